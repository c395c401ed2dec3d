// Registry
export { AssetRegistry, type RegistryInitOptions } from './registry/asset_registry.js'
export { ClockSequence, ManualSequence, type SequenceSource } from './registry/sequence_source.js'

// Types
export type {
    Principal,
    AssetId,
    AssetContent,
    AssetRecord,
    AccessEntry,
    AccessStatus,
    RegistryStatistics,
    CallContext
} from './types/registry.js'

// Stores
export { RegistryStore, type RegistryTransaction } from './store/registry_store.js'
export { MemoryRegistryStore } from './store/adapters/memory_registry_store.js'
export {
    KnexRegistryStore,
    REGISTRY_TABLES,
    type PostgreSQLConfig,
    type SQLiteConfig
} from './store/adapters/knex_registry_store.js'

// Errors
export * from './errors/index.js'

// Validation
export * from './validation/index.js'

// Auth
export * from './auth/index.js'

// HTTP
export type { DataResponse, Endpoint, EndpointRouter, HttpMethod, RegistryRequest, Servable } from './http/types.js'
export { HttpStatus, jsonResponse, successResponse } from './http/http_responses.js'
export { exposeEndpoints } from './http/endpoints.js'
export { RegistryHandler, parseAssetId, type RegistryHandlerOptions } from './http/registry_handler.js'
export { RegistryEngine, type RegistryEngineOptions } from './engine/registry_engine.js'

// Configuration
export { Env, type EnvSource } from './env/env.js'
export {
    loadRegistryConfig,
    createRegistryStore,
    STORE_KINDS,
    AUTH_MODES,
    type RegistryConfig,
    type StoreConfig
} from './config/registry_config.js'

// Utilities
export { Logger, LogLevel, parseLogLevel, type LogLevelName } from './utils/logger.js'
export { setupGracefulShutdown, type ShutdownOptions } from './utils/graceful_shutdown.js'
