import 'dotenv/config'
import { AssetRegistry } from '../src/registry/asset_registry.js'
import { ClockSequence } from '../src/registry/sequence_source.js'
import { AuthProviderFactory } from '../src/auth/auth_provider_factory.js'
import { RegistryEngine } from '../src/engine/registry_engine.js'
import { createRegistryStore, loadRegistryConfig } from '../src/config/registry_config.js'
import { setupGracefulShutdown } from '../src/utils/graceful_shutdown.js'
import { Logger } from '../src/utils/logger.js'

/**
 * Standalone registry server configured from the environment (and a .env file).
 *
 * Minimal .env:
 * - REGISTRY_ADMINISTRATOR=ST1ADMIN
 * - REGISTRY_STORE=sqlite
 * - REGISTRY_SQLITE_FILE=./registry.sqlite
 * - AUTH_MODE=gateway
 */
const config = loadRegistryConfig()
const logger = new Logger('RegistryServer', config.logLevel)

const registry = await AssetRegistry.initialize(createRegistryStore(config.store), {
    administrator: config.administrator,
    logger: logger.child('AssetRegistry')
})

const engine = new RegistryEngine({
    registry,
    auth: AuthProviderFactory.create(config.auth),
    sequence: new ClockSequence(config.blockIntervalMs),
    basePath: config.basePath,
    server: config.server,
    corsOrigin: config.corsOrigin,
    logger: logger.child('RegistryEngine')
})

setupGracefulShutdown(engine, { logger: message => logger.info(message) })

await engine.start()
