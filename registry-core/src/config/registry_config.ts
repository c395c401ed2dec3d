/**
 * @fileoverview Registry configuration read from environment variables
 */

import type { AuthMode, AuthProviderConfig, JwtConfig } from '../auth/auth_provider.js'
import { AuthProviderFactory } from '../auth/auth_provider_factory.js'
import type { Principal } from '../types/registry.js'
import type { RegistryStore } from '../store/registry_store.js'
import type { PostgreSQLConfig } from '../store/adapters/knex_registry_store.js'
import { KnexRegistryStore } from '../store/adapters/knex_registry_store.js'
import { MemoryRegistryStore } from '../store/adapters/memory_registry_store.js'
import { Env, type EnvSource } from '../env/env.js'
import { LogLevel, parseLogLevel } from '../utils/logger.js'

export const STORE_KINDS = ['memory', 'sqlite', 'postgresql'] as const
export const AUTH_MODES = ['gateway', 'jwt', 'none'] as const satisfies readonly AuthMode[]

export type StoreConfig =
    | { kind: 'memory' }
    | { kind: 'sqlite'; filename: string }
    | { kind: 'postgresql'; connection: PostgreSQLConfig }

export interface RegistryConfig {
    administrator: Principal
    store: StoreConfig
    server: { port: number; host: string }
    basePath: string
    auth: AuthProviderConfig
    /** Milliseconds per block for the clock-driven sequence */
    blockIntervalMs: number
    corsOrigin: string | boolean
    logLevel: LogLevel
}

/**
 * | Variable                    | Default            |
 * |-----------------------------|--------------------|
 * | REGISTRY_ADMINISTRATOR      | required           |
 * | REGISTRY_STORE              | sqlite             |
 * | REGISTRY_SQLITE_FILE        | ./registry.sqlite  |
 * | PG_HOST, PG_USER, PG_PASSWORD, PG_DATABASE | required for postgresql |
 * | PG_PORT                     | 5432               |
 * | REGISTRY_PORT               | 3000               |
 * | REGISTRY_HOST               | 0.0.0.0            |
 * | REGISTRY_BASE_PATH          | /registry          |
 * | AUTH_MODE                   | gateway            |
 * | REGISTRY_BLOCK_INTERVAL_MS  | 1000               |
 * | CORS_ORIGIN                 | reflect origin     |
 * | REGISTRY_LOG_LEVEL          | info               |
 *
 * @throws {ConfigurationError} On a missing or malformed variable
 */
export function loadRegistryConfig(rawEnv: EnvSource = process.env): RegistryConfig {
    const env = new Env(rawEnv)

    return {
        administrator: env.string('REGISTRY_ADMINISTRATOR'),
        store: readStoreConfig(env),
        server: {
            port: env.number('REGISTRY_PORT', { integer: true, min: 0, max: 65535, default: 3000 }),
            host: env.string('REGISTRY_HOST', { default: '0.0.0.0' })
        },
        basePath: env.string('REGISTRY_BASE_PATH', { default: '/registry' }),
        auth: readAuthConfig(env),
        blockIntervalMs: env.number('REGISTRY_BLOCK_INTERVAL_MS', { integer: true, min: 1, default: 1000 }),
        corsOrigin: env.string('CORS_ORIGIN', { optional: true }) ?? true,
        logLevel: parseLogLevel(env.string('REGISTRY_LOG_LEVEL', { default: 'info' }))
    }
}

function readStoreConfig(env: Env): StoreConfig {
    const kind = env.enum('REGISTRY_STORE', STORE_KINDS, { default: 'sqlite' })

    switch (kind) {
        case 'memory':
            return { kind }
        case 'sqlite':
            return { kind, filename: env.string('REGISTRY_SQLITE_FILE', { default: './registry.sqlite' }) }
        case 'postgresql':
            return {
                kind,
                connection: {
                    host: env.string('PG_HOST'),
                    port: env.number('PG_PORT', { integer: true, default: 5432 }),
                    user: env.string('PG_USER'),
                    password: env.string('PG_PASSWORD'),
                    database: env.string('PG_DATABASE')
                }
            }
    }
}

function readAuthConfig(env: Env): AuthProviderConfig {
    const mode = env.enum('AUTH_MODE', AUTH_MODES, { default: 'gateway' })

    if (mode !== 'jwt') {
        return {
            mode,
            gatewayHeader: env.string('AUTH_GATEWAY_HEADER', { optional: true }),
            anonymousPrincipal: env.string('AUTH_ANONYMOUS_PRINCIPAL', { optional: true })
        }
    }

    const publicKeyFile = env.string('JWT_PUBLIC_KEY_FILE', { optional: true })
    const jwt: JwtConfig = {
        secret: env.string('JWT_SECRET', { optional: true }),
        publicKey: publicKeyFile ? AuthProviderFactory.readPublicKey(publicKeyFile) : undefined,
        algorithm: env.string('JWT_ALGORITHM', { optional: true }),
        issuer: env.string('JWT_ISSUER', { optional: true }),
        audience: env.string('JWT_AUDIENCE', { optional: true }),
        principalClaim: env.string('JWT_PRINCIPAL_CLAIM', { optional: true })
    }
    return { mode, jwt }
}

/**
 * Opens the store named by the configuration. Call `migrate()` (or
 * `AssetRegistry.initialize`) before use.
 */
export function createRegistryStore(config: StoreConfig): RegistryStore {
    switch (config.kind) {
        case 'memory':
            return new MemoryRegistryStore()
        case 'sqlite':
            return KnexRegistryStore.forSQLite({ filename: config.filename })
        case 'postgresql':
            return KnexRegistryStore.forPostgreSQL(config.connection)
    }
}
