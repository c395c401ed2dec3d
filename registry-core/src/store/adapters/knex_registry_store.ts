import type { Knex } from 'knex'
import knex from 'knex'
import type BetterSqlite3 from 'better-sqlite3'
import type { AccessEntry, AssetId, AssetRecord, Principal } from '../../types/registry.js'
import type { RegistryTransaction } from '../registry_store.js'
import { RegistryStore } from '../registry_store.js'
import { DatabaseError, DuplicateEntryError, isRegistryError, wrapError } from '../../errors/index.js'

export interface PostgreSQLConfig {
    host: string
    port?: number
    user: string
    password: string
    database: string
    ssl?: boolean
}

export interface SQLiteConfig {
    filename: string
    busyTimeout?: number
}

export const REGISTRY_TABLES = {
    assets: 'registry_assets',
    access: 'registry_access',
    meta: 'registry_meta'
} as const

const META_ROW_ID = 1

/** pg hands bigint columns back as strings */
type BigIntValue = number | string

interface AssetRow {
    asset_id: BigIntValue
    name: string
    owner: string
    size_bytes: number
    created_at: BigIntValue
    description: string
    /** JSON-encoded string array */
    tags: string
}

interface AccessRow {
    asset_id: BigIntValue
    principal: string
    /** SQLite hands booleans back as 0/1 */
    read_enabled: boolean | number
}

interface MetaRow {
    id: number
    last_asset_id: BigIntValue
    administrator: string | null
}

function toRow(record: AssetRecord): AssetRow {
    return {
        asset_id: record.assetId,
        name: record.name,
        owner: record.owner,
        size_bytes: record.sizeBytes,
        created_at: record.createdAt,
        description: record.description,
        tags: JSON.stringify(record.tags)
    }
}

function parseTags(raw: string, assetId: number): string[] {
    const parsed: unknown = JSON.parse(raw)
    if (!Array.isArray(parsed) || !parsed.every((tag): tag is string => typeof tag === 'string')) {
        throw new DatabaseError(`Stored tags of asset ${assetId} are not a string list`, { assetId })
    }
    return parsed
}

function fromRow(row: AssetRow): AssetRecord {
    const assetId = Number(row.asset_id)
    return {
        assetId,
        name: row.name,
        owner: row.owner,
        sizeBytes: Number(row.size_bytes),
        createdAt: Number(row.created_at),
        description: row.description,
        tags: parseTags(row.tags, assetId)
    }
}

/**
 * Unique-key violation as reported by better-sqlite3 or pg.
 */
function isUniqueViolation(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('code' in error)) return false
    const code = String(error.code)
    return code === '23505' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE'
}

class KnexRegistryTransaction implements RegistryTransaction {
    readonly #trx: Knex.Transaction

    constructor(trx: Knex.Transaction) {
        this.#trx = trx
    }

    async getAsset(assetId: AssetId): Promise<AssetRecord | undefined> {
        const row = await this.#trx<AssetRow>(REGISTRY_TABLES.assets).where({ asset_id: assetId }).first()
        return row ? fromRow(row) : undefined
    }

    async insertAsset(record: AssetRecord): Promise<void> {
        try {
            await this.#trx<AssetRow>(REGISTRY_TABLES.assets).insert(toRow(record))
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateEntryError(`Asset ${record.assetId} already exists`, { assetId: record.assetId })
            }
            throw error
        }
    }

    async replaceAsset(record: AssetRecord): Promise<void> {
        const { asset_id, ...fields } = toRow(record)
        await this.#trx<AssetRow>(REGISTRY_TABLES.assets).where({ asset_id }).update(fields)
    }

    async deleteAsset(assetId: AssetId): Promise<void> {
        await this.#trx<AssetRow>(REGISTRY_TABLES.assets).where({ asset_id: assetId }).delete()
    }

    async getReadAccess(assetId: AssetId, principal: Principal): Promise<boolean | undefined> {
        const row = await this.#trx<AccessRow>(REGISTRY_TABLES.access).where({ asset_id: assetId, principal }).first()
        return row ? Boolean(row.read_enabled) : undefined
    }

    async setReadAccess(entry: AccessEntry): Promise<void> {
        await this.#trx<AccessRow>(REGISTRY_TABLES.access)
            .insert({ asset_id: entry.assetId, principal: entry.principal, read_enabled: entry.readEnabled })
            .onConflict(['asset_id', 'principal'])
            .merge()
    }

    async getLastAssetId(): Promise<number> {
        const meta = await this.#meta()
        return Number(meta.last_asset_id)
    }

    async advanceAssetCounter(): Promise<AssetId> {
        // Writing before reading takes the row lock, so concurrent creators line up here.
        await this.#trx<MetaRow>(REGISTRY_TABLES.meta).where({ id: META_ROW_ID }).increment('last_asset_id', 1)
        const meta = await this.#meta()
        return Number(meta.last_asset_id)
    }

    async getAdministrator(): Promise<Principal | null> {
        const meta = await this.#meta()
        return meta.administrator
    }

    async setAdministrator(administrator: Principal): Promise<void> {
        await this.#trx<MetaRow>(REGISTRY_TABLES.meta).where({ id: META_ROW_ID }).update({ administrator })
    }

    async #meta(): Promise<MetaRow> {
        const meta = await this.#trx<MetaRow>(REGISTRY_TABLES.meta).where({ id: META_ROW_ID }).first()
        if (!meta) {
            throw new DatabaseError('Registry meta row is missing, run migrate() first')
        }
        return meta
    }
}

/**
 * Knex-backed registry store (SQLite or PostgreSQL).
 */
export class KnexRegistryStore extends RegistryStore {
    #knex: Knex

    constructor(config: Knex.Config) {
        super()
        this.#knex = knex(config)
    }

    /**
     * Create a KnexRegistryStore for PostgreSQL with simplified configuration
     */
    static forPostgreSQL(pgConfig: PostgreSQLConfig): KnexRegistryStore {
        const knexConfig: Knex.Config = {
            client: 'pg',
            connection: {
                host: pgConfig.host,
                port: pgConfig.port || 5432,
                user: pgConfig.user,
                password: pgConfig.password,
                database: pgConfig.database,
                ssl: pgConfig.ssl || false
            },
            pool: {
                min: 2,
                max: 15,
                acquireTimeoutMillis: 30000,
                createTimeoutMillis: 30000,
                destroyTimeoutMillis: 5000,
                idleTimeoutMillis: 30000,
                reapIntervalMillis: 1000
            }
        }

        return new KnexRegistryStore(knexConfig)
    }

    /**
     * Create a KnexRegistryStore for SQLite (better-sqlite3).
     *
     * A single pooled connection carries every transaction, which gives the
     * one-writer-at-a-time execution the registry expects.
     */
    static forSQLite(sqliteConfig: SQLiteConfig): KnexRegistryStore {
        const knexConfig: Knex.Config = {
            client: 'better-sqlite3',
            connection: {
                filename: sqliteConfig.filename
            },
            pool: {
                min: 1,
                max: 1,
                acquireTimeoutMillis: sqliteConfig.busyTimeout || 30000,
                afterCreate: (
                    conn: BetterSqlite3.Database,
                    done: (error: Error | null, conn: BetterSqlite3.Database) => void
                ) => {
                    conn.pragma('journal_mode = WAL')
                    conn.pragma('synchronous = NORMAL')
                    done(null, conn)
                }
            },
            useNullAsDefault: true
        }

        return new KnexRegistryStore(knexConfig)
    }

    /**
     * Direct access to the Knex instance, for diagnostics and tests.
     */
    getKnex(): Knex {
        return this.#knex
    }

    async migrate(): Promise<void> {
        // One SchemaBuilder per statement: a shared builder re-runs its queue on every await
        if (!(await this.#knex.schema.hasTable(REGISTRY_TABLES.assets))) {
            await this.#knex.schema.createTable(REGISTRY_TABLES.assets, table => {
                table.bigInteger('asset_id').primary()
                table.string('name', 64).notNullable()
                table.string('owner', 128).notNullable()
                table.integer('size_bytes').notNullable()
                table.bigInteger('created_at').notNullable()
                table.string('description', 128).notNullable()
                table.text('tags').notNullable()

                table.index('owner', `${REGISTRY_TABLES.assets}_idx_owner`)
            })
        }

        if (!(await this.#knex.schema.hasTable(REGISTRY_TABLES.access))) {
            await this.#knex.schema.createTable(REGISTRY_TABLES.access, table => {
                table.bigInteger('asset_id').notNullable()
                table.string('principal', 128).notNullable()
                table.boolean('read_enabled').notNullable()

                table.primary(['asset_id', 'principal'])
            })
        }

        if (!(await this.#knex.schema.hasTable(REGISTRY_TABLES.meta))) {
            await this.#knex.schema.createTable(REGISTRY_TABLES.meta, table => {
                table.integer('id').primary()
                table.bigInteger('last_asset_id').notNullable().defaultTo(0)
                table.string('administrator', 128).nullable()
            })
        }

        await this.#knex<MetaRow>(REGISTRY_TABLES.meta)
            .insert({ id: META_ROW_ID, last_asset_id: 0, administrator: null })
            .onConflict('id')
            .ignore()
    }

    async transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
        try {
            return await this.#knex.transaction(trx => work(new KnexRegistryTransaction(trx)))
        } catch (error) {
            if (isRegistryError(error)) throw error
            throw wrapError(error, DatabaseError)
        }
    }

    async close(): Promise<void> {
        await this.#knex.destroy()
    }
}
