/**
 * @fileoverview Public surface of the asset registry
 *
 * Composes the Asset Store and the Access Control Layer over one
 * RegistryStore. Each operation runs in a single store transaction, so it
 * either commits all of its writes or none of them.
 */

import type {
    AccessStatus,
    AssetContent,
    AssetId,
    AssetRecord,
    CallContext,
    Principal,
    RegistryStatistics
} from '../types/registry.js'
import type { RegistryStore } from '../store/registry_store.js'
import { ConfigurationError } from '../errors/index.js'
import { assertPrincipal } from '../validation/asset_rules.js'
import { Logger } from '../utils/logger.js'
import { AssetStore } from './asset_store.js'
import { AccessControl } from './access_control.js'

export interface RegistryInitOptions {
    /** Identity recorded as system administrator on first initialization */
    administrator: Principal
    logger?: Logger
}

/**
 * Single-ledger registry of asset metadata records with owner-gated writes
 * and an access list on the read path.
 *
 * @example
 * ```typescript
 * const registry = await AssetRegistry.initialize(new MemoryRegistryStore(), {
 *     administrator: 'ST1ADMIN'
 * })
 *
 * const ctx = { caller: 'ST1ALICE', blockHeight: 42 }
 * const assetId = await registry.createDigitalAsset(ctx, {
 *     name: 'doc',
 *     sizeBytes: 100,
 *     description: 'x',
 *     tags: ['a']
 * })
 *
 * const record = await registry.getAssetInformation(ctx, assetId)
 * ```
 */
export class AssetRegistry {
    readonly #store: RegistryStore
    readonly #logger: Logger
    readonly #assets = new AssetStore()
    readonly #access = new AccessControl()

    private constructor(store: RegistryStore, logger: Logger) {
        this.#store = store
        this.#logger = logger
    }

    /**
     * Prepares the store and records the administrator once.
     *
     * Re-initializing a store that already has an administrator keeps the
     * recorded one.
     *
     * @throws ConfigurationError if the administrator is not a well-formed principal
     */
    static async initialize(store: RegistryStore, options: RegistryInitOptions): Promise<AssetRegistry> {
        const logger = options.logger ?? new Logger('AssetRegistry')
        const administrator = assertPrincipal(options.administrator, 'administrator', ConfigurationError)

        await store.migrate()

        const recorded = await store.transaction(async tx => {
            const existing = await tx.getAdministrator()
            if (existing !== null) return existing
            await tx.setAdministrator(administrator)
            return administrator
        })

        if (recorded !== administrator) {
            logger.warn(`Registry already initialized by ${recorded}, keeping it as administrator`, {
                requested: administrator
            })
        }

        logger.info('Registry ready', { administrator: recorded })
        return new AssetRegistry(store, logger)
    }

    // ========== Asset Store operations ==========

    /**
     * Registers a new asset owned by the caller and grants the caller read access.
     *
     * @returns The new asset id (previous highest id + 1)
     * @throws InvalidParametersError, CapacityExceededError, FormatValidationError
     */
    async createDigitalAsset(ctx: CallContext, content: AssetContent): Promise<AssetId> {
        const assetId = await this.#store.transaction(async tx => {
            const id = await this.#assets.create(tx, ctx, content)
            await this.#access.recordCreatorGrant(tx, id, ctx.caller)
            return id
        })

        this.#logger.info('Asset created', { assetId, owner: ctx.caller, blockHeight: ctx.blockHeight })
        return assetId
    }

    /**
     * Replaces the content fields of an asset; owner and creation height stay.
     *
     * @throws AssetNotFoundError, PermissionDeniedError, then the field errors of createDigitalAsset
     */
    async updateDigitalAsset(ctx: CallContext, assetId: AssetId, content: AssetContent): Promise<true> {
        await this.#store.transaction(tx => this.#assets.update(tx, ctx, assetId, content))

        this.#logger.info('Asset updated', { assetId, caller: ctx.caller })
        return true
    }

    /**
     * Hands the asset to another principal. Access entries are left as they are.
     *
     * @throws AssetNotFoundError, PermissionDeniedError, InvalidParametersError
     */
    async transferAssetOwnership(ctx: CallContext, assetId: AssetId, newOwner: Principal): Promise<true> {
        await this.#store.transaction(tx => this.#assets.transfer(tx, ctx, assetId, newOwner))

        this.#logger.info('Asset ownership transferred', { assetId, from: ctx.caller, to: newOwner })
        return true
    }

    /**
     * @throws AssetNotFoundError, PermissionDeniedError
     */
    async deleteDigitalAsset(ctx: CallContext, assetId: AssetId): Promise<true> {
        await this.#store.transaction(tx => this.#assets.delete(tx, ctx, assetId))

        this.#logger.info('Asset deleted', { assetId, caller: ctx.caller })
        return true
    }

    // ========== Read path ==========

    /**
     * @throws AssetNotFoundError
     * @throws ContentRestrictedError unless the caller owns the asset or holds a read grant
     */
    async getAssetInformation(ctx: CallContext, assetId: AssetId): Promise<AssetRecord> {
        return this.#store.transaction(async tx => {
            const record = await this.#assets.require(tx, assetId)
            await this.#access.assertCanRead(tx, record, ctx.caller)
            return record
        })
    }

    /**
     * Reports how `principal` relates to the asset. Any caller may ask.
     *
     * @throws AssetNotFoundError
     */
    async verifyAccessStatus(ctx: CallContext, assetId: AssetId, principal: Principal): Promise<AccessStatus> {
        const status = await this.#store.transaction(async tx => {
            const record = await this.#assets.require(tx, assetId)
            return this.#access.status(tx, record, principal)
        })

        this.#logger.debug('Access status queried', { assetId, principal, caller: ctx.caller })
        return status
    }

    /**
     * @throws AssetNotFoundError
     */
    async getAssetOwner(_ctx: CallContext, assetId: AssetId): Promise<Principal> {
        return this.#store.transaction(async tx => {
            const record = await this.#assets.require(tx, assetId)
            return record.owner
        })
    }

    async getRegistryStatistics(_ctx: CallContext): Promise<RegistryStatistics> {
        return this.#store.transaction(async tx => {
            const totalAssetsRegistered = await this.#assets.totalRegistered(tx)
            const systemAdministrator = await tx.getAdministrator()
            if (systemAdministrator === null) {
                throw new ConfigurationError('Registry store has no administrator recorded')
            }
            return { totalAssetsRegistered, systemAdministrator }
        })
    }

    /**
     * Releases the underlying store. The registry is unusable afterwards.
     */
    async close(): Promise<void> {
        await this.#store.close()
    }
}
