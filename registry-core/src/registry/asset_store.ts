/**
 * @fileoverview Asset Store component
 *
 * Owns asset records and the creation counter. Every write goes through the
 * field rules; every owner-gated operation checks existence first, then
 * ownership, then the new values.
 */

import type { AssetContent, AssetId, AssetRecord, CallContext, Principal } from '../types/registry.js'
import type { RegistryTransaction } from '../store/registry_store.js'
import { AssetNotFoundError, PermissionDeniedError } from '../errors/index.js'
import { assertPrincipal, isAssetId, validateAssetContent } from '../validation/asset_rules.js'

export class AssetStore {
    /**
     * Validates the content, draws the next identifier and inserts the record
     * owned by the caller.
     *
     * @returns The identifier of the new record
     */
    async create(tx: RegistryTransaction, ctx: CallContext, content: AssetContent): Promise<AssetId> {
        const checked = validateAssetContent(content)
        const assetId = await tx.advanceAssetCounter()

        await tx.insertAsset({
            assetId,
            owner: ctx.caller,
            createdAt: ctx.blockHeight,
            ...checked
        })

        return assetId
    }

    /**
     * @throws AssetNotFoundError when the id is malformed or unknown
     */
    async require(tx: RegistryTransaction, assetId: AssetId): Promise<AssetRecord> {
        const record = isAssetId(assetId) ? await tx.getAsset(assetId) : undefined
        if (!record) {
            throw new AssetNotFoundError(`Asset ${String(assetId)} not found`, { assetId })
        }
        return record
    }

    /**
     * @throws AssetNotFoundError
     * @throws PermissionDeniedError when the caller is not the current owner
     */
    async requireOwned(tx: RegistryTransaction, ctx: CallContext, assetId: AssetId): Promise<AssetRecord> {
        const record = await this.require(tx, assetId)
        if (record.owner !== ctx.caller) {
            throw new PermissionDeniedError(`Only the owner of asset ${assetId} may modify it`, {
                assetId,
                caller: ctx.caller
            })
        }
        return record
    }

    async update(tx: RegistryTransaction, ctx: CallContext, assetId: AssetId, content: AssetContent): Promise<void> {
        const record = await this.requireOwned(tx, ctx, assetId)
        const checked = validateAssetContent(content)

        await tx.replaceAsset({ ...record, ...checked })
    }

    async transfer(tx: RegistryTransaction, ctx: CallContext, assetId: AssetId, newOwner: Principal): Promise<void> {
        const record = await this.requireOwned(tx, ctx, assetId)
        const owner = assertPrincipal(newOwner, 'newOwner')

        await tx.replaceAsset({ ...record, owner })
    }

    async delete(tx: RegistryTransaction, ctx: CallContext, assetId: AssetId): Promise<void> {
        await this.requireOwned(tx, ctx, assetId)
        await tx.deleteAsset(assetId)
    }

    /** Cumulative number of creations. */
    async totalRegistered(tx: RegistryTransaction): Promise<number> {
        return tx.getLastAssetId()
    }
}
