/**
 * @fileoverview Access Control Layer
 *
 * Per-asset, per-principal read flags layered on top of ownership. Only the
 * read path consults this layer; owner-gated writes check ownership directly.
 */

import type { AccessStatus, AssetId, AssetRecord, Principal } from '../types/registry.js'
import type { RegistryTransaction } from '../store/registry_store.js'
import { ContentRestrictedError } from '../errors/index.js'

export class AccessControl {
    /**
     * Explicit read grant for the pair; a missing entry counts as no grant.
     */
    async hasGrantedAccess(tx: RegistryTransaction, assetId: AssetId, principal: Principal): Promise<boolean> {
        const readEnabled = await tx.getReadAccess(assetId, principal)
        return readEnabled ?? false
    }

    /**
     * The one automatic grant: the creator may read the asset it registered.
     */
    async recordCreatorGrant(tx: RegistryTransaction, assetId: AssetId, creator: Principal): Promise<void> {
        await tx.setReadAccess({ assetId, principal: creator, readEnabled: true })
    }

    async status(tx: RegistryTransaction, record: AssetRecord, principal: Principal): Promise<AccessStatus> {
        const hasGrantedAccess = await this.hasGrantedAccess(tx, record.assetId, principal)
        const isAssetOwner = record.owner === principal

        return {
            hasGrantedAccess,
            isAssetOwner,
            canReadAsset: hasGrantedAccess || isAssetOwner
        }
    }

    /**
     * @throws ContentRestrictedError unless the principal owns the asset or holds a read grant
     */
    async assertCanRead(tx: RegistryTransaction, record: AssetRecord, principal: Principal): Promise<void> {
        const { canReadAsset } = await this.status(tx, record, principal)
        if (!canReadAsset) {
            throw new ContentRestrictedError(`Read access to asset ${record.assetId} is restricted`, {
                assetId: record.assetId,
                caller: principal
            })
        }
    }
}
