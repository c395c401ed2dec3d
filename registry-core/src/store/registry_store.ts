/**
 * @fileoverview Persistence abstraction for registry state
 *
 * The registry state is two keyed maps (assets, access entries) plus a meta
 * row holding the creation counter and the administrator. Every registry
 * operation runs inside a single `transaction()` call: either all of its
 * writes are committed or none are.
 */

import type { AccessEntry, AssetId, AssetRecord, Principal } from '../types/registry.js'

/**
 * Operations available inside one atomic unit of work.
 *
 * Records passed in and handed out are copies; the store keeps the only
 * authoritative instance.
 */
export interface RegistryTransaction {
    /**
     * Looks up an asset record.
     * @returns The record, or undefined when no asset holds this id
     */
    getAsset(assetId: AssetId): Promise<AssetRecord | undefined>

    /**
     * Inserts a new record.
     * @throws DuplicateEntryError if the id is already present
     */
    insertAsset(record: AssetRecord): Promise<void>

    /** Overwrites the stored record with the same id. */
    replaceAsset(record: AssetRecord): Promise<void>

    deleteAsset(assetId: AssetId): Promise<void>

    /**
     * Reads the read-permission flag for a pair.
     * @returns undefined when no entry exists for the pair
     */
    getReadAccess(assetId: AssetId, principal: Principal): Promise<boolean | undefined>

    /** Creates or overwrites an access entry. */
    setReadAccess(entry: AccessEntry): Promise<void>

    /** Last identifier handed out, 0 before the first creation. */
    getLastAssetId(): Promise<number>

    /**
     * Increments the creation counter and returns the new value.
     * Rolled back with the rest of the transaction on failure.
     */
    advanceAssetCounter(): Promise<AssetId>

    getAdministrator(): Promise<Principal | null>

    setAdministrator(administrator: Principal): Promise<void>
}

/**
 * Abstract store backing an AssetRegistry.
 *
 * @example
 * ```typescript
 * const store = KnexRegistryStore.forSQLite({ filename: './data/registry.db' })
 * await store.migrate()
 *
 * const owner = await store.transaction(async tx => {
 *     const record = await tx.getAsset(1)
 *     return record?.owner
 * })
 * ```
 */
export abstract class RegistryStore {
    /**
     * Creates tables or initial state if missing. Safe to call repeatedly.
     */
    abstract migrate(): Promise<void>

    /**
     * Runs `work` atomically. Transactions never interleave: the next one
     * starts after the previous has committed or rolled back.
     *
     * @returns The value returned by `work`, once committed
     * @throws Whatever `work` throws, after rolling back its writes
     */
    abstract transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T>

    /**
     * Releases connections held by the store.
     */
    abstract close(): Promise<void>
}
