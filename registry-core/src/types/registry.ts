/**
 * @fileoverview Core data model of the asset registry
 *
 * Records, access entries and the values returned by registry operations.
 */

/**
 * Opaque caller/owner identity supplied by the host environment.
 *
 * The registry never interprets the value beyond checking that it is
 * well-formed (see `isWellFormedPrincipal`).
 */
export type Principal = string

/** Sequential asset identifier, starting at 1 and never reused. */
export type AssetId = number

/**
 * Mutable content fields of an asset, as supplied on create and update.
 */
export interface AssetContent {
    /** Display name, 1 to 64 UTF-8 bytes */
    name: string
    /** Size of the described resource, 1 <= sizeBytes < 1,000,000,000 */
    sizeBytes: number
    /** Free-form description, 1 to 128 UTF-8 bytes */
    description: string
    /** Ordered list of 1 to 10 tags, each 1 to 32 UTF-8 bytes */
    tags: string[]
}

/**
 * A registered asset as held by the store.
 *
 * @example
 * ```typescript
 * const record: AssetRecord = {
 *   assetId: 1,
 *   name: 'terrain.glb',
 *   owner: 'ST1OWNER',
 *   sizeBytes: 2048,
 *   createdAt: 1200,
 *   description: 'Terrain mesh',
 *   tags: ['mesh', 'terrain']
 * }
 * ```
 */
export interface AssetRecord extends AssetContent {
    assetId: AssetId
    owner: Principal
    /** Block height recorded at creation time; never changes */
    createdAt: number
}

/**
 * Read-permission flag stored for an (asset, principal) pair.
 *
 * A missing entry means read access is not granted.
 */
export interface AccessEntry {
    assetId: AssetId
    principal: Principal
    readEnabled: boolean
}

/** Result of `verifyAccessStatus`. */
export interface AccessStatus {
    hasGrantedAccess: boolean
    isAssetOwner: boolean
    canReadAsset: boolean
}

/** Result of `getRegistryStatistics`. */
export interface RegistryStatistics {
    /** Cumulative number of successful creations; deletions do not lower it */
    totalAssetsRegistered: number
    systemAdministrator: Principal
}

/**
 * Per-call values supplied by the execution environment.
 */
export interface CallContext {
    /** Identity of the caller, trusted as given */
    caller: Principal
    /** Current block height (or equivalent monotonic sequence number) */
    blockHeight: number
}
