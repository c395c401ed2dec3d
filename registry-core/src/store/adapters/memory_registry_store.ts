import type { AccessEntry, AssetId, AssetRecord, Principal } from '../../types/registry.js'
import type { RegistryTransaction } from '../registry_store.js'
import { RegistryStore } from '../registry_store.js'
import { DatabaseError, DuplicateEntryError } from '../../errors/index.js'

interface MemoryState {
    assets: Map<AssetId, AssetRecord>
    access: Map<AssetId, Map<Principal, boolean>>
    lastAssetId: number
    administrator: Principal | null
}

function copyRecord(record: AssetRecord): AssetRecord {
    return { ...record, tags: [...record.tags] }
}

function emptyState(): MemoryState {
    return { assets: new Map(), access: new Map(), lastAssetId: 0, administrator: null }
}

class MemoryRegistryTransaction implements RegistryTransaction {
    #open = true
    /** Restores the prior value of each touched key, newest first on rollback */
    readonly #undo: Array<() => void> = []

    constructor(private readonly state: MemoryState) {}

    close(): void {
        this.#open = false
    }

    rollback(): void {
        for (const restore of this.#undo.reverse()) {
            restore()
        }
        this.#undo.length = 0
    }

    #ensureOpen(): void {
        if (!this.#open) {
            throw new DatabaseError('Transaction already finished')
        }
    }

    #rememberAsset(assetId: AssetId): void {
        const previous = this.state.assets.get(assetId)
        this.#undo.push(() => {
            if (previous) {
                this.state.assets.set(assetId, previous)
            } else {
                this.state.assets.delete(assetId)
            }
        })
    }

    async getAsset(assetId: AssetId): Promise<AssetRecord | undefined> {
        this.#ensureOpen()
        const record = this.state.assets.get(assetId)
        return record ? copyRecord(record) : undefined
    }

    async insertAsset(record: AssetRecord): Promise<void> {
        this.#ensureOpen()
        if (this.state.assets.has(record.assetId)) {
            throw new DuplicateEntryError(`Asset ${record.assetId} already exists`, { assetId: record.assetId })
        }
        this.#rememberAsset(record.assetId)
        this.state.assets.set(record.assetId, copyRecord(record))
    }

    async replaceAsset(record: AssetRecord): Promise<void> {
        this.#ensureOpen()
        this.#rememberAsset(record.assetId)
        this.state.assets.set(record.assetId, copyRecord(record))
    }

    async deleteAsset(assetId: AssetId): Promise<void> {
        this.#ensureOpen()
        this.#rememberAsset(assetId)
        this.state.assets.delete(assetId)
    }

    async getReadAccess(assetId: AssetId, principal: Principal): Promise<boolean | undefined> {
        this.#ensureOpen()
        return this.state.access.get(assetId)?.get(principal)
    }

    async setReadAccess(entry: AccessEntry): Promise<void> {
        this.#ensureOpen()
        let entries = this.state.access.get(entry.assetId)
        if (!entries) {
            entries = new Map()
            this.state.access.set(entry.assetId, entries)
        }

        const target = entries
        const previous = target.get(entry.principal)
        this.#undo.push(() => {
            if (previous === undefined) {
                target.delete(entry.principal)
            } else {
                target.set(entry.principal, previous)
            }
            if (target.size === 0) {
                this.state.access.delete(entry.assetId)
            }
        })

        target.set(entry.principal, entry.readEnabled)
    }

    async getLastAssetId(): Promise<number> {
        this.#ensureOpen()
        return this.state.lastAssetId
    }

    async advanceAssetCounter(): Promise<AssetId> {
        this.#ensureOpen()
        const previous = this.state.lastAssetId
        this.#undo.push(() => {
            this.state.lastAssetId = previous
        })
        this.state.lastAssetId += 1
        return this.state.lastAssetId
    }

    async getAdministrator(): Promise<Principal | null> {
        this.#ensureOpen()
        return this.state.administrator
    }

    async setAdministrator(administrator: Principal): Promise<void> {
        this.#ensureOpen()
        const previous = this.state.administrator
        this.#undo.push(() => {
            this.state.administrator = previous
        })
        this.state.administrator = administrator
    }
}

/**
 * In-process registry store.
 *
 * Transactions write to the live state and keep an undo log of the keys they
 * touch; a failure replays the log, so nothing is left behind. Transactions
 * are queued and run one at a time.
 */
export class MemoryRegistryStore extends RegistryStore {
    readonly #state: MemoryState = emptyState()
    #queue: Promise<unknown> = Promise.resolve()

    async migrate(): Promise<void> {
        // nothing to create
    }

    transaction<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
        const run = this.#queue.then(() => this.#runIsolated(work))
        // The caller observes failures through `run`; the queue only needs to keep going.
        this.#queue = run.then(
            () => undefined,
            () => undefined
        )
        return run
    }

    async close(): Promise<void> {
        await this.#queue
    }

    async #runIsolated<T>(work: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
        const tx = new MemoryRegistryTransaction(this.#state)
        try {
            return await work(tx)
        } catch (error) {
            tx.rollback()
            throw error
        } finally {
            tx.close()
        }
    }
}
