/**
 * Supplies the block height recorded as `createdAt` on new assets.
 */
export interface SequenceSource {
    current(): number
}

/**
 * Derives a block height from wall-clock time: one block per `intervalMs`.
 * Never goes backwards, even if the system clock does.
 */
export class ClockSequence implements SequenceSource {
    #last = 0

    constructor(
        private readonly intervalMs: number = 1000,
        private readonly now: () => number = Date.now
    ) {
        if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
            throw new Error(`Block interval must be a positive integer, got ${intervalMs}`)
        }
    }

    current(): number {
        const height = Math.floor(this.now() / this.intervalMs)
        this.#last = Math.max(this.#last, height)
        return this.#last
    }
}

/**
 * Height driven explicitly by the host, e.g. when blocks arrive from a node.
 */
export class ManualSequence implements SequenceSource {
    #height: number

    constructor(initialHeight = 0) {
        this.#height = initialHeight
    }

    current(): number {
        return this.#height
    }

    advance(blocks = 1): number {
        this.#height += blocks
        return this.#height
    }

    set(height: number): void {
        if (height < this.#height) {
            throw new Error(`Block height cannot go back from ${this.#height} to ${height}`)
        }
        this.#height = height
    }
}
