const DEFAULT_MAX_CONCURRENT = 2;

export interface OperationPoolStats {
    maxConcurrent: number;
    active: number;
    queued: number;
}

/**
 * Bounded pool for snapshot and restore I/O. Per-entity exclusivity is the
 * lock registry's job; this only caps how many copies hit the disk at once.
 */
export class OperationPool {
    readonly #maxConcurrent: number;
    readonly #queue: Array<() => void> = [];
    #active = 0;

    constructor(maxConcurrent: number = DEFAULT_MAX_CONCURRENT) {
        this.#maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.#acquireSlot();
        try {
            return await task();
        } finally {
            this.#releaseSlot();
        }
    }

    getStats(): OperationPoolStats {
        return {
            maxConcurrent: this.#maxConcurrent,
            active: this.#active,
            queued: this.#queue.length,
        };
    }

    #acquireSlot(): Promise<void> {
        if (this.#active < this.#maxConcurrent) {
            this.#active++;
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.#queue.push(() => {
                this.#active++;
                resolve();
            });
        });
    }

    #releaseSlot(): void {
        this.#active--;
        const next = this.#queue.shift();
        if (next) next();
    }
}
