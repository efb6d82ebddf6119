import type { LockOperation } from '../types/backup.js';

/** Proof that the caller currently holds an entity's exclusive lock. */
export interface LockLease {
    readonly entityId: string;
    readonly operation: LockOperation;
    readonly acquiredAt: number;
    readonly active: boolean;
    /** Idempotent. */
    release(): void;
}

export type LockReleaseListener = (entityId: string, operation: LockOperation) => void;

interface Waiter {
    operation: LockOperation;
    resolve: (lease: LockLease | null) => void;
    timer: ReturnType<typeof setTimeout> | null;
}

class Lease implements LockLease {
    readonly entityId: string;
    readonly operation: LockOperation;
    readonly acquiredAt: number = Date.now();
    #released = false;
    readonly #onRelease: (lease: Lease) => void;

    constructor(entityId: string, operation: LockOperation, onRelease: (lease: Lease) => void) {
        this.entityId = entityId;
        this.operation = operation;
        this.#onRelease = onRelease;
    }

    get active(): boolean {
        return !this.#released;
    }

    release(): void {
        if (this.#released) return;
        this.#released = true;
        this.#onRelease(this);
    }
}

/**
 * Per-entity exclusive locks shared by the snapshot engine and the restore
 * coordinator. Locks for different entities are independent; waiters for one
 * entity are served in arrival order.
 */
export class EntityLockRegistry {
    readonly #holders: Map<string, Lease> = new Map();
    readonly #waiters: Map<string, Waiter[]> = new Map();
    readonly #idleWaiters: Map<string, Array<() => void>> = new Map();
    readonly #releaseListeners: Set<LockReleaseListener> = new Set();

    /** Take the lock if it is free; never waits. */
    tryAcquire(entityId: string, operation: LockOperation): LockLease | null {
        if (this.#holders.has(entityId)) {
            return null;
        }
        return this.#grant(entityId, operation);
    }

    /**
     * Wait up to `timeoutMs` for the lock. Resolves `null` on timeout; a
     * timed-out waiter is dropped and never granted the lock later.
     */
    acquire(entityId: string, operation: LockOperation, timeoutMs: number): Promise<LockLease | null> {
        const immediate = this.tryAcquire(entityId, operation);
        if (immediate) {
            return Promise.resolve(immediate);
        }
        if (timeoutMs <= 0) {
            return Promise.resolve(null);
        }

        return new Promise((resolve) => {
            const waiter: Waiter = { operation, resolve, timer: null };
            waiter.timer = setTimeout(() => {
                this.#removeWaiter(entityId, waiter);
                resolve(null);
            }, timeoutMs);

            const queue = this.#waiters.get(entityId) ?? [];
            queue.push(waiter);
            this.#waiters.set(entityId, queue);
        });
    }

    holder(entityId: string): LockOperation | null {
        return this.#holders.get(entityId)?.operation ?? null;
    }

    isHeld(entityId: string): boolean {
        return this.#holders.has(entityId);
    }

    /** Resolves once nobody holds or waits for the entity's lock. */
    whenIdle(entityId: string): Promise<void> {
        if (!this.#isBusy(entityId)) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            const queue = this.#idleWaiters.get(entityId) ?? [];
            queue.push(resolve);
            this.#idleWaiters.set(entityId, queue);
        });
    }

    /** Subscribe to lock releases. Returns an unsubscribe function. */
    onRelease(listener: LockReleaseListener): () => void {
        this.#releaseListeners.add(listener);
        return () => {
            this.#releaseListeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #grant(entityId: string, operation: LockOperation): Lease {
        const lease = new Lease(entityId, operation, (released) => this.#handleRelease(released));
        this.#holders.set(entityId, lease);
        return lease;
    }

    #handleRelease(lease: Lease): void {
        if (this.#holders.get(lease.entityId) !== lease) {
            return;
        }
        this.#holders.delete(lease.entityId);

        const queue = this.#waiters.get(lease.entityId);
        const next = queue?.shift();
        if (queue && queue.length === 0) {
            this.#waiters.delete(lease.entityId);
        }
        if (next) {
            if (next.timer) clearTimeout(next.timer);
            next.resolve(this.#grant(lease.entityId, next.operation));
        } else {
            const idle = this.#idleWaiters.get(lease.entityId) ?? [];
            this.#idleWaiters.delete(lease.entityId);
            for (const resolve of idle) {
                resolve();
            }
        }

        for (const listener of this.#releaseListeners) {
            try {
                listener(lease.entityId, lease.operation);
            } catch (err) {
                console.error('[EntityLock] Release listener threw an error:', err);
            }
        }
    }

    #removeWaiter(entityId: string, waiter: Waiter): void {
        const queue = this.#waiters.get(entityId);
        if (!queue) return;
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0) {
            this.#waiters.delete(entityId);
            if (!this.#holders.has(entityId)) {
                const idle = this.#idleWaiters.get(entityId) ?? [];
                this.#idleWaiters.delete(entityId);
                for (const resolve of idle) resolve();
            }
        }
    }

    #isBusy(entityId: string): boolean {
        return this.#holders.has(entityId) || (this.#waiters.get(entityId)?.length ?? 0) > 0;
    }
}
