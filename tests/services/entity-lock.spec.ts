import { afterEach, describe, expect, it, vi } from 'vitest';
import { EntityLockRegistry } from '../../src/services/entity-lock.js';

describe('EntityLockRegistry', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('grants the lock once and refuses a second non-blocking attempt', () => {
        const locks = new EntityLockRegistry();
        const lease = locks.tryAcquire('stardew', 'snapshot');

        expect(lease).not.toBeNull();
        expect(locks.tryAcquire('stardew', 'restore')).toBeNull();
        expect(locks.holder('stardew')).toBe('snapshot');
    });

    it('keeps different entities independent', () => {
        const locks = new EntityLockRegistry();
        locks.tryAcquire('stardew', 'snapshot');

        expect(locks.tryAcquire('celeste', 'snapshot')).not.toBeNull();
    });

    it('treats release as idempotent', () => {
        const locks = new EntityLockRegistry();
        const first = locks.tryAcquire('stardew', 'snapshot');
        first?.release();
        const second = locks.tryAcquire('stardew', 'restore');

        first?.release();

        expect(first?.active).toBe(false);
        expect(second?.active).toBe(true);
        expect(locks.holder('stardew')).toBe('restore');
    });

    it('hands the lock to waiters in arrival order', async () => {
        const locks = new EntityLockRegistry();
        const holder = locks.tryAcquire('stardew', 'snapshot');
        const order: string[] = [];

        const restore = locks.acquire('stardew', 'restore', 1000).then((lease) => {
            order.push(`restore:${lease?.operation}`);
            return lease;
        });
        const manual = locks.acquire('stardew', 'snapshot', 1000).then((lease) => {
            order.push(`snapshot:${lease?.operation}`);
            return lease;
        });

        holder?.release();
        const restoreLease = await restore;
        expect(locks.holder('stardew')).toBe('restore');
        restoreLease?.release();
        await manual;

        expect(order).toEqual(['restore:restore', 'snapshot:snapshot']);
    });

    it('drops a waiter that timed out and never grants it later', async () => {
        vi.useFakeTimers();
        const locks = new EntityLockRegistry();
        const holder = locks.tryAcquire('stardew', 'snapshot');

        const pending = locks.acquire('stardew', 'snapshot', 500);
        vi.advanceTimersByTime(500);
        await expect(pending).resolves.toBeNull();

        holder?.release();
        expect(locks.isHeld('stardew')).toBe(false);
    });

    it('resolves whenIdle once the last holder releases', async () => {
        const locks = new EntityLockRegistry();
        const lease = locks.tryAcquire('stardew', 'restore');
        let idle = false;
        const waiting = locks.whenIdle('stardew').then(() => {
            idle = true;
        });

        await Promise.resolve();
        expect(idle).toBe(false);

        lease?.release();
        await waiting;
        expect(idle).toBe(true);
    });

    it('notifies release listeners and survives a throwing one', () => {
        const locks = new EntityLockRegistry();
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const released: string[] = [];
        locks.onRelease(() => {
            throw new Error('listener failure');
        });
        const unsubscribe = locks.onRelease((entityId, operation) => {
            released.push(`${entityId}:${operation}`);
        });

        locks.tryAcquire('stardew', 'snapshot')?.release();
        unsubscribe();
        locks.tryAcquire('stardew', 'restore')?.release();

        expect(released).toEqual(['stardew:snapshot']);
        expect(errorSpy).toHaveBeenCalledTimes(2);
    });
});
