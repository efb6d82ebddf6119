import path from 'node:path';
import type { SaveSentinelConfig } from '../config/json-config.js';
import { ConfigProfileSource, type ProfileSource } from '../config/profile-source.js';
import { EntityLockRegistry } from '../services/entity-lock.js';
import { OperationPool } from '../services/operation-pool.js';
import {
    OWNER_LOCK_NAME,
    claimProcessLock,
    type LockOwner,
    type ProcessLock,
    type ProcessLockOptions,
} from '../services/process-lock.js';
import { SnapshotEngine } from '../services/snapshot-engine.js';
import { WatchManager } from '../services/watch-manager.js';
import { logThought } from '../utils/logger.js';

export interface Runtime {
    profiles: ProfileSource;
    locks: EntityLockRegistry;
    pool: OperationPool;
    engine: SnapshotEngine;
    manager: WatchManager;
}

/**
 * Wire the backup core from a loaded config and register every profile.
 * Throws {@link ProfileValidationError} when a configured entity is invalid.
 */
export function createRuntime(config: SaveSentinelConfig): Runtime {
    const profiles = new ConfigProfileSource(config);
    const locks = new EntityLockRegistry();
    const pool = new OperationPool(config.runtime.maxConcurrentOperations);
    const engine = new SnapshotEngine({
        locks,
        pool,
        manualWaitMs: config.runtime.manualWaitMs,
        safetyRetentionLimit: config.defaults.safetyRetentionLimit,
    });
    const manager = new WatchManager({ engine, watchRetry: config.runtime.watchRetry });

    for (const profile of profiles.listProfiles()) {
        manager.addEntity(profile);
    }
    void logThought(`[Runtime] Registered ${profiles.listProfiles().length} entities.`);

    return { profiles, locks, pool, engine, manager };
}

export type BackupDirClaim =
    | { ok: true; locks: ProcessLock[] }
    | { ok: false; entityId: string; path: string; owner: LockOwner | null };

/**
 * Claim every entity's backup directory for this process. Another live
 * process holding any of them (a daemon, or a second one-shot command) fails
 * the whole claim, and the locks taken so far are released.
 */
export async function claimBackupDirs(runtime: Runtime, options: ProcessLockOptions = {}): Promise<BackupDirClaim> {
    const locks: ProcessLock[] = [];
    for (const profile of runtime.profiles.listProfiles()) {
        const lockPath = path.join(runtime.engine.entityBackupDir(profile), OWNER_LOCK_NAME);
        const claim = await claimProcessLock(lockPath, options);
        if (!claim.ok) {
            await releaseAll(locks);
            return { ok: false, entityId: profile.id, path: claim.path, owner: claim.owner };
        }
        locks.push(claim.lock);
    }
    return { ok: true, locks };
}

export async function releaseAll(locks: readonly ProcessLock[]): Promise<void> {
    await Promise.all(locks.map((lock) => lock.release()));
}
