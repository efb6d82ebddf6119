import { randomUUID } from 'node:crypto';
import { rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { EntityProfile, RestoreResult, Snapshot } from '../types/backup.js';
import { RestoreError, errorMessage } from '../types/errors.js';
import type { LockLease } from './entity-lock.js';
import type { SnapshotEngine } from './snapshot-engine.js';
import { logBackupOperation, logThought } from '../utils/logger.js';

export interface RestorePaths {
  source: string;
  staged: string;
  previous: string;
}

export interface RestoreCoordinatorOptions {
  engine: SnapshotEngine;
  now?: () => Date;
  /** Runs once the snapshot is fully staged, before the live tree is touched. */
  beforeSwapForTest?: (paths: RestorePaths) => void | Promise<void>;
  /** Runs after the live tree was moved aside, before the staged tree is moved in. */
  afterLiveMovedForTest?: (paths: RestorePaths) => void | Promise<void>;
  /** Runs before the previous live tree is moved back after a failed swap. */
  beforeRollbackForTest?: (paths: RestorePaths) => void | Promise<void>;
}

export interface RestoreHooks {
  /**
   * Runs once the entity's lock is held, before any file is touched. A throw
   * fails the restore with the source left untouched.
   */
  onLeaseAcquired?: () => void | Promise<void>;
}

interface RestoreProgress {
  safetySnapshot: Snapshot | null;
  rollbackApplied: boolean;
  reinstatedFromSafety: boolean;
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Replaces an entity's source tree with the contents of a snapshot.
 *
 * The snapshot is staged beside the source first, then swapped in by two
 * renames. A safety snapshot of the live tree is taken before anything is
 * modified; when the swap fails the previous tree is moved back, and only if
 * that fails too is the safety snapshot materialized in its place. Restoring
 * a safety snapshot never lets the new safety snapshot's prune delete it.
 */
export class RestoreCoordinator {
  readonly #engine: SnapshotEngine;
  readonly #now: () => Date;
  readonly #beforeSwapForTest?: (paths: RestorePaths) => void | Promise<void>;
  readonly #afterLiveMovedForTest?: (paths: RestorePaths) => void | Promise<void>;
  readonly #beforeRollbackForTest?: (paths: RestorePaths) => void | Promise<void>;

  constructor(options: RestoreCoordinatorOptions) {
    this.#engine = options.engine;
    this.#now = options.now ?? (() => new Date());
    this.#beforeSwapForTest = options.beforeSwapForTest;
    this.#afterLiveMovedForTest = options.afterLiveMovedForTest;
    this.#beforeRollbackForTest = options.beforeRollbackForTest;
  }

  async restore(profile: EntityProfile, snapshotId: string, hooks: RestoreHooks = {}): Promise<RestoreResult> {
    const startedAt = this.#now().toISOString();
    const locks = this.#engine.locks;
    const lease = await locks.acquire(profile.id, 'restore', this.#engine.manualWaitMs);
    if (!lease) {
      const heldBy = locks.holder(profile.id) ?? 'another operation';
      return this.#result(profile, snapshotId, startedAt, 'busy', emptyProgress(), `Entity '${profile.id}' is busy (${heldBy}).`);
    }

    const progress = emptyProgress();
    try {
      if (hooks.onLeaseAcquired) {
        await hooks.onLeaseAcquired();
      }
      await this.#engine.pool.run(() => this.#restoreWithLease(lease, profile, snapshotId, progress));
      const result = this.#result(profile, snapshotId, startedAt, 'restored', progress, null);
      await logBackupOperation(profile.id, 'restore-completed', {
        snapshotId,
        safetySnapshotId: result.safetySnapshotId,
      });
      return result;
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[RestoreCoordinator] Restore of '${profile.id}' from '${snapshotId}' failed: ${message}`);
      await logBackupOperation(profile.id, 'restore-failed', {
        snapshotId,
        error: message,
        rollbackApplied: progress.rollbackApplied,
        reinstatedFromSafety: progress.reinstatedFromSafety,
      });
      return this.#result(profile, snapshotId, startedAt, 'failed', progress, message);
    } finally {
      lease.release();
    }
  }

  // ── Private Helpers ────────────────────────────────────────────────────────

  async #restoreWithLease(
    lease: LockLease,
    profile: EntityProfile,
    snapshotId: string,
    progress: RestoreProgress,
  ): Promise<void> {
    const snapshot = await this.#engine.getSnapshot(profile, snapshotId);
    if (!snapshot) {
      throw new RestoreError(profile.id, snapshotId, `Snapshot '${snapshotId}' does not exist for '${profile.id}'.`);
    }

    const sourceExisted = await pathExists(profile.sourcePath);
    if (sourceExisted) {
      try {
        const capture = await this.#engine.captureWithLease(lease, profile, 'safety', {
          protectedIds: [snapshot.id],
        });
        progress.safetySnapshot = capture.snapshot;
      } catch (error) {
        throw new RestoreError(
          profile.id,
          snapshotId,
          `Safety snapshot failed; source left untouched: ${errorMessage(error)}`,
        );
      }
    }

    const operationId = randomUUID().slice(0, 8);
    const parent = path.dirname(profile.sourcePath);
    const name = path.basename(profile.sourcePath);
    const paths: RestorePaths = {
      source: profile.sourcePath,
      staged: path.join(parent, `.${name}.restore-${operationId}`),
      previous: path.join(parent, `.${name}.previous-${operationId}`),
    };

    try {
      await this.#engine.materialize(snapshot, paths.staged);
      if (this.#beforeSwapForTest) {
        await this.#beforeSwapForTest(paths);
      }
    } catch (error) {
      await rm(paths.staged, { recursive: true, force: true });
      throw new RestoreError(profile.id, snapshotId, `Staging failed; source left untouched: ${errorMessage(error)}`);
    }

    let liveMoved = false;
    try {
      if (sourceExisted) {
        await rename(paths.source, paths.previous);
        liveMoved = true;
        if (this.#afterLiveMovedForTest) {
          await this.#afterLiveMovedForTest(paths);
        }
      }
      await rename(paths.staged, paths.source);
    } catch (error) {
      const swapMessage = errorMessage(error);
      await rm(paths.staged, { recursive: true, force: true });
      if (liveMoved) {
        await this.#rollback(profile, snapshotId, paths, progress);
      }
      throw new RestoreError(profile.id, snapshotId, `Swap failed: ${swapMessage}`);
    }

    if (liveMoved) {
      try {
        await rm(paths.previous, { recursive: true, force: true });
      } catch (error) {
        console.warn(`[RestoreCoordinator] Could not remove ${paths.previous}: ${errorMessage(error)}`);
        await logThought(`[RestoreCoordinator] Leftover pre-restore tree at ${paths.previous} for '${profile.id}'.`);
      }
    }
  }

  async #rollback(profile: EntityProfile, snapshotId: string, paths: RestorePaths, progress: RestoreProgress): Promise<void> {
    try {
      if (this.#beforeRollbackForTest) {
        await this.#beforeRollbackForTest(paths);
      }
      await rm(paths.source, { recursive: true, force: true });
      await rename(paths.previous, paths.source);
      progress.rollbackApplied = true;
      return;
    } catch (error) {
      console.error(`[RestoreCoordinator] Rollback of '${profile.id}' failed: ${errorMessage(error)}`);
    }

    if (!progress.safetySnapshot) {
      throw new RestoreError(profile.id, snapshotId, 'Swap and rollback failed and no safety snapshot exists.');
    }
    await rm(paths.source, { recursive: true, force: true });
    await this.#engine.materialize(progress.safetySnapshot, paths.source);
    progress.reinstatedFromSafety = true;
    await logThought(
      `[RestoreCoordinator] Reinstated '${profile.id}' from safety snapshot '${progress.safetySnapshot.id}'.`,
    );
  }

  #result(
    profile: EntityProfile,
    snapshotId: string,
    startedAt: string,
    status: RestoreResult['status'],
    progress: RestoreProgress,
    error: string | null,
  ): RestoreResult {
    return {
      status,
      entityId: profile.id,
      snapshotId,
      safetySnapshotId: progress.safetySnapshot?.id ?? null,
      rollbackApplied: progress.rollbackApplied,
      reinstatedFromSafety: progress.reinstatedFromSafety,
      error,
      startedAt,
      completedAt: this.#now().toISOString(),
    };
  }
}

function emptyProgress(): RestoreProgress {
  return { safetySnapshot: null, rollbackApplied: false, reinstatedFromSafety: false };
}
