import { cp, mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { Dirent } from 'node:fs';
import type {
  BackupUsage,
  EntityProfile,
  Snapshot,
  SnapshotFormat,
  SnapshotKind,
  SnapshotOutcome,
  TriggerReason,
} from '../types/backup.js';
import { RetentionError, SnapshotError, errorMessage } from '../types/errors.js';
import type { EntityLockRegistry, LockLease } from './entity-lock.js';
import { OperationPool } from './operation-pool.js';
import { ARCHIVE_EXTENSION, createArchive, extractArchive } from './archive.js';
import { isTransientFsError, withRetry } from '../utils/retry.js';
import { logBackupOperation, logThought } from '../utils/logger.js';

const STAGING_DIR_NAME = '.staging';
const DEFAULT_MANUAL_WAIT_MS = 30_000;
const DEFAULT_SAFETY_RETENTION_LIMIT = 5;
const COPY_RETRY = { maxAttempts: 5, baseDelayMs: 500, backoffFactor: 1, maxDelayMs: 500 };
const SNAPSHOT_NAME_PATTERN = /^(\d{8}-\d{6}-\d{3})_(automatic|manual|safety)(\.tar\.gz)?$/;

export type SnapshotEngineEvent =
  | { type: 'snapshot-started'; entityId: string; kind: SnapshotKind }
  | { type: 'snapshot-created'; entityId: string; snapshot: Snapshot; pruned: string[] }
  | { type: 'snapshot-failed'; entityId: string; kind: SnapshotKind; error: string }
  | { type: 'prune-failed'; entityId: string; snapshotId: string; error: string };

export type SnapshotEngineListener = (event: SnapshotEngineEvent) => void;

export interface CaptureResult {
  snapshot: Snapshot;
  pruned: string[];
  pruneFailures: string[];
}

interface ParsedSnapshotName {
  id: string;
  stamp: string;
  kind: SnapshotKind;
  format: SnapshotFormat;
}

/** `YYYYMMDD-HHmmss-SSS` in UTC. */
export function formatStamp(epochMs: number): string {
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}-${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}-${iso.slice(20, 23)}`;
}

export function parseStamp(stamp: string): number {
  return Date.UTC(
    Number(stamp.slice(0, 4)),
    Number(stamp.slice(4, 6)) - 1,
    Number(stamp.slice(6, 8)),
    Number(stamp.slice(9, 11)),
    Number(stamp.slice(11, 13)),
    Number(stamp.slice(13, 15)),
    Number(stamp.slice(16, 19)),
  );
}

export function parseSnapshotName(name: string): ParsedSnapshotName | null {
  const match = SNAPSHOT_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [, stamp, kind, extension] = match;
  if (kind !== 'automatic' && kind !== 'manual' && kind !== 'safety') {
    return null;
  }
  return {
    id: `${stamp}_${kind}`,
    stamp,
    kind,
    format: extension ? 'archive' : 'directory',
  };
}

/** Count and total size of listed snapshots, safety snapshots included. */
export function summarizeUsage(entityId: string, snapshots: readonly Snapshot[]): BackupUsage {
  return {
    entityId,
    snapshotCount: snapshots.length,
    totalBytes: snapshots.reduce((total, snapshot) => total + snapshot.sizeBytes, 0),
  };
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}

async function directorySize(directoryPath: string): Promise<number> {
  const entries = await readdir(directoryPath, { withFileTypes: true });
  let total = 0;
  for (const entry of entries) {
    const absolutePath = path.join(directoryPath, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(absolutePath);
    } else if (entry.isFile()) {
      total += (await stat(absolutePath)).size;
    }
  }
  return total;
}

export interface SnapshotEngineOptions {
  locks: EntityLockRegistry;
  pool?: OperationPool;
  /** Bounded wait for manual requests when another operation holds the lock. */
  manualWaitMs?: number;
  safetyRetentionLimit?: number;
  now?: () => Date;
  /** Runs after staging completes and before the rename into place. */
  beforeCommitForTest?: (stagingPath: string) => void | Promise<void>;
  /** Runs before each expired snapshot is deleted. */
  beforePruneForTest?: (snapshot: Snapshot) => void;
  /** Runs while listing, before each snapshot's size is measured. */
  beforeDescribeForTest?: (location: string) => void | Promise<void>;
}

export interface CaptureOptions {
  /** Snapshot ids the pruning pass after this capture must keep. */
  protectedIds?: readonly string[];
}

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Creates, lists and prunes the snapshots of each entity.
 *
 * Layout: `{backupRoot}/{entityId}/{YYYYMMDD-HHmmss-SSS}_{kind}[.tar.gz]`.
 * Every artifact is built under `{entityId}/.staging/` and renamed into place
 * only once complete, so a name outside `.staging` always denotes a complete
 * snapshot.
 */
export class SnapshotEngine {
  readonly #locks: EntityLockRegistry;
  readonly #pool: OperationPool;
  readonly #manualWaitMs: number;
  readonly #safetyRetentionLimit: number;
  readonly #now: () => Date;
  readonly #beforeCommitForTest?: (stagingPath: string) => void | Promise<void>;
  readonly #beforePruneForTest?: (snapshot: Snapshot) => void;
  readonly #beforeDescribeForTest?: (location: string) => void | Promise<void>;
  readonly #lastStamp: Map<string, number> = new Map();
  readonly #sweptEntities: Set<string> = new Set();
  readonly #listeners: Set<SnapshotEngineListener> = new Set();

  constructor(options: SnapshotEngineOptions) {
    this.#locks = options.locks;
    this.#pool = options.pool ?? new OperationPool();
    this.#manualWaitMs = Math.max(0, options.manualWaitMs ?? DEFAULT_MANUAL_WAIT_MS);
    this.#safetyRetentionLimit = Math.max(1, options.safetyRetentionLimit ?? DEFAULT_SAFETY_RETENTION_LIMIT);
    this.#now = options.now ?? (() => new Date());
    this.#beforeCommitForTest = options.beforeCommitForTest;
    this.#beforePruneForTest = options.beforePruneForTest;
    this.#beforeDescribeForTest = options.beforeDescribeForTest;
  }

  get locks(): EntityLockRegistry {
    return this.#locks;
  }

  get pool(): OperationPool {
    return this.#pool;
  }

  get manualWaitMs(): number {
    return this.#manualWaitMs;
  }

  /** Subscribe to engine activity. Returns an unsubscribe function. */
  onEvent(listener: SnapshotEngineListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  /**
   * Take one snapshot of the entity's source tree and apply retention.
   *
   * Automatic requests never wait: a held lock yields `busy` and the caller's
   * retrigger flag takes over. Manual requests wait up to `manualWaitMs`.
   */
  async createSnapshot(profile: EntityProfile, reason: TriggerReason): Promise<SnapshotOutcome> {
    const lease =
      reason === 'manual'
        ? await this.#locks.acquire(profile.id, 'snapshot', this.#manualWaitMs)
        : this.#locks.tryAcquire(profile.id, 'snapshot');

    if (!lease) {
      return { status: 'busy', entityId: profile.id, heldBy: this.#locks.holder(profile.id) };
    }

    try {
      const result = await this.#pool.run(() => this.captureWithLease(lease, profile, reason));
      return { status: 'created', ...result };
    } catch (error) {
      return { status: 'failed', entityId: profile.id, error: errorMessage(error) };
    } finally {
      lease.release();
    }
  }

  /**
   * Stage, commit and prune one snapshot while the caller already holds the
   * entity's lock. Throws {@link SnapshotError} when the snapshot could not be
   * created; prune failures are reported in the result instead.
   */
  async captureWithLease(
    lease: LockLease,
    profile: EntityProfile,
    kind: SnapshotKind,
    options: CaptureOptions = {},
  ): Promise<CaptureResult> {
    if (!lease.active || lease.entityId !== profile.id) {
      throw new SnapshotError(profile.id, `A snapshot of '${profile.id}' requires an active lock lease for that entity.`);
    }

    this.#emit({ type: 'snapshot-started', entityId: profile.id, kind });
    let snapshot: Snapshot;
    try {
      await this.#sweepStaging(profile);
      snapshot = await this.#stageAndCommit(profile, kind);
    } catch (error) {
      const message = errorMessage(error);
      this.#emit({ type: 'snapshot-failed', entityId: profile.id, kind, error: message });
      console.error(`[SnapshotEngine] Snapshot of '${profile.id}' failed: ${message}`);
      await logBackupOperation(profile.id, 'snapshot-failed', { kind, error: message });
      throw error instanceof SnapshotError ? error : new SnapshotError(profile.id, message);
    }

    const { pruned, failures } = await this.#prune(
      profile,
      kind === 'safety' ? 'safety' : 'retained',
      new Set(options.protectedIds ?? []),
    );
    this.#emit({ type: 'snapshot-created', entityId: profile.id, snapshot, pruned });
    await logBackupOperation(profile.id, 'snapshot-created', {
      snapshotId: snapshot.id,
      kind,
      sizeBytes: snapshot.sizeBytes,
      pruned,
      pruneFailures: failures,
    });

    return { snapshot, pruned, pruneFailures: failures };
  }

  /** Complete snapshots of the entity, newest first. */
  async listSnapshots(profile: EntityProfile): Promise<Snapshot[]> {
    const snapshots = await this.#readSnapshots(profile);
    return snapshots.reverse();
  }

  async getSnapshot(profile: EntityProfile, snapshotId: string): Promise<Snapshot | null> {
    const parsed = parseSnapshotName(snapshotId);
    if (!parsed || parsed.id !== snapshotId) {
      return null;
    }
    for (const format of ['directory', 'archive'] as const) {
      const location = this.#finalPath(profile, parsed.id, format);
      if (await pathExists(location)) {
        return this.#describe(profile, { ...parsed, format }, location);
      }
    }
    return null;
  }

  /** Copy or unpack a snapshot's contents into `destination`, which must not exist yet. */
  async materialize(snapshot: Snapshot, destination: string): Promise<void> {
    if (await pathExists(destination)) {
      throw new Error(`Refusing to materialize '${snapshot.id}' over existing path ${destination}.`);
    }
    if (snapshot.format === 'archive') {
      await extractArchive(snapshot.location, destination);
      return;
    }
    await mkdir(path.dirname(destination), { recursive: true });
    await cp(snapshot.location, destination, { recursive: true, errorOnExist: true, force: false });
  }

  entityBackupDir(profile: EntityProfile): string {
    return path.join(profile.backupRoot, profile.id);
  }

  // ── Private Helpers ────────────────────────────────────────────────────────

  async #stageAndCommit(profile: EntityProfile, kind: SnapshotKind): Promise<Snapshot> {
    const sourceStat = await stat(profile.sourcePath).catch((error: unknown) => {
      throw new SnapshotError(profile.id, `Source path ${profile.sourcePath} is not readable: ${errorMessage(error)}`);
    });
    if (!sourceStat.isDirectory()) {
      throw new SnapshotError(profile.id, `Source path ${profile.sourcePath} is not a directory.`);
    }

    const format: SnapshotFormat = profile.compressionMode === 'archive' ? 'archive' : 'directory';
    const epochMs = await this.#nextStamp(profile);
    const stamp = formatStamp(epochMs);
    const id = `${stamp}_${kind}`;
    const fileName = format === 'archive' ? `${id}${ARCHIVE_EXTENSION}` : id;
    const stagingPath = path.join(this.entityBackupDir(profile), STAGING_DIR_NAME, fileName);
    const finalPath = this.#finalPath(profile, id, format);

    try {
      await mkdir(path.dirname(stagingPath), { recursive: true });
      const copied = await withRetry(
        async () => {
          await rm(stagingPath, { recursive: true, force: true });
          if (format === 'archive') {
            await createArchive(profile.sourcePath, stagingPath);
          } else {
            await cp(profile.sourcePath, stagingPath, {
              recursive: true,
              errorOnExist: true,
              force: false,
              preserveTimestamps: true,
            });
          }
        },
        { ...COPY_RETRY, label: `snapshot:${profile.id}`, shouldRetry: isTransientFsError },
      );
      if (!copied.ok) {
        throw new SnapshotError(profile.id, `Copying ${profile.sourcePath} failed: ${copied.error ?? 'unknown error'}`);
      }

      if (this.#beforeCommitForTest) {
        await this.#beforeCommitForTest(stagingPath);
      }
      if (await pathExists(finalPath)) {
        throw new SnapshotError(profile.id, `Snapshot ${id} already exists.`);
      }
      await rename(stagingPath, finalPath);
    } catch (error) {
      await rm(stagingPath, { recursive: true, force: true });
      throw error instanceof SnapshotError ? error : new SnapshotError(profile.id, errorMessage(error));
    }

    return this.#describe(profile, { id, stamp, kind, format }, finalPath);
  }

  /**
   * Delete the oldest snapshots of `group` beyond its limit. Protected ids are
   * skipped, so the group may stay one over its limit until the next pass.
   */
  async #prune(
    profile: EntityProfile,
    group: 'retained' | 'safety',
    protectedIds: ReadonlySet<string>,
  ): Promise<{ pruned: string[]; failures: string[] }> {
    const limit = group === 'safety' ? this.#safetyRetentionLimit : profile.retentionLimit;
    const candidates = (await this.#readSnapshots(profile)).filter((snapshot) =>
      group === 'safety' ? snapshot.kind === 'safety' : snapshot.kind !== 'safety',
    );

    const pruned: string[] = [];
    const failures: string[] = [];
    const stale = candidates
      .slice(0, Math.max(0, candidates.length - limit))
      .filter((snapshot) => !protectedIds.has(snapshot.id));
    for (const snapshot of stale) {
      try {
        this.#beforePruneForTest?.(snapshot);
        await rm(snapshot.location, { recursive: true, force: true });
        pruned.push(snapshot.id);
      } catch (error) {
        const failure = new RetentionError(
          profile.id,
          snapshot.id,
          `Failed to prune snapshot '${snapshot.id}': ${errorMessage(error)}`,
        );
        failures.push(snapshot.id);
        console.warn(`[SnapshotEngine] ${failure.message}`);
        this.#emit({ type: 'prune-failed', entityId: profile.id, snapshotId: snapshot.id, error: failure.message });
        await logThought(`[SnapshotEngine] ${failure.message} It will be retried on the next pruning pass.`);
      }
    }
    return { pruned, failures };
  }

  /**
   * Complete snapshots, oldest first. Listing takes no lock, so an entry a
   * concurrent prune deletes mid-scan is left out rather than failing the list.
   */
  async #readSnapshots(profile: EntityProfile): Promise<Snapshot[]> {
    const entityDir = this.entityBackupDir(profile);
    let entries: Dirent[];
    try {
      entries = await readdir(entityDir, { withFileTypes: true });
    } catch (error) {
      if (isMissingPathError(error)) return [];
      throw error;
    }

    const snapshots: Snapshot[] = [];
    for (const entry of entries) {
      const parsed = parseSnapshotName(entry.name);
      if (!parsed) continue;
      if (parsed.format === 'directory' ? !entry.isDirectory() : !entry.isFile()) continue;
      const location = path.join(entityDir, entry.name);
      try {
        if (this.#beforeDescribeForTest) {
          await this.#beforeDescribeForTest(location);
        }
        snapshots.push(await this.#describe(profile, parsed, location));
      } catch (error) {
        if (isMissingPathError(error)) continue;
        throw error;
      }
    }
    return snapshots.sort((left, right) => left.id.localeCompare(right.id));
  }

  async #describe(profile: EntityProfile, parsed: ParsedSnapshotName, location: string): Promise<Snapshot> {
    const sizeBytes = parsed.format === 'archive' ? (await stat(location)).size : await directorySize(location);
    return {
      id: parsed.id,
      entityId: profile.id,
      timestamp: new Date(parseStamp(parsed.stamp)).toISOString(),
      kind: parsed.kind,
      format: parsed.format,
      location,
      sizeBytes,
      complete: true,
    };
  }

  /** Wall-clock milliseconds, bumped so each entity's stamps strictly increase. */
  async #nextStamp(profile: EntityProfile): Promise<number> {
    let last = this.#lastStamp.get(profile.id);
    if (last === undefined) {
      const existing = await this.#readSnapshots(profile);
      const newest = existing[existing.length - 1];
      last = newest ? Date.parse(newest.timestamp) : Number.NEGATIVE_INFINITY;
    }
    const next = Math.max(this.#now().getTime(), last + 1);
    this.#lastStamp.set(profile.id, next);
    return next;
  }

  /** Leftovers in `.staging` are from an interrupted run; they were never complete. */
  async #sweepStaging(profile: EntityProfile): Promise<void> {
    if (this.#sweptEntities.has(profile.id)) {
      return;
    }
    const stagingDir = path.join(this.entityBackupDir(profile), STAGING_DIR_NAME);
    if (await pathExists(stagingDir)) {
      await rm(stagingDir, { recursive: true, force: true });
      await logThought(`[SnapshotEngine] Cleared interrupted staging artifacts for '${profile.id}'.`);
    }
    this.#sweptEntities.add(profile.id);
  }

  #finalPath(profile: EntityProfile, id: string, format: SnapshotFormat): string {
    const name = format === 'archive' ? `${id}${ARCHIVE_EXTENSION}` : id;
    return path.join(this.entityBackupDir(profile), name);
  }

  #emit(event: SnapshotEngineEvent): void {
    for (const listener of this.#listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error('[SnapshotEngine] Listener threw an error:', err);
      }
    }
  }
}
