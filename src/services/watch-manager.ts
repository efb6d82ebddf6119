import type {
    BackupEvent,
    BackupEventListener,
    BackupStatus,
    EntityProfile,
    EntityStatusSnapshot,
    RestoreResult,
    Snapshot,
    SnapshotOutcome,
    SnapshotTrigger,
} from '../types/backup.js';
import { EntityNotFoundError, errorMessage } from '../types/errors.js';
import type { WatchHandleFactory, WatchRetryPolicy, WatchSessionSnapshot } from '../types/file-watcher.js';
import { validateProfile } from '../config/profile-source.js';
import { RestoreCoordinator } from './restore-coordinator.js';
import type { SnapshotEngine, SnapshotEngineEvent } from './snapshot-engine.js';
import { WatchSession } from './watch-session.js';
import { logThought } from '../utils/logger.js';

type Activity = 'backing-up' | 'restoring';

interface ManagedEntity {
    profile: EntityProfile;
    session: WatchSession;
    activity: Activity | null;
    lastBackupTimestamp: string | null;
    lastError: string | null;
    unsubscribeSession: () => void;
}

type EventExtras = Pick<BackupEvent, 'snapshotId' | 'safetySnapshotId' | 'detail'>;

export interface WatchManagerOptions {
    engine: SnapshotEngine;
    restorer?: RestoreCoordinator;
    watchRetry?: Partial<WatchRetryPolicy>;
    createHandle?: WatchHandleFactory;
    now?: () => Date;
}

/**
 * Owns one {@link WatchSession} per registered entity, routes their triggers
 * to the snapshot engine and publishes a {@link BackupEvent} whenever an
 * entity's status changes.
 *
 * Usage:
 * ```ts
 * const manager = new WatchManager({ engine });
 * manager.addEntity(profile);
 * manager.onEvent((event) => console.log(event.entityId, event.status));
 * await manager.startAll();
 * ```
 */
export class WatchManager {
    readonly #engine: SnapshotEngine;
    readonly #restorer: RestoreCoordinator;
    readonly #watchRetry?: Partial<WatchRetryPolicy>;
    readonly #createHandle?: WatchHandleFactory;
    readonly #now: () => Date;
    readonly #entities: Map<string, ManagedEntity> = new Map();
    readonly #listeners: Set<BackupEventListener> = new Set();
    readonly #unsubscribeLocks: () => void;
    readonly #unsubscribeEngine: () => void;

    constructor(options: WatchManagerOptions) {
        this.#engine = options.engine;
        this.#restorer = options.restorer ?? new RestoreCoordinator({ engine: options.engine });
        this.#watchRetry = options.watchRetry;
        this.#createHandle = options.createHandle;
        this.#now = options.now ?? (() => new Date());

        this.#unsubscribeLocks = this.#engine.locks.onRelease((entityId) => {
            this.#entities.get(entityId)?.session.operationFinished();
        });
        this.#unsubscribeEngine = this.#engine.onEvent((event) => this.#handleEngineEvent(event));
    }

    /** Register an entity. Does NOT start watching until `startWatching()` or `startAll()`. */
    addEntity(profile: EntityProfile): void {
        if (this.#entities.has(profile.id)) {
            throw new Error(`[WatchManager] Entity '${profile.id}' is already registered.`);
        }
        const validated = validateProfile(profile);

        const session = new WatchSession({
            profile: validated,
            onTrigger: (trigger) => this.#handleTrigger(trigger),
            isBusy: () => this.#engine.locks.isHeld(validated.id),
            retry: this.#watchRetry,
            createHandle: this.#createHandle,
            now: this.#now,
        });
        const entity: ManagedEntity = {
            profile: validated,
            session,
            activity: null,
            lastBackupTimestamp: null,
            lastError: null,
            unsubscribeSession: () => undefined,
        };
        entity.unsubscribeSession = session.onStateChange((snapshot) => this.#handleSessionChange(entity, snapshot));
        this.#entities.set(validated.id, entity);
    }

    /** Stop the entity's session, wait for its in-flight operation, then forget it. */
    async removeEntity(entityId: string): Promise<void> {
        const entity = this.#require(entityId);
        await entity.session.stop();
        await this.#engine.locks.whenIdle(entityId);
        entity.unsubscribeSession();
        this.#entities.delete(entityId);
        await logThought(`[WatchManager] Removed entity '${entityId}'.`);
    }

    hasEntity(entityId: string): boolean {
        return this.#entities.has(entityId);
    }

    getProfile(entityId: string): EntityProfile {
        return this.#require(entityId).profile;
    }

    /** Start every enabled entity. One entity failing to start never blocks the others. */
    async startAll(): Promise<void> {
        const enabled = [...this.#entities.values()].filter((entity) => entity.profile.enabled);
        await Promise.all(enabled.map((entity) => this.#startSession(entity)));
    }

    async stopAll(): Promise<void> {
        await Promise.all([...this.#entities.values()].map((entity) => entity.session.stop()));
    }

    async startWatching(entityId: string): Promise<EntityStatusSnapshot> {
        const entity = this.#require(entityId);
        await this.#startSession(entity);
        return this.#statusOf(entity);
    }

    async stopWatching(entityId: string): Promise<EntityStatusSnapshot> {
        const entity = this.#require(entityId);
        await entity.session.stop();
        return this.#statusOf(entity);
    }

    /**
     * Snapshot now, bypassing debounce. Waits a bounded time for a running
     * operation; if it is still busy the request becomes a pending retrigger.
     */
    async requestManualBackup(entityId: string): Promise<SnapshotOutcome> {
        const entity = this.#require(entityId);
        const outcome = await this.#engine.createSnapshot(entity.profile, 'manual');
        this.#applyOutcome(entityId, outcome);
        return outcome;
    }

    /**
     * Restore a snapshot over the entity's source. The watcher keeps running
     * while the restore waits for the lock and is suspended only once the lock
     * is held.
     */
    async requestRestore(entityId: string, snapshotId: string): Promise<RestoreResult> {
        const entity = this.#require(entityId);
        const watcher = { wasActive: false };

        const result = await this.#restorer.restore(entity.profile, snapshotId, {
            onLeaseAcquired: async () => {
                watcher.wasActive = await entity.session.suspend();
                entity.activity = 'restoring';
                this.#publish(entity, { snapshotId });
            },
        });

        if (watcher.wasActive && this.#entities.get(entityId) === entity) {
            // Writes made before a completed restore are in its safety snapshot.
            if (result.status === 'restored') {
                entity.session.clearPendingRetrigger();
            } else {
                entity.session.markPendingRetrigger();
            }
            await entity.session.resume();
        }

        if (result.status === 'busy') {
            this.#publish(entity, { snapshotId, detail: result.error ?? 'busy' });
            return result;
        }

        entity.activity = null;
        entity.lastError = result.status === 'failed' ? result.error : null;
        this.#publish(entity, {
            snapshotId,
            safetySnapshotId: result.safetySnapshotId ?? undefined,
            detail: this.#describeRestore(result),
        });
        return result;
    }

    async listSnapshots(entityId: string): Promise<Snapshot[]> {
        const entity = this.#require(entityId);
        return this.#engine.listSnapshots(entity.profile);
    }

    getStatus(entityId: string): EntityStatusSnapshot {
        return this.#statusOf(this.#require(entityId));
    }

    listStatuses(): EntityStatusSnapshot[] {
        return [...this.#entities.values()].map((entity) => this.#statusOf(entity));
    }

    getSessionSnapshot(entityId: string): WatchSessionSnapshot {
        return this.#require(entityId).session.getSnapshot();
    }

    /** Subscribe to backup events. Returns an unsubscribe function. */
    onEvent(listener: BackupEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    /** Stop every session and detach from the engine and lock registry. */
    async dispose(): Promise<void> {
        await this.stopAll();
        this.#unsubscribeLocks();
        this.#unsubscribeEngine();
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(entityId: string): ManagedEntity {
        const entity = this.#entities.get(entityId);
        if (!entity) {
            throw new EntityNotFoundError(entityId);
        }
        return entity;
    }

    async #startSession(entity: ManagedEntity): Promise<void> {
        await this.#seedLastBackup(entity);
        try {
            await entity.session.start();
        } catch (error) {
            entity.lastError = errorMessage(error);
            console.error(`[WatchManager] Failed to start '${entity.profile.id}':`, entity.lastError);
            this.#publish(entity, { detail: 'start-failed' });
        }
    }

    /** Carry the newest existing snapshot over from a previous run. */
    async #seedLastBackup(entity: ManagedEntity): Promise<void> {
        if (entity.lastBackupTimestamp !== null) return;
        try {
            const newest = (await this.#engine.listSnapshots(entity.profile)).find(
                (snapshot) => snapshot.kind !== 'safety',
            );
            if (newest && entity.lastBackupTimestamp === null) {
                entity.lastBackupTimestamp = newest.timestamp;
            }
        } catch (error) {
            console.warn(`[WatchManager] Could not read existing snapshots of '${entity.profile.id}':`, errorMessage(error));
        }
    }

    async #handleTrigger(trigger: SnapshotTrigger): Promise<void> {
        const entity = this.#entities.get(trigger.entityId);
        if (!entity) return;
        const outcome = await this.#engine.createSnapshot(entity.profile, trigger.reason);
        this.#applyOutcome(trigger.entityId, outcome);
    }

    #applyOutcome(entityId: string, outcome: SnapshotOutcome): void {
        const entity = this.#entities.get(entityId);
        if (!entity) return;

        if (outcome.status === 'busy') {
            entity.session.markPendingRetrigger();
            return;
        }

        if (entity.activity === 'backing-up') {
            entity.activity = null;
        }
        if (outcome.status === 'created') {
            entity.lastBackupTimestamp = outcome.snapshot.timestamp;
            entity.lastError = null;
            const detail =
                outcome.pruneFailures.length > 0
                    ? `prune-failed: ${outcome.pruneFailures.join(', ')}`
                    : outcome.pruned.length > 0
                      ? `pruned: ${outcome.pruned.join(', ')}`
                      : undefined;
            this.#publish(entity, { snapshotId: outcome.snapshot.id, detail });
            return;
        }

        entity.lastError = outcome.error;
        this.#publish(entity, { detail: 'snapshot-failed' });
    }

    #handleEngineEvent(event: SnapshotEngineEvent): void {
        if (event.type !== 'snapshot-started' || event.kind === 'safety') {
            return;
        }
        const entity = this.#entities.get(event.entityId);
        if (!entity || entity.activity === 'restoring') return;
        entity.activity = 'backing-up';
        this.#publish(entity, { detail: `${event.kind}-snapshot-started` });
    }

    #handleSessionChange(entity: ManagedEntity, snapshot: WatchSessionSnapshot): void {
        if (this.#entities.get(entity.profile.id) !== entity) return;
        if (snapshot.state === 'starting' || snapshot.state === 'stopping') return;
        this.#publish(entity, { detail: snapshot.lastError ?? `session-${snapshot.state}` });
    }

    #describeRestore(result: RestoreResult): string {
        if (result.status === 'restored') return 'restore-completed';
        if (result.reinstatedFromSafety) return 'restore-failed: reinstated from safety snapshot';
        if (result.rollbackApplied) return 'restore-failed: previous state moved back';
        return 'restore-failed';
    }

    #statusOf(entity: ManagedEntity): EntityStatusSnapshot {
        const session = entity.session.getSnapshot();
        return {
            entityId: entity.profile.id,
            status: this.#deriveStatus(entity, session),
            lastBackupTimestamp: entity.lastBackupTimestamp,
            lastError: session.lastError ?? entity.lastError,
            persistentFailure: session.persistentFailure,
        };
    }

    #deriveStatus(entity: ManagedEntity, session: WatchSessionSnapshot): BackupStatus {
        if (entity.activity) return entity.activity;
        if (session.state === 'error' || entity.lastError !== null) return 'error';
        if (session.state === 'watching' || session.state === 'starting') return 'watching';
        return 'idle';
    }

    #publish(entity: ManagedEntity, extras: EventExtras = {}): void {
        const event: BackupEvent = {
            ...this.#statusOf(entity),
            ...extras,
            timestamp: this.#now().toISOString(),
        };
        for (const listener of this.#listeners) {
            try {
                listener(event);
            } catch (err) {
                console.error('[WatchManager] Listener threw an error:', err);
            }
        }
    }
}
