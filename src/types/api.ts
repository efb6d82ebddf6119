import type { BackupUsage, EntityStatusSnapshot, RestoreResult, Snapshot, SnapshotOutcome } from './backup.js';
import type { WatchSessionSnapshot } from './file-watcher.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    entities: {
        total: number;
        watching: number;
        busy: number;
        errored: number;
        persistentFailures: string[];
    };
    operations: {
        maxConcurrent: number;
        active: number;
        queued: number;
    };
    websocket?: {
        connectedClients: number;
        subscribedClients: number;
    };
}

// ── Entities ────────────────────────────────────────────────────────────────

export interface EntityListData {
    entities: EntityStatusSnapshot[];
}

export interface EntityWatchData {
    status: EntityStatusSnapshot;
    session: WatchSessionSnapshot;
}

export interface SnapshotListData {
    entityId: string;
    snapshots: Snapshot[];
    usage: BackupUsage;
}

export interface ManualBackupData {
    outcome: SnapshotOutcome;
}

export interface RestoreRequestBody {
    snapshotId: string;
}

export interface RestoreData {
    result: RestoreResult;
}
