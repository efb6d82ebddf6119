export type CompressionMode = 'directory-copy' | 'archive';

export type SnapshotKind = 'automatic' | 'manual' | 'safety';

export type SnapshotFormat = 'directory' | 'archive';

export type TriggerReason = 'automatic' | 'manual';

export type BackupStatus = 'idle' | 'watching' | 'backing-up' | 'restoring' | 'error';

/** Static description of one monitored entity. Immutable for a session's lifetime. */
export interface EntityProfile {
  readonly id: string;
  /** Absolute path of the directory tree to protect. */
  readonly sourcePath: string;
  /** Root under which `{id}/` snapshot directories are kept. */
  readonly backupRoot: string;
  readonly retentionLimit: number;
  readonly debounceMs: number;
  readonly compressionMode: CompressionMode;
  readonly enabled: boolean;
  /** Glob patterns under the source tree whose changes never trigger a snapshot. */
  readonly exclude?: readonly string[];
}

export interface Snapshot {
  /** `{stamp}_{kind}`; also the on-disk name without archive extension. */
  id: string;
  entityId: string;
  /** ISO-8601, monotonic per entity. */
  timestamp: string;
  kind: SnapshotKind;
  format: SnapshotFormat;
  location: string;
  sizeBytes: number;
  complete: boolean;
}

export interface SnapshotTrigger {
  entityId: string;
  reason: TriggerReason;
  requestedAt: string;
}

export type SnapshotOutcome =
  | { status: 'created'; snapshot: Snapshot; pruned: string[]; pruneFailures: string[] }
  | { status: 'busy'; entityId: string; heldBy: LockOperation | null }
  | { status: 'failed'; entityId: string; error: string };

export type RestoreStatus = 'restored' | 'busy' | 'failed';

export interface RestoreResult {
  status: RestoreStatus;
  entityId: string;
  snapshotId: string;
  /** Snapshot of the live tree taken before the swap, null when nothing existed to capture. */
  safetySnapshotId: string | null;
  /** The previous live tree was moved back after a failed swap. */
  rollbackApplied: boolean;
  /** The safety snapshot was materialized over the source after a failed swap. */
  reinstatedFromSafety: boolean;
  error: string | null;
  startedAt: string;
  completedAt: string;
}

/** Outbound, read-only status notification for one entity. */
export interface BackupEvent {
  entityId: string;
  status: BackupStatus;
  lastBackupTimestamp: string | null;
  lastError: string | null;
  /** Set once the watcher's restart budget is exhausted; requires user action. */
  persistentFailure: boolean;
  snapshotId?: string;
  safetySnapshotId?: string;
  detail?: string;
  timestamp: string;
}

export type EntityStatusSnapshot = Omit<BackupEvent, 'snapshotId' | 'safetySnapshotId' | 'detail' | 'timestamp'>;

export type BackupEventListener = (event: BackupEvent) => void;

export type LockOperation = 'snapshot' | 'restore';

/** Disk footprint of one entity's complete snapshots. */
export interface BackupUsage {
  entityId: string;
  snapshotCount: number;
  totalBytes: number;
}
