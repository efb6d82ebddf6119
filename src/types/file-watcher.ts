import type { SnapshotTrigger } from './backup.js';

/** Types of filesystem changes the watcher emits. */
export type FileEventType = 'add' | 'change' | 'unlink' | 'addDir' | 'unlinkDir';

/** Normalized filesystem event payload. */
export interface FileEvent {
    type: FileEventType;
    /** Absolute path of the affected file or directory. */
    path: string;
    /** ISO-8601 timestamp when the event was detected. */
    timestamp: string;
}

export type WatchSessionState = 'stopped' | 'starting' | 'watching' | 'stopping' | 'error';

/**
 * Minimal view of a running directory watcher. The default implementation wraps
 * `chokidar`; tests substitute an in-process emitter.
 */
export interface WatchHandle {
    onEvent(listener: (type: FileEventType, path: string) => void): void;
    onError(listener: (error: Error) => void): void;
    /** Resolves once the initial scan has finished. */
    ready(): Promise<void>;
    close(): Promise<void>;
}

export interface WatchHandleOptions {
    ignored: string[];
}

export type WatchHandleFactory = (directory: string, options: WatchHandleOptions) => WatchHandle;

/** Receives every trigger a session emits; resolves when the resulting operation has finished. */
export type TriggerHandler = (trigger: SnapshotTrigger) => Promise<void>;

export interface WatchSessionSnapshot {
    entityId: string;
    state: WatchSessionState;
    lastChangeAt: string | null;
    pendingRetrigger: boolean;
    restartAttempts: number;
    persistentFailure: boolean;
    lastError: string | null;
}

export type WatchSessionStateListener = (snapshot: WatchSessionSnapshot) => void;

export interface WatchRetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
}
