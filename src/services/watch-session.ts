import { stat } from 'node:fs/promises';
import path from 'node:path';
import { watch } from 'chokidar';
import type { EntityProfile, SnapshotTrigger } from '../types/backup.js';
import { WatchError, errorMessage } from '../types/errors.js';
import type {
    FileEventType,
    TriggerHandler,
    WatchHandle,
    WatchHandleFactory,
    WatchRetryPolicy,
    WatchSessionSnapshot,
    WatchSessionState,
    WatchSessionStateListener,
} from '../types/file-watcher.js';
import { computeBackoffDelay } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_EXCLUDE = ['**/.git/**'];

export const DEFAULT_WATCH_RETRY: WatchRetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 60_000,
};

const FILE_EVENT_TYPES: ReadonlySet<string> = new Set(['add', 'change', 'unlink', 'addDir', 'unlinkDir']);

function isFileEventType(value: string): value is FileEventType {
    return FILE_EVENT_TYPES.has(value);
}

/** Wraps a `chokidar` watcher. Writes are reported once the file has been stable for 300ms. */
export const createChokidarHandle: WatchHandleFactory = (directory, options) => {
    const watcher = watch(directory, {
        ignored: options.ignored,
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
            stabilityThreshold: 300,
            pollInterval: 100,
        },
    });
    const ready = new Promise<void>((resolve) => {
        watcher.once('ready', () => resolve());
    });

    return {
        onEvent(listener) {
            watcher.on('all', (eventName: string, filePath: string) => {
                if (isFileEventType(eventName)) {
                    listener(eventName, filePath);
                }
            });
        },
        onError(listener) {
            watcher.on('error', (err: unknown) => {
                listener(err instanceof Error ? err : new Error(String(err)));
            });
        },
        ready: () => ready,
        async close() {
            await watcher.close();
        },
    };
};

export interface WatchSessionOptions {
    profile: EntityProfile;
    /** Receives each automatic trigger once its quiet period has elapsed. */
    onTrigger: TriggerHandler;
    /** True while a snapshot or restore holds the entity's lock. */
    isBusy?: () => boolean;
    retry?: Partial<WatchRetryPolicy>;
    createHandle?: WatchHandleFactory;
    now?: () => Date;
}

/**
 * Watches one entity's source tree and turns bursts of writes into a single
 * automatic trigger per quiet period of `debounceMs`.
 *
 * Deletions never trigger a snapshot: a snapshot taken right after a file
 * vanished would rotate out the last copy that still contained it.
 */
export class WatchSession {
    readonly #profile: EntityProfile;
    readonly #onTrigger: TriggerHandler;
    readonly #isBusy: () => boolean;
    readonly #retry: WatchRetryPolicy;
    readonly #createHandle: WatchHandleFactory;
    readonly #now: () => Date;
    readonly #listeners: Set<WatchSessionStateListener> = new Set();

    #state: WatchSessionState = 'stopped';
    #handle: WatchHandle | null = null;
    #debounceTimer: ReturnType<typeof setTimeout> | null = null;
    #restartTimer: ReturnType<typeof setTimeout> | null = null;
    #generation = 0;
    #lastChangeAt: string | null = null;
    #pendingRetrigger = false;
    #restartAttempts = 0;
    #persistentFailure = false;
    #lastError: string | null = null;

    constructor(options: WatchSessionOptions) {
        this.#profile = options.profile;
        this.#onTrigger = options.onTrigger;
        this.#isBusy = options.isBusy ?? (() => false);
        this.#retry = { ...DEFAULT_WATCH_RETRY, ...options.retry };
        this.#createHandle = options.createHandle ?? createChokidarHandle;
        this.#now = options.now ?? (() => new Date());
    }

    get entityId(): string {
        return this.#profile.id;
    }

    get state(): WatchSessionState {
        return this.#state;
    }

    /** Watching, starting, or waiting to restart after an error. */
    get active(): boolean {
        return this.#state === 'watching' || this.#state === 'starting' || this.#restartTimer !== null;
    }

    getSnapshot(): WatchSessionSnapshot {
        return {
            entityId: this.#profile.id,
            state: this.#state,
            lastChangeAt: this.#lastChangeAt,
            pendingRetrigger: this.#pendingRetrigger,
            restartAttempts: this.#restartAttempts,
            persistentFailure: this.#persistentFailure,
            lastError: this.#lastError,
        };
    }

    /** Subscribe to state changes. Returns an unsubscribe function. */
    onStateChange(listener: WatchSessionStateListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    /** Begin watching. Clears a persistent failure. No-op while already watching. */
    async start(): Promise<void> {
        if (this.#state === 'watching' || this.#state === 'starting') {
            return;
        }
        this.#clearRestartTimer();
        this.#restartAttempts = 0;
        this.#persistentFailure = false;
        await this.#open();
    }

    /** Stop watching. Pending triggers are dropped; in-flight operations are not touched. */
    async stop(): Promise<void> {
        this.#pendingRetrigger = false;
        await this.#close();
        this.#lastError = null;
        this.#persistentFailure = false;
        this.#restartAttempts = 0;
        this.#setState('stopped');
    }

    /**
     * Close the watcher without forgetting a pending retrigger. Returns whether
     * the session was active, so the caller knows whether to `resume()`.
     */
    async suspend(): Promise<boolean> {
        const wasActive = this.active;
        await this.#close();
        if (this.#state !== 'error') {
            this.#setState('stopped');
        }
        return wasActive;
    }

    /** Restart after `suspend()`; a retrigger recorded meanwhile starts a debounce cycle. */
    async resume(): Promise<void> {
        await this.start();
        this.operationFinished();
    }

    /** Record that a trigger arrived while the entity was busy. */
    markPendingRetrigger(): void {
        if (this.#pendingRetrigger) return;
        this.#pendingRetrigger = true;
        this.#notify();
    }

    /** Forget a recorded retrigger, e.g. once a restore captured the writes it stood for. */
    clearPendingRetrigger(): void {
        if (!this.#pendingRetrigger) return;
        this.#pendingRetrigger = false;
        this.#notify();
    }

    /**
     * Called whenever the entity's lock is released. A pending retrigger
     * starts a fresh debounce cycle.
     */
    operationFinished(): void {
        if (!this.#pendingRetrigger || this.#state !== 'watching') {
            return;
        }
        this.#pendingRetrigger = false;
        this.#scheduleTrigger();
        this.#notify();
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #open(): Promise<void> {
        const generation = ++this.#generation;
        this.#setState('starting');

        try {
            const sourceStat = await stat(this.#profile.sourcePath);
            if (!sourceStat.isDirectory()) {
                throw new Error(`${this.#profile.sourcePath} is not a directory.`);
            }
        } catch (error) {
            if (generation !== this.#generation) return;
            this.#fail(new WatchError(this.#profile.id, `Cannot watch ${this.#profile.sourcePath}: ${errorMessage(error)}`));
            return;
        }
        if (generation !== this.#generation) return;

        const handle = this.#createHandle(this.#profile.sourcePath, { ignored: this.#ignoredPatterns() });
        this.#handle = handle;
        handle.onEvent((type, filePath) => {
            if (generation === this.#generation) {
                this.#handleEvent(type, filePath);
            }
        });
        handle.onError((error) => {
            if (generation === this.#generation) {
                this.#fail(new WatchError(this.#profile.id, `Watcher error: ${error.message}`));
            }
        });

        await handle.ready();
        if (generation !== this.#generation || this.#state !== 'starting') {
            return;
        }

        this.#restartAttempts = 0;
        this.#lastError = null;
        this.#setState('watching');
        await logThought(`[WatchSession] Started watching '${this.#profile.id}' at ${this.#profile.sourcePath}`);
    }

    async #close(): Promise<void> {
        this.#generation++;
        this.#clearDebounceTimer();
        this.#clearRestartTimer();

        const handle = this.#handle;
        this.#handle = null;
        if (!handle) {
            return;
        }

        this.#setState('stopping');
        try {
            await handle.close();
        } catch (error) {
            console.error(`[WatchSession] Failed to close watcher for '${this.#profile.id}':`, errorMessage(error));
        }
        await logThought(`[WatchSession] Stopped watching '${this.#profile.id}'.`);
    }

    #handleEvent(type: FileEventType, filePath: string): void {
        if (this.#state !== 'watching') {
            return;
        }
        if (type === 'unlinkDir' && path.resolve(filePath) === path.resolve(this.#profile.sourcePath)) {
            this.#fail(new WatchError(this.#profile.id, `Source root ${this.#profile.sourcePath} was removed.`));
            return;
        }
        if (type === 'unlink' || type === 'unlinkDir') {
            void logThought(`[WatchSession] '${this.#profile.id}' saw ${type} ${filePath}; deletions never trigger a snapshot.`);
            return;
        }

        this.#lastChangeAt = this.#now().toISOString();
        this.#scheduleTrigger();
    }

    #scheduleTrigger(): void {
        this.#clearDebounceTimer();
        this.#debounceTimer = setTimeout(() => {
            this.#debounceTimer = null;
            this.#fire();
        }, this.#profile.debounceMs);
    }

    #fire(): void {
        if (this.#state !== 'watching') {
            return;
        }
        if (this.#isBusy()) {
            this.markPendingRetrigger();
            return;
        }

        const trigger: SnapshotTrigger = {
            entityId: this.#profile.id,
            reason: 'automatic',
            requestedAt: this.#now().toISOString(),
        };
        void this.#dispatch(trigger);
    }

    async #dispatch(trigger: SnapshotTrigger): Promise<void> {
        try {
            await this.#onTrigger(trigger);
        } catch (err) {
            console.error(`[WatchSession] Trigger handler for '${trigger.entityId}' threw an error:`, err);
        }
    }

    #fail(error: WatchError): void {
        this.#lastError = error.message;
        console.error(`[WatchSession] ${error.message}`);

        const handle = this.#handle;
        this.#handle = null;
        this.#generation++;
        this.#clearDebounceTimer();
        this.#setState('error');
        if (handle) {
            void this.#closeQuietly(handle);
        }

        this.#restartAttempts++;
        if (this.#restartAttempts > this.#retry.maxAttempts) {
            this.#persistentFailure = true;
            this.#notify();
            void logThought(
                `[WatchSession] '${this.#profile.id}' gave up after ${this.#retry.maxAttempts} restart attempts: ${error.message}`,
            );
            return;
        }

        const delay = computeBackoffDelay(this.#restartAttempts, this.#retry);
        this.#notify();
        this.#restartTimer = setTimeout(() => {
            this.#restartTimer = null;
            void this.#restart();
        }, delay);
    }

    async #restart(): Promise<void> {
        try {
            await this.#open();
        } catch (error) {
            this.#fail(new WatchError(this.#profile.id, `Restart failed: ${errorMessage(error)}`));
        }
    }

    async #closeQuietly(handle: WatchHandle): Promise<void> {
        try {
            await handle.close();
        } catch (error) {
            console.error(`[WatchSession] Failed to close watcher for '${this.#profile.id}':`, errorMessage(error));
        }
    }

    #ignoredPatterns(): string[] {
        const source = this.#profile.sourcePath;
        return [...DEFAULT_EXCLUDE, ...(this.#profile.exclude ?? [])].map((pattern) =>
            path.isAbsolute(pattern) ? pattern : path.join(source, pattern),
        );
    }

    #clearDebounceTimer(): void {
        if (this.#debounceTimer) {
            clearTimeout(this.#debounceTimer);
            this.#debounceTimer = null;
        }
    }

    #clearRestartTimer(): void {
        if (this.#restartTimer) {
            clearTimeout(this.#restartTimer);
            this.#restartTimer = null;
        }
    }

    #setState(state: WatchSessionState): void {
        if (this.#state === state) return;
        this.#state = state;
        this.#notify();
    }

    #notify(): void {
        const snapshot = this.getSnapshot();
        for (const listener of this.#listeners) {
            try {
                listener(snapshot);
            } catch (err) {
                console.error('[WatchSession] Listener threw an error:', err);
            }
        }
    }
}
