import { createHmac } from 'node:crypto';
import type { RestoreResult, Snapshot, SnapshotOutcome } from '../types/backup.js';
import { EntityNotFoundError } from '../types/errors.js';
import { getConfigValue } from '../config/json-config.js';

const DEFAULT_PORT = 3200;
const REACHABILITY_TIMEOUT_MS = 2_000;

export interface ControlPlaneClientOptions {
    /** Defaults to `http://127.0.0.1:{apiPort}`. */
    baseUrl?: string;
    /** Defaults to the configured apiSecret at request time. */
    resolveSecret?: () => string;
    now?: () => Date;
}

interface ApiReply {
    status: number;
    data: unknown;
    error: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function toSnapshot(value: unknown): Snapshot | null {
    if (!isRecord(value)) return null;
    const { id, entityId, timestamp, kind, format, location, sizeBytes, complete } = value;
    if (
        typeof id !== 'string' ||
        typeof entityId !== 'string' ||
        typeof timestamp !== 'string' ||
        (kind !== 'automatic' && kind !== 'manual' && kind !== 'safety') ||
        (format !== 'directory' && format !== 'archive') ||
        typeof location !== 'string' ||
        typeof sizeBytes !== 'number' ||
        typeof complete !== 'boolean'
    ) {
        return null;
    }
    return { id, entityId, timestamp, kind, format, location, sizeBytes, complete };
}

function toRestoreResult(value: unknown): RestoreResult | null {
    if (!isRecord(value)) return null;
    const { status, entityId, snapshotId, safetySnapshotId, rollbackApplied, reinstatedFromSafety, error, startedAt, completedAt } =
        value;
    if (
        (status !== 'restored' && status !== 'busy' && status !== 'failed') ||
        typeof entityId !== 'string' ||
        typeof snapshotId !== 'string' ||
        (safetySnapshotId !== null && typeof safetySnapshotId !== 'string') ||
        typeof rollbackApplied !== 'boolean' ||
        typeof reinstatedFromSafety !== 'boolean' ||
        (error !== null && typeof error !== 'string') ||
        typeof startedAt !== 'string' ||
        typeof completedAt !== 'string'
    ) {
        return null;
    }
    return { status, entityId, snapshotId, safetySnapshotId, rollbackApplied, reinstatedFromSafety, error, startedAt, completedAt };
}

/**
 * Signed client for a running daemon's control plane. One-shot CLI commands
 * go through it so that the daemon's entity locks cover them.
 */
export class ControlPlaneClient {
    readonly #baseUrl: string;
    readonly #resolveSecret: () => string;
    readonly #now: () => Date;

    constructor(options: ControlPlaneClientOptions = {}) {
        const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
        this.#baseUrl = options.baseUrl ?? `http://127.0.0.1:${port}`;
        this.#resolveSecret = options.resolveSecret ?? (() => getConfigValue('API_SECRET') ?? '');
        this.#now = options.now ?? (() => new Date());
    }

    get baseUrl(): string {
        return this.#baseUrl;
    }

    /** True when a daemon answers `GET /health`. */
    async isReachable(): Promise<boolean> {
        try {
            const response = await fetch(`${this.#baseUrl}/health`, {
                method: 'GET',
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(REACHABILITY_TIMEOUT_MS),
            });
            await response.body?.cancel();
            return response.ok;
        } catch {
            return false;
        }
    }

    async listSnapshots(entityId: string): Promise<Snapshot[]> {
        const reply = await this.#request('GET', `/entities/${encodeURIComponent(entityId)}/snapshots`);
        if (reply.status !== 200 || !isRecord(reply.data) || !Array.isArray(reply.data.snapshots)) {
            throw this.#unexpected(reply);
        }
        const snapshots: Snapshot[] = [];
        for (const item of reply.data.snapshots) {
            const snapshot = toSnapshot(item);
            if (!snapshot) throw this.#unexpected(reply);
            snapshots.push(snapshot);
        }
        return snapshots;
    }

    async requestManualBackup(entityId: string): Promise<SnapshotOutcome> {
        const reply = await this.#request('POST', `/entities/${encodeURIComponent(entityId)}/backup`);
        if (reply.status === 409) {
            return { status: 'busy', entityId, heldBy: null };
        }
        if (reply.status === 500) {
            return { status: 'failed', entityId, error: reply.error };
        }

        const outcome = isRecord(reply.data) ? reply.data.outcome : undefined;
        if (reply.status !== 201 || !isRecord(outcome)) throw this.#unexpected(reply);
        const snapshot = toSnapshot(outcome.snapshot);
        const { pruned, pruneFailures } = outcome;
        if (!snapshot || !isStringArray(pruned) || !isStringArray(pruneFailures)) throw this.#unexpected(reply);
        return { status: 'created', snapshot, pruned, pruneFailures };
    }

    async requestRestore(entityId: string, snapshotId: string): Promise<RestoreResult> {
        const startedAt = this.#now().toISOString();
        const reply = await this.#request('POST', `/entities/${encodeURIComponent(entityId)}/restore`, { snapshotId });
        if (reply.status === 409 || reply.status === 422) {
            return {
                status: reply.status === 409 ? 'busy' : 'failed',
                entityId,
                snapshotId,
                safetySnapshotId: null,
                rollbackApplied: false,
                reinstatedFromSafety: false,
                error: reply.error,
                startedAt,
                completedAt: this.#now().toISOString(),
            };
        }

        const result = toRestoreResult(isRecord(reply.data) ? reply.data.result : undefined);
        if (reply.status !== 200 || !result) throw this.#unexpected(reply);
        return result;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #request(method: 'GET' | 'POST', route: string, body?: unknown): Promise<ApiReply> {
        const payload = body === undefined ? '' : JSON.stringify(body);
        const signature = createHmac('sha256', this.#resolveSecret()).update(payload).digest('hex');
        const headers: Record<string, string> = {
            accept: 'application/json',
            'x-signature': `sha256=${signature}`,
        };
        if (body !== undefined) {
            headers['content-type'] = 'application/json';
        }

        const response = await fetch(`${this.#baseUrl}${route}`, {
            method,
            headers,
            body: body === undefined ? undefined : payload,
        });
        const raw = await response.text();
        let envelope: unknown = null;
        if (raw.trim()) {
            try {
                envelope = JSON.parse(raw);
            } catch {
                envelope = null;
            }
        }

        const data = isRecord(envelope) ? envelope.data : undefined;
        const error = isRecord(envelope) && typeof envelope.error === 'string' ? envelope.error : `HTTP ${response.status}`;
        if (response.status === 404 && route.startsWith('/entities/')) {
            throw new EntityNotFoundError(decodeURIComponent(route.split('/')[2] ?? ''));
        }
        return { status: response.status, data, error };
    }

    #unexpected(reply: ApiReply): Error {
        return new Error(`Control plane answered HTTP ${reply.status}: ${reply.error}`);
    }
}
