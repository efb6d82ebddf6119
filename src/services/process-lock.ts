import { randomUUID } from 'node:crypto';
import { link, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

/** File kept in each `{backupRoot}/{entityId}/` directory while a process owns it. */
export const OWNER_LOCK_NAME = '.owner.lock';

export interface LockOwner {
    pid: number;
    startedAt: string;
}

export type LockClaim =
    | { ok: true; lock: ProcessLock }
    | { ok: false; path: string; owner: LockOwner | null };

export interface ProcessLockOptions {
    pid?: number;
    /** Whether a recorded owner process still runs. A dead owner's lock is taken over. */
    isAlive?: (pid: number) => boolean;
    now?: () => Date;
}

function hasCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: the process exists but belongs to another user.
        return hasCode(error, 'EPERM');
    }
}

function parseOwner(raw: string): LockOwner | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null) return null;
    const pid: unknown = 'pid' in parsed ? parsed.pid : undefined;
    const startedAt: unknown = 'startedAt' in parsed ? parsed.startedAt : undefined;
    if (typeof pid !== 'number' || !Number.isInteger(pid) || typeof startedAt !== 'string') return null;
    return { pid, startedAt };
}

/** Owner recorded in a lock file; null when the file is gone or unreadable. */
export async function readLockOwner(lockPath: string): Promise<LockOwner | null> {
    try {
        return parseOwner(await readFile(lockPath, 'utf8'));
    } catch (error) {
        if (hasCode(error, 'ENOENT')) return null;
        throw error;
    }
}

/** An owner lock held by this process. */
export class ProcessLock {
    readonly path: string;
    readonly owner: LockOwner;
    #released = false;

    constructor(lockPath: string, owner: LockOwner) {
        this.path = lockPath;
        this.owner = owner;
    }

    get held(): boolean {
        return !this.#released;
    }

    /** Idempotent. Leaves the file alone when another process has taken it over. */
    async release(): Promise<void> {
        if (this.#released) return;
        this.#released = true;
        const current = await readLockOwner(this.path);
        if (current && current.pid === this.owner.pid && current.startedAt === this.owner.startedAt) {
            await rm(this.path, { force: true });
        }
    }
}

/**
 * Claim `lockPath` for this process. The owner record is written to a
 * temporary file and hard-linked into place, so a lock file is never seen
 * half written and only one claimant's link succeeds.
 */
export async function claimProcessLock(lockPath: string, options: ProcessLockOptions = {}): Promise<LockClaim> {
    const pid = options.pid ?? process.pid;
    const isAlive = options.isAlive ?? isProcessAlive;
    const owner: LockOwner = { pid, startedAt: (options.now ?? (() => new Date()))().toISOString() };

    await mkdir(path.dirname(lockPath), { recursive: true });
    const tempPath = `${lockPath}.${randomUUID().slice(0, 8)}.tmp`;
    await writeFile(tempPath, JSON.stringify(owner), { mode: 0o600 });

    try {
        for (let attempt = 0; attempt < 2; attempt++) {
            try {
                await link(tempPath, lockPath);
                return { ok: true, lock: new ProcessLock(lockPath, owner) };
            } catch (error) {
                if (!hasCode(error, 'EEXIST')) throw error;
            }

            const current = await readLockOwner(lockPath);
            if (current && current.pid !== pid && isAlive(current.pid)) {
                return { ok: false, path: lockPath, owner: current };
            }
            await rm(lockPath, { force: true });
            await logThought(
                `[ProcessLock] Took over stale lock ${lockPath} (previous owner: ${current ? `pid ${current.pid}` : 'unreadable'}).`,
            );
        }
        return { ok: false, path: lockPath, owner: await readLockOwner(lockPath) };
    } finally {
        await rm(tempPath, { force: true }).catch((error: unknown) => {
            console.warn(`[ProcessLock] Could not remove ${tempPath}: ${errorMessage(error)}`);
        });
    }
}
