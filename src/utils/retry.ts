import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Errors for which this returns false fail immediately without another attempt. */
    shouldRetry?: (error: unknown) => boolean;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The last thrown value, kept so callers can rethrow it unchanged. */
    cause?: unknown;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Delay before retry number `attempt` (1-based): `base * factor^(attempt-1)`,
 * capped at `maxDelayMs`.
 */
export function computeBackoffDelay(
    attempt: number,
    options: Pick<RetryOptions, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs'> = {},
): number {
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    return Math.min(baseDelayMs * backoffFactor ** Math.max(0, attempt - 1), maxDelayMs);
}

/** Errno codes a game holding a save file open tends to produce on Windows and Linux. */
const TRANSIENT_FS_CODES = new Set(['EBUSY', 'EPERM', 'EACCES', 'EAGAIN', 'EMFILE']);

export function isTransientFsError(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
        return false;
    }
    return typeof error.code === 'string' && TRANSIENT_FS_CODES.has(error.code);
}

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay doubles after each attempt (capped at `maxDelayMs`).
 * - All attempts are logged for postmortem traceability.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => copyFile(source, destination),
 *   { maxAttempts: 5, baseDelayMs: 500, label: 'copy:slot0000', shouldRetry: isTransientFsError },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    const label = options.label ?? 'unnamed';

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown = undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);
            lastCause = err;

            const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
            if (!retryable) {
                return {
                    ok: false,
                    error: lastError,
                    cause: err,
                    attempts: attempt,
                    totalDurationMs: Date.now() - start,
                };
            }

            if (attempt < maxAttempts) {
                const delay = computeBackoffDelay(attempt, options);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await sleep(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        cause: lastCause,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
