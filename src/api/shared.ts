import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { EntityNotFoundError, ProfileValidationError } from '../types/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    const rawBody = rawBodies.get(req);
    if (typeof rawBody === 'string') {
        payloads.add(rawBody);
    }

    if (req.body === undefined || (rawBody === undefined && isEmptyObject(req.body))) {
        payloads.add('');
    }
    if (req.body !== undefined) {
        payloads.add(JSON.stringify(req.body));
        payloads.add(stableStringify(req.body));
    }

    return [...payloads];
}

function isEmptyObject(value: unknown): boolean {
    return typeof value === 'object' && value !== null && Object.keys(value).length === 0;
}

/** `verify` hook for `express.json()` that keeps the exact bytes for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

export type SignatureCheck = { ok: true } | { ok: false; status: 401 | 403 | 503; message: string };

/**
 * Check an `X-Signature` header against the payloads the request may have been
 * signed over.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, apiSecret)>`
 */
export function checkSignature(header: unknown, payloads: readonly string[], apiSecret: string): SignatureCheck {
    if (!apiSecret) {
        return { ok: false, status: 503, message: 'Signed API endpoints are unavailable (missing apiSecret).' };
    }
    if (typeof header !== 'string' || !header.startsWith('sha256=')) {
        return { ok: false, status: 401, message: 'Missing or malformed X-Signature header.' };
    }

    const providedHex = header.slice('sha256='.length);
    if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
        return { ok: false, status: 401, message: 'Malformed signature digest.' };
    }
    const provided = Buffer.from(providedHex, 'hex');
    const signatureMatches = payloads.some((payload) => {
        const expected = Buffer.from(createHmac('sha256', apiSecret).update(payload).digest('hex'), 'hex');
        return provided.length === expected.length && timingSafeEqual(provided, expected);
    });
    return signatureMatches ? { ok: true } : { ok: false, status: 403, message: 'Invalid signature.' };
}

/** Reject signed API requests whose `X-Signature` does not match; all of them when no secret is configured. */
export function requireSignature(req: Request, res: Response, next: NextFunction): void {
    const check = checkSignature(
        req.headers['x-signature'],
        getSignaturePayloadCandidates(req),
        getConfigValue('API_SECRET') ?? '',
    );
    if (!check.ok) {
        void logThought(`[API] Signed request rejected: ${check.message}`);
        sendError(res, check.message, check.status);
        return;
    }
    next();
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof EntityNotFoundError) {
        return { status: 404, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof ProfileValidationError) {
        return { status: 422, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    console.log(`[API] [${correlationId}] ${req.method} ${req.path}`);
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
