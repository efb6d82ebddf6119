import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { getConfigValue } from '../config/json-config.js';
import { getLogDir } from '../config/workspace.js';

const REDACTED = '[REDACTED]';
const SENSITIVE_ASSIGNMENT = /\b(api[_-]?secret|token|password|secret)\s*[:=]\s*("[^"]*"|'[^']*'|\S+)/gi;

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

/** Directory holding the daily `YYYY-MM-DD.md` logs. */
export function resolveLogDir(): string {
    return getConfigValue('LOG_DIR') ?? getLogDir();
}

export function getDailyLogPath(dateIso: string = currentDateIso()): string {
    return path.join(resolveLogDir(), `${dateIso}.md`);
}

/**
 * Redact the configured API secret and any `key=value` style credential from
 * text that is about to be logged or returned to a client.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(SENSITIVE_ASSIGNMENT, (_match, key: string) => `${key}=${REDACTED}`);
    const secret = getConfigValue('API_SECRET');
    if (secret && secret.length >= 4) {
        scrubbed = scrubbed.split(secret).join(REDACTED);
    }
    return scrubbed;
}

async function appendSection(title: string, body: string): Promise<void> {
    const logPath = getDailyLogPath();
    const section = `\n## ${title} @ ${new Date().toISOString()}\n${scrubSensitiveText(body)}\n`;
    try {
        await mkdir(path.dirname(logPath), { recursive: true });
        await appendFile(logPath, section, 'utf8');
    } catch (error) {
        console.error(`[Logger] Failed to append to ${logPath}:`, error instanceof Error ? error.message : error);
    }
}

/** Append a free-form note to today's log. Never throws. */
export async function logThought(message: string): Promise<void> {
    await appendSection('Thought', message);
}

/** Record the outcome of a snapshot, prune or restore for one entity. */
export async function logBackupOperation(
    entityId: string,
    operation: string,
    detail: Record<string, unknown>,
): Promise<void> {
    const lines = [`entity: ${entityId}`, `operation: ${operation}`];
    for (const [key, value] of Object.entries(detail)) {
        lines.push(`${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
    await appendSection('Operation', lines.join('\n'));
}
