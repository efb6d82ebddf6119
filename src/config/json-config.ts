import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { CompressionMode } from '../types/backup.js';
import { getConfigPath as getWorkspaceConfigPath, ensureWorkspaceDir } from './workspace.js';

export interface WatchRetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
}

/** One monitored entity as written by the user. Unset fields fall back to `defaults`. */
export interface EntityConfig {
    id: string;
    sourcePath: string;
    backupRoot?: string;
    retentionLimit?: number;
    debounceMs?: number;
    compressionMode?: CompressionMode;
    enabled?: boolean;
    exclude?: string[];
}

export interface SaveSentinelConfig {
    runtime: {
        apiPort: number;
        apiSecret: string;
        logDir: string;
        maxConcurrentOperations: number;
        manualWaitMs: number;
        watchRetry: WatchRetryConfig;
    };
    defaults: {
        backupRoot: string;
        retentionLimit: number;
        safetyRetentionLimit: number;
        debounceMs: number;
        compressionMode: CompressionMode;
    };
    entities: EntityConfig[];
}

export const DEFAULT_CONFIG: SaveSentinelConfig = {
    runtime: {
        apiPort: 3200,
        apiSecret: '',
        logDir: '',
        maxConcurrentOperations: 2,
        manualWaitMs: 30_000,
        watchRetry: {
            maxAttempts: 5,
            baseDelayMs: 1000,
            backoffFactor: 2,
            maxDelayMs: 60_000,
        },
    },
    defaults: {
        backupRoot: '',
        retentionLimit: 50,
        safetyRetentionLimit: 5,
        debounceMs: 2000,
        compressionMode: 'directory-copy',
    },
    entities: [],
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.SAVE_SENTINEL_CONFIG_PATH) {
        return path.resolve(process.env.SAVE_SENTINEL_CONFIG_PATH);
    }
    ensureWorkspaceDir();
    return getWorkspaceConfigPath();
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<SaveSentinelConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${describeError(error)}`);
    }
    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${describeError(error)}`);
    }
}

export async function writeConfig(config: SaveSentinelConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${describeError(error)}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function numberOr(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function compressionModeOr(value: unknown, fallback: CompressionMode): CompressionMode {
    return value === 'directory-copy' || value === 'archive' ? value : fallback;
}

function parseEntity(value: unknown): EntityConfig | null {
    if (!isRecord(value) || typeof value.id !== 'string' || typeof value.sourcePath !== 'string') {
        return null;
    }
    const entity: EntityConfig = { id: value.id, sourcePath: value.sourcePath };
    if (typeof value.backupRoot === 'string') entity.backupRoot = value.backupRoot;
    if (typeof value.retentionLimit === 'number') entity.retentionLimit = value.retentionLimit;
    if (typeof value.debounceMs === 'number') entity.debounceMs = value.debounceMs;
    if (value.compressionMode === 'directory-copy' || value.compressionMode === 'archive') {
        entity.compressionMode = value.compressionMode;
    }
    if (typeof value.enabled === 'boolean') entity.enabled = value.enabled;
    if (Array.isArray(value.exclude)) {
        entity.exclude = value.exclude.filter((pattern): pattern is string => typeof pattern === 'string');
    }
    return entity;
}

function mergeWithDefaults(loaded: unknown): SaveSentinelConfig {
    const config: SaveSentinelConfig = structuredClone(DEFAULT_CONFIG);
    if (!isRecord(loaded)) return config;

    const runtime = loaded.runtime;
    if (isRecord(runtime)) {
        const base = config.runtime;
        const retry = isRecord(runtime.watchRetry) ? runtime.watchRetry : {};
        config.runtime = {
            apiPort: numberOr(runtime.apiPort, base.apiPort),
            apiSecret: stringOr(runtime.apiSecret, base.apiSecret),
            logDir: stringOr(runtime.logDir, base.logDir),
            maxConcurrentOperations: numberOr(runtime.maxConcurrentOperations, base.maxConcurrentOperations),
            manualWaitMs: numberOr(runtime.manualWaitMs, base.manualWaitMs),
            watchRetry: {
                maxAttempts: numberOr(retry.maxAttempts, base.watchRetry.maxAttempts),
                baseDelayMs: numberOr(retry.baseDelayMs, base.watchRetry.baseDelayMs),
                backoffFactor: numberOr(retry.backoffFactor, base.watchRetry.backoffFactor),
                maxDelayMs: numberOr(retry.maxDelayMs, base.watchRetry.maxDelayMs),
            },
        };
    }

    const defaults = loaded.defaults;
    if (isRecord(defaults)) {
        const base = config.defaults;
        config.defaults = {
            backupRoot: stringOr(defaults.backupRoot, base.backupRoot),
            retentionLimit: numberOr(defaults.retentionLimit, base.retentionLimit),
            safetyRetentionLimit: numberOr(defaults.safetyRetentionLimit, base.safetyRetentionLimit),
            debounceMs: numberOr(defaults.debounceMs, base.debounceMs),
            compressionMode: compressionModeOr(defaults.compressionMode, base.compressionMode),
        };
    }

    if (Array.isArray(loaded.entities)) {
        config.entities = loaded.entities
            .map((entry) => parseEntity(entry))
            .filter((entry): entry is EntityConfig => entry !== null);
    }

    return config;
}

// ── Flat Key Adapter ────────────────────────────────────────────────────────

let cachedConfig: SaveSentinelConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): SaveSentinelConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            const content = readFileSync(configPath, 'utf8');
            cachedConfig = mergeWithDefaults(JSON.parse(content));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[SaveSentinel Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

/**
 * Gets a configured value from an environment override or the JSON config.
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();
    let jsonValue: unknown = undefined;

    switch (key) {
        case 'API_PORT': jsonValue = config.runtime.apiPort; break;
        case 'API_SECRET': jsonValue = config.runtime.apiSecret; break;
        case 'LOG_DIR': jsonValue = config.runtime.logDir; break;
        case 'MAX_CONCURRENT_OPERATIONS': jsonValue = config.runtime.maxConcurrentOperations; break;
        case 'MANUAL_WAIT_MS': jsonValue = config.runtime.manualWaitMs; break;
        case 'DEFAULT_BACKUP_ROOT': jsonValue = config.defaults.backupRoot; break;
    }

    const envKey = `SAVE_SENTINEL_${key}`;
    const envValue = process.env[envKey];
    if (isAllowedOverride(key) && envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }

    return undefined;
}

function isAllowedOverride(key: string): boolean {
    return [
        'API_PORT',
        'API_SECRET',
        'LOG_DIR',
        'MAX_CONCURRENT_OPERATIONS',
        'MANUAL_WAIT_MS',
        'DEFAULT_BACKUP_ROOT',
    ].includes(key);
}
