import * as path from 'path';
import type { EntityProfile } from '../types/backup.js';
import { ProfileValidationError } from '../types/errors.js';
import type { EntityConfig, SaveSentinelConfig } from './json-config.js';
import { getDefaultBackupRoot } from './workspace.js';

/** Read-only source of entity profiles. The core never writes back through it. */
export interface ProfileSource {
    getProfile(entityId: string): EntityProfile | undefined;
    listProfiles(): EntityProfile[];
}

const ENTITY_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Throws {@link ProfileValidationError} listing every violated constraint. */
export function validateProfile(profile: EntityProfile): EntityProfile {
    const hints: string[] = [];
    if (!ENTITY_ID_PATTERN.test(profile.id)) {
        hints.push('Entity id must be alphanumeric (dots, dashes and underscores allowed after the first character).');
    }
    if (!path.isAbsolute(profile.sourcePath)) {
        hints.push('sourcePath must be an absolute path.');
    }
    if (!path.isAbsolute(profile.backupRoot)) {
        hints.push('backupRoot must be an absolute path.');
    }
    if (!Number.isInteger(profile.retentionLimit) || profile.retentionLimit < 1) {
        hints.push('retentionLimit must be an integer of at least 1.');
    }
    if (!Number.isFinite(profile.debounceMs) || profile.debounceMs <= 0) {
        hints.push('debounceMs must be greater than 0.');
    }
    const resolvedSource = path.resolve(profile.sourcePath);
    const entityBackupDir = path.resolve(profile.backupRoot, profile.id);
    if (resolvedSource === entityBackupDir || resolvedSource.startsWith(`${entityBackupDir}${path.sep}`)) {
        hints.push('sourcePath must not lie inside its own backup directory.');
    }
    const resolvedBackupRoot = path.resolve(profile.backupRoot);
    if (resolvedBackupRoot === resolvedSource || resolvedBackupRoot.startsWith(`${resolvedSource}${path.sep}`)) {
        hints.push('backupRoot must not lie inside sourcePath; a restore replaces the whole source tree.');
    }
    if (hints.length > 0) {
        throw new ProfileValidationError(profile.id, hints);
    }
    return profile;
}

/**
 * Resolves entity profiles from the JSON config, filling unset fields from the
 * app-wide defaults. Profiles are frozen on construction.
 */
export class ConfigProfileSource implements ProfileSource {
    readonly #profiles: Map<string, EntityProfile> = new Map();

    constructor(config: SaveSentinelConfig) {
        for (const entity of config.entities) {
            if (this.#profiles.has(entity.id)) {
                throw new ProfileValidationError(entity.id, ['Entity ids must be unique.']);
            }
            this.#profiles.set(entity.id, Object.freeze(resolveProfile(entity, config)));
        }
    }

    getProfile(entityId: string): EntityProfile | undefined {
        return this.#profiles.get(entityId);
    }

    listProfiles(): EntityProfile[] {
        return [...this.#profiles.values()];
    }
}

export function resolveProfile(entity: EntityConfig, config: SaveSentinelConfig): EntityProfile {
    const defaults = config.defaults;
    const backupRoot = entity.backupRoot || defaults.backupRoot || getDefaultBackupRoot();
    return validateProfile({
        id: entity.id,
        sourcePath: path.resolve(entity.sourcePath),
        backupRoot: path.resolve(backupRoot),
        retentionLimit: entity.retentionLimit ?? defaults.retentionLimit,
        debounceMs: entity.debounceMs ?? defaults.debounceMs,
        compressionMode: entity.compressionMode ?? defaults.compressionMode,
        enabled: entity.enabled ?? true,
        exclude: entity.exclude ? [...entity.exclude] : [],
    });
}
