import { existsSync, mkdirSync } from 'fs';
import * as os from 'os';
import * as path from 'path';

const HOME_DIR_NAME = '.save-sentinel';
const CONFIG_FILE_NAME = 'save-sentinel.json';

/**
 * Profile name from `SAVE_SENTINEL_PROFILE`, used to isolate workspaces
 * (e.g. a throwaway `test` profile next to the real one).
 */
export function getProfileName(): string {
    const raw = process.env.SAVE_SENTINEL_PROFILE?.trim();
    return raw ? raw : 'default';
}

function sanitizeProfileName(name: string): string {
    return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}

export function getHomeDir(): string {
    return path.join(os.homedir(), HOME_DIR_NAME);
}

/** `~/.save-sentinel/workspace` or `~/.save-sentinel/workspace-{profile}`. */
export function getWorkspaceDir(): string {
    const profile = getProfileName();
    const dirName = profile === 'default' ? 'workspace' : `workspace-${sanitizeProfileName(profile)}`;
    return path.join(getHomeDir(), dirName);
}

export function getWorkspaceSubdir(name: string): string {
    return path.join(getWorkspaceDir(), name);
}

export function getConfigPath(): string {
    return path.join(getWorkspaceDir(), CONFIG_FILE_NAME);
}

export function getLogDir(): string {
    return getWorkspaceSubdir('logs');
}

export function getDefaultBackupRoot(): string {
    return getWorkspaceSubdir('backups');
}

export function ensureWorkspaceDir(): void {
    const dir = getWorkspaceDir();
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }
}
