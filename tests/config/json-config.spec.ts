import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    readConfig,
    writeConfig,
    getConfigValue,
    DEFAULT_CONFIG,
    reloadConfigSync,
    clearConfigCacheForTests,
    type SaveSentinelConfig,
} from '../../src/config/json-config.js';

describe('JSON config', () => {
    const tempDir = path.join(os.tmpdir(), 'save-sentinel-test-config', Date.now().toString());
    const tempConfigPath = path.join(tempDir, 'save-sentinel.json');

    beforeEach(async () => {
        vi.stubEnv('SAVE_SENTINEL_CONFIG_PATH', tempConfigPath);
        clearConfigCacheForTests();
        if (!existsSync(tempDir)) {
            await fs.mkdir(tempDir, { recursive: true });
        }
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        clearConfigCacheForTests();
        if (existsSync(tempDir)) {
            await fs.rm(tempDir, { recursive: true, force: true });
        }
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig();
        expect(config.runtime.apiPort).toBe(3200);
        expect(config.runtime.maxConcurrentOperations).toBe(2);
        expect(config.defaults.retentionLimit).toBe(50);
        expect(config.defaults.compressionMode).toBe('directory-copy');
        expect(config.entities).toEqual([]);
    });

    it('saves and reads structured config correctly', async () => {
        const customConfig: SaveSentinelConfig = structuredClone(DEFAULT_CONFIG);
        customConfig.runtime.apiPort = 9999;
        customConfig.entities.push({
            id: 'stardew',
            sourcePath: '/games/stardew/Saves',
            retentionLimit: 10,
            compressionMode: 'archive',
            exclude: ['**/*.tmp'],
        });

        await writeConfig(customConfig);

        const loaded = await readConfig();
        expect(loaded.runtime.apiPort).toBe(9999);
        expect(loaded.entities).toEqual([
            {
                id: 'stardew',
                sourcePath: '/games/stardew/Saves',
                retentionLimit: 10,
                compressionMode: 'archive',
                exclude: ['**/*.tmp'],
            },
        ]);
        expect(await fs.readdir(tempDir)).toEqual(['save-sentinel.json']);
    });

    it('fills missing sections from defaults and drops malformed entities', async () => {
        await fs.writeFile(
            tempConfigPath,
            JSON.stringify({
                defaults: { retentionLimit: 10, compressionMode: 'zip' },
                entities: [
                    { id: 'celeste', sourcePath: '/games/celeste', compressionMode: 'zip', enabled: 'yes' },
                    { id: 5 },
                    'stardew',
                ],
            }),
            'utf8',
        );

        const config = await readConfig();

        expect(config.defaults).toEqual({
            backupRoot: '',
            retentionLimit: 10,
            safetyRetentionLimit: 5,
            debounceMs: 2000,
            compressionMode: 'directory-copy',
        });
        expect(config.runtime).toEqual(DEFAULT_CONFIG.runtime);
        expect(config.entities).toEqual([{ id: 'celeste', sourcePath: '/games/celeste' }]);
    });

    it('handles malformed JSON by throwing an error', async () => {
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');
        await expect(readConfig()).rejects.toThrow(/Failed to parse config file/);
    });

    it('maps flat keys onto the JSON config with environment overrides', async () => {
        const customConfig: SaveSentinelConfig = structuredClone(DEFAULT_CONFIG);
        customConfig.runtime.apiSecret = 'test-secret';
        customConfig.runtime.maxConcurrentOperations = 4;
        await fs.writeFile(tempConfigPath, JSON.stringify(customConfig), 'utf8');

        reloadConfigSync();

        expect(getConfigValue('API_SECRET')).toBe('test-secret');
        expect(getConfigValue('MAX_CONCURRENT_OPERATIONS')).toBe('4');
        expect(getConfigValue('LOG_DIR')).toBeUndefined();
        expect(getConfigValue('UNKNOWN_KEY')).toBeUndefined();

        vi.stubEnv('SAVE_SENTINEL_API_SECRET', 'env-secret');
        expect(getConfigValue('API_SECRET')).toBe('env-secret');

        vi.stubEnv('SAVE_SENTINEL_API_PORT', '   ');
        expect(getConfigValue('API_PORT')).toBe('3200');
    });
});
