import * as path from 'path';
import * as os from 'os';
import { mkdtemp, rm } from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logBackupOperation: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

import { DEFAULT_CONFIG } from '../../src/config/json-config.js';
import { claimBackupDirs, createRuntime, releaseAll, type Runtime } from '../../src/core/runtime.js';
import { claimProcessLock, readLockOwner } from '../../src/services/process-lock.js';
import { ProfileValidationError } from '../../src/types/errors.js';

const ROOT = path.join(os.tmpdir(), 'save-sentinel-runtime');

describe('createRuntime', () => {
  let runtime: Runtime | null = null;

  afterEach(async () => {
    await runtime?.manager.dispose();
    runtime = null;
  });

  it('registers every configured entity with the shared core', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.runtime.maxConcurrentOperations = 3;
    config.runtime.manualWaitMs = 1500;
    config.defaults.backupRoot = path.join(ROOT, 'backups');
    config.entities = [
      { id: 'stardew', sourcePath: path.join(ROOT, 'stardew') },
      { id: 'celeste', sourcePath: path.join(ROOT, 'celeste'), enabled: false },
    ];

    runtime = createRuntime(config);

    expect(runtime.manager.listStatuses().map((status) => status.entityId)).toEqual(['stardew', 'celeste']);
    expect(runtime.pool.getStats().maxConcurrent).toBe(3);
    expect(runtime.engine.manualWaitMs).toBe(1500);
    expect(runtime.engine.locks).toBe(runtime.locks);
    expect(runtime.manager.getProfile('celeste').enabled).toBe(false);
  });

  it('refuses to start with an invalid entity', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.defaults.backupRoot = path.join(ROOT, 'backups');
    config.entities = [{ id: 'stardew', sourcePath: path.join(ROOT, 'stardew'), retentionLimit: 0 }];

    expect(() => createRuntime(config)).toThrow(ProfileValidationError);
  });
});

describe('claimBackupDirs', () => {
  let root: string;
  let runtime: Runtime;

  const lockOf = (entityId: string) => path.join(root, 'backups', entityId, '.owner.lock');

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'save-sentinel-claim-'));
    const config = structuredClone(DEFAULT_CONFIG);
    config.defaults.backupRoot = path.join(root, 'backups');
    config.entities = [
      { id: 'stardew', sourcePath: path.join(root, 'stardew') },
      { id: 'celeste', sourcePath: path.join(root, 'celeste') },
    ];
    runtime = createRuntime(config);
  });

  afterEach(async () => {
    await runtime.manager.dispose();
    await rm(root, { recursive: true, force: true });
  });

  it('claims every entity directory and releases them together', async () => {
    const claim = await claimBackupDirs(runtime, { pid: 4242 });
    if (!claim.ok) throw new Error('expected the claim to succeed');

    expect(claim.locks.map((lock) => lock.path)).toEqual([lockOf('stardew'), lockOf('celeste')]);
    expect((await readLockOwner(lockOf('celeste')))?.pid).toBe(4242);

    await releaseAll(claim.locks);
    await expect(readLockOwner(lockOf('stardew'))).resolves.toBeNull();
  });

  it('fails when another live process owns one entity and keeps nothing', async () => {
    await claimProcessLock(lockOf('celeste'), { pid: 5151, now: () => new Date('2026-10-19T12:00:00.000Z') });

    const claim = await claimBackupDirs(runtime, { pid: 4242, isAlive: () => true });

    expect(claim).toEqual({
      ok: false,
      entityId: 'celeste',
      path: lockOf('celeste'),
      owner: { pid: 5151, startedAt: '2026-10-19T12:00:00.000Z' },
    });
    await expect(readLockOwner(lockOf('stardew'))).resolves.toBeNull();
  });
});
