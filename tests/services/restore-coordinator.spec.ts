import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logBackupOperation: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

import { EntityLockRegistry } from '../../src/services/entity-lock.js';
import { RestoreCoordinator, type RestoreCoordinatorOptions } from '../../src/services/restore-coordinator.js';
import { SnapshotEngine } from '../../src/services/snapshot-engine.js';
import type { EntityProfile } from '../../src/types/backup.js';

async function readTree(root: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  const entries = await readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const absolutePath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      for (const [child, content] of Object.entries(await readTree(absolutePath))) {
        result[`${entry.name}/${child}`] = content;
      }
    } else {
      result[entry.name] = await readFile(absolutePath, 'utf8');
    }
  }
  return result;
}

describe('RestoreCoordinator', () => {
  let workspace: string;
  let sourcePath: string;
  let profile: EntityProfile;
  let engine: SnapshotEngine;
  let snapshotId: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'save-sentinel-restore-'));
    sourcePath = path.join(workspace, 'saves');
    await mkdir(sourcePath, { recursive: true });
    await writeFile(path.join(sourcePath, 'fileA.sav'), 'v1', 'utf8');
    await writeFile(path.join(sourcePath, 'fileB.sav'), 'b', 'utf8');

    profile = {
      id: 'stardew',
      sourcePath,
      backupRoot: path.join(workspace, 'backups'),
      retentionLimit: 5,
      debounceMs: 2000,
      compressionMode: 'directory-copy',
      enabled: true,
    };
    engine = new SnapshotEngine({ locks: new EntityLockRegistry(), manualWaitMs: 0 });

    const outcome = await engine.createSnapshot(profile, 'manual');
    if (outcome.status !== 'created') {
      throw new Error(`Fixture snapshot failed: ${outcome.status}`);
    }
    snapshotId = outcome.snapshot.id;

    await writeFile(path.join(sourcePath, 'fileA.sav'), 'v2', 'utf8');
    await rm(path.join(sourcePath, 'fileB.sav'));
    await writeFile(path.join(sourcePath, 'fileC.sav'), 'c', 'utf8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workspace, { recursive: true, force: true });
  });

  function makeCoordinator(overrides: Partial<RestoreCoordinatorOptions> = {}): RestoreCoordinator {
    return new RestoreCoordinator({ engine, ...overrides });
  }

  it('mirrors the snapshot onto the source and keeps a safety snapshot of the live tree', async () => {
    const result = await makeCoordinator().restore(profile, snapshotId);

    expect(result).toMatchObject({
      status: 'restored',
      entityId: 'stardew',
      snapshotId,
      rollbackApplied: false,
      reinstatedFromSafety: false,
      error: null,
    });
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v1', 'fileB.sav': 'b' });

    expect(result.safetySnapshotId).toMatch(/_safety$/);
    const safety = await engine.getSnapshot(profile, result.safetySnapshotId ?? '');
    expect(safety?.kind).toBe('safety');
    await expect(readTree(safety?.location ?? '')).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });

    expect((await readdir(workspace)).sort()).toEqual(['backups', 'saves']);
    expect(engine.locks.isHeld('stardew')).toBe(false);
  });

  it('restores into a missing source without a safety snapshot', async () => {
    await rm(sourcePath, { recursive: true });

    const result = await makeCoordinator().restore(profile, snapshotId);

    expect(result.status).toBe('restored');
    expect(result.safetySnapshotId).toBeNull();
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v1', 'fileB.sav': 'b' });
  });

  it('fails without touching the source when the snapshot does not exist', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const result = await makeCoordinator().restore(profile, '20200101-000000-000_manual');

    expect(result.status).toBe('failed');
    expect(result.error).toBe("Snapshot '20200101-000000-000_manual' does not exist for 'stardew'.");
    expect(result.safetySnapshotId).toBeNull();
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
  });

  it('leaves the source untouched when staging fails before the swap', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const coordinator = makeCoordinator({
      beforeSwapForTest: () => {
        throw new Error('ENOSPC: no space left on device');
      },
    });

    const result = await coordinator.restore(profile, snapshotId);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Staging failed; source left untouched: ENOSPC: no space left on device');
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
    expect((await readdir(workspace)).sort()).toEqual(['backups', 'saves']);
  });

  it('moves the previous tree back when the swap fails midway', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const coordinator = makeCoordinator({
      afterLiveMovedForTest: () => {
        throw new Error('EPERM: operation not permitted');
      },
    });

    const result = await coordinator.restore(profile, snapshotId);

    expect(result).toMatchObject({
      status: 'failed',
      rollbackApplied: true,
      reinstatedFromSafety: false,
      error: 'Swap failed: EPERM: operation not permitted',
    });
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
    expect((await readdir(workspace)).sort()).toEqual(['backups', 'saves']);
  });

  it('reinstates the safety snapshot when the rollback fails as well', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const coordinator = makeCoordinator({
      afterLiveMovedForTest: () => {
        throw new Error('EPERM: operation not permitted');
      },
      beforeRollbackForTest: () => {
        throw new Error('EBUSY: resource busy or locked');
      },
    });

    const result = await coordinator.restore(profile, snapshotId);

    expect(result).toMatchObject({
      status: 'failed',
      rollbackApplied: false,
      reinstatedFromSafety: true,
    });
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
    expect(consoleError).toHaveBeenCalledWith(
      "[RestoreCoordinator] Rollback of 'stardew' failed: EBUSY: resource busy or locked",
    );
  });

  it('reports busy while another operation holds the entity', async () => {
    const lease = engine.locks.tryAcquire('stardew', 'snapshot');

    const result = await makeCoordinator().restore(profile, snapshotId);

    expect(result.status).toBe('busy');
    expect(result.error).toBe("Entity 'stardew' is busy (snapshot).");
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
    lease?.release();
  });

  it('restores from an archive snapshot', async () => {
    const archiveProfile: EntityProfile = { ...profile, compressionMode: 'archive' };
    await writeFile(path.join(sourcePath, 'fileA.sav'), 'v3', 'utf8');
    const outcome = await engine.createSnapshot(archiveProfile, 'manual');
    if (outcome.status !== 'created') throw new Error('archive snapshot failed');
    await writeFile(path.join(sourcePath, 'fileA.sav'), 'v4', 'utf8');

    const result = await makeCoordinator().restore(archiveProfile, outcome.snapshot.id);

    expect(result.status).toBe('restored');
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v3', 'fileC.sav': 'c' });
  });

  it('restores a safety snapshot while the safety group is at its limit', async () => {
    engine = new SnapshotEngine({ locks: new EntityLockRegistry(), manualWaitMs: 0, safetyRetentionLimit: 2 });
    const coordinator = makeCoordinator();
    const first = await coordinator.restore(profile, snapshotId);
    await coordinator.restore(profile, snapshotId);
    const target = first.safetySnapshotId ?? '';

    const result = await coordinator.restore(profile, target);

    expect(result).toMatchObject({ status: 'restored', snapshotId: target, error: null });
    await expect(readTree(sourcePath)).resolves.toEqual({ 'fileA.sav': 'v2', 'fileC.sav': 'c' });
    const safety = (await engine.listSnapshots(profile)).filter((snapshot) => snapshot.kind === 'safety');
    expect(safety).toHaveLength(3);
    expect(safety.map((snapshot) => snapshot.id)).toContain(target);
  });
});
