import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { createHmac } from 'node:crypto';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logBackupOperation: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

import { createApiApp } from '../../src/api/router.js';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';
import { EntityLockRegistry } from '../../src/services/entity-lock.js';
import { OperationPool } from '../../src/services/operation-pool.js';
import { SnapshotEngine } from '../../src/services/snapshot-engine.js';
import { WatchManager } from '../../src/services/watch-manager.js';
import type { WatchHandle } from '../../src/types/file-watcher.js';

const API_SECRET = 'test-secret';

const sign = (payload: string, secret = API_SECRET) =>
  `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;

const fakeHandle = (): WatchHandle => ({
  onEvent: () => undefined,
  onError: () => undefined,
  ready: async () => undefined,
  close: async () => undefined,
});

describe('entity routes', () => {
  let workspace: string;
  let sourcePath: string;
  let engine: SnapshotEngine;
  let manager: WatchManager;
  let app: Express;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'save-sentinel-api-'));
    sourcePath = path.join(workspace, 'saves');
    await mkdir(sourcePath, { recursive: true });
    await writeFile(path.join(sourcePath, 'save.dat'), 'v1', 'utf8');

    vi.stubEnv('SAVE_SENTINEL_CONFIG_PATH', path.join(workspace, 'missing.json'));
    vi.stubEnv('SAVE_SENTINEL_API_SECRET', API_SECRET);
    clearConfigCacheForTests();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const pool = new OperationPool(2);
    engine = new SnapshotEngine({ locks: new EntityLockRegistry(), pool, manualWaitMs: 0 });
    manager = new WatchManager({ engine, createHandle: fakeHandle });
    manager.addEntity({
      id: 'stardew',
      sourcePath,
      backupRoot: path.join(workspace, 'backups'),
      retentionLimit: 3,
      debounceMs: 2000,
      compressionMode: 'directory-copy',
      enabled: true,
    });
    app = createApiApp({ manager, pool });
  });

  afterEach(async () => {
    await manager.dispose();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCacheForTests();
    await rm(workspace, { recursive: true, force: true });
  });

  describe('signature checks', () => {
    it('rejects requests without a signature header', async () => {
      const res = await request(app).get('/entities');

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ ok: false, error: 'Missing or malformed X-Signature header.' });
    });

    it('rejects requests signed with another secret', async () => {
      const res = await request(app).get('/entities').set('X-Signature', sign('', 'wrong-secret'));

      expect(res.status).toBe(403);
      expect(res.body.error).toBe('Invalid signature.');
    });

    it('rejects a digest that is not hex', async () => {
      const res = await request(app).get('/entities').set('X-Signature', 'sha256=not-a-digest');

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Malformed signature digest.');
    });

    it('answers 503 when no API secret is configured', async () => {
      vi.stubEnv('SAVE_SENTINEL_API_SECRET', '');

      const res = await request(app).get('/entities').set('X-Signature', sign(''));

      expect(res.status).toBe(503);
      expect(res.body.error).toBe('Signed API endpoints are unavailable (missing apiSecret).');
    });
  });

  it('lists entity statuses', async () => {
    const res = await request(app).get('/entities').set('X-Signature', sign(''));

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(typeof res.body.correlationId).toBe('string');
    expect(res.body.data.entities).toEqual([
      {
        entityId: 'stardew',
        status: 'idle',
        lastBackupTimestamp: null,
        lastError: null,
        persistentFailure: false,
      },
    ]);
  });

  it('creates a manual snapshot and lists it', async () => {
    const created = await request(app).post('/entities/stardew/backup').set('X-Signature', sign(''));

    expect(created.status).toBe(201);
    expect(created.body.data.outcome.status).toBe('created');
    const snapshotId: string = created.body.data.outcome.snapshot.id;
    expect(snapshotId).toMatch(/^\d{8}-\d{6}-\d{3}_manual$/);

    const listed = await request(app).get('/entities/stardew/snapshots').set('X-Signature', sign(''));

    expect(listed.status).toBe(200);
    expect(listed.body.data.entityId).toBe('stardew');
    expect(listed.body.data.snapshots.map((snapshot: { id: string }) => snapshot.id)).toEqual([snapshotId]);
    expect(listed.body.data.usage).toEqual({ entityId: 'stardew', snapshotCount: 1, totalBytes: 2 });
  });

  it('answers 409 while another operation holds the entity', async () => {
    const lease = engine.locks.tryAcquire('stardew', 'restore');

    const res = await request(app).post('/entities/stardew/backup').set('X-Signature', sign(''));

    expect(res.status).toBe(409);
    expect(res.body.error).toBe("Entity 'stardew' is busy (restore in progress).");
    lease?.release();
  });

  it('answers 404 for an unknown entity', async () => {
    const res = await request(app).post('/entities/ghost/backup').set('X-Signature', sign(''));

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Entity 'ghost' is not registered.");
  });

  it('validates the restore request body', async () => {
    const missing = await request(app).post('/entities/stardew/restore').set('X-Signature', sign('{}')).send({});
    expect(missing.status).toBe(400);
    expect(missing.body.error).toBe("Field 'snapshotId' is required.");

    const body = { snapshotId: '   ' };
    const blank = await request(app)
      .post('/entities/stardew/restore')
      .set('X-Signature', sign(JSON.stringify(body)))
      .send(body);
    expect(blank.status).toBe(400);
    expect(blank.body.error).toBe("Field 'snapshotId' must be a non-empty string.");
  });

  it('restores a snapshot over the source', async () => {
    const created = await request(app).post('/entities/stardew/backup').set('X-Signature', sign(''));
    const snapshotId: string = created.body.data.outcome.snapshot.id;
    await writeFile(path.join(sourcePath, 'save.dat'), 'v2', 'utf8');

    const body = { snapshotId };
    const res = await request(app)
      .post('/entities/stardew/restore')
      .set('X-Signature', sign(JSON.stringify(body)))
      .send(body);

    expect(res.status).toBe(200);
    expect(res.body.data.result).toMatchObject({ status: 'restored', snapshotId, error: null });
    await expect(readFile(path.join(sourcePath, 'save.dat'), 'utf8')).resolves.toBe('v1');
  });

  it('answers 422 when a restore fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const body = { snapshotId: '20200101-000000-000_manual' };

    const res = await request(app)
      .post('/entities/stardew/restore')
      .set('X-Signature', sign(JSON.stringify(body)))
      .send(body);

    expect(res.status).toBe(422);
    expect(res.body.error).toBe("Snapshot '20200101-000000-000_manual' does not exist for 'stardew'.");
  });

  it('starts and stops watching', async () => {
    const started = await request(app).post('/entities/stardew/watch/start').set('X-Signature', sign(''));
    expect(started.status).toBe(200);
    expect(started.body.data.status.status).toBe('watching');
    expect(started.body.data.session.state).toBe('watching');

    const stopped = await request(app).post('/entities/stardew/watch/stop').set('X-Signature', sign(''));
    expect(stopped.status).toBe(200);
    expect(stopped.body.data.status.status).toBe('idle');
  });

  it('answers 503 for hub metrics without a hub and 404 for unknown routes', async () => {
    const metrics = await request(app).get('/ws/metrics').set('X-Signature', sign(''));
    expect(metrics.status).toBe(503);

    const missing = await request(app).get('/nothing-here');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe('Not found.');
  });
});
