import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logBackupOperation: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

import { buildHealthData, handleHealth } from '../../src/api/handlers/health.js';
import { WsHub } from '../../src/api/websocket-hub.js';
import { EntityLockRegistry } from '../../src/services/entity-lock.js';
import { OperationPool } from '../../src/services/operation-pool.js';
import { SnapshotEngine } from '../../src/services/snapshot-engine.js';
import { WatchManager } from '../../src/services/watch-manager.js';
import type { EntityProfile } from '../../src/types/backup.js';
import type { WatchHandle } from '../../src/types/file-watcher.js';

const fakeHandle = (): WatchHandle => ({
  onEvent: () => undefined,
  onError: () => undefined,
  ready: async () => undefined,
  close: async () => undefined,
});

describe('GET /health', () => {
  let workspace: string;
  let pool: OperationPool;
  let manager: WatchManager;
  let app: Express;

  const profileFor = (id: string, sourcePath: string): EntityProfile => ({
    id,
    sourcePath,
    backupRoot: path.join(workspace, 'backups'),
    retentionLimit: 3,
    debounceMs: 2000,
    compressionMode: 'directory-copy',
    enabled: true,
  });

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'save-sentinel-health-'));
    await mkdir(path.join(workspace, 'stardew'), { recursive: true });

    pool = new OperationPool(3);
    const engine = new SnapshotEngine({ locks: new EntityLockRegistry(), pool });
    manager = new WatchManager({ engine, createHandle: fakeHandle, watchRetry: { maxAttempts: 0 } });
    manager.addEntity(profileFor('stardew', path.join(workspace, 'stardew')));

    app = express();
    app.use(express.json());
    app.get('/health', handleHealth({ manager, pool }));
  });

  afterEach(async () => {
    await manager.dispose();
    vi.restoreAllMocks();
    await rm(workspace, { recursive: true, force: true });
  });

  it('reports ok while every entity is healthy', async () => {
    await manager.startAll();

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      status: 'ok',
      entities: { total: 1, watching: 1, busy: 0, errored: 0, persistentFailures: [] },
      operations: { maxConcurrent: 3, active: 0, queued: 0 },
    });
    expect(res.body.data.websocket).toBeUndefined();
  });

  it('reports degraded when a watcher has given up', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    manager.addEntity(profileFor('celeste', path.join(workspace, 'missing')));
    await manager.startAll();

    const health = buildHealthData({ manager, pool });

    expect(health.status).toBe('degraded');
    expect(health.entities).toEqual({
      total: 2,
      watching: 1,
      busy: 0,
      errored: 1,
      persistentFailures: ['celeste'],
    });
  });

  it('includes event stream clients once a hub is wired', () => {
    const wsHub = new WsHub({ resolveSecret: () => 'test-secret' });

    expect(buildHealthData({ manager, pool, wsHub }).websocket).toEqual({ connectedClients: 0, subscribedClients: 0 });
    wsHub.stop();
  });
});
