import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, type HealthDeps } from './handlers/health.js';
import {
    handleListEntities,
    handleListSnapshots,
    handleManualBackup,
    handleRestore,
    handleWatchToggle,
    type EntityDeps,
} from './handlers/entities.js';
import { requestLogger, requireSignature, sendError, sendOk, setRawRequestBody } from './shared.js';
import type { WatchManager } from '../services/watch-manager.js';
import type { OperationPool } from '../services/operation-pool.js';
import type { WsHub } from './websocket-hub.js';
import { logThought } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';

export interface ApiServerDeps {
    manager: WatchManager;
    pool: OperationPool;
    wsHub?: WsHub;
}

const DEFAULT_PORT = 3200;

/**
 * Build the Control Plane HTTP app.
 *
 * Endpoints:
 *   GET  /health                      Entity status summary (unsigned)
 *   GET  /entities                    Status of every registered entity
 *   GET  /entities/:id/snapshots      Complete snapshots, newest first
 *   POST /entities/:id/backup         Manual snapshot (201 / 409 busy / 500 failed)
 *   POST /entities/:id/restore        Restore `{ snapshotId }` (200 / 409 busy / 422 failed)
 *   POST /entities/:id/watch/start    Start the entity's watch session
 *   POST /entities/:id/watch/stop     Stop the entity's watch session
 *   GET  /ws/metrics                  WebSocket hub diagnostics
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const healthDeps: HealthDeps = { manager: deps.manager, pool: deps.pool, wsHub: deps.wsHub };
    const entityDeps: EntityDeps = { manager: deps.manager };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));

    // Protected endpoints
    app.get('/entities', requireSignature, handleListEntities(entityDeps));
    app.get('/entities/:id/snapshots', requireSignature, handleListSnapshots(entityDeps));
    app.post('/entities/:id/backup', requireSignature, handleManualBackup(entityDeps));
    app.post('/entities/:id/restore', requireSignature, handleRestore(entityDeps));
    app.post('/entities/:id/watch/start', requireSignature, handleWatchToggle(entityDeps, 'start'));
    app.post('/entities/:id/watch/stop', requireSignature, handleWatchToggle(entityDeps, 'stop'));

    app.get('/ws/metrics', requireSignature, (_req, res) => {
        if (!deps.wsHub) {
            sendError(res, 'WebSocket hub not initialized.', 503);
            return;
        }
        sendOk(res, deps.wsHub.getMetrics());
    });

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the app, attach the WebSocket hub and start listening on `apiPort`. */
export function startApiServer(deps: ApiServerDeps): Server {
    const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
    const server = createServer(createApiApp(deps));

    if (deps.wsHub) {
        deps.wsHub.attach(server);
    }

    server.listen(port, () => {
        console.log(`[save-sentinel API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] HTTP server started on port ${port}.`);
    });
    return server;
}
