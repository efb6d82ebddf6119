import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { WatchManager } from '../../services/watch-manager.js';
import type { OperationPool } from '../../services/operation-pool.js';
import type { WsHub } from '../websocket-hub.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    manager: WatchManager;
    pool: OperationPool;
    wsHub?: WsHub;
}

/** Degraded whenever any entity is in `error` or has exhausted its restart budget. */
export function buildHealthData(deps: HealthDeps): HealthData {
    const statuses = deps.manager.listStatuses();
    const errored = statuses.filter((status) => status.status === 'error').length;
    const persistentFailures = statuses.filter((status) => status.persistentFailure).map((status) => status.entityId);
    const wsMetrics = deps.wsHub?.getMetrics();

    return {
        status: errored > 0 || persistentFailures.length > 0 ? 'degraded' : 'ok',
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
        entities: {
            total: statuses.length,
            watching: statuses.filter((status) => status.status === 'watching').length,
            busy: statuses.filter((status) => status.status === 'backing-up' || status.status === 'restoring').length,
            errored,
            persistentFailures,
        },
        operations: deps.pool.getStats(),
        websocket: wsMetrics
            ? {
                  connectedClients: wsMetrics.connectedClients,
                  subscribedClients: wsMetrics.subscribedClients,
              }
            : undefined,
    };
}

/** GET /health */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, buildHealthData(deps));
    };
}
