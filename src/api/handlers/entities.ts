import type { Request, Response } from 'express';
import type { WatchManager } from '../../services/watch-manager.js';
import type {
    EntityListData,
    EntityWatchData,
    ManualBackupData,
    RestoreData,
    RestoreRequestBody,
    SnapshotListData,
} from '../../types/api.js';
import { EntityNotFoundError } from '../../types/errors.js';
import { summarizeUsage } from '../../services/snapshot-engine.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface EntityDeps {
    manager: WatchManager;
}

function parseRestoreRequestBody(body: unknown): RestoreRequestBody {
    if (!body || typeof body !== 'object' || !('snapshotId' in body)) {
        throw new Error("Field 'snapshotId' is required.");
    }
    const { snapshotId } = body;
    if (typeof snapshotId !== 'string' || snapshotId.trim().length === 0) {
        throw new Error("Field 'snapshotId' must be a non-empty string.");
    }
    return { snapshotId: snapshotId.trim() };
}

/** Resolve `:id` to a registered entity, answering 404 otherwise. */
function requireEntityId(deps: EntityDeps, req: Request, res: Response): string | null {
    const entityId = req.params.id;
    if (typeof entityId !== 'string' || !deps.manager.hasEntity(entityId)) {
        sendError(res, new EntityNotFoundError(String(entityId)).message, 404);
        return null;
    }
    return entityId;
}

/** GET /entities */
export function handleListEntities(deps: EntityDeps) {
    return (_req: Request, res: Response): void => {
        const data: EntityListData = { entities: deps.manager.listStatuses() };
        sendOk(res, data);
    };
}

/** GET /entities/:id/snapshots */
export function handleListSnapshots(deps: EntityDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const entityId = requireEntityId(deps, req, res);
        if (!entityId) return;

        try {
            const snapshots = await deps.manager.listSnapshots(entityId);
            const data: SnapshotListData = { entityId, snapshots, usage: summarizeUsage(entityId, snapshots) };
            sendOk(res, data);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /entities/:id/backup */
export function handleManualBackup(deps: EntityDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const entityId = requireEntityId(deps, req, res);
        if (!entityId) return;

        try {
            const outcome = await deps.manager.requestManualBackup(entityId);
            if (outcome.status === 'busy') {
                sendError(res, `Entity '${entityId}' is busy (${outcome.heldBy ?? 'operation'} in progress).`, 409);
                return;
            }
            if (outcome.status === 'failed') {
                sendError(res, outcome.error, 500);
                return;
            }
            const data: ManualBackupData = { outcome };
            sendOk(res, data, 201);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /entities/:id/restore */
export function handleRestore(deps: EntityDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const entityId = requireEntityId(deps, req, res);
        if (!entityId) return;

        let request: RestoreRequestBody;
        try {
            request = parseRestoreRequestBody(req.body);
        } catch (error) {
            sendError(res, mapError(error).message, 400);
            return;
        }

        try {
            const result = await deps.manager.requestRestore(entityId, request.snapshotId);
            if (result.status === 'busy') {
                sendError(res, result.error ?? `Entity '${entityId}' is busy.`, 409);
                return;
            }
            if (result.status === 'failed') {
                sendError(res, result.error ?? 'Restore failed.', 422);
                return;
            }
            const data: RestoreData = { result };
            sendOk(res, data);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}

/** POST /entities/:id/watch/start and /entities/:id/watch/stop */
export function handleWatchToggle(deps: EntityDeps, action: 'start' | 'stop') {
    return async (req: Request, res: Response): Promise<void> => {
        const entityId = requireEntityId(deps, req, res);
        if (!entityId) return;

        try {
            const status =
                action === 'start'
                    ? await deps.manager.startWatching(entityId)
                    : await deps.manager.stopWatching(entityId);
            const data: EntityWatchData = { status, session: deps.manager.getSessionSnapshot(entityId) };
            sendOk(res, data);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
        }
    };
}
