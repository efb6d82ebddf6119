#!/usr/bin/env node
import { handleBackupCli, handleHelpCli, handleUnknownCommand, isBackupCommand } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { ControlPlaneClient } from './core/control-client.js';
import { claimBackupDirs, createRuntime, releaseAll, type BackupDirClaim, type Runtime } from './core/runtime.js';
import { readConfig } from './config/json-config.js';
import { ensureWorkspaceDir } from './config/workspace.js';
import { startApiServer } from './api/router.js';
import { WsHub } from './api/websocket-hub.js';
import { BackupEventProducer } from './api/backup-event-producer.js';
import { errorMessage } from './types/errors.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

async function loadRuntime(): Promise<Runtime> {
    try {
        return createRuntime(await readConfig());
    } catch (error) {
        console.error(`[save-sentinel] Startup blocked: ${errorMessage(error)}`);
        process.exit(1);
    }
}

function describeConflict(claim: Exclude<BackupDirClaim, { ok: true }>): string {
    const owner = claim.owner ? `pid ${claim.owner.pid}, since ${claim.owner.startedAt}` : 'unknown owner';
    return `Backups of '${claim.entityId}' are in use by another save-sentinel process (${owner}). Lock file: ${claim.path}`;
}

// ── Early one-shot CLI commands (bypass service startup) ─────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (await handleLogsCli(argv)) {
    if (!argv.includes('--follow') && !argv.includes('-f')) {
        process.exit(process.exitCode ?? 0);
    }
} else {
    ensureWorkspaceDir();

    if (isBackupCommand(argv)) {
        // A running daemon owns the backup dirs; send the command to it.
        const client = new ControlPlaneClient();
        if (await client.isReachable()) {
            await handleBackupCli(argv, client);
            process.exit(process.exitCode ?? 0);
        }
    }

    const runtime = await loadRuntime();
    const claim = await claimBackupDirs(runtime);
    if (!claim.ok) {
        console.error(`[save-sentinel] ${describeConflict(claim)}`);
        process.exit(isBackupCommand(argv) ? 2 : 1);
    }
    const ownerLocks = claim.locks;

    if (isBackupCommand(argv)) {
        await handleBackupCli(argv, runtime.manager);
        await runtime.manager.dispose();
        await releaseAll(ownerLocks);
        process.exit(process.exitCode ?? 0);
    }

    // ── Daemon ───────────────────────────────────────────────────────────────

    const { manager, pool } = runtime;
    const wsHub = new WsHub();
    const producer = new BackupEventProducer({ hub: wsHub, manager, pool });
    producer.start();

    await manager.startAll();
    const server = startApiServer({ manager, pool, wsHub });

    console.log('save-sentinel daemon initialized.');
    void logThought(`[Daemon] Watching ${manager.listStatuses().length} entities.`);

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        void logThought(`[Daemon] Received ${signal}; stopping all sessions.`);
        producer.stop();
        wsHub.stop();
        server.close();
        try {
            await manager.dispose();
            await releaseAll(ownerLocks);
        } catch (error) {
            console.error(`[save-sentinel] Shutdown error: ${errorMessage(error)}`);
            process.exitCode = 1;
        }
        process.exit(process.exitCode ?? 0);
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}
