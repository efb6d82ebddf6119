import { summarizeUsage } from '../services/snapshot-engine.js';
import type { RestoreResult, Snapshot, SnapshotOutcome } from '../types/backup.js';
import { EntityNotFoundError, errorMessage } from '../types/errors.js';

/** What the one-shot commands run against: the local manager or a running daemon. */
export interface BackupCommandTarget {
  listSnapshots(entityId: string): Promise<Snapshot[]>;
  requestManualBackup(entityId: string): Promise<SnapshotOutcome>;
  requestRestore(entityId: string, snapshotId: string): Promise<RestoreResult>;
}

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: save-sentinel [command] [options]

Without a command, starts the daemon: watches every enabled entity and serves
the control plane on the configured apiPort. While the daemon runs, list,
backup and restore are sent to it through the signed control plane.

Commands:
  list <entityId>                  List complete snapshots, newest first
  backup <entityId>                Take a manual snapshot now
  restore <entityId> <snapshotId>  Replace the entity's source with a snapshot
  logs [--follow]                  Print (or follow) today's operation log

Options:
  --help, -h          Show this help message

Environment:
  SAVE_SENTINEL_CONFIG_PATH   Config file (default ~/.save-sentinel/workspace/save-sentinel.json)
  SAVE_SENTINEL_PROFILE       Named workspace profile

Examples:
  save-sentinel list stardew
  save-sentinel backup stardew
  save-sentinel restore stardew 20261019-120000-000_manual
  save-sentinel logs --follow
`.trim();

const KNOWN_COMMANDS = new Set(['list', 'backup', 'restore', 'logs', '--help', '-h']);
const BACKUP_COMMANDS = new Set(['list', 'backup', 'restore']);

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command)) {
    return false;
  }

  console.error(`[save-sentinel] Unknown command: '${command}'`);
  console.error(`Run 'save-sentinel --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/** True for the one-shot commands that need the backup core. */
export function isBackupCommand(argv: string[]): boolean {
  return argv.length > 0 && BACKUP_COMMANDS.has(argv[0]);
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** Bytes in the largest unit that keeps the value under 1024, two decimals. */
export function formatSize(sizeBytes: number): string {
  let value = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) return `${value.toFixed(2)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

export function formatSnapshotLine(snapshot: Snapshot): string {
  return `${snapshot.id}  ${snapshot.timestamp}  ${snapshot.kind}  ${snapshot.format}  ${snapshot.sizeBytes} bytes`;
}

/**
 * Handle `list`, `backup` and `restore` against a wired manager or a daemon.
 * Exit codes: 0 success, 1 failure or bad usage, 2 entity busy.
 */
export async function handleBackupCli(argv: string[], target: BackupCommandTarget): Promise<boolean> {
  const [command, entityId, snapshotId] = argv;
  if (!command || !BACKUP_COMMANDS.has(command)) return false;

  if (!entityId) {
    console.error(`[save-sentinel] Usage: save-sentinel ${command} <entityId>${command === 'restore' ? ' <snapshotId>' : ''}`);
    process.exitCode = 1;
    return true;
  }

  try {
    switch (command) {
      case 'list': {
        const snapshots = await target.listSnapshots(entityId);
        if (snapshots.length === 0) {
          console.log(`No snapshots for '${entityId}'.`);
        } else {
          for (const snapshot of snapshots) {
            console.log(formatSnapshotLine(snapshot));
          }
          const usage = summarizeUsage(entityId, snapshots);
          console.log(`Total: ${usage.snapshotCount} snapshot(s), ${formatSize(usage.totalBytes)}`);
        }
        process.exitCode = 0;
        break;
      }
      case 'backup': {
        const outcome = await target.requestManualBackup(entityId);
        if (outcome.status === 'created') {
          console.log(`Created ${outcome.snapshot.id} (${outcome.snapshot.sizeBytes} bytes).`);
          if (outcome.pruned.length > 0) {
            console.log(`Pruned: ${outcome.pruned.join(', ')}`);
          }
          process.exitCode = 0;
        } else if (outcome.status === 'busy') {
          console.error(`[save-sentinel] '${entityId}' is busy (${outcome.heldBy ?? 'operation'} in progress).`);
          process.exitCode = 2;
        } else {
          console.error(`[save-sentinel] Backup failed: ${outcome.error}`);
          process.exitCode = 1;
        }
        break;
      }
      case 'restore': {
        if (!snapshotId) {
          console.error('[save-sentinel] Usage: save-sentinel restore <entityId> <snapshotId>');
          process.exitCode = 1;
          break;
        }
        const result = await target.requestRestore(entityId, snapshotId);
        if (result.status === 'restored') {
          console.log(`Restored '${entityId}' from ${snapshotId}.`);
          if (result.safetySnapshotId) {
            console.log(`Safety snapshot: ${result.safetySnapshotId}`);
          }
          process.exitCode = 0;
        } else {
          console.error(`[save-sentinel] Restore ${result.status}: ${result.error ?? 'unknown error'}`);
          process.exitCode = result.status === 'busy' ? 2 : 1;
        }
        break;
      }
    }
  } catch (error) {
    if (error instanceof EntityNotFoundError) {
      console.error(`[save-sentinel] ${error.message}`);
      process.exitCode = 1;
      return true;
    }
    console.error(`[save-sentinel] ${command} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  return true;
}
