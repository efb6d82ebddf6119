import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

/**
 * Handle the `logs` command.
 * Prints or tails today's operation log.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const dateIso = currentDateIso();
    const logPath = getDailyLogPath(dateIso);

    if (!fs.existsSync(logPath)) {
        console.error(`[save-sentinel logs] No logs found for today (${dateIso}) at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[save-sentinel logs] Following logs from ${logPath}...\n`);
        tailFile(logPath);
        // The fs watcher keeps the process alive.
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

/** Tail a file similar to `tail -f`, starting with the last 4KB. */
function tailFile(filePath: string): void {
    let position = fs.statSync(filePath).size;
    const startPos = Math.max(0, position - 4096);

    if (startPos < position) {
        const initialStream = fs.createReadStream(filePath, { start: startPos, encoding: 'utf8' });
        initialStream.pipe(process.stdout);
    }

    try {
        fs.watch(filePath, (eventType) => {
            if (eventType !== 'change') return;
            const stats = fs.statSync(filePath);
            if (stats.size > position) {
                const stream = fs.createReadStream(filePath, {
                    start: position,
                    end: stats.size,
                    encoding: 'utf8',
                });

                stream.on('data', (chunk) => {
                    process.stdout.write(chunk);
                });

                position = stats.size;
            } else if (stats.size < position) {
                // Truncated or rolled over
                position = stats.size;
            }
        });
    } catch (err) {
        console.error(`[save-sentinel logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
    }
}
