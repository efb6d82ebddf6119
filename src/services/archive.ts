import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { create, extract } from 'tar';

export const ARCHIVE_EXTENSION = '.tar.gz';

/** Write a gzip tarball of everything under `sourceDir`, stored relative to it, to `archivePath`. */
export async function createArchive(sourceDir: string, archivePath: string): Promise<void> {
    await mkdir(path.dirname(archivePath), { recursive: true });
    await create(
        {
            gzip: true,
            file: archivePath,
            cwd: sourceDir,
            portable: true,
            strict: true,
        },
        ['.'],
    );
}

/** Unpack `archivePath` into `destinationDir`, creating the directory first. */
export async function extractArchive(archivePath: string, destinationDir: string): Promise<void> {
    await mkdir(destinationDir, { recursive: true });
    await extract({
        file: archivePath,
        cwd: destinationDir,
        strict: true,
    });
}
