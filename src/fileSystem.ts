import { mkdir, open, readFile, rename, rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';

export async function pathExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch {
        return false;
    }
}

let tempCounter = 0;

/**
 * Writes beside the destination, syncs, then renames over it. On any failure
 * the temp file is removed and the destination is left as it was.
 */
export async function writeFileAtomic(path: string, content: string | Uint8Array): Promise<void> {
    const dir = dirname(path);
    await mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.${basename(path)}.${process.pid}.${++tempCounter}.tmp`);
    try {
        const handle = await open(tempPath, 'w');
        try {
            await handle.writeFile(content);
            await handle.sync();
        } finally {
            await handle.close();
        }
        await rename(tempPath, path);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }
}

export async function copyFileAtomic(source: string, destination: string): Promise<void> {
    const content = await readFile(source);
    await writeFileAtomic(destination, content);
}
