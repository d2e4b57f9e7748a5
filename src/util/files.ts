import fs from 'fs';
import path from 'path';
import { METADATA_SUFFIX, PARTIAL_SUFFIX } from './constants';
import logger from './logger';

export const tempPath = (finalPath: string): string => `${finalPath}${PARTIAL_SUFFIX}`;

/** `Parasite_2019.jpg` -> `Parasite_2019_metadata.json`, in the same directory. */
export function sidecarPathFor(imagePath: string): string {
    const { dir, name } = path.parse(imagePath);
    return path.join(dir, `${name}${METADATA_SUFFIX}`);
}

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.promises.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Writes to `<finalPath>.part` and renames it into place, so `finalPath`
 * is either absent or complete. The partial file is removed on failure.
 */
export async function writeFileAtomic(finalPath: string, data: string | Uint8Array): Promise<void> {
    const partial = tempPath(finalPath);
    await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
    try {
        await fs.promises.writeFile(partial, data);
        await fs.promises.rename(partial, finalPath);
    } catch (error) {
        await fs.promises.rm(partial, { force: true }).catch((cleanupError: unknown) => {
            logger.warn({ err: cleanupError }, `Could not remove partial file ${partial}`);
        });
        throw error;
    }
}

export function formatFileSize(bytes: number): string {
    if (!Number.isFinite(bytes) || bytes <= 0) return '0B';

    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    let size = bytes;
    let unit = 0;
    while (size >= 1024 && unit < units.length - 1) {
        size /= 1024;
        unit++;
    }
    return `${size.toFixed(1)}${units[unit]}`;
}
