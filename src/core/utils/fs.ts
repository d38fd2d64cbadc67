import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';

/**
 * Whether a path exists and is a regular file (symlinks are followed)
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code === 'ENOENT' || code === 'ENOTDIR') {
            return false;
        }
        throw error;
    }
}

/**
 * Write a file atomically: write to a temp file beside it, then rename over the target.
 * Keeps the target's permission bits when it already exists.
 * The temp file is removed if anything fails, leaving the target untouched.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.tmp.${randomBytes(8).toString('hex')}`;
    try {
        await fs.writeFile(tempPath, content, 'utf-8');
        try {
            const { mode } = await fs.stat(filePath);
            await fs.chmod(tempPath, mode);
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
                throw error;
            }
        }
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
