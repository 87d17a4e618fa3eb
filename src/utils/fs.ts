/**
 * File system utility functions
 */

import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Ensures a directory exists, creating it recursively if needed
 *
 * @param dirPath - The directory path to ensure exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
}

/**
 * Writes data to a JSON file with pretty formatting
 * Creates parent directories if they don't exist
 *
 * @param filePath - Path to write the JSON file
 * @param data - The data to serialize to JSON
 */
export async function writeJson<T>(filePath: string, data: T): Promise<void> {
    const dir = dirname(filePath);
    if (dir && dir !== '.' && dir !== '/') {
        await ensureDir(dir);
    }
    const content = JSON.stringify(data, null, 2);
    await writeFile(filePath, content, 'utf-8');
}

/**
 * Checks if a file exists and has non-zero size
 *
 * @param filePath - Path to the file to check
 * @returns true if file exists with size > 0, false otherwise
 */
export async function fileExistsWithContent(filePath: string): Promise<boolean> {
    try {
        const stats = await stat(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}

/**
 * Runs `fn` with a fresh temporary directory and removes the directory
 * afterwards, whether `fn` resolves or rejects.
 *
 * @param prefix - Name prefix of the directory
 * @param fn - Work to do inside the directory
 * @param root - Parent directory, the OS temp dir by default
 */
export async function withTempDir<T>(
    prefix: string,
    fn: (dir: string) => Promise<T>,
    root: string = tmpdir()
): Promise<T> {
    const dir = await mkdtemp(join(root, prefix));
    try {
        return await fn(dir);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}

/**
 * Checks if a path is an existing regular file, whatever its size
 */
export async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

/**
 * Deletes a file if present; directories are left alone
 */
export async function removeFile(filePath: string): Promise<void> {
    if (await isFile(filePath)) {
        await rm(filePath, { force: true });
    }
}
