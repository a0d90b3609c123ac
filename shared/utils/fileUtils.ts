/**
 * File helpers shared by the store and the crawl checkpoint
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write JSON to a temporary file next to the target, then rename it into place.
 * Readers see either the old content or the new content, never a partial file.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  const tempFilePath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempFilePath, JSON.stringify(value, null, 2), 'utf-8');
    await fs.rename(tempFilePath, filePath);
  } catch (error) {
    await fs.rm(tempFilePath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file, or return null when it does not exist
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
