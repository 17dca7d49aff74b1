/**
 * File system utilities with atomic write support
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { randomUUID } from 'crypto';

/**
 * Atomic write: write to a temp file in the same directory, then rename.
 * Readers see either the old file or the new one, never a partial write.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read file safely, return null if not found
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file; a missing file is not an error
 * @returns whether a file was removed
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
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
 * Append line to file (JSONL logs)
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, line + '\n', 'utf-8');
}

/**
 * Non-empty lines of a file; [] when it does not exist
 */
export async function readLines(filePath: string): Promise<string[]> {
  const content = await readFileSafe(filePath);
  if (content === null) {
    return [];
  }
  return content.split('\n').filter((line) => line.trim());
}
