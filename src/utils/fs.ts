import { promises as fs } from 'fs';
import type { Dirent, WriteFileOptions } from 'fs';
import { randomUUID } from 'crypto';
import os from 'os';
import path from 'path';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    MISSING_CODES.has(error.code)
  );
}

/**
 * @throws the underlying error for anything other than a missing path
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await fs.stat(targetPath)).isDirectory();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Read a directory's entries, or `null` when the directory cannot be read.
 */
export async function readDirSafe(directoryPath: string): Promise<Dirent[] | null> {
  try {
    return await fs.readdir(directoryPath, { withFileTypes: true });
  } catch {
    return null;
  }
}

/**
 * Read a UTF-8 file, or `null` when it is missing or unreadable.
 */
export async function readTextSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch {
    return null;
  }
}

export async function ensureDir(directoryPath: string): Promise<void> {
  await fs.mkdir(directoryPath, { recursive: true });
}

/**
 * Write through a temp file beside `filePath`, then rename over it. Readers
 * see either the old or the new content. The temp file is removed when the
 * write or the rename fails.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string,
  options: WriteFileOptions = 'utf8'
): Promise<void> {
  const directory = path.dirname(filePath);
  await ensureDir(directory);

  const tempFile = path.join(directory, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempFile, data, options);
    await fs.rename(tempFile, filePath);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw error;
  }
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export async function ensureTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export type ConcurrencyTask<T> = () => Promise<T>;

export async function runWithConcurrency<T>(tasks: readonly ConcurrencyTask<T>[], limit = 8): Promise<T[]> {
  if (limit <= 0) {
    throw new Error('Concurrency limit must be greater than zero');
  }

  const results: T[] = [];
  let current = 0;

  async function worker(): Promise<void> {
    while (current < tasks.length) {
      const index = current++;
      results[index] = await tasks[index]();
    }
  }

  const workerCount = Math.min(limit, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
