// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';
import { isErrnoException } from '../errors';

const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes to a temp file beside `path`, then renames it into place, so a
 * reader never observes a partially written file.
 */
export async function atomicWrite(path: string, content: string | Uint8Array): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Size in bytes of a regular file, or undefined if there is none at `path`.
 */
export async function fileSize(path: string): Promise<number | undefined> {
  try {
    const stat = await fs.stat(path);
    return stat.isFile() ? stat.size : undefined;
  } catch (error) {
    if (isErrnoException(error) && ABSENT_CODES.has(error.code ?? '')) {
      return undefined;
    }
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && ABSENT_CODES.has(error.code ?? '')) {
      return false;
    }
    throw error;
  }
}
