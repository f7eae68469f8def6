/**
 * Filesystem helpers for the cache tree
 *
 * Table files are replaced through a sibling temp file and a rename, so an
 * interrupted write leaves the previous file in place.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Error code of a failed fs call, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating parents as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check whether a regular file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') {
      return false;
    }
    throw err;
  }
}

const TEMP_SUFFIX = '.tmp';

/**
 * Names of in-flight (or abandoned) temp files: `.<target>.<uuid>.tmp`
 */
export const TEMP_FILE_PATTERN =
  /^\..+\.[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.tmp$/;

export function isTempFileName(name: string): boolean {
  return TEMP_FILE_PATTERN.test(name);
}

function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}${TEMP_SUFFIX}`);
}

async function flushToDisk(handle: fs.FileHandle): Promise<void> {
  try {
    await handle.datasync();
  } catch (err) {
    // CIFS and FUSE mounts may only support a full sync
    if (!['ENOTSUP', 'ENOSYS', 'EINVAL'].includes(errorCode(err) ?? '')) {
      throw err;
    }
    await handle.sync();
  }
}

/**
 * Replace a file's content so readers see either the old or the new version
 *
 * The content goes to a sibling temp file that is flushed and then renamed
 * over the target. Parent directories are created as needed.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  await ensureDirectory(dirname(filePath));
  const tmp = tempPathFor(filePath);

  try {
    const handle = await fs.open(tmp, 'w', 0o644);
    try {
      await handle.writeFile(content, 'utf-8');
      await flushToDisk(handle);
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Remove a file; returns false when there was nothing to remove
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return false;
    }
    throw err;
  }
}
