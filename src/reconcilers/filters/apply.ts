/**
 * Removal of obsolete filters from the cache
 */

import { parseFilterId, toStoragePath } from '../../cache/identifier.js';
import { removeFile } from '../../cache/io.js';
import { pruneEmptyDirectories } from '../../cache/store.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Delete the stored files of the given filters, then prune empty directories
 *
 * Files that are already gone are skipped. IDs that do not parse cannot
 * have a stored file and are skipped with a warning.
 *
 * @returns Paths of the files actually deleted
 */
export async function removeObsoleteFilters(
  filterIds: string[],
  cacheDir: string,
  log: Logger
): Promise<string[]> {
  const removed: string[] = [];

  for (const filterId of filterIds) {
    let location: string;
    try {
      location = toStoragePath(parseFilterId(filterId), cacheDir);
    } catch (err) {
      log.warn(`Skipping malformed filter ID ${filterId}`, {
        reason: err instanceof Error ? err.message : String(err),
      });
      continue;
    }

    if (await removeFile(location)) {
      removed.push(location);
      log.debug(`Removed ${location}`);
    }
  }

  await pruneEmptyDirectories(cacheDir);
  return removed;
}
