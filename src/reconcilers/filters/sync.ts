/**
 * Incremental update of the filter cache
 *
 * Compares the cached index with a freshly fetched one by filter ID,
 * removes filters that disappeared, downloads the new ones and then
 * replaces the cached index. When the ID sets match nothing is written
 * except the update timestamp.
 */

import { fetchAndCacheMany, fetchIndex } from '../../cache/download.js';
import { indexPath } from '../../cache/identifier.js';
import { indexFilterIds, loadIndex } from '../../cache/store.js';
import type { DownloadContext } from '../../cache/types.js';
import { serializeTable } from '../../cache/votable.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { diffFilterIds, formatFilterDiffSummary } from './diff.js';
import { removeObsoleteFilters } from './apply.js';
import type { SyncOptions, SyncReport } from './types.js';

/**
 * Bring the cache in line with the remote filter index
 *
 * @throws MissingIndexError if the cache has never been fully downloaded
 */
export async function syncFilterCache(
  ctx: DownloadContext,
  cacheDir: string,
  options: SyncOptions = {}
): Promise<SyncReport> {
  const log = ctx.logger ?? defaultLogger;
  const dryRun = options.dryRun ?? false;

  const cachedIndex = await loadIndex(cacheDir);

  log.info('Fetching latest filter index ...');
  const freshIndex = await fetchIndex(ctx);

  const diff = diffFilterIds(indexFilterIds(cachedIndex), indexFilterIds(freshIndex));
  log.debug(formatFilterDiffSummary(diff));

  if (!diff.hasChanges) {
    log.info('Filter data is already up-to-date!');
    if (!dryRun) {
      await ctx.marker.touch();
    }
    return { updated: false, added: [], removed: [], failed: [], dryRun };
  }

  if (dryRun) {
    return {
      updated: true,
      added: diff.toAdd,
      removed: diff.toRemove,
      failed: [],
      dryRun,
    };
  }

  log.info('Removing outdated filters ...', { count: diff.toRemove.length });
  await removeObsoleteFilters(diff.toRemove, cacheDir, log);

  log.info('Caching new filters ...', { count: diff.toAdd.length });
  const batch = await fetchAndCacheMany(ctx, diff.toAdd, cacheDir);

  await serializeTable(freshIndex, indexPath(cacheDir));
  await ctx.marker.touch();

  return {
    updated: true,
    added: batch.succeeded,
    removed: diff.toRemove,
    failed: batch.failed,
    dryRun,
  };
}

/**
 * Update the cache; true when it changed
 */
export async function sync(ctx: DownloadContext, cacheDir: string): Promise<boolean> {
  const report = await syncFilterCache(ctx, cacheDir);
  return report.updated;
}
