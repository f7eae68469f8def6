/**
 * Download orchestration
 *
 * Fetches the filter index and transmission curves from the remote source
 * and writes them into the cache layout. Batches run one filter at a time;
 * a failing filter is logged and skipped so one bad entry cannot stop the
 * rest of a multi-thousand filter download.
 */

import { logger as defaultLogger } from '../utils/logger.js';
import { DownloadFailedError } from './errors.js';
import {
  indexPath,
  normalizeFilterId,
  parseFilterId,
  toCanonicalRemoteForm,
  toStoragePath,
} from './identifier.js';
import { indexFilterIds } from './store.js';
import type { Table } from './table.js';
import type { BatchDownloadResult, DownloadContext } from './types.js';
import { serializeTable } from './votable.js';

/**
 * Fetch the current filter index without caching it
 */
export async function fetchIndex(ctx: DownloadContext): Promise<Table> {
  return ctx.source.fetchIndex();
}

/**
 * Fetch the filter index, store it in the cache and mark the cache as updated
 */
export async function fetchAndCacheIndex(ctx: DownloadContext, cacheDir: string): Promise<Table> {
  const log = ctx.logger ?? defaultLogger;

  log.info('Caching filter index ...', { cacheDir });
  const index = await fetchIndex(ctx);
  await serializeTable(index, indexPath(cacheDir));
  await ctx.marker.touch();

  return index;
}

/**
 * Fetch and store the transmission data of one filter
 *
 * @param identifier - Filter ID using `/` or `.` delimiters
 * @returns Path of the stored table
 * @throws MalformedIdentifierError if the ID does not parse
 * @throws DownloadFailedError if fetching or storing fails
 */
export async function fetchAndCacheOne(
  ctx: DownloadContext,
  identifier: string,
  cacheDir: string
): Promise<string> {
  const id = parseFilterId(identifier);
  const canonicalId = toCanonicalRemoteForm(id);

  try {
    const table = await ctx.source.fetchTransmission(canonicalId);
    return await serializeTable(table, toStoragePath(id, cacheDir));
  } catch (err) {
    throw new DownloadFailedError(identifier, err);
  }
}

/**
 * Download transmission data for many filters, continuing past failures
 *
 * Every failure is logged with the filter ID and its cause and collected in
 * the result; this function itself does not throw for per-filter failures.
 */
export async function fetchAndCacheMany(
  ctx: DownloadContext,
  identifiers: Iterable<string | Uint8Array>,
  cacheDir: string
): Promise<BatchDownloadResult> {
  const log = ctx.logger ?? defaultLogger;
  const result: BatchDownloadResult = { succeeded: [], failed: [] };

  for (const raw of identifiers) {
    const identifier = normalizeFilterId(raw);

    try {
      await fetchAndCacheOne(ctx, identifier, cacheDir);
      result.succeeded.push(identifier);
      log.debug(`Cached filter ${identifier}`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      result.failed.push({ identifier, error });
      log.error(`Data for filter ID = ${identifier} could not be downloaded`, error, {
        filterId: identifier,
      });
    }
  }

  log.info(
    `Cached ${result.succeeded.length} filter(s), ${result.failed.length} failed`
  );

  return result;
}

/**
 * Download the filter index and every filter it lists
 */
export async function fetchAndCacheAll(
  ctx: DownloadContext,
  cacheDir: string
): Promise<BatchDownloadResult> {
  const log = ctx.logger ?? defaultLogger;

  const index = await fetchAndCacheIndex(ctx, cacheDir);

  log.info('Caching transmission data ...');
  return fetchAndCacheMany(ctx, indexFilterIds(index), cacheDir);
}
