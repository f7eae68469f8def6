/**
 * download command - Populate the cache from the filter service
 *
 * Without filter IDs the index and every listed filter are downloaded.
 * With filter IDs only those filters are fetched; the index is left alone.
 */

import type { CommandContext, CommandResult, DownloadSummary } from '../types.js';
import type { BatchDownloadResult } from '../cache/types.js';
import { fetchAndCacheAll, fetchAndCacheMany } from '../cache/download.js';
import { formatError } from '../cache/errors.js';
import {
  info,
  success,
  warn,
  error as printError,
  verbose,
  header,
  dryRunNotice,
} from '../utils/output.js';

export interface DownloadOptions {
  /** Filters to download; all filters when empty */
  filterIds?: string[];
}

function toSummary(result: BatchDownloadResult, indexDownloaded: boolean): DownloadSummary {
  return {
    indexDownloaded,
    succeeded: result.succeeded,
    failed: result.failed.map(({ identifier, error }) => ({
      identifier,
      error: error.message,
    })),
  };
}

/**
 * Execute the download command
 */
export async function downloadCommand(
  ctx: CommandContext,
  options: DownloadOptions = {}
): Promise<CommandResult<DownloadSummary>> {
  const { options: globalOpts, outputFormat, cacheDir } = ctx;
  const filterIds = options.filterIds ?? [];
  const full = filterIds.length === 0;

  verbose(`Executing download command`, globalOpts.verbose);
  verbose(`Cache directory: ${cacheDir}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Filter Download');
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
  }

  if (globalOpts.dryRun) {
    const message = full
      ? `Dry run: would download the filter index and every filter into ${cacheDir}`
      : `Dry run: would download ${filterIds.length} filter(s) into ${cacheDir}`;
    if (outputFormat === 'human') {
      info(message);
    }
    return {
      success: true,
      message,
      data: { indexDownloaded: false, succeeded: [], failed: [] },
    };
  }

  try {
    const result = full
      ? await fetchAndCacheAll(ctx.downloads, cacheDir)
      : await fetchAndCacheMany(ctx.downloads, filterIds, cacheDir);
    const summary = toSummary(result, full);

    if (outputFormat === 'human') {
      console.log('');
      if (summary.failed.length > 0) {
        warn(`${summary.failed.length} filter(s) could not be downloaded`);
        for (const failure of summary.failed) {
          printError(`${failure.identifier}: ${failure.error}`);
        }
      }
      success(`Cached ${summary.succeeded.length} filter(s) in ${cacheDir}`);
    }

    return {
      success: summary.failed.length === 0,
      message: `Download complete: ${summary.succeeded.length} cached, ${summary.failed.length} failed`,
      data: summary,
      errors: summary.failed.map((failure) => `${failure.identifier}: ${failure.error}`),
    };
  } catch (err) {
    const errorMsg = formatError(err);
    if (outputFormat === 'human') {
      printError(errorMsg);
    }
    return {
      success: false,
      message: `Download failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
