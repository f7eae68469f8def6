/**
 * filter-cache library entrypoint
 *
 * Public operations take the cache root explicitly; callers that want the
 * configured default pass `getConfiguredCacheDir()`.
 */

import {
  fetchAndCacheAll,
  fetchAndCacheMany,
  fetchAndCacheOne,
} from './cache/download.js';
import type { BatchDownloadResult, DownloadContext } from './cache/types.js';

export { loadIndex, loadTransmission, pruneEmptyDirectories, findMissingTransmissions } from './cache/store.js';
export { sync, syncFilterCache, diffFilterIds } from './reconcilers/filters/index.js';
export type { FilterIdDiff, SyncOptions, SyncReport } from './reconcilers/filters/index.js';
export {
  fetchIndex,
  fetchAndCacheIndex,
  fetchAndCacheOne,
  fetchAndCacheMany,
  fetchAndCacheAll,
} from './cache/download.js';
export type {
  FilterDataSource,
  UpdateMarker,
  DownloadContext,
  DownloadFailure,
  BatchDownloadResult,
} from './cache/types.js';
export {
  normalizeFilterId,
  parseFilterId,
  toCanonicalRemoteForm,
  canonicalizeFilterId,
  toStoragePath,
  indexPath,
  type FilterIdentifier,
} from './cache/identifier.js';
export {
  createTable,
  columnValues,
  textColumn,
  type Table,
  type TableField,
  type TableParam,
  type CellValue,
  type Datatype,
} from './cache/table.js';
export { serializeTable, parseTable, encodeVOTable, decodeVOTable } from './cache/votable.js';
export {
  FilterCacheError,
  MalformedIdentifierError,
  MissingIndexError,
  UnknownFilterError,
  InconsistentCacheError,
  DecodeError,
  DownloadFailedError,
  formatError,
} from './cache/errors.js';
export {
  createClient,
  ApiRequestError,
  type FilterServiceClient,
  type FilterServiceConfig,
} from './api/index.js';
export {
  getConfiguredCacheDir,
  setConfiguredCacheDir,
  getLastUpdate,
  touchUpdateTimestamp,
  settingsMarker,
  SettingsError,
} from './config/index.js';
export { Logger, createLogger, logger, type LoggerConfig, type LogLevel } from './utils/logger.js';

/**
 * Download the filter index and the transmission data of every filter
 */
export function downloadAll(ctx: DownloadContext, cacheDir: string): Promise<BatchDownloadResult> {
  return fetchAndCacheAll(ctx, cacheDir);
}

/**
 * Download the transmission data of one filter
 */
export function downloadOne(
  ctx: DownloadContext,
  identifier: string,
  cacheDir: string
): Promise<string> {
  return fetchAndCacheOne(ctx, identifier, cacheDir);
}

/**
 * Download the transmission data of several filters, continuing past failures
 */
export function downloadMany(
  ctx: DownloadContext,
  identifiers: Iterable<string | Uint8Array>,
  cacheDir: string
): Promise<BatchDownloadResult> {
  return fetchAndCacheMany(ctx, identifiers, cacheDir);
}
