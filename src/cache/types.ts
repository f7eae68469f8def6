/**
 * Collaborator interfaces and result types for cache downloads
 */

import type { Logger } from '../utils/logger.js';
import type { Table } from './table.js';

/**
 * Remote source of filter data
 */
export interface FilterDataSource {
  /** Fetch the complete filter index */
  fetchIndex(): Promise<Table>;
  /** Fetch the transmission curve of one filter, by canonical remote ID */
  fetchTransmission(canonicalId: string): Promise<Table>;
}

/**
 * Records when the cache was last brought up to date
 */
export interface UpdateMarker {
  touch(): void | Promise<void>;
}

/**
 * Everything download and sync operations need besides the cache root
 */
export interface DownloadContext {
  source: FilterDataSource;
  marker: UpdateMarker;
  /** Defaults to the shared logger */
  logger?: Logger;
}

/**
 * A filter that could not be downloaded during a batch
 */
export interface DownloadFailure {
  identifier: string;
  error: Error;
}

/**
 * Outcome of a batch download
 */
export interface BatchDownloadResult {
  /** Identifiers whose transmission data was stored */
  succeeded: string[];
  /** Identifiers that failed, with the reason */
  failed: DownloadFailure[];
}
