/**
 * Types for filter cache reconciliation
 */

import type { DownloadFailure } from '../../cache/types.js';

/**
 * Difference between the cached and the fresh set of filter IDs
 */
export interface FilterIdDiff {
  /** IDs only in the fresh index, in fresh-index order */
  toAdd: string[];
  /** IDs only in the cached index, in cached-index order */
  toRemove: string[];
  /** IDs present in both */
  unchanged: string[];
  /** Whether the two ID sets differ */
  hasChanges: boolean;
}

/**
 * Options for a sync run
 */
export interface SyncOptions {
  /** Compute the changes without touching the cache */
  dryRun?: boolean;
}

/**
 * Outcome of a sync run
 */
export interface SyncReport {
  /** Whether the cache was (or, in a dry run, would be) modified */
  updated: boolean;
  /** Filter IDs downloaded (or to download) */
  added: string[];
  /** Filter IDs dropped from the cache (or to drop) */
  removed: string[];
  /** New filters whose download failed */
  failed: DownloadFailure[];
  dryRun: boolean;
}
