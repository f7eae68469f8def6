/**
 * Shared types and interfaces for the filter-cache CLI
 */

import type { DownloadContext } from './cache/types.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Cache root (defaults to the configured one) */
  cacheDir?: string;
  /** Filter service endpoint */
  serviceUrl?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Resolved cache root */
  cacheDir: string;
  /** Remote source, update marker and logger for download commands */
  downloads: DownloadContext;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

// ============================================================================
// Command Payloads
// ============================================================================

/**
 * download command result
 */
export interface DownloadSummary {
  /** Whether the index was downloaded as well */
  indexDownloaded: boolean;
  succeeded: string[];
  failed: { identifier: string; error: string }[];
}

/**
 * update command result
 */
export interface UpdateSummary {
  updated: boolean;
  dryRun: boolean;
  added: string[];
  removed: string[];
  failed: { identifier: string; error: string }[];
}

/**
 * status command result
 */
export interface CacheStatus {
  cacheDir: string;
  lastUpdate: string | null;
  hasIndex: boolean;
  filterCount: number;
  missingTransmissions: string[];
}

/**
 * index and show command result
 */
export interface TableSummary {
  source: string;
  columns: string[];
  rowCount: number;
  rows: Record<string, unknown>[];
}
