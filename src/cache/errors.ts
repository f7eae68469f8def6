/**
 * Error classes for filter cache operations
 *
 * Each error carries a stable `code` for programmatic handling and an
 * optional suggestion shown to CLI users.
 */

/**
 * Base error class for filter cache errors
 */
export class FilterCacheError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'FilterCacheError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when a filter identifier does not split into
 * facility, instrument and filter name
 */
export class MalformedIdentifierError extends FilterCacheError {
  constructor(public readonly identifier: string) {
    super(
      `Malformed filter ID: "${identifier}"`,
      'MALFORMED_IDENTIFIER',
      'Use facility/instrument/filter or facility/instrument.filter (e.g. Generic/Bessell.V)'
    );
    this.name = 'MalformedIdentifierError';
  }
}

/**
 * Error thrown when the cache directory holds no filter index
 */
export class MissingIndexError extends FilterCacheError {
  constructor(public readonly cacheDir: string) {
    super(
      `Filter index does not exist in the cache directory: ${cacheDir}`,
      'MISSING_INDEX',
      'Download the filter data first with `filter-cache download`'
    );
    this.name = 'MissingIndexError';
  }
}

/**
 * Error thrown when a filter ID is well-formed but not listed in the index
 */
export class UnknownFilterError extends FilterCacheError {
  constructor(public readonly identifier: string) {
    super(`Requested filter ID: ${identifier} does not exist`, 'UNKNOWN_FILTER');
    this.name = 'UnknownFilterError';
  }
}

/**
 * Error thrown when the index lists a filter whose transmission file is missing
 */
export class InconsistentCacheError extends FilterCacheError {
  constructor(
    public readonly identifier: string,
    public readonly cacheDir: string
  ) {
    super(
      `Requested filter ID: ${identifier} exists in index, but its transmission data is missing in the cache directory: ${cacheDir}`,
      'INCONSISTENT_CACHE',
      `Run \`filter-cache download\` to restore the complete cache, or \`filter-cache download ${identifier}\` for this filter only`
    );
    this.name = 'InconsistentCacheError';
  }
}

/**
 * Error thrown when a persisted table cannot be decoded
 */
export class DecodeError extends FilterCacheError {
  constructor(
    public readonly source: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(
      `Failed to decode table ${source}: ${detail}`,
      'DECODE_ERROR',
      'Delete the file and download it again',
      options
    );
    this.name = 'DecodeError';
  }
}

/**
 * Error thrown when transmission data for one filter cannot be fetched or stored
 */
export class DownloadFailedError extends FilterCacheError {
  constructor(
    public readonly identifier: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Data for filter ID = ${identifier} could not be downloaded: ${detail}`,
      'DOWNLOAD_FAILED',
      undefined,
      { cause }
    );
    this.name = 'DownloadFailedError';
  }
}

/**
 * Type guard to check if an error is a FilterCacheError
 */
export function isFilterCacheError(error: unknown): error is FilterCacheError {
  return error instanceof FilterCacheError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isFilterCacheError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
