/**
 * Filter identifier parsing and cache path layout
 *
 * Filter IDs name a facility, an instrument and a filter. The remote
 * service spells them `facility/instrument.filter`; the cache accepts `/`
 * and `.` interchangeably and stores each filter at
 * `<cacheDir>/<facility>/<instrument>/<filter>.vot`.
 */

import { join } from 'node:path';
import { MalformedIdentifierError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed filter identifier
 */
export interface FilterIdentifier {
  facility: string;
  instrument: string;
  filterName: string;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * File extension of every persisted table
 */
export const TABLE_EXTENSION = 'vot';

/**
 * Base name of the persisted filter index
 */
export const INDEX_BASENAME = 'index';

const DELIMITER_PATTERN = /[/.]/;

const utf8 = new TextDecoder('utf-8');

// =============================================================================
// Parsing
// =============================================================================

/**
 * Decode a filter ID that may arrive as raw bytes
 */
export function normalizeFilterId(raw: string | Uint8Array): string {
  return typeof raw === 'string' ? raw : utf8.decode(raw);
}

/**
 * Parse a filter ID written with `/` or `.` delimiters
 *
 * @example
 * parseFilterId('Generic/Bessell.V') // { facility: 'Generic', instrument: 'Bessell', filterName: 'V' }
 * parseFilterId('Generic/Bessell/V') // same
 */
export function parseFilterId(identifier: string): FilterIdentifier {
  const segments = identifier.split(DELIMITER_PATTERN);
  if (segments.length !== 3 || segments.some((segment) => segment.length === 0)) {
    throw new MalformedIdentifierError(identifier);
  }

  const [facility, instrument, filterName] = segments;
  return { facility, instrument, filterName };
}

/**
 * Format an identifier the way the remote service expects it
 */
export function toCanonicalRemoteForm(id: FilterIdentifier): string {
  return `${id.facility}/${id.instrument}.${id.filterName}`;
}

/**
 * Parse any accepted spelling and return the canonical remote form
 */
export function canonicalizeFilterId(identifier: string): string {
  return toCanonicalRemoteForm(parseFilterId(identifier));
}

// =============================================================================
// Paths
// =============================================================================

/**
 * Path of a filter's transmission table inside the cache
 */
export function toStoragePath(
  id: FilterIdentifier,
  cacheDir: string,
  ext: string = TABLE_EXTENSION
): string {
  return join(cacheDir, id.facility, id.instrument, `${id.filterName}.${ext}`);
}

/**
 * Path of the filter index inside the cache
 */
export function indexPath(cacheDir: string, ext: string = TABLE_EXTENSION): string {
  return join(cacheDir, `${INDEX_BASENAME}.${ext}`);
}
