/**
 * Read access to the cached filter data
 *
 * The cache root holds `index.vot` plus one `<facility>/<instrument>/<filter>.vot`
 * file per filter.
 */

import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import {
  InconsistentCacheError,
  MissingIndexError,
  UnknownFilterError,
} from './errors.js';
import {
  indexPath,
  parseFilterId,
  toCanonicalRemoteForm,
  toStoragePath,
  type FilterIdentifier,
} from './identifier.js';
import { errorCode, fileExists, isTempFileName } from './io.js';
import { textColumn, type Table } from './table.js';
import { parseTable } from './votable.js';

/**
 * Index column holding the canonical filter ID
 */
export const FILTER_ID_COLUMN = 'filterID';

/**
 * Load the cached filter index
 *
 * @throws MissingIndexError if no index has been downloaded into cacheDir
 */
export async function loadIndex(cacheDir: string): Promise<Table> {
  const location = indexPath(cacheDir);
  if (!(await fileExists(location))) {
    throw new MissingIndexError(cacheDir);
  }
  return parseTable(location);
}

/**
 * Filter IDs listed in an index table
 */
export function indexFilterIds(index: Table): string[] {
  return textColumn(index, FILTER_ID_COLUMN);
}

/**
 * Load the cached transmission data of one filter
 *
 * When the file is absent the index decides which error is raised: a
 * listed filter means the cache is incomplete, an unlisted one means the
 * ID was never valid.
 *
 * @throws MalformedIdentifierError for IDs that are not facility/instrument/filter
 * @throws InconsistentCacheError if the index lists the filter but its file is missing
 * @throws UnknownFilterError if the index does not list the filter
 * @throws MissingIndexError if neither the file nor the index exist
 */
export async function loadTransmission(identifier: string, cacheDir: string): Promise<Table> {
  const id = parseFilterId(identifier);
  const location = toStoragePath(id, cacheDir);

  if (await fileExists(location)) {
    return parseTable(location);
  }

  const index = await loadIndex(cacheDir);
  if (indexFilterIds(index).includes(toCanonicalRemoteForm(id))) {
    throw new InconsistentCacheError(identifier, cacheDir);
  }
  throw new UnknownFilterError(identifier);
}

/**
 * Filter IDs the index lists but whose transmission file is missing
 *
 * IDs that do not parse are reported as missing too, since nothing can
 * ever be stored for them.
 */
export async function findMissingTransmissions(cacheDir: string): Promise<string[]> {
  const index = await loadIndex(cacheDir);
  const missing: string[] = [];

  for (const filterId of indexFilterIds(index)) {
    let id: FilterIdentifier;
    try {
      id = parseFilterId(filterId);
    } catch {
      missing.push(filterId);
      continue;
    }
    if (!(await fileExists(toStoragePath(id, cacheDir)))) {
      missing.push(filterId);
    }
  }

  return missing;
}

async function pruneBelow(dirPath: string): Promise<boolean> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  let remaining = entries.length;

  for (const entry of entries) {
    if (entry.isFile() && isTempFileName(entry.name)) {
      // Left behind by an interrupted write
      await fs.rm(join(dirPath, entry.name), { force: true });
      remaining--;
      continue;
    }
    if (!entry.isDirectory()) continue;
    const child = join(dirPath, entry.name);
    if (await pruneBelow(child)) {
      await fs.rmdir(child);
      remaining--;
    }
  }

  return remaining === 0;
}

/**
 * Remove every empty directory under cacheDir, deepest first
 *
 * A directory emptied by removing its children is removed as well.
 * Temp files abandoned by interrupted writes are deleted on the way.
 * cacheDir itself is never removed.
 */
export async function pruneEmptyDirectories(cacheDir: string): Promise<void> {
  try {
    await fs.access(cacheDir);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return;
    }
    throw err;
  }
  await pruneBelow(cacheDir);
}
