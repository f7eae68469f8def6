/**
 * Shared fixtures for unit tests: tables, an in-memory filter source and
 * temporary cache directories.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { join } from 'node:path';
import type { DownloadContext, FilterDataSource, UpdateMarker } from '../../src/cache/types.js';
import { createTable, type Table } from '../../src/cache/table.js';
import { Logger } from '../../src/utils/logger.js';

// =============================================================================
// Tables
// =============================================================================

export function createIndexTable(filterIds: string[]): Table {
  return createTable(
    [
      { name: 'filterID', datatype: 'char', arraysize: '*' },
      { name: 'WavelengthEff', datatype: 'double', unit: 'Angstrom' },
    ],
    filterIds.map((id, i) => [id, 4000 + i * 100])
  );
}

export function createTransmissionTable(points: Array<[number, number]>): Table {
  return createTable(
    [
      { name: 'Wavelength', datatype: 'double', unit: 'Angstrom' },
      { name: 'Transmission', datatype: 'double' },
    ],
    points.map(([wavelength, transmission]) => [wavelength, transmission])
  );
}

// =============================================================================
// Fake source and marker
// =============================================================================

/**
 * In-memory filter service
 */
export class FakeFilterSource implements FilterDataSource {
  index: Table;
  readonly failing = new Set<string>();
  readonly requested: string[] = [];
  indexRequests = 0;

  constructor(filterIds: string[]) {
    this.index = createIndexTable(filterIds);
  }

  setFilterIds(filterIds: string[]): void {
    this.index = createIndexTable(filterIds);
  }

  async fetchIndex(): Promise<Table> {
    this.indexRequests++;
    return this.index;
  }

  async fetchTransmission(canonicalId: string): Promise<Table> {
    this.requested.push(canonicalId);
    if (this.failing.has(canonicalId)) {
      throw new Error(`service unavailable for ${canonicalId}`);
    }
    return createTransmissionTable([
      [5000, 0.1],
      [5500, 0.9],
      [6000, 0.2],
    ]);
  }
}

export class CountingMarker implements UpdateMarker {
  touches = 0;

  touch(): void {
    this.touches++;
  }
}

export interface TestContext extends DownloadContext {
  source: FakeFilterSource;
  marker: CountingMarker;
  logger: Logger;
}

export function createTestContext(filterIds: string[]): TestContext {
  return {
    source: new FakeFilterSource(filterIds),
    marker: new CountingMarker(),
    logger: new Logger({ level: 'info', timestamps: false }),
  };
}

// =============================================================================
// Filesystem
// =============================================================================

export async function createTempDir(prefix = 'filter-cache-test-'): Promise<string> {
  return fs.mkdtemp(join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}
