/**
 * Unit Tests: Download orchestration
 *
 * Tests full and per-filter downloads against an in-memory source,
 * including batch behavior when some filters fail.
 */

import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  fetchAndCacheAll,
  fetchAndCacheIndex,
  fetchAndCacheMany,
  fetchAndCacheOne,
} from '../../src/cache/download.js';
import { DownloadFailedError, MalformedIdentifierError } from '../../src/cache/errors.js';
import { indexFilterIds, loadIndex, loadTransmission } from '../../src/cache/store.js';
import {
  createTempDir,
  createTestContext,
  pathExists,
  removeTempDir,
  type TestContext,
} from './helpers.js';

describe('download', () => {
  let cacheDir: string;
  let ctx: TestContext;

  beforeEach(async () => {
    cacheDir = await createTempDir();
    ctx = createTestContext(['Generic/Bessell.V', 'Generic/Bessell.B', '2MASS/2MASS.J']);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(cacheDir);
  });

  // ===========================================================================
  // fetchAndCacheIndex
  // ===========================================================================

  describe('fetchAndCacheIndex', () => {
    it('stores the index and touches the update marker', async () => {
      await fetchAndCacheIndex(ctx, cacheDir);

      expect(await pathExists(join(cacheDir, 'index.vot'))).toBe(true);
      expect(indexFilterIds(await loadIndex(cacheDir))).toEqual([
        'Generic/Bessell.V',
        'Generic/Bessell.B',
        '2MASS/2MASS.J',
      ]);
      expect(ctx.marker.touches).toBe(1);
    });
  });

  // ===========================================================================
  // fetchAndCacheOne
  // ===========================================================================

  describe('fetchAndCacheOne', () => {
    it('requests the canonical ID and stores the table by path segments', async () => {
      const written = await fetchAndCacheOne(ctx, 'Generic/Bessell/V', cacheDir);

      expect(ctx.source.requested).toEqual(['Generic/Bessell.V']);
      expect(written).toBe(join(cacheDir, 'Generic', 'Bessell', 'V.vot'));
      expect((await loadTransmission('Generic/Bessell.V', cacheDir)).rows).toHaveLength(3);
    });

    it('throws MalformedIdentifierError without calling the source', async () => {
      await expect(fetchAndCacheOne(ctx, 'Bessell.V', cacheDir)).rejects.toBeInstanceOf(
        MalformedIdentifierError
      );
      expect(ctx.source.requested).toEqual([]);
    });

    it('wraps source failures in DownloadFailedError', async () => {
      ctx.source.failing.add('Generic/Bessell.V');

      await expect(fetchAndCacheOne(ctx, 'Generic/Bessell.V', cacheDir)).rejects.toMatchObject({
        name: 'DownloadFailedError',
        code: 'DOWNLOAD_FAILED',
        identifier: 'Generic/Bessell.V',
      });
    });
  });

  // ===========================================================================
  // fetchAndCacheMany
  // ===========================================================================

  describe('fetchAndCacheMany', () => {
    it('continues past a malformed ID and logs one failure', async () => {
      const result = await fetchAndCacheMany(
        ctx,
        ['Generic/Bessell.V', 'not-a-filter', 'Generic/Bessell.B'],
        cacheDir
      );

      expect(result.succeeded).toEqual(['Generic/Bessell.V', 'Generic/Bessell.B']);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0].identifier).toBe('not-a-filter');
      expect(result.failed[0].error).toBeInstanceOf(MalformedIdentifierError);

      expect(console.error).toHaveBeenCalledTimes(1);
      expect(vi.mocked(console.error).mock.calls[0][0]).toContain(
        'Data for filter ID = not-a-filter could not be downloaded'
      );
      expect(await pathExists(join(cacheDir, 'Generic', 'Bessell', 'B.vot'))).toBe(true);
    });

    it('collects remote failures with their cause', async () => {
      ctx.source.failing.add('2MASS/2MASS.J');

      const result = await fetchAndCacheMany(ctx, ['2MASS/2MASS.J', 'Generic/Bessell.V'], cacheDir);

      expect(result.succeeded).toEqual(['Generic/Bessell.V']);
      expect(result.failed[0].error).toBeInstanceOf(DownloadFailedError);
      expect(result.failed[0].error.message).toBe(
        'Data for filter ID = 2MASS/2MASS.J could not be downloaded: service unavailable for 2MASS/2MASS.J'
      );
    });

    it('decodes byte-valued IDs', async () => {
      const encoder = new TextEncoder();
      const result = await fetchAndCacheMany(ctx, [encoder.encode('Generic/Bessell.V')], cacheDir);

      expect(result.succeeded).toEqual(['Generic/Bessell.V']);
      expect(ctx.source.requested).toEqual(['Generic/Bessell.V']);
    });

    it('does nothing for an empty batch', async () => {
      const result = await fetchAndCacheMany(ctx, [], cacheDir);

      expect(result).toEqual({ succeeded: [], failed: [] });
      expect(await fs.readdir(cacheDir)).toEqual([]);
    });
  });

  // ===========================================================================
  // fetchAndCacheAll
  // ===========================================================================

  describe('fetchAndCacheAll', () => {
    it('stores the index and every listed filter', async () => {
      const result = await fetchAndCacheAll(ctx, cacheDir);

      expect(result.succeeded).toEqual(['Generic/Bessell.V', 'Generic/Bessell.B', '2MASS/2MASS.J']);
      expect(result.failed).toEqual([]);
      expect(await pathExists(join(cacheDir, 'index.vot'))).toBe(true);
      expect(await pathExists(join(cacheDir, '2MASS', '2MASS', 'J.vot'))).toBe(true);
      expect(ctx.marker.touches).toBe(1);
    });

    it('keeps the index when some filters fail', async () => {
      ctx.source.failing.add('Generic/Bessell.B');

      const result = await fetchAndCacheAll(ctx, cacheDir);

      expect(result.failed.map((failure) => failure.identifier)).toEqual(['Generic/Bessell.B']);
      expect(indexFilterIds(await loadIndex(cacheDir))).toHaveLength(3);
    });
  });
});
