/**
 * status command - Report what the cache currently holds
 */

import type { CommandContext, CommandResult, CacheStatus } from '../types.js';
import { findMissingTransmissions, indexFilterIds, loadIndex } from '../cache/store.js';
import { MissingIndexError, formatError } from '../cache/errors.js';
import { getLastUpdate } from '../config/index.js';
import { error as printError, header, printStatus, verbose, warn } from '../utils/output.js';

/**
 * Execute the status command
 */
export async function statusCommand(ctx: CommandContext): Promise<CommandResult<CacheStatus>> {
  const { options: globalOpts, outputFormat, cacheDir } = ctx;

  verbose(`Executing status command`, globalOpts.verbose);

  try {
    const lastUpdate = getLastUpdate();
    const status: CacheStatus = {
      cacheDir,
      lastUpdate: lastUpdate ? lastUpdate.toISOString() : null,
      hasIndex: false,
      filterCount: 0,
      missingTransmissions: [],
    };

    try {
      const index = await loadIndex(cacheDir);
      status.hasIndex = true;
      status.filterCount = indexFilterIds(index).length;
      status.missingTransmissions = await findMissingTransmissions(cacheDir);
    } catch (err) {
      if (!(err instanceof MissingIndexError)) {
        throw err;
      }
    }

    if (outputFormat === 'human') {
      header('Filter Cache Status');
      printStatus(status, outputFormat);
      if (!status.hasIndex) {
        console.log('');
        warn('No filter index cached yet. Run `filter-cache download` first.');
      } else if (status.missingTransmissions.length > 0) {
        console.log('');
        warn(`${status.missingTransmissions.length} filter(s) listed in the index have no cached data`);
      }
    }

    const message = status.hasIndex
      ? `${status.filterCount} filter(s) indexed, ${status.missingTransmissions.length} missing`
      : 'No filter index cached';

    return {
      success: true,
      message,
      data: status,
    };
  } catch (err) {
    if (outputFormat === 'human') {
      printError(formatError(err));
    }
    return {
      success: false,
      message: `Status failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
