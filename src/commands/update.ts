/**
 * update command - Bring an existing cache up to date
 *
 * Removes filters the service no longer lists, downloads new ones and
 * replaces the cached index. Requires a prior full download.
 */

import type { CommandContext, CommandResult, UpdateSummary } from '../types.js';
import { syncFilterCache } from '../reconcilers/filters/index.js';
import { formatError } from '../cache/errors.js';
import {
  info,
  success,
  warn,
  error as printError,
  verbose,
  header,
  dryRunNotice,
} from '../utils/output.js';

function listIds(label: string, ids: string[]): void {
  if (ids.length === 0) return;
  info(`${label} (${ids.length}):`);
  for (const id of ids) {
    console.log(`    ${id}`);
  }
}

/**
 * Execute the update command
 */
export async function updateCommand(ctx: CommandContext): Promise<CommandResult<UpdateSummary>> {
  const { options: globalOpts, outputFormat, cacheDir } = ctx;

  verbose(`Executing update command`, globalOpts.verbose);
  verbose(`Cache directory: ${cacheDir}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Filter Update');
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
  }

  try {
    const report = await syncFilterCache(ctx.downloads, cacheDir, {
      dryRun: globalOpts.dryRun,
    });

    const summary: UpdateSummary = {
      updated: report.updated,
      dryRun: report.dryRun,
      added: report.added,
      removed: report.removed,
      failed: report.failed.map(({ identifier, error }) => ({
        identifier,
        error: error.message,
      })),
    };

    let message: string;
    if (!report.updated) {
      message = 'Filter data is already up-to-date';
    } else if (report.dryRun) {
      message = `Dry run: ${summary.added.length} to add, ${summary.removed.length} to remove`;
    } else {
      message = `Update complete: ${summary.added.length} added, ${summary.removed.length} removed, ${summary.failed.length} failed`;
    }

    if (outputFormat === 'human') {
      listIds(report.dryRun ? 'Would add' : 'Added', summary.added);
      listIds(report.dryRun ? 'Would remove' : 'Removed', summary.removed);
      for (const failure of summary.failed) {
        warn(`${failure.identifier}: ${failure.error}`);
      }
      console.log('');
      if (summary.failed.length > 0) {
        printError(message);
      } else {
        success(message);
      }
    }

    return {
      success: summary.failed.length === 0,
      message,
      data: summary,
      errors: summary.failed.map((failure) => `${failure.identifier}: ${failure.error}`),
    };
  } catch (err) {
    if (outputFormat === 'human') {
      printError(formatError(err));
    }
    return {
      success: false,
      message: `Update failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
