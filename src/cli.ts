#!/usr/bin/env node
/**
 * filter-cache CLI - Keep a local copy of filter transmission data
 *
 * Commands:
 * - download: Fetch the filter index and transmission data
 * - update: Sync an existing cache with the service
 * - list: Print the cached filter index
 * - show: Print one filter's transmission data
 * - status: Report what the cache holds
 * - config: Show or change the stored settings
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  downloadCommand,
  updateCommand,
  listCommand,
  showCommand,
  statusCommand,
  configCommand,
} from './commands/index.js';
import { createClient } from './api/index.js';
import { getConfiguredCacheDir, settingsMarker } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const cacheDir = options.cacheDir ?? getConfiguredCacheDir();
  const logger = createLogger({
    level: options.verbose ? 'debug' : options.json ? 'warn' : 'info',
  });

  verboseLog(`Using cache directory ${cacheDir}`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    cacheDir,
    downloads: {
      source: createClient({ baseUrl: options.serviceUrl, logger }),
      marker: settingsMarker,
      logger,
    },
  };
}

/**
 * Read the global options commander parsed
 */
function readGlobalOptions(): GlobalOptions {
  const opts = program.opts();
  return {
    cacheDir: typeof opts.cacheDir === 'string' ? opts.cacheDir : undefined,
    serviceUrl: typeof opts.serviceUrl === 'string' ? opts.serviceUrl : undefined,
    dryRun: opts.dryRun === true,
    json: opts.json === true,
    verbose: opts.verbose === true,
  };
}

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return limit;
}

/**
 * Build the context, run a command and exit with its status
 */
async function run<T>(
  label: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  try {
    const ctx = createContext(readGlobalOptions());
    const result = await execute(ctx);

    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('filter-cache')
  .description('Download and keep up to date a local cache of filter transmission curves')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--cache-dir <path>', 'Cache root directory')
      .env('FILTER_CACHE_DIR')
  )
  .addOption(
    new Option('--service-url <url>', 'Filter service endpoint')
      .env('FILTER_CACHE_SERVICE_URL')
  )
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * download command - Fetch the index and transmission data
 */
program
  .command('download')
  .description('Download the filter index and all filters, or only the given filters')
  .argument('[filterIds...]', 'Filter IDs such as Generic/Bessell.V')
  .action(async (filterIds: string[]) => {
    await run('Download', (ctx) => downloadCommand(ctx, { filterIds }));
  });

/**
 * update command - Sync the cache with the service
 */
program
  .command('update')
  .description('Remove filters no longer offered and download new ones')
  .action(async () => {
    await run('Update', (ctx) => updateCommand(ctx));
  });

/**
 * list command - Print the cached index
 */
program
  .command('list')
  .description('Print the cached filter index')
  .addOption(new Option('--limit <n>', 'Maximum rows to print').argParser(parseLimit))
  .action(async (cmdOpts: { limit?: number }) => {
    await run('List', (ctx) => listCommand(ctx, { limit: cmdOpts.limit }));
  });

/**
 * show command - Print one filter's transmission data
 */
program
  .command('show')
  .description('Print the cached transmission data of a filter')
  .argument('<filterId>', 'Filter ID such as Generic/Bessell.V')
  .addOption(new Option('--limit <n>', 'Maximum rows to print').argParser(parseLimit))
  .action(async (filterId: string, cmdOpts: { limit?: number }) => {
    await run('Show', (ctx) => showCommand(ctx, { filterId, limit: cmdOpts.limit }));
  });

/**
 * status command - Report cache contents
 */
program
  .command('status')
  .description('Show the cache location, last update and missing filters')
  .action(async () => {
    await run('Status', (ctx) => statusCommand(ctx));
  });

/**
 * config command - Show or change settings
 */
program
  .command('config')
  .description('Show the stored settings')
  .option('--set-cache-dir <path>', 'Store a new default cache directory')
  .action(async (cmdOpts: { setCacheDir?: string }) => {
    await run('Config', (ctx) => configCommand(ctx, { setCacheDir: cmdOpts.setCacheDir }));
  });

// Parse and execute
await program.parseAsync();
