/**
 * list and show commands - Read tables from the cache
 */

import type { CommandContext, CommandResult, TableSummary } from '../types.js';
import type { Table } from '../cache/table.js';
import { loadIndex, loadTransmission } from '../cache/store.js';
import { formatError } from '../cache/errors.js';
import { indexPath } from '../cache/identifier.js';
import { error as printError, printTable, verbose } from '../utils/output.js';

export interface ListOptions {
  /** Maximum rows to print in human output (JSON output prints all rows) */
  limit?: number;
}

export interface ShowOptions extends ListOptions {
  filterId: string;
}

const DEFAULT_ROW_LIMIT = 20;

/**
 * Convert a table to column names plus row records
 */
export function summarizeTable(table: Table, source: string, limit?: number): TableSummary {
  const columns = table.fields.map((field) => field.name);
  const rows = (limit === undefined ? table.rows : table.rows.slice(0, limit)).map((row) => {
    const record: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      record[column] = row[index] ?? null;
    });
    return record;
  });

  return { source, columns, rowCount: table.rows.length, rows };
}

async function printCachedTable(
  ctx: CommandContext,
  source: string,
  load: () => Promise<Table>,
  limit: number | undefined
): Promise<CommandResult<TableSummary>> {
  const { outputFormat } = ctx;

  try {
    const table = await load();
    const summary = summarizeTable(
      table,
      source,
      outputFormat === 'json' ? undefined : (limit ?? DEFAULT_ROW_LIMIT)
    );
    if (outputFormat === 'human') {
      printTable(summary, outputFormat);
    }
    return {
      success: true,
      message: `${summary.rowCount} row(s) in ${source}`,
      data: summary,
    };
  } catch (err) {
    if (outputFormat === 'human') {
      printError(formatError(err));
    }
    return {
      success: false,
      message: err instanceof Error ? err.message : String(err),
    };
  }
}

/**
 * Execute the list command: print the cached filter index
 */
export async function listCommand(
  ctx: CommandContext,
  options: ListOptions = {}
): Promise<CommandResult<TableSummary>> {
  verbose(`Executing list command`, ctx.options.verbose);
  return printCachedTable(ctx, indexPath(ctx.cacheDir), () => loadIndex(ctx.cacheDir), options.limit);
}

/**
 * Execute the show command: print one filter's transmission data
 */
export async function showCommand(
  ctx: CommandContext,
  options: ShowOptions
): Promise<CommandResult<TableSummary>> {
  verbose(`Executing show command for ${options.filterId}`, ctx.options.verbose);
  return printCachedTable(
    ctx,
    options.filterId,
    () => loadTransmission(options.filterId, ctx.cacheDir),
    options.limit
  );
}
