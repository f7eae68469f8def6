/**
 * config command - Show or change the stored settings
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  getSettingsPath,
  loadSettings,
  setConfiguredCacheDir,
  type FilterCacheSettings,
} from '../config/index.js';
import { error as printError, header, printStatus, success } from '../utils/output.js';

export interface ConfigOptions {
  /** New default cache root */
  setCacheDir?: string;
}

export interface ConfigSummary {
  settingsPath: string;
  /** Cache root this invocation resolved */
  cacheDir: string;
  settings: FilterCacheSettings;
}

/**
 * Execute the config command
 */
export async function configCommand(
  ctx: CommandContext,
  options: ConfigOptions = {}
): Promise<CommandResult<ConfigSummary>> {
  const { outputFormat } = ctx;

  try {
    let cacheDir = ctx.cacheDir;
    if (options.setCacheDir !== undefined) {
      if (ctx.options.dryRun) {
        return {
          success: true,
          message: `Dry run: would set the default cache directory to ${options.setCacheDir}`,
        };
      }
      cacheDir = setConfiguredCacheDir(options.setCacheDir);
      if (outputFormat === 'human') {
        success(`Default cache directory set to ${cacheDir}`);
      }
    }

    const summary: ConfigSummary = {
      settingsPath: getSettingsPath(),
      cacheDir,
      settings: loadSettings(),
    };

    if (outputFormat === 'human') {
      header('Settings');
      printStatus(
        {
          settingsPath: summary.settingsPath,
          cacheDir: summary.cacheDir,
          cacheUpdatedAt: summary.settings.cache_updated_at,
        },
        outputFormat
      );
    }

    return {
      success: true,
      message: `Settings loaded from ${summary.settingsPath}`,
      data: summary,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (outputFormat === 'human') {
      printError(message);
    }
    return { success: false, message: `Config failed: ${message}` };
  }
}
