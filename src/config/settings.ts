/**
 * Settings management for filter-cache
 *
 * Manages <configDir>/config.yml which stores:
 * - cache_dir: Default cache root used when --cache-dir is not given
 * - cache_updated_at: When the cache was last brought up to date
 *
 * The config directory defaults to ~/.filter-cache and can be moved with
 * FILTER_CACHE_CONFIG_DIR.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import * as os from 'node:os';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import type { UpdateMarker } from '../cache/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Settings file schema
 */
export interface FilterCacheSettings {
  cache_dir?: string;
  /** ISO timestamp */
  cache_updated_at?: string;
}

/**
 * Error thrown when the settings file cannot be read or parsed
 */
export class SettingsError extends Error {
  constructor(
    public readonly settingsPath: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(`Invalid settings file ${settingsPath}: ${detail}`, options);
    this.name = 'SettingsError';
  }
}

// =============================================================================
// Locations
// =============================================================================

const SETTINGS_FILENAME = 'config.yml';
const DEFAULT_CACHE_SUBDIR = 'filter_data';

/**
 * Directory holding the settings file
 */
export function getConfigDir(): string {
  const fromEnv = process.env.FILTER_CACHE_CONFIG_DIR;
  return fromEnv ? resolve(fromEnv) : join(os.homedir(), '.filter-cache');
}

/**
 * Path of the settings file
 */
export function getSettingsPath(): string {
  return join(getConfigDir(), SETTINGS_FILENAME);
}

// =============================================================================
// Load / Save
// =============================================================================

function validateSettings(value: unknown, settingsPath: string): FilterCacheSettings {
  if (value === null || value === undefined) {
    return {};
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new SettingsError(settingsPath, 'expected a mapping at the top level');
  }

  const settings: FilterCacheSettings = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key !== 'cache_dir' && key !== 'cache_updated_at') {
      continue;
    }
    if (typeof entry !== 'string') {
      throw new SettingsError(settingsPath, `${key} must be a string`);
    }
    settings[key] = entry;
  }
  return settings;
}

/**
 * Load settings; a missing file yields empty settings
 *
 * @throws SettingsError if the file is unreadable or not a YAML mapping
 */
export function loadSettings(): FilterCacheSettings {
  const settingsPath = getSettingsPath();
  if (!existsSync(settingsPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(settingsPath, 'utf-8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SettingsError(settingsPath, detail, { cause: err });
  }

  return validateSettings(parsed, settingsPath);
}

/**
 * Save settings, creating the config directory if needed
 */
export function saveSettings(settings: FilterCacheSettings): void {
  mkdirSync(getConfigDir(), { recursive: true });
  writeFileSync(getSettingsPath(), yaml.stringify(settings, { indent: 2 }), 'utf-8');
}

/**
 * Merge updates into the stored settings
 *
 * @returns The updated settings
 */
export function updateSettings(updates: Partial<FilterCacheSettings>): FilterCacheSettings {
  const next = { ...loadSettings(), ...updates };
  saveSettings(next);
  return next;
}

// =============================================================================
// Cache root
// =============================================================================

/**
 * Default cache root: FILTER_CACHE_DIR, then cache_dir from the settings
 * file, then <configDir>/filter_data
 */
export function getConfiguredCacheDir(): string {
  if (process.env.FILTER_CACHE_DIR) {
    return resolve(process.env.FILTER_CACHE_DIR);
  }
  const settings = loadSettings();
  if (settings.cache_dir) {
    return resolve(settings.cache_dir);
  }
  return join(getConfigDir(), DEFAULT_CACHE_SUBDIR);
}

/**
 * Persist a new default cache root
 */
export function setConfiguredCacheDir(cacheDir: string): string {
  const absolute = resolve(cacheDir);
  updateSettings({ cache_dir: absolute });
  return absolute;
}

// =============================================================================
// Update timestamp
// =============================================================================

/**
 * When the cache was last updated, or null if never
 */
export function getLastUpdate(): Date | null {
  const { cache_updated_at: stamp } = loadSettings();
  if (!stamp) return null;
  const date = new Date(stamp);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Record that the cache was brought up to date
 */
export function touchUpdateTimestamp(now: Date = new Date()): void {
  updateSettings({ cache_updated_at: now.toISOString() });
}

/**
 * Update marker backed by the settings file
 */
export const settingsMarker: UpdateMarker = {
  touch: () => touchUpdateTimestamp(),
};
