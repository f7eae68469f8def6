/**
 * Configuration module exports
 */

export {
  getConfigDir,
  getSettingsPath,
  loadSettings,
  saveSettings,
  updateSettings,
  getConfiguredCacheDir,
  setConfiguredCacheDir,
  getLastUpdate,
  touchUpdateTimestamp,
  settingsMarker,
  SettingsError,
  type FilterCacheSettings,
} from './settings.js';
