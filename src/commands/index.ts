/**
 * Command exports
 */

export { downloadCommand, type DownloadOptions } from './download.js';
export { updateCommand } from './update.js';
export { listCommand, showCommand, summarizeTable, type ListOptions, type ShowOptions } from './show.js';
export { statusCommand } from './status.js';
export { configCommand, type ConfigOptions, type ConfigSummary } from './config.js';
