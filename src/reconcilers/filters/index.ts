/**
 * Filter cache reconciler exports
 */

export type { FilterIdDiff, SyncOptions, SyncReport } from './types.js';

export { diffFilterIds, formatFilterDiffSummary } from './diff.js';

export { removeObsoleteFilters } from './apply.js';

export { syncFilterCache, sync } from './sync.js';
