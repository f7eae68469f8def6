/**
 * Filter ID diff
 *
 * Compares two filter ID lists as sets. Only membership matters: order and
 * duplicates are ignored, and rows whose other columns changed are not
 * reported.
 */

import type { FilterIdDiff } from './types.js';

function unique(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids));
}

/**
 * Diff cached filter IDs against a fresh list
 *
 * @param oldIds - IDs from the cached index
 * @param newIds - IDs from the freshly fetched index
 */
export function diffFilterIds(oldIds: Iterable<string>, newIds: Iterable<string>): FilterIdDiff {
  const oldList = unique(oldIds);
  const newList = unique(newIds);
  const oldSet = new Set(oldList);
  const newSet = new Set(newList);

  const toAdd = newList.filter((id) => !oldSet.has(id));
  const toRemove = oldList.filter((id) => !newSet.has(id));
  const unchanged = newList.filter((id) => oldSet.has(id));

  return {
    toAdd,
    toRemove,
    unchanged,
    hasChanges: toAdd.length > 0 || toRemove.length > 0,
  };
}

/**
 * One-line summary of a diff
 */
export function formatFilterDiffSummary(diff: FilterIdDiff): string {
  if (!diff.hasChanges) {
    return `No changes (${diff.unchanged.length} filters)`;
  }
  return `${diff.toAdd.length} to add, ${diff.toRemove.length} to remove, ${diff.unchanged.length} unchanged`;
}
