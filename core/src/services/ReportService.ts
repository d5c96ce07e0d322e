import type { DuplicateGroup, DuplicateReport, Occurrence } from "../types.js";

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Orders occurrences by path (code unit order), then by line number.
 */
export function compareOccurrences(a: Occurrence, b: Occurrence): number {
  return compareStrings(a.filePath, b.filePath) || a.startLine - b.startLine;
}

/**
 * Larger groups first; equal sizes fall back to comparing the sorted occurrence lists
 * element by element so the order never depends on insertion order.
 */
export function compareGroups(a: DuplicateGroup, b: DuplicateGroup): number {
  const bySize = b.occurrences.length - a.occurrences.length;
  if (bySize !== 0) return bySize;

  const shared = Math.min(a.occurrences.length, b.occurrences.length);
  for (let i = 0; i < shared; i++) {
    const cmp = compareOccurrences(a.occurrences[i], b.occurrences[i]);
    if (cmp !== 0) return cmp;
  }
  return compareStrings(a.digest, b.digest);
}

export function rankGroups(groups: readonly DuplicateGroup[]): DuplicateGroup[] {
  return groups
    .map((group) => ({ ...group, occurrences: [...group.occurrences].sort(compareOccurrences) }))
    .sort(compareGroups);
}

/**
 * Ranks every group and keeps the first `top`. The cap only limits what is shown;
 * `duplicateGroups` still counts all of them.
 */
export function buildDuplicateReport(
  root: string,
  filesScanned: number,
  groups: readonly DuplicateGroup[],
  top: number
): DuplicateReport {
  const ranked = rankGroups(groups);
  const shown = ranked.slice(0, Math.max(0, top));
  return {
    root,
    filesScanned,
    duplicateGroups: ranked.length,
    shown: shown.length,
    groups: shown,
  };
}
