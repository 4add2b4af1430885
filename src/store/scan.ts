import { globMatch } from './glob.js';
import type { ScanPage } from './types.js';

export const DEFAULT_SCAN_COUNT = 10;

/**
 * Sorted snapshot of every name matching the pattern.
 */
export function matchingSorted(names: Iterable<string>, pattern: string): string[] {
  const out: string[] = [];
  for (const name of names) {
    if (globMatch(pattern, name)) out.push(name);
  }
  return out.sort();
}

/**
 * Offset pagination over a sorted snapshot. A returned cursor of 0 means the walk is
 * complete. Calls made without writes in between visit every item exactly once; writes
 * between calls shift offsets, so items may then be skipped or repeated.
 */
export function paginate(items: string[], cursor: number, count: number): ScanPage {
  const size = count > 0 ? count : DEFAULT_SCAN_COUNT;
  if (cursor >= items.length) {
    return { cursor: 0, items: [] };
  }
  const end = Math.min(cursor + size, items.length);
  return {
    cursor: end < items.length ? end : 0,
    items: items.slice(cursor, end),
  };
}
