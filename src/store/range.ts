export interface ResolvedRange {
  start: number;
  stop: number;
}

/**
 * Resolves an inclusive [start, stop] pair against a sequence length.
 * Negative indices count from the end; both ends are then clamped into the sequence.
 * Returns null when the range selects nothing.
 */
export function resolveRange(length: number, start: number, stop: number): ResolvedRange | null {
  if (length === 0) return null;

  let from = start < 0 ? length + start : start;
  let to = stop < 0 ? length + stop : stop;
  if (from < 0) from = 0;
  if (to >= length) to = length - 1;

  if (from > to || from >= length) return null;
  return { start: from, stop: to };
}
