/**
 * @file Position arithmetic for a D-ary heap stored in a flat array
 */

export const DEFAULT_ARITY = 8;

/** Half-open range of array positions [start, end). */
export type IndexRange = { start: number; end: number };

/** Parent position, or undefined for the root. */
export function parentOf(index: number, arity: number): number | undefined {
  if (index <= 0) {
    return undefined;
  }
  return Math.floor((index - 1) / arity);
}

/** Children of `index` that exist in a heap of `length` entries. */
export function childrenOf(index: number, length: number, arity: number): IndexRange {
  const base = index * arity;
  const start = base + 1;
  const end = Math.min(base + arity + 1, length);
  return { start, end };
}

/** Positions in `range`, ascending. */
export function rangeIndexes(range: IndexRange): number[] {
  const out: number[] = [];
  for (let i = range.start; i < range.end; i++) {
    out.push(i);
  }
  return out;
}
