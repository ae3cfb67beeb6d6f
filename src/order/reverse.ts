/**
 * @file Value-reversal adapter
 *
 * Wrapping priorities in Reverse and ordering them with reverseComparator
 * turns the min-heap into a max-heap without a second sink/swim.
 */
import type { Comparator } from "../types";

export type Reverse<T> = { readonly value: T };

/**
 *
 */
export function reverse<T>(value: T): Reverse<T> {
  return { value };
}

/** Order Reverse-wrapped values opposite to `compare`. */
export function reverseComparator<T>(compare: Comparator<T>): Comparator<Reverse<T>> {
  return (a, b) => compare(b.value, a.value);
}
