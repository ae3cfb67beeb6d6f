/**
 * @file Small helpers for lazy, restartable iterables
 *
 * A generator object can be walked once. The helpers below wrap a factory
 * instead, so every `for...of` over the result starts from the beginning
 * and reads the current state of the backing structure.
 */
import type { ArenaIterable } from "../types";

/** Wrap an iterator factory as an iterable that restarts on every walk. */
export function restartable<V>(make: () => Iterator<V>): Iterable<V> {
  return { [Symbol.iterator]: make };
}

/**
 *
 */
export function mapIterable<S, V>(source: Iterable<S>, fn: (item: S) => V): Iterable<V> {
  return restartable(function* () {
    for (const item of source) {
      yield fn(item);
    }
  });
}

/** Attach an arena tag to an iterable. */
export function tagIterable<A extends string, V>(arena: A, source: Iterable<V>): ArenaIterable<A, V> {
  return {
    arena,
    [Symbol.iterator]: () => source[Symbol.iterator](),
  };
}
