/**
 * @file Core type definitions for idheap
 *
 * This module defines the types shared by the heap core and the typed
 * queue facades:
 * - Comparators and the primitive priorities that have a default order
 * - Construction options and debug modes
 * - Entries returned by removal and lookup operations
 * - Arena-tagged iterables
 */
import type { Id, RawId } from "./arena/id";

/**
 * Total order over priorities.
 * Negative when a sorts before b, zero when equal, positive otherwise.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Any storable priority. `undefined` marks an empty storage slot and is
 * never a priority.
 */
export type Priority = {} | null;

/** Priority kinds ordered without a user comparator. */
export type Ordered = number | string | bigint;

/**
 * Run-time checking level.
 * - 'off': no checks
 * - 'warn': report problems through console.warn and continue
 * - 'throw': raise on the first problem
 */
export type DebugMode = "off" | "warn" | "throw";

/** Construction options shared by the core and the facades. */
export type QueueOptions<T> = {
  arity?: number; // default: 8
  capacity?: number; // initial slot count, default: 16
  debug?: DebugMode; // default: IDHEAP_DEBUG or 'off'
  compare?: Comparator<T>;
};

/** Options after validation and defaulting. */
export type ResolvedQueueOptions<T> = {
  arity: number;
  capacity: number;
  debug: DebugMode;
  compare: Comparator<T>;
};

/** Untyped id paired with its priority. */
export type UntypedEntry<T> = {
  id: RawId;
  value: T;
};

/** Typed id paired with its priority. */
export type QueueEntry<A extends string, T> = {
  id: Id<A>;
  value: T;
};

/** Iterable carrying the arena its items belong to. */
export type ArenaIterable<A extends string, V> = Iterable<V> & {
  readonly arena: A;
};
