/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Aggregates the typed queue facades, the id/arena helpers and the untyped
 * heap core. Internals remain organized under src/heap/*, src/queue/* and
 * src/component/*.
 */

/**
 * Typed queues
 * - createIndexedMinQueue: root is the smallest priority
 * - createIndexedMaxQueue: root is the largest priority
 * @public
 */
export type { IndexedMinQueue } from "./queue/min";
export type { IndexedMaxQueue } from "./queue/max";
export { createIndexedMinQueue, fromUntyped } from "./queue/min";
export { createIndexedMaxQueue, fromReversed } from "./queue/max";

/**
 * Shared types
 * @public
 */
export type {
  ArenaIterable,
  Comparator,
  DebugMode,
  Ordered,
  Priority,
  QueueEntry,
  QueueOptions,
  ResolvedQueueOptions,
  UntypedEntry,
} from "./types";

/**
 * Ids and arenas
 * @public
 */
export type { Id, RawId } from "./arena/id";
export { fromRaw, rawId, sameRawId, toRaw } from "./arena/id";
export type { ArenaState } from "./arena/allocator";
export { allocate, createArena, isLive, liveCount, liveIds, release, validate } from "./arena/allocator";

/**
 * Untyped core and diagnostics
 * @public
 */
export type { UntypedIndexedMinQueue } from "./heap/untyped";
export * as untyped from "./heap/untyped";
export { MAX_QUEUE_LENGTH } from "./heap/untyped";
export { DEFAULT_ARITY } from "./heap/arity";
export type { InvariantName, InvariantReport, InvariantViolation } from "./heap/invariants";
export { checkInvariants, isHeapOrdered } from "./heap/invariants";

/**
 * Ordering and configuration
 * @public
 */
export type { Reverse } from "./order/reverse";
export { reverse, reverseComparator } from "./order/reverse";
export { compareOrdered } from "./order/compare";
export { DEBUG_ENV, debugModeFromEnv, resolveQueueOptions } from "./config/options";

export {
  ArenaMismatchError,
  InvalidIdError,
  InvalidQueueOptionError,
  QueueCapacityError,
  QueueInvariantError,
  UnorderedValueError,
} from "./errors";
