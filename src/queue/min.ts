/**
 * @file Typed min-queue facade: thin wrappers over the untyped heap core
 *
 * Subject: IndexedMinQueue<A, T>
 * - Binds the core to arena `A`; ids from other arenas do not type-check
 * - Translates Id<A> to raw ids on the way in and rebuilds Id<A> on the way out
 *
 * Object: UntypedIndexedMinQueue<T>
 * - Holds the heap array, the position map and the priorities
 * - The facade forwards every operation to it, no copies
 *
 * With a debug mode other than 'off', every entry point that takes an id also
 * checks the id's run-time arena tag.
 */
import type { Id } from "../arena/id";
import type { ArenaIterable, Comparator, DebugMode, Ordered, Priority, QueueEntry, QueueOptions, UntypedEntry } from "../types";
import type { UntypedIndexedMinQueue } from "../heap/untyped";
import * as core from "../heap/untyped";
import { fromRaw, toRaw } from "../arena/id";
import { ArenaMismatchError } from "../errors";
import { mapIterable, tagIterable } from "../util/iterable";

export type IndexedMinQueue<A extends string, T> = {
  readonly arena: A;
  readonly state: UntypedIndexedMinQueue<T>;
  readonly size: number;
  isEmpty(): boolean;
  clear(): void;
  /** Insert, or update the priority of an id already queued. */
  insert(id: Id<A>, value: T): void;
  remove(id: Id<A>): QueueEntry<A, T> | undefined;
  has(id: Id<A>): boolean;
  /** Current priority of `id`, if queued. */
  get(id: Id<A>): T | undefined;
  peek(): T | undefined;
  peekId(): QueueEntry<A, T> | undefined;
  getPosition(position: number): T | undefined;
  getPositionWithId(position: number): QueueEntry<A, T> | undefined;
  pop(): QueueEntry<A, T> | undefined;
  removePosition(position: number): QueueEntry<A, T> | undefined;
  /** Apply `value` only if it sorts strictly before the current priority. */
  decrease(id: Id<A>, value: T): void;
  /** Apply `value` only if it sorts strictly after the current priority. */
  increase(id: Id<A>, value: T): void;
  /** Entries in heap-array order; only the first is guaranteed minimal. */
  iterSorted(): Iterable<QueueEntry<A, T>>;
  /** Value slots by id index, tagged with the arena. */
  values(): ArenaIterable<A, T | undefined>;
  clone(): IndexedMinQueue<A, T>;
  cloneFrom(other: IndexedMinQueue<A, T>): void;
};

/** Report an id from a foreign arena according to the debug mode. */
export function checkArena(expected: string, id: { readonly arena: string }, debug: DebugMode): void {
  if (debug === "off" || id.arena === expected) {
    return;
  }
  if (debug === "throw") {
    throw new ArenaMismatchError(expected, id.arena);
  }
  console.warn(`[idheap] id from arena "${id.arena}" used with a queue of arena "${expected}"`);
}

/**
 * Attach a typed facade to an existing core state.
 * The state becomes the backing store of the returned queue.
 */
export function fromUntyped<A extends string, T>(arena: A, state: UntypedIndexedMinQueue<T>): IndexedMinQueue<A, T> {
  const lift = (e: UntypedEntry<T> | undefined): QueueEntry<A, T> | undefined =>
    e === undefined ? undefined : { id: fromRaw(arena, e.id), value: e.value };
  const raw = (id: Id<A>) => {
    checkArena(arena, id, state.debug);
    return toRaw(id);
  };
  const queue: IndexedMinQueue<A, T> = {
    arena,
    state,
    get size() {
      return core.size(state);
    },
    isEmpty: () => core.isEmpty(state),
    clear: () => core.clear(state),
    insert: (id, value) => core.insert(state, raw(id), value),
    remove: (id) => lift(core.remove(state, raw(id))),
    has: (id) => core.has(state, raw(id)),
    get: (id) => core.valueOf(state, raw(id)),
    peek: () => core.peek(state),
    peekId: () => lift(core.peekId(state)),
    getPosition: (position) => core.getPosition(state, position),
    getPositionWithId: (position) => lift(core.getPositionWithId(state, position)),
    pop: () => lift(core.pop(state)),
    removePosition: (position) => lift(core.removePosition(state, position)),
    decrease: (id, value) => core.decrease(state, raw(id), value),
    increase: (id, value) => core.increase(state, raw(id), value),
    iterSorted: () => mapIterable(core.iterSorted(state), (e) => ({ id: fromRaw(arena, e.id), value: e.value })),
    values: () => tagIterable(arena, core.values(state)),
    clone: () => fromUntyped(arena, core.cloneQueue(state)),
    cloneFrom: (other) => core.cloneQueueFrom(state, other.state),
  };
  return queue;
}

/** Create an empty min-queue for arena `arena`. Primitive priorities need no comparator. */
export function createIndexedMinQueue<A extends string, T extends Ordered>(
  arena: A,
  options?: QueueOptions<T>,
): IndexedMinQueue<A, T>;
export function createIndexedMinQueue<A extends string, T extends Priority>(
  arena: A,
  options: QueueOptions<T> & { compare: Comparator<T> },
): IndexedMinQueue<A, T>;
export function createIndexedMinQueue<A extends string, T extends Priority>(arena: A, options: QueueOptions<T> = {}): IndexedMinQueue<A, T> {
  return fromUntyped(arena, core.createUntypedQueue(options));
}
