/**
 * @file Typed max-queue adapter
 *
 * Wraps an IndexedMinQueue over Reverse<T>: values are wrapped on the way in
 * and unwrapped on the way out, and increase/decrease swap roles (raising a
 * value lowers its reversed form). The heap algorithm itself is the min-queue's.
 */
import type { Id } from "../arena/id";
import type { ArenaIterable, Comparator, Ordered, Priority, QueueEntry, QueueOptions } from "../types";
import type { IndexedMinQueue } from "./min";
import type { Reverse } from "../order/reverse";
import { createIndexedMinQueue } from "./min";
import { reverse, reverseComparator } from "../order/reverse";
import { resolveQueueOptions } from "../config/options";
import { mapIterable, tagIterable } from "../util/iterable";

export type IndexedMaxQueue<A extends string, T> = {
  readonly arena: A;
  readonly inner: IndexedMinQueue<A, Reverse<T>>;
  readonly size: number;
  isEmpty(): boolean;
  clear(): void;
  insert(id: Id<A>, value: T): void;
  remove(id: Id<A>): QueueEntry<A, T> | undefined;
  has(id: Id<A>): boolean;
  get(id: Id<A>): T | undefined;
  peek(): T | undefined;
  peekId(): QueueEntry<A, T> | undefined;
  getPosition(position: number): T | undefined;
  getPositionWithId(position: number): QueueEntry<A, T> | undefined;
  pop(): QueueEntry<A, T> | undefined;
  removePosition(position: number): QueueEntry<A, T> | undefined;
  /** Apply `value` only if it sorts strictly after the current priority. */
  increase(id: Id<A>, value: T): void;
  /** Apply `value` only if it sorts strictly before the current priority. */
  decrease(id: Id<A>, value: T): void;
  iterSorted(): Iterable<QueueEntry<A, T>>;
  values(): ArenaIterable<A, T | undefined>;
  clone(): IndexedMaxQueue<A, T>;
  cloneFrom(other: IndexedMaxQueue<A, T>): void;
};

function unwrap<A extends string, T>(e: QueueEntry<A, Reverse<T>> | undefined): QueueEntry<A, T> | undefined {
  return e === undefined ? undefined : { id: e.id, value: e.value.value };
}

/** Wrap an existing min-queue of reversed values. */
export function fromReversed<A extends string, T>(inner: IndexedMinQueue<A, Reverse<T>>): IndexedMaxQueue<A, T> {
  const queue: IndexedMaxQueue<A, T> = {
    arena: inner.arena,
    inner,
    get size() {
      return inner.size;
    },
    isEmpty: () => inner.isEmpty(),
    clear: () => inner.clear(),
    insert: (id, value) => inner.insert(id, reverse(value)),
    remove: (id) => unwrap(inner.remove(id)),
    has: (id) => inner.has(id),
    get: (id) => inner.get(id)?.value,
    peek: () => inner.peek()?.value,
    peekId: () => unwrap(inner.peekId()),
    getPosition: (position) => inner.getPosition(position)?.value,
    getPositionWithId: (position) => unwrap(inner.getPositionWithId(position)),
    pop: () => unwrap(inner.pop()),
    removePosition: (position) => unwrap(inner.removePosition(position)),
    increase: (id, value) => inner.decrease(id, reverse(value)),
    decrease: (id, value) => inner.increase(id, reverse(value)),
    iterSorted: () => mapIterable(inner.iterSorted(), (e) => ({ id: e.id, value: e.value.value })),
    values: () => tagIterable(inner.arena, mapIterable(inner.values(), (v) => v?.value)),
    clone: () => fromReversed(inner.clone()),
    cloneFrom: (other) => inner.cloneFrom(other.inner),
  };
  return queue;
}

/** Create an empty max-queue for arena `arena`. Primitive priorities need no comparator. */
export function createIndexedMaxQueue<A extends string, T extends Ordered>(
  arena: A,
  options?: QueueOptions<T>,
): IndexedMaxQueue<A, T>;
export function createIndexedMaxQueue<A extends string, T extends Priority>(
  arena: A,
  options: QueueOptions<T> & { compare: Comparator<T> },
): IndexedMaxQueue<A, T>;
export function createIndexedMaxQueue<A extends string, T extends Priority>(arena: A, options: QueueOptions<T> = {}): IndexedMaxQueue<A, T> {
  const o = resolveQueueOptions(options);
  const inner = createIndexedMinQueue<A, Reverse<T>>(arena, {
    arity: o.arity,
    capacity: o.capacity,
    debug: o.debug,
    compare: reverseComparator(o.compare),
  });
  return fromReversed(inner);
}
