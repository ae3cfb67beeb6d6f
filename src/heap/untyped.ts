/**
 * @file Indexed D-ary min-heap over raw ids
 *
 * The heap array (`inverse`) lists ids in heap order; `positions` maps each
 * id's slot back to its array position and `values` holds its priority.
 * Every public mutation restores both directions of the id <-> position
 * mapping together with the heap order:
 * - sink: move an entry down toward its smallest child
 * - swim: move an entry up while it sorts before its parent
 * - swap: exchange two array positions and the two ids' position entries
 *
 * The core is generation-agnostic: ids address storage by `index` only, and
 * the caller is trusted to pass ids that are valid for its arena.
 *
 * Positions are 32-bit, so a queue holds at most MAX_QUEUE_LENGTH entries.
 */
import type { RawId } from "../arena/id";
import type { Comparator, DebugMode, Priority, QueueOptions, UntypedEntry } from "../types";
import type { DenseComponent } from "../component/dense";
import {
  cloneComponent,
  copyComponent,
  createComponent,
  fillWith,
  getAt,
  setAt,
  slotValues,
  swapSlots,
  takeAt,
} from "../component/dense";
import { childrenOf, parentOf } from "./arity";
import { auditQueue } from "./invariants";
import { resolveQueueOptions } from "../config/options";
import { QueueCapacityError, QueueInvariantError, UnorderedValueError } from "../errors";
import { restartable } from "../util/iterable";

export const MAX_QUEUE_LENGTH = 0xffffffff;

export type UntypedIndexedMinQueue<T> = {
  arity: number;
  compare: Comparator<T>;
  debug: DebugMode;
  /** Priority per id slot. */
  values: DenseComponent<T>;
  /** Heap position per id slot. */
  positions: DenseComponent<number>;
  /** Heap array: inverse[p] is the id at position p. */
  inverse: RawId[];
};

/**
 *
 */
export function createUntypedQueue<T extends Priority>(options: QueueOptions<T> = {}): UntypedIndexedMinQueue<T> {
  const o = resolveQueueOptions(options);
  return {
    arity: o.arity,
    compare: o.compare,
    debug: o.debug,
    values: createComponent<T>(o.capacity),
    positions: createComponent<number>(o.capacity),
    inverse: [],
  };
}

/**
 *
 */
export function size<T>(q: UntypedIndexedMinQueue<T>): number {
  return q.inverse.length;
}

/**
 *
 */
export function isEmpty<T>(q: UntypedIndexedMinQueue<T>): boolean {
  return q.inverse.length === 0;
}

/**
 *
 */
export function has<T>(q: UntypedIndexedMinQueue<T>, id: RawId): boolean {
  return getAt(q.positions, id) !== undefined;
}

/** Current priority of `id`, if queued. */
export function valueOf<T>(q: UntypedIndexedMinQueue<T>, id: RawId): T | undefined {
  return getAt(q.values, id);
}

/**
 *
 */
export function clear<T>(q: UntypedIndexedMinQueue<T>): void {
  fillWith(q.values, () => undefined);
  fillWith(q.positions, () => undefined);
  q.inverse.length = 0;
}

/**
 * Insert or update.
 * A queued id gets the new value and is restored in place (sink, then swim);
 * a new id is appended and swum up.
 */
export function insert<T>(q: UntypedIndexedMinQueue<T>, id: RawId, value: T): void {
  admit(q, value);
  const at = getAt(q.positions, id);
  if (at !== undefined) {
    setAt(q.values, id, value);
    q.inverse[at] = id;
    sink(q, at);
    swim(q, at);
    auditQueue(q, "insert");
    return;
  }
  const index = q.inverse.length;
  if (index >= MAX_QUEUE_LENGTH) {
    throw new QueueCapacityError(MAX_QUEUE_LENGTH);
  }
  setAt(q.values, id, value);
  setAt(q.positions, id, index);
  q.inverse.push(id);
  swim(q, index);
  auditQueue(q, "insert");
}

/** Remove `id`; undefined when it is not queued. */
export function remove<T>(q: UntypedIndexedMinQueue<T>, id: RawId): UntypedEntry<T> | undefined {
  const at = getAt(q.positions, id);
  if (at === undefined) {
    return undefined;
  }
  const out = detach(q, at);
  auditQueue(q, "remove");
  return out;
}

/** Remove whatever sits at heap position `position`. */
export function removePosition<T>(q: UntypedIndexedMinQueue<T>, position: number): UntypedEntry<T> | undefined {
  if (!isPosition(q, position)) {
    return undefined;
  }
  const out = detach(q, position);
  auditQueue(q, "removePosition");
  return out;
}

/**
 *
 */
export function pop<T>(q: UntypedIndexedMinQueue<T>): UntypedEntry<T> | undefined {
  return removePosition(q, 0);
}

/**
 *
 */
export function getPosition<T>(q: UntypedIndexedMinQueue<T>, position: number): T | undefined {
  const id = q.inverse[position];
  if (id === undefined) {
    return undefined;
  }
  return getAt(q.values, id);
}

/**
 *
 */
export function getPositionWithId<T>(q: UntypedIndexedMinQueue<T>, position: number): UntypedEntry<T> | undefined {
  const id = q.inverse[position];
  if (id === undefined) {
    return undefined;
  }
  const value = getAt(q.values, id);
  if (value === undefined) {
    return undefined;
  }
  return { id, value };
}

/**
 *
 */
export function peek<T>(q: UntypedIndexedMinQueue<T>): T | undefined {
  return getPosition(q, 0);
}

/**
 *
 */
export function peekId<T>(q: UntypedIndexedMinQueue<T>): UntypedEntry<T> | undefined {
  return getPositionWithId(q, 0);
}

/** Lower the priority of a queued id. Ignored unless `value` sorts strictly before the current one. */
export function decrease<T>(q: UntypedIndexedMinQueue<T>, id: RawId, value: T): void {
  const current = getAt(q.values, id);
  const at = getAt(q.positions, id);
  if (current === undefined || at === undefined) {
    return;
  }
  admit(q, value);
  if (q.compare(value, current) < 0) {
    setAt(q.values, id, value);
    swim(q, at);
    auditQueue(q, "decrease");
  }
}

/** Raise the priority of a queued id. Ignored unless `value` sorts strictly after the current one. */
export function increase<T>(q: UntypedIndexedMinQueue<T>, id: RawId, value: T): void {
  const current = getAt(q.values, id);
  const at = getAt(q.positions, id);
  if (current === undefined || at === undefined) {
    return;
  }
  admit(q, value);
  if (q.compare(value, current) > 0) {
    setAt(q.values, id, value);
    sink(q, at);
    auditQueue(q, "increase");
  }
}

/**
 * Entries in heap-array order. Only the first entry is guaranteed minimal.
 * Each walk reads the live queue; do not mutate it mid-walk.
 */
export function iterSorted<T>(q: UntypedIndexedMinQueue<T>): Iterable<UntypedEntry<T>> {
  return restartable(function* () {
    for (let p = 0; p < q.inverse.length; p++) {
      const id = q.inverse[p];
      const value = getAt(q.values, id);
      if (value === undefined) {
        throw new QueueInvariantError("iterSorted", [`position ${p} holds slot ${id.index} without a value`]);
      }
      yield { id, value };
    }
  });
}

/** Raw view of the value storage, one item per slot (undefined when not queued). */
export function values<T>(q: UntypedIndexedMinQueue<T>): Iterable<T | undefined> {
  return slotValues(q.values);
}

/**
 *
 */
export function cloneQueue<T>(q: UntypedIndexedMinQueue<T>): UntypedIndexedMinQueue<T> {
  return {
    arity: q.arity,
    compare: q.compare,
    debug: q.debug,
    values: cloneComponent(q.values),
    positions: cloneComponent(q.positions),
    inverse: q.inverse.slice(),
  };
}

/** Turn `dst` into a copy of `src`, reusing its storage. */
export function cloneQueueFrom<T>(dst: UntypedIndexedMinQueue<T>, src: UntypedIndexedMinQueue<T>): void {
  if (dst === src) {
    return;
  }
  dst.arity = src.arity;
  dst.compare = src.compare;
  dst.debug = src.debug;
  copyComponent(dst.values, src.values);
  copyComponent(dst.positions, src.positions);
  dst.inverse.length = 0;
  for (const id of src.inverse) {
    dst.inverse.push(id);
  }
}

// Runs before any state changes, so a rejected priority leaves the queue as it was.
function admit<T>(q: UntypedIndexedMinQueue<T>, value: T): void {
  if (value === undefined) {
    throw new UnorderedValueError("undefined cannot be queued");
  }
  q.compare(value, value);
  const root = peek(q);
  if (root !== undefined) {
    q.compare(value, root);
  }
}

function isPosition<T>(q: UntypedIndexedMinQueue<T>, position: number): boolean {
  return Number.isInteger(position) && position >= 0 && position < q.inverse.length;
}

// Move `position` to the end, pop it, clear its slot, then restore order at `position`.
function detach<T>(q: UntypedIndexedMinQueue<T>, position: number): UntypedEntry<T> {
  const last = q.inverse.length - 1;
  swap(q, position, last);
  const id = q.inverse.pop();
  if (id === undefined) {
    throw new QueueInvariantError("remove", [`position ${position} vanished from the heap array`]);
  }
  const value = takeAt(q.values, id);
  takeAt(q.positions, id);
  if (value === undefined) {
    throw new QueueInvariantError("remove", [`slot ${id.index} was queued without a value`]);
  }
  sink(q, position);
  swim(q, position);
  return { id, value };
}

function sink<T>(q: UntypedIndexedMinQueue<T>, index: number): void {
  // eslint-disable-next-line no-restricted-syntax -- Performance-critical: heap operations require mutable index
  let i = index;
  while (true) {
    const child = minChild(q, i);
    if (child === undefined) {
      return;
    }
    const childValue = getPosition(q, child);
    const parentValue = getPosition(q, i);
    if (childValue === undefined || parentValue === undefined) {
      return;
    }
    if (q.compare(childValue, parentValue) >= 0) {
      return;
    }
    swap(q, i, child);
    i = child;
  }
}

// Smallest child of `parent`; on ties the lowest position wins.
function minChild<T>(q: UntypedIndexedMinQueue<T>, parent: number): number | undefined {
  const { start, end } = childrenOf(parent, q.inverse.length, q.arity);
  // eslint-disable-next-line no-restricted-syntax -- running minimum over the child range
  let best: { index: number; value: T } | undefined;
  for (let c = start; c < end; c++) {
    const value = getPosition(q, c);
    if (value === undefined) {
      continue;
    }
    if (best === undefined || q.compare(value, best.value) < 0) {
      best = { index: c, value };
    }
  }
  return best?.index;
}

function swim<T>(q: UntypedIndexedMinQueue<T>, index: number): void {
  // eslint-disable-next-line no-restricted-syntax -- Performance-critical: heap operations require mutable index
  let i = index;
  for (let parent = parentOf(i, q.arity); parent !== undefined; parent = parentOf(i, q.arity)) {
    const parentValue = getPosition(q, parent);
    const childValue = getPosition(q, i);
    if (parentValue === undefined || childValue === undefined) {
      return;
    }
    if (q.compare(childValue, parentValue) >= 0) {
      return;
    }
    swap(q, i, parent);
    i = parent;
  }
}

function swap<T>(q: UntypedIndexedMinQueue<T>, a: number, b: number): void {
  const idA = q.inverse[a];
  const idB = q.inverse[b];
  if (idA === undefined || idB === undefined) {
    return;
  }
  swapSlots(q.positions, idA, idB);
  q.inverse[a] = idB;
  q.inverse[b] = idA;
}
