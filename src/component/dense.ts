import type { RawId } from '../arena/id'
import { InvalidIdError } from '../errors'
import { restartable } from '../util/iterable'

export interface DenseComponent<T> {
  slots: (T | undefined)[]
  _capacity: number
  _extent: number
}

export function createComponent<T>(capacity = 16): DenseComponent<T> {
  const cap = Math.max(1, capacity)
  return {
    slots: new Array<T | undefined>(cap).fill(undefined),
    _capacity: cap,
    _extent: 0,
  }
}

export function componentExtent<T>(c: DenseComponent<T>) { return c._extent }

function slotOf(id: RawId): number {
  const index = id.index
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new InvalidIdError(index)
  }
  return index
}

/** Grow (doubling) until `index` fits. Returns true when storage was reallocated. */
export function ensureSlot<T>(c: DenseComponent<T>, index: number): boolean {
  if (index < c._capacity) {
    return false
  }
  let newCap = c._capacity
  while (newCap <= index) {
    newCap *= 2
  }
  const slots2 = new Array<T | undefined>(newCap).fill(undefined)
  for (let i = 0; i < c._extent; i++) {
    slots2[i] = c.slots[i]
  }
  c.slots = slots2
  c._capacity = newCap
  return true
}

export function setAt<T>(c: DenseComponent<T>, id: RawId, value: T | undefined) {
  const index = slotOf(id)
  ensureSlot(c, index)
  c.slots[index] = value
  if (index >= c._extent) {
    c._extent = index + 1
  }
}

export function getAt<T>(c: DenseComponent<T>, id: RawId): T | undefined {
  const index = id.index
  if (index < 0 || index >= c._extent) {
    return undefined
  }
  return c.slots[index]
}

/** Clear a slot and return what it held. */
export function takeAt<T>(c: DenseComponent<T>, id: RawId): T | undefined {
  const prev = getAt(c, id)
  if (prev !== undefined) {
    c.slots[id.index] = undefined
  }
  return prev
}

/** Reset every slot, keeping capacity and extent. */
export function fillWith<T>(c: DenseComponent<T>, factory: () => T | undefined) {
  for (let i = 0; i < c._capacity; i++) {
    c.slots[i] = factory()
  }
}

/** Exchange the contents of two slots. */
export function swapSlots<T>(c: DenseComponent<T>, a: RawId, b: RawId) {
  const ia = slotOf(a)
  const ib = slotOf(b)
  ensureSlot(c, Math.max(ia, ib))
  const t = c.slots[ia]
  c.slots[ia] = c.slots[ib]
  c.slots[ib] = t
  c._extent = Math.max(c._extent, ia + 1, ib + 1)
}

export function cloneComponent<T>(c: DenseComponent<T>): DenseComponent<T> {
  return { slots: c.slots.slice(), _capacity: c._capacity, _extent: c._extent }
}

/** Make `dst` a copy of `src`, reusing `dst`'s array when it is large enough. */
export function copyComponent<T>(dst: DenseComponent<T>, src: DenseComponent<T>) {
  if (dst.slots.length < src._capacity) {
    dst.slots = src.slots.slice()
  } else {
    for (let i = 0; i < src._capacity; i++) {
      dst.slots[i] = src.slots[i]
    }
    dst.slots.length = src._capacity
  }
  dst._capacity = src._capacity
  dst._extent = src._extent
}

/** Slot contents from 0 up to the highest slot ever written. */
export function slotValues<T>(c: DenseComponent<T>): Iterable<T | undefined> {
  return restartable(function* () {
    for (let i = 0; i < c._extent; i++) {
      yield c.slots[i]
    }
  })
}
