/**
 * @file Identifier shapes and raw/typed translation
 *
 * Ids are minted by an arena (see ./allocator). The queue core only sees the
 * raw form and uses `index` as a dense slot; the typed form adds the arena
 * tag so ids from unrelated arenas do not mix.
 */

/** Untyped id: slot index plus the generation that occupies it. */
export type RawId = {
  readonly index: number;
  readonly generation: number;
};

/** Id bound to arena `A`. */
export type Id<A extends string> = RawId & {
  readonly arena: A;
};

/**
 *
 */
export function rawId(index: number, generation = 0): RawId {
  return { index, generation };
}

/** Drop the arena tag. */
export function toRaw(id: RawId): RawId {
  return { index: id.index, generation: id.generation };
}

/** Rebuild a typed id from its raw form. */
export function fromRaw<A extends string>(arena: A, raw: RawId): Id<A> {
  return { arena, index: raw.index, generation: raw.generation };
}

/**
 *
 */
export function sameRawId(a: RawId, b: RawId): boolean {
  return a.index === b.index && a.generation === b.generation;
}
