/**
 * @file Generational arena: mints, validates and recycles ids
 *
 * The queue does not depend on this module; it trusts the ids it receives.
 * Callers use an arena to obtain ids, to tell live ids from stale ones after
 * a slot is reused, and to enumerate what is currently live.
 *
 * Freed slots go on a LIFO free list. Reusing a slot bumps its generation,
 * so an old id for the slot no longer validates.
 */
import type { Id } from "./id";
import { restartable } from "../util/iterable";

export type ArenaState<A extends string> = {
  readonly name: A;
  generations: number[];
  live: boolean[];
  free: number[];
  _live: number;
};

/**
 *
 */
export function createArena<A extends string>(name: A): ArenaState<A> {
  return { name, generations: [], live: [], free: [], _live: 0 };
}

/** Mint a fresh id, reusing the most recently freed slot first. */
export function allocate<A extends string>(arena: ArenaState<A>): Id<A> {
  const reused = arena.free.pop();
  if (reused !== undefined) {
    arena.live[reused] = true;
    arena._live++;
    return { arena: arena.name, index: reused, generation: arena.generations[reused] };
  }
  const index = arena.generations.length;
  arena.generations.push(0);
  arena.live.push(true);
  arena._live++;
  return { arena: arena.name, index, generation: 0 };
}

/**
 *
 */
export function isLive<A extends string>(arena: ArenaState<A>, id: Id<A>): boolean {
  if (id.arena !== arena.name) {
    return false;
  }
  if (arena.live[id.index] !== true) {
    return false;
  }
  return arena.generations[id.index] === id.generation;
}

/** Free a live id. Returns false for stale or unknown ids. */
export function release<A extends string>(arena: ArenaState<A>, id: Id<A>): boolean {
  if (!isLive(arena, id)) {
    return false;
  }
  arena.live[id.index] = false;
  arena.generations[id.index]++;
  arena.free.push(id.index);
  arena._live--;
  return true;
}

/** The id itself when live, otherwise undefined. */
export function validate<A extends string>(arena: ArenaState<A>, id: Id<A>): Id<A> | undefined {
  return isLive(arena, id) ? id : undefined;
}

/** Live ids in slot order. */
export function liveIds<A extends string>(arena: ArenaState<A>): Iterable<Id<A>> {
  return restartable(function* () {
    for (let index = 0; index < arena.live.length; index++) {
      if (arena.live[index]) {
        yield { arena: arena.name, index, generation: arena.generations[index] };
      }
    }
  });
}

/**
 *
 */
export function liveCount<A extends string>(arena: ArenaState<A>): number {
  return arena._live;
}
