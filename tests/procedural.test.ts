/**
 * @file Randomized operation sequences checked against a plain model
 */
import { describe, it, expect } from "vitest";
import {
  allocate,
  checkInvariants,
  createArena,
  createIndexedMaxQueue,
  createIndexedMinQueue,
  liveIds,
  release,
} from "../src/index";
import type { ArenaState, Id } from "../src/index";

// mulberry32
function rng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<A extends string>(arena: ArenaState<A>, next: () => number): Id<A> | undefined {
  const ids = Array.from(liveIds(arena));
  if (ids.length === 0) {
    return undefined;
  }
  return ids[Math.floor(next() * ids.length)];
}

type Action = "insertNew" | "update" | "remove" | "reuse" | "decrease" | "increase" | "pop";
const ACTIONS: Action[] = ["insertNew", "update", "remove", "reuse", "decrease", "increase", "pop"];

function run(seed: number, kind: "min" | "max", arity: number) {
  const next = rng(seed);
  const value = () => Math.floor(next() * 1000);
  const arena = createArena("item");
  const options = { arity, debug: "throw" as const };
  const queue =
    kind === "min"
      ? createIndexedMinQueue<"item", number>("item", options)
      : createIndexedMaxQueue<"item", number>("item", options);
  const model = new Map<number, number>();
  const better = (a: number, b: number) => (kind === "min" ? a < b : a > b);
  const released: number[] = [];
  const mint = () => {
    const id = allocate(arena);
    const at = released.indexOf(id.index);
    if (at >= 0) {
      released.splice(at, 1);
    }
    return id;
  };

  for (let i = 0; i < 10; i++) {
    const id = allocate(arena);
    const v = value();
    queue.insert(id, v);
    model.set(id.index, v);
  }

  for (let step = 0; step < 1000; step++) {
    const action = ACTIONS[Math.floor(next() * ACTIONS.length)];
    switch (action) {
      case "insertNew": {
        const id = mint();
        const v = value();
        queue.insert(id, v);
        model.set(id.index, v);
        break;
      }
      case "update": {
        const id = pick(arena, next);
        if (id !== undefined) {
          const v = value();
          queue.insert(id, v);
          model.set(id.index, v);
        }
        break;
      }
      case "remove": {
        const id = pick(arena, next);
        if (id !== undefined) {
          const removed = queue.remove(id);
          expect(removed?.value).toBe(model.get(id.index));
          model.delete(id.index);
          release(arena, id);
          released.push(id.index);
        }
        break;
      }
      case "reuse": {
        if (released.length > 0) {
          const reusedIndex = released[released.length - 1];
          const id = mint();
          expect(id.index).toBe(reusedIndex);
          expect(id.generation).toBeGreaterThan(0);
          const v = value();
          queue.insert(id, v);
          model.set(id.index, v);
        }
        break;
      }
      case "decrease":
      case "increase": {
        const id = pick(arena, next);
        if (id !== undefined) {
          const v = value();
          const current = model.get(id.index);
          queue[action](id, v);
          const lowers = action === "decrease";
          if (current !== undefined && (lowers ? v < current : v > current)) {
            model.set(id.index, v);
          }
        }
        break;
      }
      case "pop": {
        const popped = queue.pop();
        if (popped !== undefined) {
          expect(popped.value).toBe(model.get(popped.id.index));
          for (const v of model.values()) {
            expect(better(v, popped.value)).toBe(false);
          }
          model.delete(popped.id.index);
        }
        break;
      }
    }

    const report = "inner" in queue ? checkInvariants(queue.inner.state) : checkInvariants(queue.state);
    expect(report.violations).toEqual([]);
    const state = "inner" in queue ? queue.inner.state : queue.state;
    expect(queue.size).toBe(model.size);
    for (const [index, v] of model) {
      expect(queue.getPositionWithId(state.positions.slots[index] ?? -1)?.value).toBe(v);
    }
  }
}

describe("procedural sequences", () => {
  it.each([
    [1, 8],
    [7, 8],
    [42, 2],
    [2024, 3],
  ])("min-queue seed %i arity %i stays consistent with the model", (seed, arity) => {
    run(seed, "min", arity);
  });

  it.each([
    [5, 8],
    [99, 4],
  ])("max-queue seed %i arity %i stays consistent with the model", (seed, arity) => {
    run(seed, "max", arity);
  });
});
