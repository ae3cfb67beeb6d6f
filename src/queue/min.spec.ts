/**
 * @file Tests for the typed min-queue facade
 */
import { createIndexedMinQueue, fromUntyped } from "./min";
import { allocate, createArena } from "../arena/allocator";
import { fromRaw, rawId } from "../arena/id";
import type { Id } from "../arena/id";
import { createUntypedQueue, insert as coreInsert } from "../heap/untyped";
import { checkInvariants } from "../heap/invariants";
import { ArenaMismatchError, UnorderedValueError } from "../errors";

const node = (index: number): Id<"node"> => fromRaw("node", rawId(index));

function indexes(q: { iterSorted(): Iterable<{ id: { index: number } }> }): number[] {
  return Array.from(q.iterSorted(), (e) => e.id.index);
}

describe("queue/IndexedMinQueue", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs insert, decrease and pop end to end", () => {
    const q = createIndexedMinQueue<"node", number>("node", { debug: "throw" });
    q.insert(node(0), 3);
    q.insert(node(1), 2);
    expect(indexes(q)).toEqual([1, 0]);
    expect(q.peek()).toBe(2);

    q.decrease(node(0), 1);
    expect(indexes(q)).toEqual([0, 1]);
    expect(q.peek()).toBe(1);

    expect(q.pop()).toEqual({ id: { arena: "node", index: 0, generation: 0 }, value: 1 });
    expect(indexes(q)).toEqual([1]);
  });

  it("removes by id and keeps heap order", () => {
    const q = createIndexedMinQueue<"node", number>("node", { debug: "throw" });
    q.insert(node(0), 1);
    q.insert(node(1), 2);
    q.insert(node(2), 3);
    expect(q.remove(node(1))).toEqual({ id: node(1), value: 2 });
    expect(indexes(q)).toEqual([0, 2]);
    expect(checkInvariants(q.state).ok).toBe(true);
  });

  it("returns undefined for absent ids and empty queues", () => {
    const q = createIndexedMinQueue<"node", number>("node");
    expect(q.remove(node(0))).toBeUndefined();
    expect(q.pop()).toBeUndefined();
    expect(q.peekId()).toBeUndefined();
    expect(q.size).toBe(0);
    expect(q.isEmpty()).toBe(true);
  });

  it("exposes values by id and by position", () => {
    const arena = createArena("task");
    const a = allocate(arena);
    const b = allocate(arena);
    const q = createIndexedMinQueue<"task", string>("task");
    q.insert(a, "m");
    q.insert(b, "c");
    expect(q.get(a)).toBe("m");
    expect(q.has(b)).toBe(true);
    expect(q.getPosition(0)).toBe("c");
    expect(q.getPositionWithId(1)).toEqual({ id: a, value: "m" });
    expect(q.peekId()).toEqual({ id: b, value: "c" });
    expect(q.removePosition(1)).toEqual({ id: a, value: "m" });
    expect(q.get(a)).toBeUndefined();
  });

  it("upserts without growing", () => {
    const q = createIndexedMinQueue<"node", number>("node");
    q.insert(node(0), 5);
    q.insert(node(1), 6);
    q.insert(node(1), 1);
    expect(q.size).toBe(2);
    expect(q.peekId()).toEqual({ id: node(1), value: 1 });
  });

  it("increase sinks and ignores values that do not grow", () => {
    const q = createIndexedMinQueue<"node", number>("node");
    q.insert(node(0), 1);
    q.insert(node(1), 2);
    q.increase(node(0), 1);
    expect(q.peek()).toBe(1);
    q.increase(node(0), 3);
    expect(q.peekId()).toEqual({ id: node(1), value: 2 });
  });

  it("tags value iteration with the arena", () => {
    const q = createIndexedMinQueue<"node", number>("node");
    q.insert(node(1), 4);
    const vals = q.values();
    expect(vals.arena).toBe("node");
    expect(Array.from(vals)).toEqual([undefined, 4]);
  });

  it("accepts a custom comparator for structured priorities", () => {
    type Due = { at: number; seq: number };
    const q = createIndexedMinQueue<"job", Due>("job", {
      compare: (a, b) => a.at - b.at || a.seq - b.seq,
      debug: "throw",
    });
    const job = (i: number) => fromRaw("job", rawId(i));
    q.insert(job(0), { at: 5, seq: 0 });
    q.insert(job(1), { at: 5, seq: 1 });
    q.insert(job(2), { at: 2, seq: 2 });
    expect(Array.from({ length: 3 }, () => q.pop()?.id.index)).toEqual([2, 0, 1]);
  });

  it("supports other arities", () => {
    const q = createIndexedMinQueue<"node", number>("node", { arity: 2, debug: "throw" });
    for (const [i, v] of [9, 4, 7, 1, 8, 2].entries()) {
      q.insert(node(i), v);
    }
    const out: number[] = [];
    for (let e = q.pop(); e !== undefined; e = q.pop()) {
      out.push(e.value);
    }
    expect(out).toEqual([1, 2, 4, 7, 8, 9]);
  });

  it("clones and copies independently", () => {
    const q = createIndexedMinQueue<"node", number>("node");
    q.insert(node(0), 2);
    q.insert(node(1), 1);
    const c = q.clone();
    c.pop();
    expect(q.size).toBe(2);
    expect(c.peek()).toBe(2);

    const other = createIndexedMinQueue<"node", number>("node");
    other.cloneFrom(q);
    expect(indexes(other)).toEqual([1, 0]);
    other.clear();
    expect(other.isEmpty()).toBe(true);
    expect(q.size).toBe(2);
  });

  it("wraps an existing core state", () => {
    const state = createUntypedQueue<number>({ debug: "throw" });
    coreInsert(state, rawId(3), 7);
    const q = fromUntyped("node", state);
    expect(q.peekId()).toEqual({ id: node(3), value: 7 });
  });

  it("throws on ids from another arena in throw mode", () => {
    const q = createIndexedMinQueue<string, number>("node", { debug: "throw" });
    const foreign = fromRaw("edge", rawId(0));
    expect(() => q.insert(foreign, 1)).toThrow(ArenaMismatchError);
    expect(() => q.remove(foreign)).toThrow('id from arena "edge" used with a queue of arena "node"');
    expect(q.size).toBe(0);
  });

  it("warns on ids from another arena in warn mode and proceeds", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const q = createIndexedMinQueue<string, number>("node", { debug: "warn" });
    q.insert(fromRaw("edge", rawId(0)), 1);
    expect(warn).toHaveBeenCalledWith('[idheap] id from arena "edge" used with a queue of arena "node"');
    expect(q.size).toBe(1);
  });

  it("skips the arena check when debug is off", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const q = createIndexedMinQueue<string, number>("node", { debug: "off" });
    q.insert(fromRaw("edge", rawId(0)), 1);
    expect(warn).not.toHaveBeenCalled();
    expect(q.size).toBe(1);
  });

  it("rejects a priority of another kind and leaves the queue unchanged", () => {
    const q = createIndexedMinQueue<"node", number | string>("node", { debug: "throw" });
    q.insert(node(0), "a");
    expect(() => q.insert(node(1), 1)).toThrow(UnorderedValueError);
    expect(() => q.insert(node(1), 1)).toThrow("unordered priority: cannot compare number with string");
    expect(q.size).toBe(1);
    expect(q.has(node(1))).toBe(false);
    expect(checkInvariants(q.state).ok).toBe(true);
  });
});
