/**
 * @file Structural checks for the indexed heap
 *
 * Verifies, for a queue state:
 * - heap-order: no child sorts before its parent
 * - bijection: positions[inverse[p]] === p for every position p
 * - presence: a slot has a value exactly when it has a position
 * - density: the heap array holds exactly the present ids
 *
 * The walk is O(n·D) plus one pass over the storage slots, so the core
 * only runs it when a debug mode is enabled.
 */
import type { UntypedIndexedMinQueue } from "./untyped";
import { childrenOf, rangeIndexes } from "./arity";
import { componentExtent, getAt } from "../component/dense";
import { QueueInvariantError } from "../errors";

export type InvariantName = "heap-order" | "bijection" | "presence" | "density";

export type InvariantViolation = { invariant: InvariantName; message: string };

export type InvariantReport = { ok: boolean; violations: InvariantViolation[] };

/**
 *
 */
export function checkInvariants<T>(q: UntypedIndexedMinQueue<T>): InvariantReport {
  const violations: InvariantViolation[] = [];
  const n = q.inverse.length;

  for (let p = 0; p < n; p++) {
    const id = q.inverse[p];
    const at = getAt(q.positions, id);
    if (at !== p) {
      violations.push({ invariant: "bijection", message: `position ${p} holds slot ${id.index}, which maps back to ${String(at)}` });
    }
    const parent = getAt(q.values, id);
    if (parent === undefined) {
      continue;
    }
    for (const c of rangeIndexes(childrenOf(p, n, q.arity))) {
      const child = getAt(q.values, q.inverse[c]);
      if (child !== undefined && q.compare(child, parent) < 0) {
        violations.push({ invariant: "heap-order", message: `child ${c} sorts before its parent ${p}` });
      }
    }
  }

  let present = 0;
  const extent = Math.max(componentExtent(q.values), componentExtent(q.positions));
  for (let index = 0; index < extent; index++) {
    const hasValue = q.values.slots[index] !== undefined;
    const hasPosition = q.positions.slots[index] !== undefined;
    if (hasValue !== hasPosition) {
      violations.push({
        invariant: "presence",
        message: `slot ${index} has ${hasValue ? "a value but no position" : "a position but no value"}`,
      });
    }
    if (hasValue) {
      present++;
    }
  }
  if (present !== n) {
    violations.push({ invariant: "density", message: `${present} ids present but heap array holds ${n}` });
  }

  return { ok: violations.length === 0, violations };
}

/**
 *
 */
export function isHeapOrdered<T>(q: UntypedIndexedMinQueue<T>): boolean {
  return checkInvariants(q).violations.every((v) => v.invariant !== "heap-order");
}

/**
 * Run the checks after a mutation according to the queue's debug mode.
 * 'warn' logs each violation, 'throw' raises QueueInvariantError.
 */
export function auditQueue<T>(q: UntypedIndexedMinQueue<T>, operation: string): void {
  if (q.debug === "off") {
    return;
  }
  const report = checkInvariants(q);
  if (report.ok) {
    return;
  }
  const messages = report.violations.map((v) => `${v.invariant}: ${v.message}`);
  if (q.debug === "throw") {
    throw new QueueInvariantError(operation, messages);
  }
  for (const m of messages) {
    console.warn(`[idheap] invariant violated after ${operation}: ${m}`);
  }
}
