/**
 * @file Default total order for primitive priorities
 */
import { UnorderedValueError } from "../errors";

function kindOf(x: unknown): "number" | "string" | "bigint" | undefined {
  const t = typeof x;
  if (t === "number" || t === "string" || t === "bigint") {
    return t;
  }
  return undefined;
}

/**
 * Compare two numbers, strings or bigints of the same kind.
 * Throws UnorderedValueError for NaN, mixed kinds and anything else.
 */
export function compareOrdered(a: unknown, b: unknown): number {
  const ka = kindOf(a);
  const kb = kindOf(b);
  if (ka === undefined || kb === undefined) {
    throw new UnorderedValueError(`expected number, string or bigint, got ${typeof a} and ${typeof b}`);
  }
  if (ka !== kb) {
    throw new UnorderedValueError(`cannot compare ${ka} with ${kb}`);
  }
  if (Number.isNaN(a) || Number.isNaN(b)) {
    throw new UnorderedValueError("NaN has no position in a total order");
  }
  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return 0;
}
