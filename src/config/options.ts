/**
 * @file Queue option normalization + validation (raw -> ResolvedQueueOptions)
 */
import type { Comparator, DebugMode, QueueOptions, ResolvedQueueOptions } from "../types";
import { DEFAULT_ARITY } from "../heap/arity";
import { compareOrdered } from "../order/compare";
import { InvalidQueueOptionError } from "../errors";

export const DEFAULT_CAPACITY = 16;
export const MAX_ARITY = 1024;
/** Slot count cap; no id index can exceed a 32-bit heap position. */
export const MAX_CAPACITY = 0xffffffff;
export const DEBUG_ENV = "IDHEAP_DEBUG";

/**
 *
 */
export function isDebugMode(x: unknown): x is DebugMode {
  return x === "off" || x === "warn" || x === "throw";
}

/**
 * Read the debug mode from the environment.
 * Unknown values are reported and ignored.
 */
export function debugModeFromEnv(env: Record<string, string | undefined> = processEnv()): DebugMode {
  const raw = env[DEBUG_ENV];
  if (raw === undefined || raw === "") {
    return "off";
  }
  const mode = raw.trim().toLowerCase();
  if (isDebugMode(mode)) {
    return mode;
  }
  console.warn(`[idheap] ignoring ${DEBUG_ENV}=${JSON.stringify(raw)}; expected off, warn or throw`);
  return "off";
}

function processEnv(): Record<string, string | undefined> {
  if (typeof process === "undefined") {
    return {};
  }
  return process.env;
}

function resolveInteger(option: string, value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value)) {
    throw new InvalidQueueOptionError(option, `must be an integer, got ${value}`);
  }
  if (value < min || value > max) {
    throw new InvalidQueueOptionError(option, `must be within ${min}..${max}, got ${value}`);
  }
  return value;
}

/** Validate options and fill defaults. Throws InvalidQueueOptionError on invalid input. */
export function resolveQueueOptions<T>(raw: QueueOptions<T> = {}): ResolvedQueueOptions<T> {
  const arity = resolveInteger("arity", raw.arity, DEFAULT_ARITY, 2, MAX_ARITY);
  const capacity = resolveInteger("capacity", raw.capacity, DEFAULT_CAPACITY, 1, MAX_CAPACITY);
  if (raw.debug !== undefined && !isDebugMode(raw.debug)) {
    throw new InvalidQueueOptionError("debug", `expected off, warn or throw, got ${String(raw.debug)}`);
  }
  if (raw.compare !== undefined && typeof raw.compare !== "function") {
    throw new InvalidQueueOptionError("compare", "must be a function");
  }
  const compare: Comparator<T> = raw.compare ?? compareOrdered;
  return {
    arity,
    capacity,
    debug: raw.debug ?? debugModeFromEnv(),
    compare,
  } satisfies ResolvedQueueOptions<T>;
}
