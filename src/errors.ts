/**
 * @file Error types raised by the queue and its collaborators
 * Rationale: Error classes are idiomatic and improve instanceof checks and
 * stack traces. Suppress the linter rule discouraging classes in this file.
 *
 * Lookups that miss (absent id, position out of range, empty queue) never
 * throw; they return undefined. The classes below cover misuse and defects.
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

/** Thrown when an id's slot index is not a non-negative safe integer. */
export class InvalidIdError extends Error {
  constructor(index: number) {
    super(`invalid id index: ${index}`);
    this.name = "InvalidIdError";
  }
}

/** Thrown when queue options fail validation. */
export class InvalidQueueOptionError extends Error {
  readonly option: string;
  constructor(option: string, detail: string) {
    super(`invalid queue option "${option}": ${detail}`);
    this.name = "InvalidQueueOptionError";
    this.option = option;
  }
}

/** Thrown for priorities without a total order, or with no storable value. */
export class UnorderedValueError extends Error {
  constructor(detail: string) {
    super(`unordered priority: ${detail}`);
    this.name = "UnorderedValueError";
  }
}

/** Thrown when a new id would need a heap position past the 32-bit range. */
export class QueueCapacityError extends Error {
  readonly limit: number;
  constructor(limit: number) {
    super(`queue is full: at most ${limit} entries`);
    this.name = "QueueCapacityError";
    this.limit = limit;
  }
}

/** Thrown in "throw" debug mode when an id from another arena reaches a queue. */
export class ArenaMismatchError extends Error {
  readonly expected: string;
  readonly received: string;
  constructor(expected: string, received: string) {
    super(`id from arena "${received}" used with a queue of arena "${expected}"`);
    this.name = "ArenaMismatchError";
    this.expected = expected;
    this.received = received;
  }
}

/** Thrown in "throw" debug mode when a mutation leaves the heap inconsistent. */
export class QueueInvariantError extends Error {
  readonly violations: readonly string[];
  constructor(operation: string, violations: readonly string[]) {
    super(`queue invariant violated after ${operation}: ${violations.join("; ")}`);
    this.name = "QueueInvariantError";
    this.violations = violations;
  }
}
