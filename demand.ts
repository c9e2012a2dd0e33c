// @filename: demand.ts
/**
 * Demand accounting for push/demand streams.
 *
 * A demand is the number of further elements a subscriber is willing to
 * receive. It is always a non-negative integer, or `Infinity` when the
 * subscriber accepts everything a publisher can produce.
 *
 * The type and the helper namespace share a name, so `Demand` reads the same
 * in a signature and in an expression:
 *
 * ```ts
 * function next(value: string): Demand {
 *   return value.length > 3 ? Demand.max(1) : Demand.none;
 * }
 * ```
 *
 * @module
 */

/** Number of elements a subscriber is ready to receive. `Infinity` means unlimited. */
export type Demand = number;

/**
 * Returns `true` when `value` is a valid demand: a non-negative integer or
 * `Infinity`.
 */
function isValid(value: number): value is Demand {
  return value === Infinity || (Number.isInteger(value) && value >= 0);
}

/**
 * Creates a bounded demand.
 *
 * @throws {RangeError} when `count` is negative, fractional or `NaN`
 */
function max(count: number): Demand {
  if (!isValid(count)) {
    throw new RangeError(`Demand must be a non-negative integer, received ${count}`);
  }
  return count;
}

/** Adds two demands, saturating at `Infinity`. */
function add(a: Demand, b: Demand): Demand {
  if (a === Infinity || b === Infinity) return Infinity;
  return a + b;
}

/** Subtracts `b` from `a`. Unlimited demand stays unlimited; the result never drops below zero. */
function subtract(a: Demand, b: Demand): Demand {
  if (a === Infinity) return Infinity;
  return Math.max(0, a - b);
}

/** No additional demand. */
const none: Demand = 0;

/** Every element the publisher can produce. */
const unlimited: Demand = Infinity;

export const Demand = { none, unlimited, max, add, subtract, isValid } as const;
