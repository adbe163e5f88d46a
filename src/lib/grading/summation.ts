/**
 * Summation
 * Finite sums of a term over an integer range, with infinite limits
 * truncated to a configured stand-in for infinity.
 */

import { SummationError } from "../errors.ts";
import { addValues } from "../math/arithmetic.ts";
import { isArray, type Value } from "../math/array.ts";
import { ZERO } from "../math/complex.ts";

export const MAX_SUMMATION_TERMS = 1_000_000;

/** 0 sums every integer, 1 only odd ones, 2 only even ones */
export type EvenOdd = 0 | 1 | 2;

/**
 * Check that evaluated limits are real integers or infinite.
 *
 * @example
 * summationLimits(complex(1), complex(Infinity))  // [1, Infinity]
 * summationLimits(complex(1.5), complex(3))
 * // SummationError: Lower summation limit does not evaluate to an integer.
 */
export function summationLimits(lower: Value, upper: Value): [number, number] {
  if (isArray(lower) || isArray(upper)) {
    throw new SummationError("Summation limits must be scalars.");
  }
  if (lower.im !== 0 || upper.im !== 0) {
    throw new SummationError("Summation limits must be real but have evaluated to complex numbers.");
  }
  if (Number.isFinite(lower.re) && !Number.isInteger(lower.re)) {
    throw new SummationError("Lower summation limit does not evaluate to an integer.");
  }
  if (Number.isFinite(upper.re) && !Number.isInteger(upper.re)) {
    throw new SummationError("Upper summation limit does not evaluate to an integer.");
  }
  return [lower.re, upper.re];
}

/**
 * Sum term(n) over the range. Reversed limits are swapped, since a sum does
 * not change sign the way an integral does.
 */
export function performSummation(
  term: (n: number) => Value,
  limits: readonly [number, number],
  evenOdd: EvenOdd,
  inftyVal: number,
): Value {
  let [lower, upper] = limits[0] <= limits[1] ? limits : [limits[1], limits[0]];

  if (lower === Number.NEGATIVE_INFINITY) lower = -inftyVal;
  if (upper === Number.POSITIVE_INFINITY) upper = inftyVal;
  // Only reachable when both limits are the same infinity
  if (upper === Number.NEGATIVE_INFINITY) {
    throw new SummationError("Cannot sum from -infty to -infty.");
  }
  if (lower === Number.POSITIVE_INFINITY) {
    throw new SummationError("Cannot sum from infty to infty.");
  }

  lower = Math.ceil(lower);
  upper = Math.floor(upper);
  let step = 1;
  if (evenOdd === 1) {
    step = 2;
    if (Math.abs(lower % 2) !== 1) lower += 1;
  } else if (evenOdd === 2) {
    step = 2;
    if (Math.abs(lower % 2) !== 0) lower += 1;
  }

  if ((upper - lower) / step + 1 > MAX_SUMMATION_TERMS) {
    throw new SummationError(`Cannot sum more than ${MAX_SUMMATION_TERMS} terms.`);
  }

  let result: Value = ZERO;
  for (let n = lower; n <= upper; n += step) {
    result = addValues(result, term(n));
  }
  return result;
}
