/**
 * Tolerance
 * Absolute or percentage tolerances and the comparisons built on them.
 */

import { ConfigError } from "../errors.ts";
import { norm, subtractValues } from "../math/arithmetic.ts";
import { isArray, type Value } from "../math/array.ts";
import { isInfinite } from "../math/complex.ts";

/** A tolerance as configured: a non-negative number or a string like "5%" */
export type ToleranceInput = number | string;

export type Tolerance = { kind: "absolute"; value: number } | { kind: "percent"; fraction: number; text: string };

const PERCENTAGE_PATTERN = /^(\d+(?:\.\d*)?|\.\d+)(?:e([+-]?\d+))?%$/i;

/**
 * Validate a configured tolerance.
 *
 * @example
 * parseTolerance("0.01%")  // { kind: "percent", fraction: 0.0001, text: "0.01%" }
 * parseTolerance(1e-6)     // { kind: "absolute", value: 1e-6 }
 */
export function parseTolerance(input: ToleranceInput): Tolerance {
  if (typeof input === "number") {
    if (!(input >= 0) || !Number.isFinite(input)) {
      throw new ConfigError(`Tolerance must be a non-negative number, received ${input}`);
    }
    return { kind: "absolute", value: input };
  }
  const text = input.trim();
  const match = PERCENTAGE_PATTERN.exec(text);
  if (!match) {
    throw new ConfigError(`Invalid tolerance '${input}': expected a non-negative number or a percentage like '5%'`);
  }
  return { kind: "percent", fraction: Number(text.slice(0, -1)) / 100, text };
}

export function formatTolerance(tolerance: Tolerance): string {
  return tolerance.kind === "absolute" ? String(tolerance.value) : tolerance.text;
}

/** Absolute tolerance for a comparison against the given reference value */
function resolve(tolerance: Tolerance, reference: Value | number | undefined): number {
  if (tolerance.kind === "absolute") return tolerance.value;
  if (reference === undefined) {
    throw new ConfigError("When tolerance is a percentage, reference must not be undefined.");
  }
  const size = typeof reference === "number" ? Math.abs(reference) : norm(reference);
  return size * tolerance.fraction;
}

/**
 * Whether y is within tolerance of the expected value x: |x - y| <= tol.
 * A percentage is taken of |x|. Scalar infinities ignore the tolerance and
 * must match exactly.
 */
export function withinTolerance(x: Value, y: Value, tolerance: Tolerance): boolean {
  if (!isArray(x) && !isArray(y) && (isInfinite(x) || isInfinite(y))) {
    return x.re === y.re && x.im === y.im;
  }
  return norm(subtractValues(x, y)) <= resolve(tolerance, x);
}

/** Whether |x| is within tolerance of zero; percentages are taken of the reference */
export function isNearlyZero(x: Value | number, tolerance: Tolerance, reference?: Value | number): boolean {
  const size = typeof x === "number" ? Math.abs(x) : norm(x);
  return size <= resolve(tolerance, reference);
}
