/**
 * Linear Comparer
 * Credit for answers related to the expected one by expected = a * student + b.
 *
 * Modes, from strictest:
 * - equals        a = 1, b = 0
 * - proportional  b = 0
 * - offset        a = 1
 * - linear        a and b free
 * A mode set to null is not checked. The best grade over passing modes wins.
 */

import { ConfigError } from "../errors.ts";
import { shapeOf, type Value } from "../math/array.ts";
import { add, type Complex, complex, conj, divide, modulus, multiply, scale, subtract, ZERO } from "../math/complex.ts";
import type { ComparerResult, ComparerUtils, CorrelatedComparer } from "./comparers.ts";
import { flattenEntries, proportionalFit } from "./comparers.ts";

export type LinearMode = "equals" | "proportional" | "offset" | "linear";

const ALL_MODES: readonly LinearMode[] = ["equals", "proportional", "offset", "linear"];
const ZERO_COMPATIBLE_MODES: ReadonlySet<LinearMode> = new Set(["equals", "offset"]);

export interface LinearComparerOptions {
  equals?: number | null;
  proportional?: number | null;
  offset?: number | null;
  linear?: number | null;
  equals_msg?: string;
  proportional_msg?: string;
  offset_msg?: string;
  linear_msg?: string;
}

const DEFAULT_PROPORTIONAL_MSG = "The submitted answer differs from an expected answer by a constant factor.";

// =============================================================================
// FIT ERRORS
// =============================================================================
// Each returns the residual norm of the best fit y ~ f(x), x being the student's values.

function norm2(values: readonly Complex[]): number {
  return Math.sqrt(values.reduce((total, z) => total + modulus(z) ** 2, 0));
}

function mean(values: readonly Complex[]): Complex {
  if (values.length === 0) return ZERO;
  return scale(
    values.reduce((sum, z) => add(sum, z), ZERO),
    1 / values.length,
  );
}

export function equalsFitError(x: readonly Complex[], y: readonly Complex[]): number {
  return norm2(x.map((z, k) => subtract(z, y[k] ?? ZERO)));
}

export function proportionalFitError(x: readonly Complex[], y: readonly Complex[]): number {
  return proportionalFit(x, y).error;
}

export function offsetFitError(x: readonly Complex[], y: readonly Complex[]): number {
  const shift = mean(y.map((z, k) => subtract(z, x[k] ?? ZERO)));
  return norm2(x.map((z, k) => subtract(add(z, shift), y[k] ?? ZERO)));
}

/** Falls back to the offset fit when x is constant */
export function linearFitError(x: readonly Complex[], y: readonly Complex[]): number {
  const xMean = mean(x);
  const yMean = mean(y);
  const dx = x.map((z) => subtract(z, xMean));
  const spread = dx.reduce((total, z) => total + modulus(z) ** 2, 0);
  if (spread <= 1e-24 * Math.max(norm2(x) ** 2, 1)) {
    return offsetFitError(x, y);
  }
  let covariance = ZERO;
  dx.forEach((z, k) => {
    covariance = add(covariance, multiply(conj(z), subtract(y[k] ?? ZERO, yMean)));
  });
  const slope = divide(covariance, complex(spread));
  const intercept = subtract(yMean, multiply(slope, xMean));
  return norm2(y.map((z, k) => subtract(z, add(multiply(slope, x[k] ?? ZERO), intercept))));
}

const FIT_ERRORS: Record<LinearMode, (x: readonly Complex[], y: readonly Complex[]) => number> = {
  equals: equalsFitError,
  proportional: proportionalFitError,
  offset: offsetFitError,
  linear: linearFitError,
};

// =============================================================================
// COMPARER
// =============================================================================

function checkCredit(value: number | null, mode: LinearMode): number | null {
  if (value !== null && !(value >= 0 && value <= 1)) {
    throw new ConfigError(`LinearComparer ${mode} credit must be between 0 and 1, received ${value}`);
  }
  return value;
}

/**
 * @example
 * new LinearComparer({ offset: 0.5, offset_msg: "Check your constant term" })
 */
export class LinearComparer implements CorrelatedComparer {
  readonly name = "linear";
  readonly correlated = true;
  private readonly credit: Record<LinearMode, number | null>;
  private readonly messages: Record<LinearMode, string>;
  readonly modes: readonly LinearMode[];

  constructor(options: LinearComparerOptions = {}) {
    this.credit = {
      equals: checkCredit(options.equals === undefined ? 1 : options.equals, "equals"),
      proportional: checkCredit(options.proportional === undefined ? 0.5 : options.proportional, "proportional"),
      offset: checkCredit(options.offset ?? null, "offset"),
      linear: checkCredit(options.linear ?? null, "linear"),
    };
    this.messages = {
      equals: options.equals_msg ?? "",
      proportional: options.proportional_msg ?? DEFAULT_PROPORTIONAL_MSG,
      offset: options.offset_msg ?? "",
      linear: options.linear_msg ?? "",
    };
    this.modes = ALL_MODES.filter((mode) => this.credit[mode] !== null);
  }

  compare(params: readonly (readonly Value[])[], student: readonly Value[], utils: ComparerUtils): ComparerResult {
    const expected = params.map((trial) => trial[0] ?? ZERO);
    const [firstStudent] = student;
    const [firstExpected] = expected;
    if (utils.validateShape && firstStudent !== undefined && firstExpected !== undefined) {
      utils.validateShape(firstStudent, shapeOf(firstExpected));
    }

    if (student.length < 3) {
      throw new ConfigError("Cannot perform linear comparison with less than 3 samples");
    }

    const x = flattenEntries(student);
    const y = flattenEntries(expected);
    const studentNorm = norm2(x);

    // Proportional and linear fits are meaningless against zero
    const studentZero = student.every((value, k) => utils.isNearlyZero(value, expected[k] ?? ZERO));
    const expectedZero = y.every((z) => z.re === 0 && z.im === 0);
    const modes = studentZero || expectedZero ? this.modes.filter((mode) => ZERO_COMPATIBLE_MODES.has(mode)) : this.modes;

    let best = { grade_decimal: 0, msg: "" };
    for (const mode of modes) {
      const error = FIT_ERRORS[mode](x, y);
      if (!utils.isNearlyZero(error, studentNorm)) continue;
      const candidate = { grade_decimal: this.credit[mode] ?? 0, msg: this.messages[mode] };
      if (
        candidate.grade_decimal > best.grade_decimal ||
        (candidate.grade_decimal === best.grade_decimal && candidate.msg > best.msg)
      ) {
        best = candidate;
      }
    }
    return best;
  }
}
