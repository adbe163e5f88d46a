/**
 * Comparers
 * Decide whether a student's sampled values match the instructor's.
 *
 * Uncorrelated comparers see one trial at a time. Correlated comparers see
 * every trial at once, which is what relationships like "a constant multiple
 * of the answer" need.
 */

import { ConfigError, InputTypeError } from "../errors.ts";
import { multiplyValues, norm } from "../math/arithmetic.ts";
import {
  describeShape,
  getShapeName,
  isArray,
  isVector,
  type MathArray,
  type Shape,
  sameShape,
  shapeOf,
  type Value,
  valueEntries,
} from "../math/array.ts";
import {
  add,
  type Complex,
  complex,
  conj,
  divide,
  modulus,
  multiply,
  ONE,
  scale,
  subtract,
  ZERO,
} from "../math/complex.ts";
import { isNearlyZero, type Tolerance, withinTolerance } from "./tolerance.ts";

// =============================================================================
// TYPES
// =============================================================================

export type Verdict = boolean | "partial";

export type ComparerResult = boolean | { grade_decimal: number; ok?: Verdict; msg?: string };

export interface ComparerUtils {
  tolerance: Tolerance;
  withinTolerance(x: Value, y: Value): boolean;
  isNearlyZero(x: Value | number, reference?: Value | number): boolean;
  /** Only present for the matrix kind; throws InputTypeError on mismatch */
  validateShape?: (value: Value, shape: Shape) => void;
}

export interface UncorrelatedComparer {
  readonly name: string;
  readonly correlated: false;
  compare(params: readonly Value[], student: Value, utils: ComparerUtils): ComparerResult;
}

export interface CorrelatedComparer {
  readonly name: string;
  readonly correlated: true;
  /** params[k] holds the evaluated comparer params of trial k */
  compare(params: readonly (readonly Value[])[], student: readonly Value[], utils: ComparerUtils): ComparerResult;
}

export type Comparer = UncorrelatedComparer | CorrelatedComparer;

export interface NormalizedResult {
  ok: Verdict;
  grade_decimal: number;
  msg: string;
}

/** Fill in ok and msg from a comparer's boolean or partial result */
export function normalizeResult(result: ComparerResult): NormalizedResult {
  if (typeof result === "boolean") {
    return { ok: result, grade_decimal: result ? 1 : 0, msg: "" };
  }
  const grade = Math.min(1, Math.max(0, result.grade_decimal));
  const inferred: Verdict = grade === 1 ? true : grade === 0 ? false : "partial";
  return { ok: result.ok ?? inferred, grade_decimal: grade, msg: result.msg ?? "" };
}

// =============================================================================
// UTILS
// =============================================================================

export type ShapeMessageDetail = "type" | "shape" | null;

/**
 * Check a student value's shape, explaining the mismatch at the requested detail.
 *
 * @example
 * validateStudentShape(complex(1), [3], "type")
 * // InputTypeError: Expected answer to be a vector, but input is a scalar
 */
export function validateStudentShape(value: Value, expected: Shape, detail: ShapeMessageDetail): void {
  const actual = shapeOf(value);
  if (sameShape(actual, expected)) return;
  if (detail === null) {
    throw new InputTypeError("");
  }

  const describe = detail === "shape" ? describeShape : (shape: Shape) => getShapeName(shape.length);
  const expectedText = describe(expected);
  const receivedText = describe(actual);
  const suffix = detail !== "shape" && expectedText === receivedText ? " of incorrect shape" : "";
  throw new InputTypeError(`Expected answer to be a ${expectedText}, but input is a ${receivedText}${suffix}`);
}

export function createComparerUtils(
  tolerance: Tolerance,
  shapeDetail?: ShapeMessageDetail,
): ComparerUtils {
  const utils: ComparerUtils = {
    tolerance,
    withinTolerance: (x, y) => withinTolerance(x, y, tolerance),
    isNearlyZero: (x, reference) => isNearlyZero(x, tolerance, reference),
  };
  if (shapeDetail !== undefined) {
    utils.validateShape = (value, shape) => validateStudentShape(value, shape, shapeDetail);
  }
  return utils;
}

function expectParams(name: string, params: readonly Value[], count: number): void {
  if (params.length !== count) {
    throw new ConfigError(`${name} expects ${count} comparer_params, received ${params.length}`);
  }
}

function firstParam(params: readonly Value[]): Value {
  const [first] = params;
  if (first === undefined) {
    throw new ConfigError("Comparer needs at least one comparer_param");
  }
  return first;
}

// =============================================================================
// LINEAR ALGEBRA ON ENTRY LISTS
// =============================================================================

function dot(a: readonly Complex[], b: readonly Complex[]): Complex {
  let sum = ZERO;
  a.forEach((z, k) => {
    sum = add(sum, multiply(conj(z), b[k] ?? ZERO));
  });
  return sum;
}

function residualNorm(values: readonly Complex[]): number {
  let total = 0;
  for (const z of values) total += modulus(z) ** 2;
  return Math.sqrt(total);
}

/** Distance from target to the span of the given vectors (Gram-Schmidt projection) */
export function spanResidual(basis: readonly (readonly Complex[])[], target: readonly Complex[]): number {
  const orthonormal: Complex[][] = [];
  const scaleLimit = Math.max(...basis.map(residualNorm), 0) * 1e-12;
  for (const vector of basis) {
    let work = [...vector];
    for (const q of orthonormal) {
      const coefficient = dot(q, work);
      work = work.map((z, k) => subtract(z, multiply(coefficient, q[k] ?? ZERO)));
    }
    const size = residualNorm(work);
    if (size > scaleLimit) orthonormal.push(work.map((z) => scale(z, 1 / size)));
  }

  let residual = [...target];
  for (const q of orthonormal) {
    const coefficient = dot(q, residual);
    residual = residual.map((z, k) => subtract(z, multiply(coefficient, q[k] ?? ZERO)));
  }
  return residualNorm(residual);
}

/** Best c with y ~ c x in least squares, and the residual norm */
export function proportionalFit(x: readonly Complex[], y: readonly Complex[]): { coefficient: Complex; error: number } {
  const xx = dot(x, x);
  if (modulus(xx) === 0) {
    return { coefficient: ZERO, error: residualNorm(y) };
  }
  const coefficient = divide(dot(x, y), xx);
  return {
    coefficient,
    error: residualNorm(y.map((z, k) => subtract(z, multiply(coefficient, x[k] ?? ZERO)))),
  };
}

export function flattenEntries(values: readonly Value[]): Complex[] {
  return values.flatMap((value) => [...valueEntries(value)]);
}

// =============================================================================
// UNCORRELATED COMPARERS
// =============================================================================

/** The default: student value within tolerance of the expected one */
export const equalityComparer: UncorrelatedComparer = {
  name: "equality",
  correlated: false,
  compare(params, student, utils) {
    const expected = firstParam(params);
    utils.validateShape?.(student, shapeOf(expected));
    return utils.withinTolerance(expected, student);
  },
};

/** Real student value in [start, stop] */
export const betweenComparer: UncorrelatedComparer = {
  name: "between",
  correlated: false,
  compare(params, student) {
    expectParams("between", params, 2);
    const [start, stop] = params.map((value) => (isArray(value) ? Number.NaN : value.re));
    if (isArray(student) || student.im !== 0) {
      throw new InputTypeError("Input must be real.");
    }
    return (start ?? Number.NaN) <= student.re && student.re <= (stop ?? Number.NaN);
  },
};

/**
 * Student value equal to the target modulo a period, e.g. angles modulo 2*pi.
 * The difference is reduced into the period nearest zero before comparing.
 */
export const congruenceComparer: UncorrelatedComparer = {
  name: "congruence",
  correlated: false,
  compare(params, student, utils) {
    expectParams("congruence", params, 2);
    const [target, period] = params;
    if (target === undefined || period === undefined || isArray(target) || isArray(period)) {
      throw new ConfigError("congruence expects a scalar target and a scalar modulus");
    }
    if (isArray(student) || student.im !== 0) {
      throw new InputTypeError("Input must be real.");
    }
    const m = period.re;
    const difference = student.re - target.re;
    const reduced = difference - m * Math.round(difference / m);
    return utils.isNearlyZero(reduced, target);
  },
};

/** Nonzero student vector v with M v = lambda v */
export const eigenvectorComparer: UncorrelatedComparer = {
  name: "eigenvector",
  correlated: false,
  compare(params, student, utils) {
    expectParams("eigenvector", params, 2);
    const [matrix, eigenvalue] = params;
    if (matrix === undefined || eigenvalue === undefined || !isArray(matrix) || !matrix.isSquare) {
      throw new ConfigError("eigenvector expects a square matrix and an eigenvalue");
    }
    const expectedShape = [matrix.rowCount];
    if (utils.validateShape) {
      utils.validateShape(student, expectedShape);
    } else {
      validateStudentShape(student, expectedShape, "type");
    }

    if (isZeroVector(student, utils)) {
      return { ok: false, grade_decimal: 0, msg: "Eigenvectors must be nonzero." };
    }
    const actual = multiplyValues(matrix, student);
    const expected = multiplyValues(eigenvalue, student);
    return utils.withinTolerance(actual, expected);
  },
};

/** Norm as a scalar value, for tolerance comparisons of magnitudes */
function normValue(value: Value): Complex {
  return complex(norm(value));
}

function isZeroVector(value: Value, utils: ComparerUtils): boolean {
  return utils.withinTolerance(ZERO, normValue(value));
}

function sameLengthVectors(values: readonly Value[]): values is readonly MathArray[] {
  const [first] = values;
  return (
    first !== undefined &&
    isVector(first) &&
    values.every((value) => isVector(value) && value.size === first.size)
  );
}

/** Nonzero student vector in the span of the given vectors */
export const vectorSpanComparer: UncorrelatedComparer = {
  name: "vector_span",
  correlated: false,
  compare(params, student, utils) {
    if (!sameLengthVectors(params)) {
      throw new ConfigError(
        "Problem Configuration Error: comparer_params should be a list of strings that evaluate to equal-length vectors",
      );
    }
    const first = firstParam(params);
    if (utils.validateShape) {
      utils.validateShape(student, shapeOf(first));
    } else {
      validateStudentShape(student, shapeOf(first), "type");
    }
    if (isZeroVector(student, utils)) {
      return { ok: false, grade_decimal: 0, msg: "Input should be a nonzero vector." };
    }
    const error = spanResidual(
      params.map((value) => [...valueEntries(value)]),
      [...valueEntries(student)],
    );
    return utils.isNearlyZero(error, student);
  },
};

/** Student vector equal to the given one up to an overall phase */
export const vectorPhaseComparer: UncorrelatedComparer = {
  name: "vector_phase",
  correlated: false,
  compare(params, student, utils) {
    if (params.length !== 1 || !sameLengthVectors(params)) {
      throw new ConfigError(
        "Problem Configuration Error: comparer_params should be a list of strings that evaluate to a single vector.",
      );
    }
    const inSpan = vectorSpanComparer.compare(params, student, utils);
    if (inSpan !== true) return inSpan;
    return utils.withinTolerance(normValue(firstParam(params)), normValue(student));
  },
};

// =============================================================================
// CORRELATED COMPARERS
// =============================================================================

function validateCorrelatedShape(
  params: readonly (readonly Value[])[],
  student: readonly Value[],
  utils: ComparerUtils,
): void {
  const [firstStudent] = student;
  const expected = params[0]?.[0];
  if (utils.validateShape && firstStudent !== undefined && expected !== undefined) {
    utils.validateShape(firstStudent, shapeOf(expected));
  }
}

export interface ConstantMultipleOptions {
  grade_decimal?: number;
  msg?: string;
}

/**
 * Full credit for the expected answer, partial credit for a nonzero constant
 * multiple of it. A zero submission is always wrong.
 */
export function makeConstantMultipleComparer(options: ConstantMultipleOptions = {}): CorrelatedComparer {
  const gradeDecimal = options.grade_decimal ?? 0.5;
  const msg = options.msg ?? "The submitted answer differs from the expected answer by a constant multiple";

  return {
    name: "constant_multiple",
    correlated: true,
    compare(params, student, utils) {
      validateCorrelatedShape(params, student, utils);
      const x = flattenEntries(student);
      const y = flattenEntries(params.map(firstParam));
      const studentNorm = residualNorm(x) / Math.max(student.length, 1);

      if (utils.isNearlyZero(studentNorm, residualNorm(x))) {
        return false;
      }
      const { coefficient, error } = proportionalFit(x, y);
      if (!utils.isNearlyZero(error, studentNorm)) {
        return false;
      }
      if (utils.isNearlyZero(modulus(subtract(coefficient, ONE)), studentNorm)) {
        return true;
      }
      return { grade_decimal: gradeDecimal, msg };
    },
  };
}

export const constantMultipleComparer = makeConstantMultipleComparer();
