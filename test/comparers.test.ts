/**
 * Tolerance, comparer and linear comparer tests
 */

import { describe, expect, test } from "vitest";
import { ConfigError, InputTypeError } from "../src/lib/errors.ts";
import { MathArray, type Value } from "../src/lib/math/array.ts";
import { complex } from "../src/lib/math/complex.ts";
import {
  betweenComparer,
  congruenceComparer,
  constantMultipleComparer,
  createComparerUtils,
  eigenvectorComparer,
  equalityComparer,
  normalizeResult,
  spanResidual,
  vectorPhaseComparer,
  vectorSpanComparer,
} from "../src/lib/grading/comparers.ts";
import { LinearComparer, linearFitError, offsetFitError } from "../src/lib/grading/linear.ts";
import {
  formatTolerance,
  isNearlyZero,
  parseTolerance,
  withinTolerance,
} from "../src/lib/grading/tolerance.ts";

const utils = createComparerUtils(parseTolerance("0.01%"));

const c = (re: number, im = 0) => complex(re, im);
const vec = (...entries: Array<number | [number, number]>): MathArray =>
  MathArray.vector(entries.map((e) => (typeof e === "number" ? complex(e) : complex(e[0], e[1]))));
const reals = (...xs: number[]) => xs.map((x) => complex(x));
/** One single-param trial per value */
const trials = (...xs: number[]): Value[][] => xs.map((x) => [complex(x)]);

// =============================================================================
// TOLERANCE
// =============================================================================

describe("parseTolerance", () => {
  test("numbers are absolute, strings ending in % are relative", () => {
    expect(parseTolerance(0.5)).toEqual({ kind: "absolute", value: 0.5 });
    expect(parseTolerance("5%")).toEqual({ kind: "percent", fraction: 0.05, text: "5%" });
    expect(parseTolerance(" 2.5% ")).toEqual({ kind: "percent", fraction: 0.025, text: "2.5%" });
  });

  test("rejects negative and malformed values", () => {
    expect(() => parseTolerance(-1)).toThrow("Tolerance must be a non-negative number, received -1");
    expect(() => parseTolerance("abc")).toThrow(
      "Invalid tolerance 'abc': expected a non-negative number or a percentage like '5%'",
    );
    expect(() => parseTolerance("abc")).toThrow(ConfigError);
  });

  test("formats back to its configured spelling", () => {
    expect(formatTolerance(parseTolerance(0.001))).toBe("0.001");
    expect(formatTolerance(parseTolerance("0.01%"))).toBe("0.01%");
  });
});

describe("withinTolerance", () => {
  test("the boundary is inclusive", () => {
    const tol = parseTolerance(0.5);
    expect(withinTolerance(c(1), c(1.5), tol)).toBe(true);
    expect(withinTolerance(c(1), c(1.51), tol)).toBe(false);
  });

  test("a percentage of zero demands an exact match", () => {
    const tol = parseTolerance("1%");
    expect(withinTolerance(c(0), c(0), tol)).toBe(true);
    expect(withinTolerance(c(0), c(1e-12), tol)).toBe(false);
  });

  test("infinities must match exactly", () => {
    const tol = parseTolerance(1);
    const inf = c(Number.POSITIVE_INFINITY);
    expect(withinTolerance(inf, inf, tol)).toBe(true);
    expect(withinTolerance(inf, c(1e300), tol)).toBe(false);
    expect(withinTolerance(inf, c(Number.NEGATIVE_INFINITY), tol)).toBe(false);
  });

  test("arrays compare by the norm of their difference", () => {
    expect(withinTolerance(vec(1, 2), vec(1, 2.0001), parseTolerance(0.001))).toBe(true);
    expect(withinTolerance(vec(3, 4), vec(3, 4.6), parseTolerance("10%"))).toBe(false);
  });

  test("isNearlyZero takes percentages of the reference", () => {
    expect(isNearlyZero(0.04, parseTolerance("1%"), 5)).toBe(true);
    expect(isNearlyZero(0.06, parseTolerance("1%"), 5)).toBe(false);
    expect(() => isNearlyZero(0.06, parseTolerance("1%"))).toThrow(
      "When tolerance is a percentage, reference must not be undefined.",
    );
  });
});

// =============================================================================
// RESULTS
// =============================================================================

describe("normalizeResult", () => {
  test("booleans become full or no credit", () => {
    expect(normalizeResult(true)).toEqual({ ok: true, grade_decimal: 1, msg: "" });
    expect(normalizeResult(false)).toEqual({ ok: false, grade_decimal: 0, msg: "" });
  });

  test("grades are clamped and partial credit inferred", () => {
    expect(normalizeResult({ grade_decimal: 1.4 })).toEqual({ ok: true, grade_decimal: 1, msg: "" });
    expect(normalizeResult({ grade_decimal: 0.3, msg: "close" })).toEqual({
      ok: "partial",
      grade_decimal: 0.3,
      msg: "close",
    });
    expect(normalizeResult({ grade_decimal: 0.3, ok: false })).toEqual({ ok: false, grade_decimal: 0.3, msg: "" });
  });
});

// =============================================================================
// UNCORRELATED COMPARERS
// =============================================================================

describe("equalityComparer", () => {
  test("compares within tolerance", () => {
    expect(equalityComparer.compare([c(2)], c(2.0001), utils)).toBe(true);
    expect(equalityComparer.compare([c(2)], c(2.001), utils)).toBe(false);
  });

  test("checks shapes when the utils carry a shape check", () => {
    const shaped = createComparerUtils(parseTolerance("0.01%"), "shape");
    expect(() => equalityComparer.compare([vec(1, 2)], c(1), shaped)).toThrow(
      "Expected answer to be a vector of length 2, but input is a scalar",
    );
  });
});

describe("betweenComparer", () => {
  test("accepts real values in the closed interval", () => {
    expect(betweenComparer.compare([c(0), c(1)], c(0.5), utils)).toBe(true);
    expect(betweenComparer.compare([c(0), c(1)], c(1), utils)).toBe(true);
    expect(betweenComparer.compare([c(0), c(1)], c(1.5), utils)).toBe(false);
  });

  test("complex input is the wrong type", () => {
    expect(() => betweenComparer.compare([c(0), c(1)], c(0.5, 1), utils)).toThrow(InputTypeError);
    expect(() => betweenComparer.compare([c(0), c(1)], c(0.5, 1), utils)).toThrow("Input must be real.");
  });

  test("needs two params", () => {
    expect(() => betweenComparer.compare([c(0)], c(0.5), utils)).toThrow("between expects 2 comparer_params, received 1");
  });
});

describe("congruenceComparer", () => {
  test("equal modulo the period", () => {
    expect(congruenceComparer.compare([c(1), c(2 * Math.PI)], c(1 + 4 * Math.PI), utils)).toBe(true);
    expect(congruenceComparer.compare([c(1), c(2 * Math.PI)], c(1 - 2 * Math.PI), utils)).toBe(true);
    expect(congruenceComparer.compare([c(1), c(2 * Math.PI)], c(1.5), utils)).toBe(false);
  });

  test("a percentage tolerance is taken of the unreduced target", () => {
    const tenPercent = createComparerUtils(parseTolerance("10%"));
    const period = c(2 * Math.PI);
    // 10% of 1 is 0.1, so a residue of 0.5 is too far
    expect(congruenceComparer.compare([c(1), period], c(1.5), tenPercent)).toBe(false);
    // 10% of 200*pi is about 62.8, wider than any reduced residue
    expect(congruenceComparer.compare([c(200 * Math.PI), period], c(200 * Math.PI + 3), tenPercent)).toBe(true);
    expect(congruenceComparer.compare([c(200 * Math.PI), period], c(200 * Math.PI + 3), utils)).toBe(false);
  });
});

describe("eigenvectorComparer", () => {
  const matrix = MathArray.fromReal([2, 2], [2, 0, 0, 3]);

  test("M v = lambda v", () => {
    expect(eigenvectorComparer.compare([matrix, c(2)], vec(1, 0), utils)).toBe(true);
    expect(eigenvectorComparer.compare([matrix, c(2)], vec(5, 0), utils)).toBe(true);
    expect(eigenvectorComparer.compare([matrix, c(2)], vec(0, 1), utils)).toBe(false);
  });

  test("the zero vector is never an eigenvector", () => {
    expect(eigenvectorComparer.compare([matrix, c(2)], vec(0, 0), utils)).toEqual({
      ok: false,
      grade_decimal: 0,
      msg: "Eigenvectors must be nonzero.",
    });
  });

  test("a scalar is the wrong type", () => {
    expect(() => eigenvectorComparer.compare([matrix, c(2)], c(1), utils)).toThrow(
      "Expected answer to be a vector, but input is a scalar",
    );
  });
});

describe("vector comparers", () => {
  const e1 = vec(1, 0, 0);
  const e2 = vec(0, 1, 0);

  test("vector_span accepts combinations of the params", () => {
    expect(vectorSpanComparer.compare([e1, e2], vec(2, 3, 0), utils)).toBe(true);
    expect(vectorSpanComparer.compare([e1, e2], vec(0, 0, 1), utils)).toBe(false);
    expect(vectorSpanComparer.compare([e1, e2], vec(0, 0, 0), utils)).toEqual({
      ok: false,
      grade_decimal: 0,
      msg: "Input should be a nonzero vector.",
    });
  });

  test("vector_phase allows only an overall phase", () => {
    const v = vec(1, [0, 1]);
    expect(vectorPhaseComparer.compare([v], vec([0, 1], -1), utils)).toBe(true);
    expect(vectorPhaseComparer.compare([v], vec(2, [0, 2]), utils)).toBe(false);
  });

  test("spanResidual measures distance from the span", () => {
    expect(spanResidual([reals(1, 0, 0)], reals(3, 4, 0))).toBeCloseTo(4, 12);
  });
});

// =============================================================================
// CORRELATED COMPARERS
// =============================================================================

describe("constantMultipleComparer", () => {
  const expected = trials(1, 2, 3);

  test("full credit for the answer, partial for a multiple", () => {
    expect(constantMultipleComparer.compare(expected, reals(1, 2, 3), utils)).toBe(true);
    expect(constantMultipleComparer.compare(expected, reals(2, 4, 6), utils)).toEqual({
      grade_decimal: 0.5,
      msg: "The submitted answer differs from the expected answer by a constant multiple",
    });
  });

  test("zero and unrelated submissions get nothing", () => {
    expect(constantMultipleComparer.compare(expected, reals(0, 0, 0), utils)).toBe(false);
    expect(constantMultipleComparer.compare(expected, reals(1, 1, 1), utils)).toBe(false);
  });
});

describe("LinearComparer", () => {
  const expected = trials(1, 2, 3);

  test("equal answers get full credit", () => {
    expect(new LinearComparer().compare(expected, reals(1, 2, 3), utils)).toEqual({ grade_decimal: 1, msg: "" });
  });

  test("proportional answers get half credit by default", () => {
    expect(new LinearComparer().compare(expected, reals(2, 4, 6), utils)).toEqual({
      grade_decimal: 0.5,
      msg: "The submitted answer differs from an expected answer by a constant factor.",
    });
  });

  test("offset credit only when configured", () => {
    expect(new LinearComparer().compare(expected, reals(2, 3, 4), utils)).toEqual({ grade_decimal: 0, msg: "" });
    expect(new LinearComparer({ offset: 0.7 }).compare(expected, reals(2, 3, 4), utils)).toEqual({
      grade_decimal: 0.7,
      msg: "",
    });
  });

  test("a zero expected answer only allows equality and offset", () => {
    const zeros = trials(0, 0, 0);
    expect(new LinearComparer().compare(zeros, reals(0, 0, 0), utils)).toEqual({ grade_decimal: 1, msg: "" });
  });

  test("needs at least three samples", () => {
    expect(() => new LinearComparer().compare(trials(1, 2), reals(1, 2), utils)).toThrow(
      "Cannot perform linear comparison with less than 3 samples",
    );
  });

  test("credits must lie in [0, 1]", () => {
    expect(() => new LinearComparer({ equals: 2 })).toThrow(
      "LinearComparer equals credit must be between 0 and 1, received 2",
    );
    expect(new LinearComparer({ proportional: null }).modes).toEqual(["equals"]);
  });

  test("fit errors", () => {
    expect(linearFitError(reals(1, 2, 3), reals(3, 5, 7))).toBeCloseTo(0, 12);
    expect(offsetFitError(reals(1, 2, 3), reals(2, 3, 4))).toBeCloseTo(0, 12);
    // Constant x falls back to the offset fit
    expect(linearFitError(reals(1, 1, 1), reals(2, 2, 2))).toBeCloseTo(0, 12);
  });
});
