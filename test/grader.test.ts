/**
 * Grader tests: end-to-end grading per kind, submission validation,
 * failure budgets and configuration errors
 */

import { describe, expect, test } from "vitest";
import { ConfigError, ZeroDivisionError } from "../src/lib/errors.ts";
import { consolidate } from "../src/lib/grading/checks.ts";
import { equalityComparer } from "../src/lib/grading/comparers.ts";
import { createGrader, grade, Grader } from "../src/lib/grading/grader.ts";
import type { Answer } from "../src/lib/grading/kinds.ts";

const withX = { variables: ["x"] };

// =============================================================================
// FORMULA KIND
// =============================================================================

describe("formula grading", () => {
  test("equivalent expressions match", () => {
    expect(grade({ answers: "x^2", ...withX }, "x*x", { seed: 1 })).toEqual({
      matched: true,
      credit: 1,
      message: "",
      seed: 1,
      trials: 5,
    });
    expect(grade({ answers: "sin(x)/cos(x)", ...withX }, "tan(x)", { seed: 7 }).matched).toBe(true);
  });

  test("different expressions do not", () => {
    const result = grade({ answers: "x^2", ...withX }, "2*x", { seed: 3 });
    expect(result.matched).toBe(false);
    expect(result.credit).toBe(0);
    expect(result.diagnostic).toBeUndefined();
  });

  test("every expression matches itself", () => {
    const expressions = ["x^3 - 2*x", "exp(x)*sin(x)", "sqrt(x)/(1+x)", "abs(x - 3)"];
    for (const expression of expressions) {
      for (const seed of [1, 2, 3]) {
        expect(grade({ answers: expression, ...withX }, expression, { seed }).matched).toBe(true);
      }
    }
  });

  test("numbered variables are sampled on demand", () => {
    const config = { answers: "a_{0}+a_{1}+a_{-1}", numbered_vars: ["a"] };
    expect(grade(config, "a_{0}+a_{1}+a_{-1}+a_{42}-a_{42}", { seed: 2 }).matched).toBe(true);
    expect(grade(config, "a_{0}+a_{1}", { seed: 2 }).matched).toBe(false);
  });

  test("a random seed is chosen and reported when omitted", () => {
    const { seed } = grade({ answers: "x", ...withX }, "x");
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
  });

  test("the same seed replays the same samples", () => {
    const grader = createGrader({ answers: "x^2", ...withX, debug: true });
    const first = grader.grade("x*x", { seed: 11 });
    const second = grader.grade("x*x", { seed: 11 });
    expect(first.debug).toEqual(second.debug);
  });

  test("samples can be overridden per submission", () => {
    const grader = new Grader({ answers: "x", ...withX });
    expect(grader.grade("x", { seed: 1, samples: 2 }).trials).toBe(2);
    expect(() => grader.grade("x", { samples: 0 })).toThrow("samples must be a positive integer, received 0");
  });
});

describe("comparer answers", () => {
  const config = {
    answers: { comparer: "congruence" as const, comparer_params: ["b^2/a", "2*pi"] },
    variables: ["a", "b"],
  };

  test("congruent submissions match", () => {
    expect(grade(config, "b^2/a + 6*pi", { seed: 4 }).matched).toBe(true);
  });

  test("an odd multiple of pi is not congruent", () => {
    const result = grade(config, "b^2/a + 5.5*pi", { seed: 4 });
    expect(result.matched).toBe(false);
    expect(result.diagnostic).toBeUndefined();
  });
});

describe("partial credit", () => {
  test("the best answer wins", () => {
    const config = {
      answers: [{ expect: "x^2" }, { expect: "2*x^2", grade_decimal: 0.5, msg: "Off by a factor of 2" }],
      ...withX,
    };
    const result = grade(config, "2*x^2", { seed: 5 });
    expect(result.matched).toBe("partial");
    expect(result.credit).toBe(0.5);
    expect(result.message).toBe("Off by a factor of 2");
  });
});

describe("numerical kind", () => {
  test("tolerance is absolute when given as a number", () => {
    const config = { answers: "1", kind: "numerical" as const, tolerance: 0.5 };
    expect(grade(config, "1.5", { seed: 1 }).matched).toBe(true);
    expect(grade(config, "1.51", { seed: 1 }).matched).toBe(false);
  });

  test("variables are rejected", () => {
    expect(() => new Grader({ answers: "1", kind: "numerical", variables: ["x"] })).toThrow(
      "The numerical kind does not accept variables",
    );
  });
});

// =============================================================================
// DIAGNOSTICS
// =============================================================================

describe("diagnostics", () => {
  test("parse errors", () => {
    expect(grade({ answers: "x", ...withX }, "(1+2", { seed: 1 }).diagnostic).toEqual({
      kind: "ParseError",
      message: "Invalid Input:\n1 parenthesis was opened without being closed (highlighted below)\n<code><mark>(</mark>1+2</code>",
    });
    expect(grade({ answers: "x", ...withX }, "", { seed: 1 }).diagnostic).toEqual({
      kind: "ParseError",
      message: "Invalid Input: the expression is empty",
    });
  });

  test("unknown variables", () => {
    const result = grade({ answers: "x^2", ...withX }, "y^2", { seed: 1 });
    expect(result.matched).toBe(false);
    expect(result.message).toBe("Invalid Input: 'y' not permitted in answer as a variable");
    expect(result.diagnostic?.kind).toBe("UnknownIdentifier");
  });

  test("instructor variables are hidden from students", () => {
    const config = {
      answers: "s",
      variables: ["x", "s"],
      sample_from: { s: { type: "DependentSampler", depends: ["x"], formula: "x^2" } },
      instructor_vars: ["s"],
    };
    expect(grade(config, "s", { seed: 1 }).message).toBe("Invalid Input: 's' not permitted in answer as a variable");
    expect(grade(config, "x^2", { seed: 1 }).matched).toBe(true);
  });

  test("debug mode records every step", () => {
    const result = grade({ answers: "2", debug: true, samples: 1 }, "1+1", { seed: 1 });
    expect(result.debug).toEqual([
      "Answer 1 of 1",
      "Sample 1 of 1",
      "  Variables: (none)",
      "  Comparer params: [2]",
      "  Student value: 2",
      "Comparer: equality",
      '  ok: true, grade_decimal: 1, msg: ""',
    ]);
  });

  test("no trace outside debug mode", () => {
    expect(grade({ answers: "2" }, "1+1", { seed: 1 }).debug).toBeUndefined();
  });
});

describe("failable evaluations", () => {
  const config = { answers: "x", ...withX, sample_from: { x: [0, 2] }, samples: 50 };
  const student = "x*floor(x)/floor(x)";

  test("without a budget one failed trial rejects the submission", () => {
    expect(grade(config, student, { seed: 8 }).diagnostic).toEqual({
      kind: "ZeroDivisionError",
      message: "Division by zero occurred. Check your input's denominators.",
    });
  });

  test("a budget absorbs failed trials", () => {
    expect(grade({ ...config, failable_evals: 50 }, student, { seed: 8 }).matched).toBe(true);
  });
});

describe("consolidate", () => {
  const answer: Answer = {
    expect: { type: "comparer", comparer: equalityComparer, params: ["1"] },
    grade_decimal: 1,
    ok: true,
    msg: "",
  };
  const pass = { ok: true, grade_decimal: 1, msg: "" } as const;
  const miss = { ok: false, grade_decimal: 0, msg: "nope" } as const;

  test("errors within budget keep the answer's credit", () => {
    const errors = [new ZeroDivisionError()];
    const results = [pass, pass, pass, pass];
    expect(consolidate(answer, errors, results, { trials: 5, failableEvals: 1, correlated: false })).toEqual(pass);
    expect(() => consolidate(answer, errors, results, { trials: 5, failableEvals: 0, correlated: false })).toThrow(
      ZeroDivisionError,
    );
  });

  test("every trial failing raises the first error", () => {
    const errors = Array.from({ length: 3 }, () => new ZeroDivisionError());
    expect(() => consolidate(answer, errors, [], { trials: 3, failableEvals: 5, correlated: false })).toThrow(
      ZeroDivisionError,
    );
  });

  test("failed comparisons share the budget", () => {
    const results = [pass, pass, pass, pass, miss];
    expect(consolidate(answer, [], results, { trials: 5, failableEvals: 1, correlated: false })).toEqual(pass);
    expect(consolidate(answer, [], results, { trials: 5, failableEvals: 0, correlated: false })).toEqual(miss);
  });

  test("correlated comparers and single trials cannot absorb a failure", () => {
    expect(consolidate(answer, [], [miss], { trials: 5, failableEvals: 5, correlated: true })).toEqual(miss);
    expect(consolidate(answer, [], [miss], { trials: 1, failableEvals: 5, correlated: false })).toEqual(miss);
  });
});

// =============================================================================
// SUBMISSION VALIDATION
// =============================================================================

describe("submission validation", () => {
  test("blacklisted functions", () => {
    const config = { answers: "sin(x)^2", ...withX, blacklist: ["sin"] };
    expect(grade(config, "sin(x)^2", { seed: 1 }).diagnostic).toEqual({
      kind: "InvalidInput",
      message: "Invalid Input: function(s) 'sin' not permitted in answer",
    });
    expect(grade(config, "1 - cos(x)^2", { seed: 1 }).matched).toBe(true);
  });

  test("whitelisted functions", () => {
    const config = { answers: "cos(x)", ...withX, whitelist: ["cos"] };
    expect(grade(config, "sin(x + pi/2)", { seed: 1 }).message).toBe(
      "Invalid Input: function(s) 'sin' not permitted in answer",
    );
  });

  test("required functions", () => {
    const config = { answers: "sin(x)", ...withX, required_functions: ["sin"] };
    expect(grade(config, "cos(x - pi/2)", { seed: 1 }).message).toBe(
      "Invalid Input: Answer must contain the function sin",
    );
    expect(grade(config, "sin(x)", { seed: 1 }).matched).toBe(true);
  });

  test("forbidden strings ignore whitespace", () => {
    const config = { answers: "2*x", ...withX, forbidden_strings: ["*x"] };
    expect(grade(config, "2 * x", { seed: 1 }).message).toBe("Invalid Input: This particular answer is forbidden");
    expect(grade(config, "x + x", { seed: 1 }).matched).toBe(true);
  });

  test("incorrect submissions are not validated", () => {
    const config = { answers: "2*x", ...withX, forbidden_strings: ["*x"] };
    const result = grade(config, "3 * x", { seed: 1 });
    expect(result.matched).toBe(false);
    expect(result.diagnostic).toBeUndefined();
  });
});

// =============================================================================
// CONFIGURATION
// =============================================================================

describe("configuration errors", () => {
  test("schema violations list their paths", () => {
    expect(() => new Grader({ answers: "x", samples: -1 })).toThrow(/^Invalid grader configuration:\n {2}- samples: /);
  });

  test("whitelist and blacklist are exclusive", () => {
    expect(() => new Grader({ answers: "x", whitelist: ["cos"], blacklist: ["sin"] })).toThrow(
      "Cannot whitelist and blacklist at the same time",
    );
  });

  test("malformed tolerance", () => {
    expect(() => new Grader({ answers: "x", tolerance: "abc" })).toThrow(ConfigError);
  });

  test("instructor expressions are parsed up front", () => {
    expect(() => new Grader({ answers: "x^", ...withX })).toThrow(
      "Invalid instructor expression 'x^': Invalid Input: the expression ends unexpectedly after '^'; an operand is missing",
    );
  });

  test("overriding a default constant needs suppress_warnings", () => {
    expect(() => new Grader({ answers: "e", variables: ["e"] })).toThrow(
      "Warning: 'variables' contains entries 'e' which will override default values. " +
        "If you intend to override defaults, you may suppress this warning by adding " +
        "'suppress_warnings=True' to the grader configuration.",
    );
    expect(() => new Grader({ answers: "e", variables: ["e"], suppress_warnings: true })).not.toThrow();
  });

  test("sampling sets for undeclared variables", () => {
    expect(() => new Grader({ answers: "x", ...withX, sample_from: { y: [1, 2] } })).toThrow(
      "sample_from contains entries for undeclared variables: ['y']",
    );
  });

  test("a name cannot be both a variable and a constant", () => {
    expect(() => new Grader({ answers: "x", ...withX, user_constants: { x: 1 } })).toThrow(
      "'user_constants' and 'variables' contain duplicate entries: ['x']",
    );
  });

  test("an instructor answer that fails to evaluate", () => {
    const grader = new Grader({ answers: "1/0" });
    expect(() => grader.grade("1", { seed: 1 })).toThrow(
      "Error evaluating instructor expression '1/0': Division by zero occurred. Check your input's denominators.",
    );
  });

  test("a list submission for a single-expression kind", () => {
    expect(() => grade({ answers: "x", ...withX }, ["x"], { seed: 1 })).toThrow(
      'The formula kind grades a single expression, received ["x"]',
    );
  });
});

// =============================================================================
// MATRIX KIND
// =============================================================================

describe("matrix kind", () => {
  test("matrix variables", () => {
    const config = {
      kind: "matrix" as const,
      answers: "A^2",
      variables: ["A"],
      sample_from: { A: { type: "RealMatrices" } },
    };
    expect(grade(config, "A*A", { seed: 1 }).matched).toBe(true);
  });

  test("Pauli matrices and the identity", () => {
    expect(grade({ kind: "matrix", answers: "[[0,1],[1,0]]" }, "sigma_x", { seed: 1 }).matched).toBe(true);
    expect(grade({ kind: "matrix", answers: "[1,2]", identity_dim: 2 }, "I*[1,2]", { seed: 1 }).matched).toBe(true);
  });

  test("student matrices are forbidden by default", () => {
    expect(grade({ kind: "matrix", answers: "sigma_x" }, "[[0,1],[1,0]]", { seed: 1 }).diagnostic).toEqual({
      kind: "DomainError",
      message: "Matrix expressions have been forbidden in this entry.",
    });
    expect(
      grade({ kind: "matrix", answers: "sigma_x", max_array_dim: 2 }, "[[0,1],[1,0]]", { seed: 1 }).matched,
    ).toBe(true);
  });

  test("shape mismatches between answer and submission", () => {
    expect(grade({ kind: "matrix", answers: "[1,2]" }, "[1,2,3]", { seed: 1 }).diagnostic).toEqual({
      kind: "InputType",
      message: "Expected answer to be a vector, but input is a vector of incorrect shape",
    });
    expect(grade({ kind: "matrix", answers: "[1,2]" }, "1", { seed: 1 }).message).toBe(
      "Expected answer to be a vector, but input is a scalar",
    );
    const detailed = { kind: "matrix" as const, answers: "[1,2]", answer_shape_mismatch: { msg_detail: "shape" as const } };
    expect(grade(detailed, "[1,2,3]", { seed: 1 }).message).toBe(
      "Expected answer to be a vector of length 2, but input is a vector of length 3",
    );
  });

  test("a mismatch can be graded as incorrect instead", () => {
    const config = { kind: "matrix" as const, answers: "[1,2]", answer_shape_mismatch: { is_raised: false } };
    const result = grade(config, "[1,2,3]", { seed: 1 });
    expect(result.matched).toBe(false);
    expect(result.message).toBe("Expected answer to be a vector, but input is a vector of incorrect shape");
    expect(result.diagnostic).toBeUndefined();
  });

  test("shape errors in the submission", () => {
    const student = "[1,2] + [1,2,3]";
    const message = "Cannot add/subtract a vector of length 2 with a vector of length 3.";
    expect(grade({ kind: "matrix", answers: "[1,2]" }, student, { seed: 1 }).diagnostic).toEqual({
      kind: "ShapeError",
      message,
    });

    const demoted = grade({ kind: "matrix", answers: "[1,2]", shape_errors: false }, student, { seed: 1 });
    expect(demoted.diagnostic).toBeUndefined();
    expect(demoted.message).toBe(message);

    const silent = grade({ kind: "matrix", answers: "[1,2]", suppress_matrix_messages: true }, student, { seed: 1 });
    expect(silent).toMatchObject({ matched: false, message: "" });
  });
});

// =============================================================================
// SUM KIND
// =============================================================================

describe("sum kind", () => {
  const config = {
    kind: "sum" as const,
    variables: ["n"],
    sample_from: { n: 5 },
    answers: { lower: "1", upper: "n", summand: "k", summation_variable: "k" },
  };

  test("a bare summand takes the answer's limits", () => {
    expect(grade(config, "k", { seed: 1 }).matched).toBe(true);
    expect(grade(config, "k^2", { seed: 1 }).matched).toBe(false);
  });

  test("all four fields as a list", () => {
    expect(grade(config, ["0", "n", "k", "k"], { seed: 1 }).matched).toBe(true);
    expect(() => grade(config, ["1", "n", "k"], { seed: 1 })).toThrow(
      "Expected 4 student inputs but found 3. Inputs should be ordered as lower, upper, summand, summation_variable.",
    );
  });

  test("sums to infinity", () => {
    const infinite = {
      kind: "sum" as const,
      answers: { lower: "0", upper: "infty", summand: "1/2^k", summation_variable: "k" },
    };
    expect(grade(infinite, "(1/2)^k", { seed: 1 }).matched).toBe(true);
  });

  test("limits must be integers", () => {
    expect(grade(config, ["1", "1.5", "k", "k"], { seed: 1 }).diagnostic).toEqual({
      kind: "InvalidInput",
      message: "Upper summation limit does not evaluate to an integer.",
    });
  });

  test("the summation variable must be free", () => {
    expect(grade(config, { summand: "pi", summation_variable: "pi" }, { seed: 1 }).message).toBe(
      "Cannot use pi as summation variable; it already has another meaning in this problem.",
    );
    expect(grade(config, { summand: "n", summation_variable: "n" }, { seed: 1 }).message).toBe(
      "Summation variable n conflicts with another previously-defined variable.",
    );
    expect(grade(config, { summation_variable: "1k" }, { seed: 1 }).message).toBe(
      "Summation variable 1k is an invalid variable name. Variable name should begin with a letter and " +
        "contain alphanumeric characters or underscores thereafter, but may end in single quotes.",
    );
  });

  test("fields cannot be blank", () => {
    expect(grade(config, { summand: " " }, { seed: 1 }).message).toBe(
      "Please enter a value for summand, it cannot be empty.",
    );
  });

  test("answers must be structured", () => {
    expect(() => new Grader({ kind: "sum", answers: "k" })).toThrow(
      "The sum kind expects answers with keys 'lower', 'upper', 'summand' and 'summation_variable'",
    );
  });
});

// =============================================================================
// INTEGRAL KIND
// =============================================================================

describe("integral kind", () => {
  const config = {
    kind: "integral" as const,
    answers: { lower: "0", upper: "pi", integrand: "sin(x)", integration_variable: "x" },
  };

  test("equal integrals match", () => {
    expect(grade(config, "sin(x)", { seed: 1 }).matched).toBe(true);
    expect(grade(config, { integrand: "cos(x)", lower: "-pi/2", upper: "pi/2" }, { seed: 1 }).matched).toBe(true);
    expect(grade(config, "cos(x)", { seed: 1 }).matched).toBe(false);
  });

  test("a divergent integral is reported to the student", () => {
    const result = grade(config, { integrand: "1/x", lower: "0", upper: "1" }, { seed: 1 });
    expect(result.diagnostic).toEqual({
      kind: "InvalidInput",
      message:
        "There appears to be an error with the integral you entered: The maximum number of subdivisions (50) " +
        "has been achieved. The integral is probably divergent, or slowly convergent.",
    });
  });
});
