/**
 * Answer Checks
 * Run one expected answer against a submission over every sampled trial and
 * fold the per-trial outcomes into one result.
 *
 * Per trial the instructor side is evaluated first, then the student side
 * against the same bindings with instructor-only variables removed.
 */

import {
  ConfigError,
  DomainError,
  errorMessage,
  type GraderError,
  InputTypeError,
  IntegrationError,
  InvalidInputError,
  isEvaluationError,
  ShapeError,
} from "../errors.ts";
import type { Logger } from "../logger.ts";
import { formatValue, isArray, type Value } from "../math/array.ts";
import { complex } from "../math/complex.ts";
import { evaluate } from "../math/evaluator.ts";
import { extendScope, type Scope } from "../math/functions.ts";
import type { ParsedExpression } from "../math/parser.ts";
import { createPlan, resolveVariableSets, sampleTrials, type TrialSample } from "../sampling/engine.ts";
import { createRng } from "../sampling/rng.ts";
import { RealInterval } from "../sampling/sets.ts";
import { type Comparer, type ComparerUtils, type NormalizedResult, normalizeResult } from "./comparers.ts";
import { integrate } from "./integration.ts";
import type { Answer, GraderSettings, RangeKind } from "./kinds.ts";
import { performSummation, summationLimits } from "./summation.ts";

export interface CheckContext {
  settings: GraderSettings;
  utils: ComparerUtils;
  seed: number;
  trials: number;
  log: Logger;
  /** Debug lines are appended here when debug mode is on */
  trace: string[] | null;
}

/** A sum or integral with every field parsed */
export interface ParsedRange {
  lower: ParsedExpression;
  upper: ParsedExpression;
  body: ParsedExpression;
  variable: string;
}

// =============================================================================
// SAMPLING AND SCOPES
// =============================================================================

/** Draw every trial for one answer; each answer replays the same seed */
function drawTrials(ctx: CheckContext, used: Iterable<string>): TrialSample[] {
  const { settings } = ctx;
  const sets = resolveVariableSets({
    variables: settings.variables,
    numberedVars: settings.numberedVars,
    sampleFrom: settings.sampleFrom,
    used,
    defaultSet: () => new RealInterval(),
  });
  const plan = createPlan(sets, settings.randomFunctions);
  return sampleTrials(plan, createRng(ctx.seed), ctx.trials);
}

function trialScope(settings: GraderSettings, sample: TrialSample): Scope {
  return extendScope(settings.scope, { variables: sample.variables, functions: sample.functions });
}

function studentScope(settings: GraderSettings, scope: Scope): Scope {
  if (settings.instructorVars.length === 0) return scope;
  const variables = new Map(scope.variables);
  for (const name of settings.instructorVars) variables.delete(name);
  return { ...scope, variables };
}

function usedVariables(expressions: readonly ParsedExpression[], exclude: readonly string[] = []): Set<string> {
  const used = new Set<string>();
  for (const parsed of expressions) {
    for (const name of parsed.usage.variables) used.add(name);
  }
  for (const name of exclude) used.delete(name);
  return used;
}

// =============================================================================
// TRACE
// =============================================================================

function formatBindings(sample: TrialSample): string {
  const variables = [...sample.variables].map(([name, value]) => `${name} = ${formatValue(value)}`);
  const functions = [...sample.functions.keys()].map((name) => `${name}(...)`);
  return [...variables, ...functions].join(", ") || "(none)";
}

function traceTrial(ctx: CheckContext, index: number, sample: TrialSample, lines: string[]): void {
  ctx.log.debug({ trial: index + 1, variables: formatBindings(sample) }, "trial sampled");
  ctx.trace?.push(`Sample ${index + 1} of ${ctx.trials}`, `  Variables: ${formatBindings(sample)}`, ...lines);
}

function traceResults(ctx: CheckContext, comparer: string, results: readonly NormalizedResult[]): void {
  ctx.log.debug({ comparer, results }, "comparison done");
  ctx.trace?.push(
    `Comparer: ${comparer}`,
    ...results.map((r) => `  ok: ${String(r.ok)}, grade_decimal: ${r.grade_decimal}, msg: ${JSON.stringify(r.msg)}`),
  );
}

// =============================================================================
// CONSOLIDATION
// =============================================================================

function worst(results: readonly NormalizedResult[]): NormalizedResult | undefined {
  let lowest: NormalizedResult | undefined;
  for (const result of results) {
    if (lowest === undefined || result.grade_decimal < lowest.grade_decimal) lowest = result;
  }
  return lowest;
}

/**
 * Fold per-trial outcomes into one result for the answer.
 *
 * Failed evaluations and failed comparisons share the failable_evals budget.
 * If every trial failed to evaluate, the first error is raised. Over budget,
 * an evaluation error is raised if there was one; otherwise the lowest
 * credit among the failed comparisons is the result. A correlated comparer
 * or a single trial has nothing to absorb a failure into.
 */
export function consolidate(
  answer: Answer,
  errors: readonly GraderError[],
  results: readonly NormalizedResult[],
  options: { trials: number; failableEvals: number; correlated: boolean },
): NormalizedResult {
  const [firstError] = errors;
  if (firstError !== undefined && errors.length >= options.trials) throw firstError;

  const failed = results.filter((result) => result.ok !== true);
  const lowest = worst(failed);
  if (lowest !== undefined && (options.correlated || options.trials === 1)) return lowest;

  if (errors.length + failed.length > options.failableEvals) {
    if (firstError !== undefined) throw firstError;
    if (lowest !== undefined) return lowest;
  }
  return { ok: answer.ok, grade_decimal: answer.grade_decimal, msg: answer.msg };
}

// =============================================================================
// EVALUATION
// =============================================================================

type StudentOutcome = { value: Value } | { error: GraderError };

function evaluateInstructor(parsed: ParsedExpression, scope: Scope, settings: GraderSettings): Value {
  try {
    return evaluate(parsed, scope, { ...settings.evaluation, maxArrayDim: undefined }).value;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Error evaluating instructor expression '${parsed.source}': ${errorMessage(error)}`);
  }
}

/** Evaluation errors are kept for the failable budget; anything else propagates */
function captureStudent(compute: () => Value): StudentOutcome {
  try {
    return { value: compute() };
  } catch (error) {
    if (isEvaluationError(error)) return { error };
    throw error;
  }
}

/**
 * Apply the matrix kind's shape options to one answer check.
 * Suppressed or demoted errors make the answer incorrect with the error's
 * message instead of rejecting the submission.
 */
export function withMatrixHandling(settings: GraderSettings, check: () => NormalizedResult): NormalizedResult {
  const { matrix } = settings;
  if (matrix === null) return check();
  try {
    return check();
  } catch (error) {
    if (!(error instanceof ShapeError || error instanceof InputTypeError || error instanceof DomainError)) throw error;
    if (matrix.suppressMessages) return { ok: false, grade_decimal: 0, msg: "" };
    if (
      (error instanceof ShapeError && !matrix.shapeErrors) ||
      (error instanceof InputTypeError && !matrix.mismatchRaised)
    ) {
      return { ok: false, grade_decimal: 0, msg: error.message };
    }
    throw error;
  }
}

// =============================================================================
// COMPARER ANSWERS
// =============================================================================

/** Check a submission against a comparer answer (a plain expression uses equality) */
export function checkComparerAnswer(
  ctx: CheckContext,
  answer: Answer,
  comparer: Comparer,
  params: readonly ParsedExpression[],
  student: ParsedExpression,
): NormalizedResult {
  const { settings } = ctx;
  const samples = drawTrials(ctx, usedVariables([student, ...params]));

  const errors: GraderError[] = [];
  const paramsPerTrial: Value[][] = [];
  const studentPerTrial: Value[] = [];
  samples.forEach((sample, k) => {
    const scope = trialScope(settings, sample);
    const values = params.map((parsed) => evaluateInstructor(parsed, scope, settings));
    const outcome = captureStudent(() => evaluate(student, studentScope(settings, scope), settings.evaluation).value);
    traceTrial(ctx, k, sample, [
      `  Comparer params: [${values.map(formatValue).join(", ")}]`,
      "error" in outcome ? `  Student error: ${outcome.error.message}` : `  Student value: ${formatValue(outcome.value)}`,
    ]);
    if ("error" in outcome) {
      errors.push(outcome.error);
      return;
    }
    paramsPerTrial.push(values);
    studentPerTrial.push(outcome.value);
  });

  const [firstError] = errors;
  if (firstError !== undefined && errors.length >= ctx.trials) throw firstError;

  const results = comparer.correlated
    ? [normalizeResult(comparer.compare(paramsPerTrial, studentPerTrial, ctx.utils))]
    : studentPerTrial.map((value, k) => normalizeResult(comparer.compare(paramsPerTrial[k] ?? [], value, ctx.utils)));
  traceResults(ctx, comparer.name, results);

  return consolidate(answer, errors, results, {
    trials: ctx.trials,
    failableEvals: settings.failableEvals,
    correlated: comparer.correlated,
  });
}

// =============================================================================
// SUM AND INTEGRAL ANSWERS
// =============================================================================

const NOUNS: Record<RangeKind, { title: string; noun: string }> = {
  sum: { title: "Summation", noun: "sum" },
  integral: { title: "Integration", noun: "integral" },
};

function usesFactorial(range: ParsedRange): boolean {
  return [range.lower, range.upper, range.body].some(
    (parsed) => parsed.usage.functions.has("fact") || parsed.usage.functions.has("factorial"),
  );
}

function evaluateLimit(parsed: ParsedExpression, scope: Scope, settings: GraderSettings): Value {
  return evaluate(parsed, scope, { ...settings.evaluation, allowInf: true }).value;
}

function computeSum(range: ParsedRange, scope: Scope, settings: GraderSettings): Value {
  if (scope.variables.has(range.variable)) {
    throw new InvalidInputError(`Summation variable ${range.variable} conflicts with another previously-defined variable.`);
  }
  const limits = summationLimits(evaluateLimit(range.lower, scope, settings), evaluateLimit(range.upper, scope, settings));
  const { evenOdd, inftyVal, inftyValFact } = settings.sum;
  const term = (n: number): Value =>
    evaluate(range.body, extendScope(scope, { variables: [[range.variable, complex(n)]] }), settings.evaluation).value;
  return performSummation(term, limits, evenOdd, usesFactorial(range) ? inftyValFact : inftyVal);
}

function computeIntegral(range: ParsedRange, scope: Scope, settings: GraderSettings): Value {
  const lower = evaluateLimit(range.lower, scope, settings);
  const upper = evaluateLimit(range.upper, scope, settings);
  if (isArray(lower) || isArray(upper) || lower.im !== 0 || upper.im !== 0) {
    throw new IntegrationError("Integration limits must be real but have evaluated to complex numbers.");
  }

  const integrand = (x: number): Value =>
    evaluate(range.body, extendScope(scope, { variables: [[range.variable, complex(x)]] }), settings.evaluation).value;
  const options = { limit: settings.integral.maxSubdivisions };

  if (settings.integral.complexIntegrand) {
    const scalar = (x: number): { re: number; im: number } => {
      const value = integrand(x);
      if (isArray(value)) throw new IntegrationError("Integrand must evaluate to a scalar.");
      return value;
    };
    const re = integrate((x) => scalar(x).re, lower.re, upper.re, options);
    const im = integrate((x) => scalar(x).im, lower.re, upper.re, options);
    return complex(re.value, im.value);
  }

  const real = (x: number): number => {
    const value = integrand(x);
    if (isArray(value) || value.im !== 0) {
      throw new IntegrationError("Integrand has evaluated to complex number but must evaluate to a real.");
    }
    return value.re;
  };
  return complex(integrate(real, lower.re, upper.re, options).value);
}

function computeRange(kind: RangeKind, range: ParsedRange, scope: Scope, settings: GraderSettings): Value {
  return kind === "sum" ? computeSum(range, scope, settings) : computeIntegral(range, scope, settings);
}

/** Check a structured sum or integral against the expected one */
export function checkRangeAnswer(
  ctx: CheckContext,
  kind: RangeKind,
  answer: Answer,
  expected: ParsedRange,
  student: ParsedRange,
): NormalizedResult {
  const { settings } = ctx;
  const { title, noun } = NOUNS[kind];
  const used = usedVariables(
    [expected.lower, expected.upper, expected.body, student.lower, student.upper, student.body],
    [expected.variable, student.variable],
  );
  const samples = drawTrials(ctx, used);

  const errors: GraderError[] = [];
  const results: NormalizedResult[] = [];
  samples.forEach((sample, k) => {
    const scope = trialScope(settings, sample);
    let expectedValue: Value;
    try {
      expectedValue = computeRange(kind, expected, scope, settings);
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      throw new ConfigError(`${title} Error with author's stored answer: ${errorMessage(error)}`);
    }

    const outcome = captureStudent(() => {
      try {
        return computeRange(kind, student, studentScope(settings, scope), settings);
      } catch (error) {
        if (error instanceof IntegrationError) {
          throw new IntegrationError(`There appears to be an error with the ${noun} you entered: ${error.message}`);
        }
        throw error;
      }
    });
    traceTrial(ctx, k, sample, [
      `  Instructor value: ${formatValue(expectedValue)}`,
      "error" in outcome ? `  Student error: ${outcome.error.message}` : `  Student value: ${formatValue(outcome.value)}`,
    ]);
    if ("error" in outcome) {
      errors.push(outcome.error);
      return;
    }
    results.push(normalizeResult(ctx.utils.withinTolerance(expectedValue, outcome.value)));
  });
  traceResults(ctx, "equality", results);

  return consolidate(answer, errors, results, {
    trials: ctx.trials,
    failableEvals: settings.failableEvals,
    correlated: false,
  });
}
