/**
 * Grader
 * Grade a submission against one or more expected answers by evaluating
 * both sides on randomly sampled variables.
 *
 * Flow per submission:
 * 1. Parse (cached). Parse errors and unknown names are reported at once.
 * 2. Check every answer over the sampled trials; the best result wins.
 * 3. A correct or partially correct result is then validated against the
 *    forbidden strings, required functions and permitted functions.
 *
 * Student mistakes become a diagnostic on the result. Authoring mistakes
 * throw ConfigError.
 */

import {
  ConfigError,
  type ErrorKind,
  errorMessage,
  type GraderError,
  InvalidInputError,
  isGraderError,
} from "../errors.ts";
import { type Logger } from "../logger.ts";
import type { MathFunction } from "../math/domain.ts";
import { checkScope } from "../math/evaluator.ts";
import type { Scope } from "../math/functions.ts";
import type { ParsedExpression } from "../math/parser.ts";
import { stripWhitespace } from "../math/tokenizer.ts";
import { numberedVarsRegExp } from "../sampling/engine.ts";
import { randomSeed } from "../sampling/rng.ts";
import { ZERO } from "../math/complex.ts";
import {
  type CheckContext,
  checkComparerAnswer,
  checkRangeAnswer,
  type ParsedRange,
  withMatrixHandling,
} from "./checks.ts";
import { createComparerUtils, type NormalizedResult, type Verdict } from "./comparers.ts";
import { type GraderConfig, parseGraderConfig } from "./config.ts";
import {
  type Answer,
  type GraderSettings,
  isRangeKind,
  type RangeExpression,
  type RangeKind,
  resolveSettings,
} from "./kinds.ts";
import { GradingSession } from "./session.ts";

// =============================================================================
// TYPES
// =============================================================================

/**
 * A submission: one expression, or for the sum and integral kinds the
 * fields of the sum or integral. Fields left out take the first answer's.
 */
export type Submission = string | readonly string[] | Readonly<Record<string, string>>;

export interface GradeOptions {
  /** Seed for the trial samples; random when omitted and returned on the result */
  seed?: number;
  /** Replaces the configured trial count */
  samples?: number;
}

export interface Diagnostic {
  kind: ErrorKind;
  message: string;
}

export interface GradeResult {
  matched: Verdict;
  credit: number;
  message: string;
  diagnostic?: Diagnostic;
  seed: number;
  trials: number;
  debug?: string[];
}

export interface GraderOptions {
  session?: GradingSession;
}

const RANGE_FIELDS: Record<RangeKind, readonly [string, string, string, string]> = {
  sum: ["lower", "upper", "summand", "summation_variable"],
  integral: ["lower", "upper", "integrand", "integration_variable"],
};

const VARIABLE_NAME = /^[A-Za-z][A-Za-z0-9_]*'*$/;

// Only membership matters when checking names
const placeholder: MathFunction = () => ZERO;

type PreparedSubmission =
  | { type: "expression"; parsed: ParsedExpression }
  | { type: "range"; range: ParsedRange; parsed: ParsedExpression[] };

// =============================================================================
// GRADER
// =============================================================================

export class Grader {
  readonly settings: GraderSettings;
  private readonly session: GradingSession;
  private readonly log: Logger;

  constructor(config: GraderConfig, options: GraderOptions = {}) {
    this.session = options.session ?? new GradingSession();
    this.log = this.session.log;
    this.settings = resolveSettings(parseGraderConfig(config), this.session.config.debug);
    // Parse every instructor expression now so authoring mistakes fail early
    for (const answer of this.settings.answers) this.parseAnswer(answer);
    this.log.debug({ kind: this.settings.kind, answers: this.settings.answers.length }, "grader created");
  }

  /**
   * Grade a submission.
   *
   * @example
   * const grader = new Grader({ answers: "x^2", variables: ["x"] });
   * grader.grade("x*x", { seed: 1 }).matched  // true
   */
  grade(student: Submission, options: GradeOptions = {}): GradeResult {
    const seed = options.seed ?? randomSeed();
    const trials = options.samples ?? this.settings.samples;
    if (!Number.isInteger(trials) || trials < 1) {
      throw new ConfigError(`samples must be a positive integer, received ${trials}`);
    }
    const trace: string[] | null = this.settings.debug ? [] : null;
    const base = { seed, trials, ...(trace ? { debug: trace } : {}) };

    try {
      const prepared = this.prepare(student);
      const { result, usedFunctions } = this.checkAnswers(prepared, { seed, trials, trace });
      if (result.ok === true || result.ok === "partial") {
        this.validateSubmission(student, usedFunctions);
      }
      this.log.debug({ seed, matched: result.ok, credit: result.grade_decimal }, "submission graded");
      return { matched: result.ok, credit: result.grade_decimal, message: result.msg, ...base };
    } catch (error) {
      const diagnostic = this.diagnose(error, student);
      this.log.debug({ seed, diagnostic }, "submission rejected");
      trace?.push(`Diagnostic: ${diagnostic.kind}: ${diagnostic.message}`);
      return { matched: false, credit: 0, message: diagnostic.message, diagnostic, ...base };
    }
  }

  // ===========================================================================
  // PREPARATION
  // ===========================================================================

  private parseAnswer(answer: Answer): ParsedExpression[] {
    const { expect } = answer;
    if (expect.type === "comparer") {
      return expect.params.map((param) => this.session.parseInstructor(param));
    }
    const { lower, upper, body } = expect.range;
    return [lower, upper, body].map((field) => this.session.parseInstructor(field));
  }

  private parseRange(range: RangeExpression, parse: (expr: string) => ParsedExpression): ParsedRange {
    return { lower: parse(range.lower), upper: parse(range.upper), body: parse(range.body), variable: range.variable };
  }

  /** Parse the submission and check every name it uses is available to students */
  private prepare(student: Submission): PreparedSubmission {
    const { kind } = this.settings;
    if (!isRangeKind(kind)) {
      if (typeof student !== "string") {
        throw new ConfigError(`The ${kind} kind grades a single expression, received ${JSON.stringify(student)}`);
      }
      const parsed = this.session.parse(student);
      this.checkNames([parsed], []);
      return { type: "expression", parsed };
    }

    const fields = this.structure(student, kind);
    this.validateDummyVariable(fields.variable, kind);
    const range = this.parseRange(fields, (expr) => this.session.parse(expr));
    const parsed = [range.lower, range.upper, range.body];
    this.checkNames(parsed, [fields.variable]);
    return { type: "range", range, parsed };
  }

  /** Fill a sum or integral submission's fields, taking missing ones from the first answer */
  private structure(student: Submission, kind: RangeKind): RangeExpression {
    const [first] = this.settings.answers;
    const fallback = first?.expect.type === "range" ? first.expect.range : undefined;
    if (fallback === undefined) {
      throw new ConfigError(`The ${kind} kind needs at least one structured answer`);
    }

    const keys = RANGE_FIELDS[kind];
    let values: Record<string, string>;
    if (typeof student === "string") {
      values = { [keys[2]]: student };
    } else if (isStringList(student)) {
      if (student.length !== keys.length) {
        throw new ConfigError(
          `Expected ${keys.length} student inputs but found ${student.length}. Inputs should be ordered as ${keys.join(", ")}.`,
        );
      }
      values = Object.fromEntries(keys.map((key, k) => [key, student[k] ?? ""]));
    } else {
      values = { ...student };
    }

    const [lowerKey, upperKey, bodyKey, variableKey] = keys;
    const fields: RangeExpression = {
      lower: values[lowerKey] ?? fallback.lower,
      upper: values[upperKey] ?? fallback.upper,
      body: values[bodyKey] ?? fallback.body,
      variable: (values[variableKey] ?? fallback.variable).trim(),
    };
    const named: Array<[string, string]> = [
      [lowerKey, fields.lower],
      [upperKey, fields.upper],
      [bodyKey, fields.body],
      [variableKey, fields.variable],
    ];
    for (const [key, value] of named) {
      if (value.trim() === "") {
        throw new InvalidInputError(`Please enter a value for ${key}, it cannot be empty.`);
      }
    }
    return fields;
  }

  private validateDummyVariable(name: string, kind: RangeKind): void {
    const adjective = kind === "sum" ? "summation" : "integration";
    const { scope, randomFunctions } = this.settings;
    if (scope.functions.has(name) || randomFunctions.has(name) || scope.variables.has(name)) {
      throw new InvalidInputError(
        `Cannot use ${name} as ${adjective} variable; it already has another meaning in this problem.`,
      );
    }
    if (!VARIABLE_NAME.test(name)) {
      const title = adjective.charAt(0).toUpperCase() + adjective.slice(1);
      throw new InvalidInputError(
        `${title} variable ${name} is an invalid variable name. ` +
          "Variable name should begin with a letter and contain alphanumeric characters " +
          "or underscores thereafter, but may end in single quotes.",
      );
    }
  }

  /** Unknown and instructor-only names are rejected before any sampling */
  private checkNames(parsed: readonly ParsedExpression[], dummies: readonly string[]): void {
    const { scope, variables, numberedVars, instructorVars, randomFunctions } = this.settings;
    const names = new Set([...scope.variables.keys(), ...variables, ...dummies]);
    if (numberedVars.length > 0) {
      const pattern = numberedVarsRegExp(numberedVars);
      for (const expression of parsed) {
        for (const name of expression.usage.variables) {
          if (pattern.test(name)) names.add(name);
        }
      }
    }
    for (const name of instructorVars) names.delete(name);

    const available: Scope = {
      variables: new Map([...names].map((name) => [name, ZERO])),
      functions: new Map([...scope.functions, ...[...randomFunctions.keys()].map((name): [string, MathFunction] => [name, placeholder])]),
      suffixes: scope.suffixes,
    };
    for (const expression of parsed) checkScope(expression, available);
  }

  // ===========================================================================
  // CHECKING
  // ===========================================================================

  /**
   * Check every answer and keep the best result, the first on ties.
   * An answer whose check raised a student-facing error only decides the
   * outcome when no answer gave any credit.
   */
  private checkAnswers(
    prepared: PreparedSubmission,
    run: { seed: number; trials: number; trace: string[] | null },
  ): { result: NormalizedResult; usedFunctions: Set<string> } {
    const { settings } = this;
    const ctx: CheckContext = {
      settings,
      utils: createComparerUtils(settings.tolerance, settings.matrix?.shapeDetail),
      seed: run.seed,
      trials: run.trials,
      log: this.log,
      trace: run.trace,
    };

    let best: NormalizedResult | undefined;
    let firstError: GraderError | undefined;
    for (const [k, answer] of settings.answers.entries()) {
      run.trace?.push(`Answer ${k + 1} of ${settings.answers.length}`);
      try {
        const result = withMatrixHandling(settings, () => this.checkAnswer(ctx, answer, prepared));
        if (best === undefined || result.grade_decimal > best.grade_decimal) best = result;
      } catch (error) {
        if (error instanceof ConfigError || !isGraderError(error)) throw error;
        firstError ??= error;
      }
    }

    if (firstError !== undefined && (best === undefined || best.grade_decimal === 0)) throw firstError;
    const parsed = prepared.type === "expression" ? [prepared.parsed] : prepared.parsed;
    const usedFunctions = new Set(parsed.flatMap((expression) => [...expression.usage.functions]));
    return { result: best ?? { ok: false, grade_decimal: 0, msg: "" }, usedFunctions };
  }

  private checkAnswer(ctx: CheckContext, answer: Answer, prepared: PreparedSubmission): NormalizedResult {
    const { expect } = answer;
    const { kind } = this.settings;
    if (expect.type === "comparer" && prepared.type === "expression") {
      const params = expect.params.map((param) => this.session.parseInstructor(param));
      return checkComparerAnswer(ctx, answer, expect.comparer, params, prepared.parsed);
    }
    if (expect.type === "range" && prepared.type === "range" && isRangeKind(kind)) {
      const expected = this.parseRange(expect.range, (expr) => this.session.parseInstructor(expr));
      return checkRangeAnswer(ctx, kind, answer, expected, prepared.range);
    }
    throw new ConfigError(`Answer does not match the ${kind} kind`);
  }

  // ===========================================================================
  // VALIDATION AND DIAGNOSTICS
  // ===========================================================================

  private validateSubmission(student: Submission, usedFunctions: ReadonlySet<string>): void {
    const { forbiddenStrings, forbiddenMessage, requiredFunctions, permittedFunctions } = this.settings;

    const texts = submissionTexts(student).map(stripWhitespace);
    const forbidden = forbiddenStrings.map(stripWhitespace).filter((text) => text !== "");
    if (texts.some((text) => forbidden.some((fragment) => text.includes(fragment)))) {
      throw new InvalidInputError(forbiddenMessage);
    }

    for (const name of requiredFunctions) {
      if (!usedFunctions.has(name)) {
        throw new InvalidInputError(`Invalid Input: Answer must contain the function ${name}`);
      }
    }

    const notPermitted = [...usedFunctions].filter((name) => !permittedFunctions.has(name)).sort();
    if (notPermitted.length > 0) {
      const names = notPermitted.map((name) => `'${name}'`).join(", ");
      throw new InvalidInputError(`Invalid Input: function(s) ${names} not permitted in answer`);
    }
  }

  /** Student-facing errors keep their message; anything unexpected becomes a generic one */
  private diagnose(error: unknown, student: Submission): Diagnostic {
    if (error instanceof ConfigError) throw error;
    if (isGraderError(error)) {
      return { kind: error.kind, message: error.message };
    }
    this.log.warn({ err: error }, "unexpected error while grading");
    const input = submissionTexts(student).join(", ");
    const message = `Invalid Input: Could not evaluate '${input}'`;
    return {
      kind: "InvalidInput",
      message: this.settings.debug ? `${message}\n${errorMessage(error)}` : message,
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function isStringList(value: Submission): value is readonly string[] {
  return Array.isArray(value);
}

function submissionTexts(student: Submission): string[] {
  if (typeof student === "string") return [student];
  if (isStringList(student)) return [...student];
  return Object.values(student);
}

/** Build a grader; configuration problems throw ConfigError */
export function createGrader(config: GraderConfig, options: GraderOptions = {}): Grader {
  return new Grader(config, options);
}

/**
 * Build a grader and grade one submission.
 *
 * @example
 * grade({ answers: "sin(x)/cos(x)", variables: ["x"] }, "tan(x)", { seed: 7 }).credit  // 1
 */
export function grade(
  config: GraderConfig,
  student: Submission,
  options: GradeOptions & GraderOptions = {},
): GradeResult {
  const { session, ...gradeOptions } = options;
  return createGrader(config, { session }).grade(student, gradeOptions);
}
