/**
 * Grader Kinds
 * Capability presets and the resolution of a validated configuration into
 * the settings one grader runs with.
 *
 * A kind only changes defaults and what is in scope. Every kind shares the
 * same evaluation and comparison core.
 */

import { z } from "zod";
import { ConfigError } from "../errors.ts";
import { MathArray, type Value } from "../math/array.ts";
import { complex, isComplex } from "../math/complex.ts";
import type { MathFunction } from "../math/domain.ts";
import type { EvaluationOptions } from "../math/evaluator.ts";
import {
  CARTESIAN_IJK,
  CARTESIAN_XYZ,
  DEFAULT_FUNCTIONS,
  DEFAULT_VARIABLES,
  defaultScope,
  PAULI_MATRICES,
  type Scope,
} from "../math/functions.ts";
import { buildFunctionSet, buildVariableSet, isSamplingSet } from "../sampling/schema.ts";
import type { VariableSet } from "../sampling/engine.ts";
import type { FunctionSamplingSet } from "../sampling/sets.ts";
import {
  betweenComparer,
  type Comparer,
  constantMultipleComparer,
  congruenceComparer,
  eigenvectorComparer,
  equalityComparer,
  makeConstantMultipleComparer,
  type ShapeMessageDetail,
  vectorPhaseComparer,
  vectorSpanComparer,
  type Verdict,
} from "./comparers.ts";
import {
  type AnswerInput,
  type ComparerName,
  type ComparerRef,
  type Expect,
  type GraderKind,
  isComparer,
  isMathFunction,
  type ParsedGraderConfig,
} from "./config.ts";
import { LinearComparer } from "./linear.ts";
import { parseTolerance, type Tolerance, type ToleranceInput } from "./tolerance.ts";

// =============================================================================
// PRESETS
// =============================================================================

interface KindPreset {
  samples: number;
  tolerance: ToleranceInput;
  maxArrayDim: number;
}

export const KIND_PRESETS: Record<GraderKind, KindPreset> = {
  formula: { samples: 5, tolerance: "0.01%", maxArrayDim: 0 },
  numerical: { samples: 1, tolerance: "5%", maxArrayDim: 0 },
  matrix: { samples: 5, tolerance: "0.01%", maxArrayDim: 1 },
  sum: { samples: 2, tolerance: 1e-12, maxArrayDim: 0 },
  integral: { samples: 1, tolerance: "0.01%", maxArrayDim: 0 },
};

export const DEFAULT_FORBIDDEN_MESSAGE = "Invalid Input: This particular answer is forbidden";

/** Kinds whose answers bind a dummy variable over a range */
export type RangeKind = "sum" | "integral";

export function isRangeKind(kind: GraderKind): kind is RangeKind {
  return kind === "sum" || kind === "integral";
}

// =============================================================================
// SETTINGS
// =============================================================================

/** A structured sum or integral; body is the summand or integrand */
export interface RangeExpression {
  lower: string;
  upper: string;
  body: string;
  variable: string;
}

export type Expectation =
  | { type: "comparer"; comparer: Comparer; params: readonly string[] }
  | { type: "range"; range: RangeExpression };

export interface Answer {
  expect: Expectation;
  ok: Verdict;
  grade_decimal: number;
  msg: string;
}

export interface MatrixSettings {
  shapeErrors: boolean;
  mismatchRaised: boolean;
  shapeDetail: ShapeMessageDetail;
  suppressMessages: boolean;
}

export interface SumSettings {
  inftyVal: number;
  inftyValFact: number;
  evenOdd: 0 | 1 | 2;
}

export interface IntegralSettings {
  complexIntegrand: boolean;
  maxSubdivisions: number;
}

export interface GraderSettings {
  kind: GraderKind;
  answers: readonly Answer[];
  variables: readonly string[];
  numberedVars: readonly string[];
  sampleFrom: ReadonlyMap<string, VariableSet>;
  samples: number;
  failableEvals: number;
  tolerance: Tolerance;
  /** Constants, fixed functions and suffixes; sampled values are layered on per trial */
  scope: Scope;
  randomFunctions: ReadonlyMap<string, FunctionSamplingSet>;
  permittedFunctions: ReadonlySet<string>;
  forbiddenStrings: readonly string[];
  forbiddenMessage: string;
  requiredFunctions: readonly string[];
  instructorVars: readonly string[];
  evaluation: EvaluationOptions;
  debug: boolean;
  matrix: MatrixSettings | null;
  sum: SumSettings;
  integral: IntegralSettings;
}

// =============================================================================
// ANSWERS
// =============================================================================

function resolveComparer(ref: ComparerRef): Comparer {
  if (typeof ref === "string") return namedComparer(ref);
  if (isComparer(ref)) return ref;
  if (ref.type === "LinearComparer") {
    const { type: _type, ...options } = ref;
    return new LinearComparer(options);
  }
  return makeConstantMultipleComparer({ grade_decimal: ref.grade_decimal, msg: ref.msg });
}

function namedComparer(name: ComparerName): Comparer {
  switch (name) {
    case "equality":
      return equalityComparer;
    case "between":
      return betweenComparer;
    case "congruence":
      return congruenceComparer;
    case "eigenvector":
      return eigenvectorComparer;
    case "vector_span":
      return vectorSpanComparer;
    case "vector_phase":
      return vectorPhaseComparer;
    case "constant_multiple":
      return constantMultipleComparer;
    case "linear":
      return new LinearComparer();
  }
}

function inferVerdict(grade: number): Verdict {
  if (grade === 1) return true;
  if (grade === 0) return false;
  return "partial";
}

const RANGE_WORDING: Record<RangeKind, { body: string; variable: string }> = {
  sum: { body: "summand", variable: "summation_variable" },
  integral: { body: "integrand", variable: "integration_variable" },
};

function resolveExpectation(expect: Expect, kind: GraderKind): Expectation {
  if (isRangeKind(kind)) {
    if (typeof expect === "object" && "lower" in expect) {
      if (kind === "sum" && "summand" in expect) {
        return {
          type: "range",
          range: { lower: expect.lower, upper: expect.upper, body: expect.summand, variable: expect.summation_variable },
        };
      }
      if (kind === "integral" && "integrand" in expect) {
        return {
          type: "range",
          range: {
            lower: expect.lower,
            upper: expect.upper,
            body: expect.integrand,
            variable: expect.integration_variable,
          },
        };
      }
    }
    const { body, variable } = RANGE_WORDING[kind];
    throw new ConfigError(
      `The ${kind} kind expects answers with keys 'lower', 'upper', '${body}' and '${variable}'`,
    );
  }

  if (typeof expect === "string") {
    return { type: "comparer", comparer: equalityComparer, params: [expect] };
  }
  if ("comparer" in expect) {
    return { type: "comparer", comparer: resolveComparer(expect.comparer), params: expect.comparer_params };
  }
  throw new ConfigError(`Structured sum and integral answers need the sum or integral kind, not ${kind}`);
}

/**
 * Normalize configured answers to full answer records.
 * A bare expectation is worth full credit.
 */
export function resolveAnswers(answers: AnswerInput | AnswerInput[], kind: GraderKind): Answer[] {
  const list = Array.isArray(answers) ? answers : [answers];
  return list.map((answer): Answer => {
    if (typeof answer === "object" && "expect" in answer) {
      const grade = answer.grade_decimal ?? 1;
      return {
        expect: resolveExpectation(answer.expect, kind),
        grade_decimal: grade,
        ok: answer.ok ?? inferVerdict(grade),
        msg: answer.msg ?? "",
      };
    }
    return { expect: resolveExpectation(answer, kind), grade_decimal: 1, ok: true, msg: "" };
  });
}

// =============================================================================
// CONSTANTS AND FUNCTIONS
// =============================================================================

const ScalarConstantSchema = z.union([
  z.number(),
  z.object({ re: z.number(), im: z.number().default(0) }),
]);

/** A user constant as a value; null removes a default of the same name */
export function buildConstant(input: unknown, name: string): Value | null {
  if (input === null) return null;
  if (input instanceof MathArray || isComplex(input)) return input;
  if (Array.isArray(input)) {
    const entries = input.map((item: unknown) => buildConstant(item, name));
    const values: Value[] = [];
    for (const entry of entries) {
      if (entry === null) throw new ConfigError(`user_constants entry '${name}' cannot contain null`);
      values.push(entry);
    }
    const stacked = MathArray.stack(values);
    if (stacked === null) {
      throw new ConfigError(`user_constants entry '${name}' is not a rectangular array`);
    }
    return stacked;
  }
  const result = ScalarConstantSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`user_constants entry '${name}' must be a number, a complex number or an array`);
  }
  const parsed = result.data;
  return typeof parsed === "number" ? complex(parsed) : complex(parsed.re, parsed.im);
}

function resolveUserFunctions(input: Record<string, unknown>): {
  fixed: Map<string, MathFunction>;
  random: Map<string, FunctionSamplingSet>;
} {
  const fixed = new Map<string, MathFunction>();
  const random = new Map<string, FunctionSamplingSet>();
  for (const [name, description] of Object.entries(input)) {
    if (isMathFunction(description)) {
      fixed.set(name, description);
      continue;
    }
    const built =
      isSamplingSet(description) && description.kind === "function" ? description : buildFunctionSet(description, name);
    if (isMathFunction(built)) {
      fixed.set(name, built);
    } else {
      random.set(name, built);
    }
  }
  return { fixed, random };
}

function resolveSampleFrom(
  input: Record<string, unknown>,
  declared: readonly string[],
): Map<string, VariableSet> {
  const undeclared = Object.keys(input)
    .filter((name) => !declared.includes(name))
    .sort();
  if (undeclared.length > 0) {
    throw new ConfigError(`sample_from contains entries for undeclared variables: ${formatList(undeclared)}`);
  }
  const sets = new Map<string, VariableSet>();
  for (const [name, description] of Object.entries(input)) {
    if (isSamplingSet(description) && description.kind !== "function") {
      sets.set(name, description);
    } else {
      sets.set(name, buildVariableSet(description, name));
    }
  }
  return sets;
}

// =============================================================================
// VALIDATION
// =============================================================================

const formatList = (names: readonly string[]): string => `['${names.join("', '")}']`;

function warnIfOverride(key: string, names: Iterable<string>, defaults: ReadonlyMap<string, unknown>): void {
  const duplicates = [...new Set(names)].filter((name) => defaults.has(name)).sort();
  if (duplicates.length === 0) return;
  const quoted = duplicates.map((name) => `'${name}'`).join(", ");
  throw new ConfigError(
    `Warning: '${key}' contains entries ${quoted} which will override default values. ` +
      "If you intend to override defaults, you may suppress this warning by adding " +
      "'suppress_warnings=True' to the grader configuration.",
  );
}

function validateNoCollisions(sets: Record<string, readonly string[]>): void {
  const keys = Object.keys(sets).sort();
  keys.forEach((first, k) => {
    for (const second of keys.slice(k + 1)) {
      const other = new Set(sets[second]);
      const duplicates = [...new Set(sets[first])].filter((name) => other.has(name)).sort();
      if (duplicates.length > 0) {
        throw new ConfigError(`'${first}' and '${second}' contain duplicate entries: ${formatList(duplicates)}`);
      }
    }
  });
}

/**
 * Functions a correct submission may use.
 * An empty whitelist means every default minus the blacklist; [null] means
 * none of the defaults. User functions are always allowed.
 */
export function permittedFunctions(
  defaults: Iterable<string>,
  whitelist: readonly (string | null)[],
  blacklist: readonly string[],
  alwaysAllowed: Iterable<string>,
): Set<string> {
  const permitted = new Set(alwaysAllowed);
  if (whitelist.length === 0) {
    for (const name of defaults) {
      if (!blacklist.includes(name)) permitted.add(name);
    }
  } else {
    for (const name of whitelist) {
      if (name !== null) permitted.add(name);
    }
  }
  return permitted;
}

function validateFunctionLists(
  defaults: ReadonlyMap<string, MathFunction>,
  whitelist: readonly (string | null)[],
  blacklist: readonly string[],
): void {
  if (whitelist.length > 0 && blacklist.length > 0) {
    throw new ConfigError("Cannot whitelist and blacklist at the same time");
  }
  for (const name of blacklist) {
    if (!defaults.has(name)) throw new ConfigError(`Unknown function in blacklist: ${name}`);
  }
  if (whitelist.length === 1 && whitelist[0] === null) return;
  for (const name of whitelist) {
    if (name === null || !defaults.has(name)) {
      throw new ConfigError(`Unknown function in whitelist: ${name}`);
    }
  }
}

function validateNumerical(config: ParsedGraderConfig, randomFunctions: ReadonlyMap<string, unknown>): void {
  const offending: string[] = [];
  if ((config.variables ?? []).length > 0) offending.push("variables");
  if ((config.numbered_vars ?? []).length > 0) offending.push("numbered_vars");
  if (Object.keys(config.sample_from ?? {}).length > 0) offending.push("sample_from");
  if (randomFunctions.size > 0) offending.push("random user_functions");
  if (config.samples !== undefined && config.samples !== 1) offending.push("samples other than 1");
  if (config.failable_evals !== undefined && config.failable_evals !== 0) offending.push("failable_evals");
  if (offending.length > 0) {
    throw new ConfigError(`The numerical kind does not accept ${offending.join(", ")}`);
  }
}

// =============================================================================
// RESOLUTION
// =============================================================================

/** Names and values the kind adds before user configuration is applied */
function kindDefaults(config: ParsedGraderConfig): { variables: Map<string, Value>; functions: Map<string, MathFunction> } {
  const base = defaultScope({ arrayFunctions: config.kind === "matrix" });
  const variables = new Map(base.variables);
  if (config.kind === "matrix") {
    for (const table of [PAULI_MATRICES, CARTESIAN_XYZ, CARTESIAN_IJK]) {
      for (const [name, value] of table) variables.set(name, value);
    }
  }
  if (isRangeKind(config.kind)) {
    variables.set("infty", complex(Number.POSITIVE_INFINITY));
  }
  return { variables, functions: new Map(base.functions) };
}

/**
 * Resolve a validated configuration into grader settings.
 * Every authoring mistake surfaces here as a ConfigError.
 */
export function resolveSettings(config: ParsedGraderConfig, debugDefault = false): GraderSettings {
  const preset = KIND_PRESETS[config.kind];
  const defaults = kindDefaults(config);
  const whitelist = config.whitelist ?? [];
  const blacklist = config.blacklist ?? [];
  validateFunctionLists(defaults.functions, whitelist, blacklist);

  const variables = config.variables ?? [];
  const numberedVars = config.numbered_vars ?? [];
  const userConstants = config.user_constants ?? {};
  const userFunctions = config.user_functions ?? {};

  // A null constant deletes the default before overrides are checked
  for (const [name, value] of Object.entries(userConstants)) {
    if (value === null) defaults.variables.delete(name);
  }
  const constantNames = Object.entries(userConstants)
    .filter(([, value]) => value !== null)
    .map(([name]) => name);

  if (!config.suppress_warnings) {
    warnIfOverride("variables", variables, DEFAULT_VARIABLES);
    warnIfOverride("numbered_vars", numberedVars, DEFAULT_VARIABLES);
    warnIfOverride("user_constants", constantNames, DEFAULT_VARIABLES);
    warnIfOverride("user_functions", Object.keys(userFunctions), DEFAULT_FUNCTIONS);
  }
  validateNoCollisions({ variables, user_constants: constantNames });

  const { fixed, random } = resolveUserFunctions(userFunctions);
  if (config.kind === "numerical") validateNumerical(config, random);

  const constants = defaults.variables;
  for (const name of constantNames) {
    const value = buildConstant(userConstants[name], name);
    if (value !== null) constants.set(name, value);
  }
  if (config.kind === "matrix" && config.identity_dim && !constants.has("I")) {
    constants.set("I", MathArray.identity(config.identity_dim));
  }

  const functions = new Map([...defaults.functions, ...fixed]);
  const scope = defaultScope({ metricSuffixes: config.metric_suffixes ?? false });
  const mismatch = config.answer_shape_mismatch ?? { is_raised: true, msg_detail: "type" };
  const maxArrayDim = config.max_array_dim === null ? undefined : (config.max_array_dim ?? preset.maxArrayDim);

  return {
    kind: config.kind,
    answers: resolveAnswers(config.answers, config.kind),
    variables,
    numberedVars,
    sampleFrom: resolveSampleFrom(config.sample_from ?? {}, [...variables, ...numberedVars]),
    samples: config.samples ?? preset.samples,
    failableEvals: config.failable_evals ?? 0,
    tolerance: parseTolerance(config.tolerance ?? preset.tolerance),
    scope: { variables: constants, functions, suffixes: scope.suffixes },
    randomFunctions: random,
    permittedFunctions: permittedFunctions(defaults.functions.keys(), whitelist, blacklist, [
      ...fixed.keys(),
      ...random.keys(),
    ]),
    forbiddenStrings: config.forbidden_strings ?? [],
    forbiddenMessage: config.forbidden_message ?? DEFAULT_FORBIDDEN_MESSAGE,
    requiredFunctions: config.required_functions ?? [],
    instructorVars: config.instructor_vars ?? [],
    evaluation: {
      maxArrayDim,
      allowInf: config.allow_inf ?? false,
      negativePowers: config.negative_powers ?? true,
    },
    debug: config.debug ?? debugDefault,
    matrix:
      config.kind === "matrix"
        ? {
            shapeErrors: config.shape_errors ?? true,
            mismatchRaised: mismatch.is_raised,
            shapeDetail: mismatch.msg_detail,
            suppressMessages: config.suppress_matrix_messages ?? false,
          }
        : null,
    sum: {
      inftyVal: config.infty_val ?? 1e3,
      inftyValFact: config.infty_val_fact ?? 80,
      evenOdd: config.even_odd ?? 0,
    },
    integral: {
      complexIntegrand: config.complex_integrand ?? false,
      maxSubdivisions: config.max_subdivisions ?? 50,
    },
  };
}
