/**
 * Grader Configuration
 * Zod schemas for grader options, answers and comparer references.
 *
 * Only what the author wrote is validated here; kind presets and defaults are
 * layered on in kinds.ts, and cross-field checks run when the grader is built.
 */

import { z } from "zod";
import { ConfigError } from "../errors.ts";
import type { MathFunction } from "../math/domain.ts";
import type { Comparer } from "./comparers.ts";

// =============================================================================
// COMPARERS
// =============================================================================

export const COMPARER_NAMES = [
  "equality",
  "between",
  "congruence",
  "eigenvector",
  "vector_span",
  "vector_phase",
  "constant_multiple",
  "linear",
] as const;

export type ComparerName = (typeof COMPARER_NAMES)[number];

export function isComparer(value: unknown): value is Comparer {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "correlated" in value &&
    typeof value.correlated === "boolean" &&
    "compare" in value &&
    typeof value.compare === "function"
  );
}

const Credit = z.number().min(0).max(1);

export const ComparerRefSchema = z
  .union([
    z.enum(COMPARER_NAMES),
    z.object({
      type: z.literal("LinearComparer"),
      equals: Credit.nullable().optional(),
      proportional: Credit.nullable().optional(),
      offset: Credit.nullable().optional(),
      linear: Credit.nullable().optional(),
      equals_msg: z.string().optional(),
      proportional_msg: z.string().optional(),
      offset_msg: z.string().optional(),
      linear_msg: z.string().optional(),
    }),
    z.object({
      type: z.literal("ConstantMultipleComparer"),
      grade_decimal: Credit.optional(),
      msg: z.string().optional(),
    }),
    z.custom<Comparer>(isComparer, "Expected a comparer"),
  ])
  .describe("Comparer name, a configured comparer description, or a comparer object");

export type ComparerRef = z.infer<typeof ComparerRefSchema>;

// =============================================================================
// ANSWERS
// =============================================================================

export const ComparerExpectSchema = z.object({
  comparer: ComparerRefSchema,
  comparer_params: z.array(z.string()).min(1).describe("Expressions evaluated and passed to the comparer"),
});

export const SumExpectSchema = z.object({
  lower: z.string(),
  upper: z.string(),
  summand: z.string(),
  summation_variable: z.string(),
});

export const IntegralExpectSchema = z.object({
  lower: z.string(),
  upper: z.string(),
  integrand: z.string(),
  integration_variable: z.string(),
});

export type SumExpect = z.infer<typeof SumExpectSchema>;
export type IntegralExpect = z.infer<typeof IntegralExpectSchema>;

const ExpectSchema = z.union([z.string(), ComparerExpectSchema, SumExpectSchema, IntegralExpectSchema]);

export type Expect = z.infer<typeof ExpectSchema>;

const VerdictSchema = z.union([z.boolean(), z.literal("partial")]);

export const AnswerSchema = z.union([
  z.string(),
  z.object({
    expect: ExpectSchema,
    grade_decimal: Credit.default(1),
    ok: VerdictSchema.optional(),
    msg: z.string().default(""),
  }),
  ComparerExpectSchema,
  SumExpectSchema,
  IntegralExpectSchema,
]);

export type AnswerInput = z.input<typeof AnswerSchema>;

// =============================================================================
// GRADER
// =============================================================================

export const GRADER_KINDS = ["formula", "numerical", "matrix", "sum", "integral"] as const;

export type GraderKind = (typeof GRADER_KINDS)[number];

const Names = z.array(z.string());

export const GraderConfigSchema = z.object({
  answers: z.union([AnswerSchema, z.array(AnswerSchema).min(1)]).describe("Expected answer or list of answers"),
  kind: z.enum(GRADER_KINDS).default("formula").describe("Capability preset"),

  // Sampling
  variables: Names.optional(),
  numbered_vars: Names.optional(),
  sample_from: z.record(z.string(), z.unknown()).optional().describe("Sampling set per variable"),
  samples: z.number().int().positive().optional(),
  failable_evals: z.number().int().nonnegative().optional(),
  tolerance: z.union([z.number().nonnegative(), z.string()]).optional(),

  // Scope
  user_functions: z.record(z.string(), z.unknown()).optional(),
  user_constants: z.record(z.string(), z.unknown()).optional(),
  metric_suffixes: z.boolean().optional(),
  instructor_vars: Names.optional(),
  suppress_warnings: z.boolean().optional(),

  // Submission validation
  blacklist: Names.optional(),
  whitelist: z.array(z.string().nullable()).optional().describe("[null] forbids every default function"),
  forbidden_strings: Names.optional(),
  forbidden_message: z.string().optional(),
  required_functions: Names.optional(),

  // Evaluation
  max_array_dim: z.number().int().nonnegative().nullable().optional(),
  allow_inf: z.boolean().optional(),
  debug: z.boolean().optional(),

  // Matrix kind
  identity_dim: z.number().int().positive().nullable().optional(),
  negative_powers: z.boolean().optional(),
  shape_errors: z.boolean().optional(),
  suppress_matrix_messages: z.boolean().optional(),
  answer_shape_mismatch: z
    .object({
      is_raised: z.boolean().default(true),
      msg_detail: z.enum(["type", "shape"]).nullable().default("type"),
    })
    .optional(),

  // Sum kind
  infty_val: z.number().positive().optional(),
  infty_val_fact: z.number().positive().optional(),
  even_odd: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),

  // Integral kind
  complex_integrand: z.boolean().optional(),
  max_subdivisions: z.number().int().positive().optional(),
});

export type GraderConfig = z.input<typeof GraderConfigSchema>;
export type ParsedGraderConfig = z.output<typeof GraderConfigSchema>;

/**
 * Validate a grader configuration.
 * Every issue is reported at once, each prefixed with its path.
 */
export function parseGraderConfig(input: unknown): ParsedGraderConfig {
  const result = GraderConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors
      .map((err) => `  - ${err.path.join(".") || "(root)"}: ${err.message}`)
      .join("\n");
    throw new ConfigError(`Invalid grader configuration:\n${issues}`);
  }
  return result.data;
}

/** Fixed functions are passed through; anything else is a function set description */
export function isMathFunction(value: unknown): value is MathFunction {
  return typeof value === "function";
}
