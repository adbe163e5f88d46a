/**
 * Sampling Set Descriptions
 * Zod schemas for sampling sets written as plain data, and their builders.
 *
 * Shorthand accepted wherever a variable's set is given:
 * - [a, b]      RealInterval from a to b
 * - 3.5         DiscreteSet holding the single value
 * - { type }    any set below, by class name
 */

import { z } from "zod";
import { ConfigError } from "../errors.ts";
import { complex } from "../math/complex.ts";
import type { MathFunction } from "../math/domain.ts";
import { DEFAULT_FUNCTIONS } from "../math/functions.ts";
import {
  ComplexMatrices,
  ComplexVectors,
  IdentityMatrixMultiples,
  OrthogonalMatrices,
  RealMatrices,
  RealVectors,
  SquareMatrices,
  UnitaryMatrices,
} from "./arrays.ts";
import { RandomFunction, SpecificFunctions } from "./functions.ts";
import {
  ComplexRectangle,
  ComplexSector,
  DependentSampler,
  DiscreteSet,
  type FunctionSamplingSet,
  IntegerRange,
  RealInterval,
  type SamplingSet,
  type VariableSamplingSet,
} from "./sets.ts";

// =============================================================================
// SCHEMAS
// =============================================================================

const RangeSchema = z.tuple([z.number(), z.number()]).describe("[start, stop]");

const ComplexValueSchema = z
  .object({ re: z.number(), im: z.number().default(0) })
  .describe("Complex number as real and imaginary parts");

const ScalarSetSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("RealInterval"),
    start: z.number().default(1),
    stop: z.number().default(5),
  }),
  z.object({
    type: z.literal("IntegerRange"),
    start: z.number().int().default(1),
    stop: z.number().int().default(5),
  }),
  z.object({
    type: z.literal("ComplexRectangle"),
    re: RangeSchema.default([1, 3]),
    im: RangeSchema.default([1, 3]),
  }),
  z.object({
    type: z.literal("ComplexSector"),
    modulus: RangeSchema.default([1, 3]),
    argument: RangeSchema.default([0, Math.PI / 2]),
  }),
  z.object({
    type: z.literal("DiscreteSet"),
    values: z.union([z.number(), ComplexValueSchema, z.array(z.union([z.number(), ComplexValueSchema])).min(1)]),
  }),
]);

const ScalarSamplerSchema = z.union([z.number(), RangeSchema, ScalarSetSchema]);

const ArraySetSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("RealVectors"),
    shape: z.number().int().positive().default(3),
    norm: RangeSchema.default([1, 5]),
  }),
  z.object({
    type: z.literal("ComplexVectors"),
    shape: z.number().int().positive().default(3),
    norm: RangeSchema.default([1, 5]),
  }),
  z.object({
    type: z.literal("RealMatrices"),
    shape: z.tuple([z.number().int().positive(), z.number().int().positive()]).default([2, 2]),
    norm: RangeSchema.default([1, 5]),
    triangular: z.enum(["upper", "lower"]).nullable().default(null),
  }),
  z.object({
    type: z.literal("ComplexMatrices"),
    shape: z.tuple([z.number().int().positive(), z.number().int().positive()]).default([2, 2]),
    norm: RangeSchema.default([1, 5]),
    triangular: z.enum(["upper", "lower"]).nullable().default(null),
  }),
  z.object({
    type: z.literal("SquareMatrices"),
    dimension: z.number().int().min(2).default(2),
    norm: RangeSchema.default([1, 5]),
    complex: z.boolean().default(false),
    symmetry: z
      .enum(["diagonal", "symmetric", "antisymmetric", "hermitian", "antihermitian"])
      .nullable()
      .default(null),
    traceless: z.boolean().default(false),
    determinant: z.union([z.literal(0), z.literal(1)]).nullable().default(null),
  }),
  z.object({
    type: z.literal("IdentityMatrixMultiples"),
    dimension: z.number().int().min(2).default(2),
    sampler: ScalarSamplerSchema.optional().describe("Set the scalar factor is drawn from"),
  }),
  z.object({
    type: z.literal("OrthogonalMatrices"),
    dimension: z.number().int().min(2).default(2),
    unitdet: z.boolean().default(true),
  }),
  z.object({
    type: z.literal("UnitaryMatrices"),
    dimension: z.number().int().min(2).default(2),
    unitdet: z.boolean().default(true),
  }),
]);

const DependentSchema = z.object({
  type: z.literal("DependentSampler"),
  depends: z.array(z.string()).describe("Variables the formula refers to"),
  formula: z.string(),
});

export const VariableSetSchema = z
  .union([z.number(), RangeSchema, ScalarSetSchema, ArraySetSchema, DependentSchema])
  .describe("Sampling set for a variable: [start, stop], a number, or { type, ... }");

export type VariableSetDescription = z.input<typeof VariableSetSchema>;

export const FunctionSetSchema = z
  .union([
    z.string().describe("Name of a default function"),
    z.array(z.string()).min(1).describe("Names of default functions, one picked per trial"),
    z.object({
      type: z.literal("RandomFunction"),
      input_dim: z.number().int().positive().default(1),
      output_dim: z.number().int().positive().default(1),
      num_terms: z.number().int().positive().default(3),
      center: z.number().default(0),
      amplitude: z.number().positive().default(10),
    }),
    z.object({
      type: z.literal("SpecificFunctions"),
      functions: z.array(z.string()).min(1),
    }),
  ])
  .describe("A default function name, a list of names, or { type: 'RandomFunction', ... }");

export type FunctionSetDescription = z.input<typeof FunctionSetSchema>;

// =============================================================================
// BUILDERS
// =============================================================================

function describeIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function buildScalarSet(parsed: z.output<typeof ScalarSamplerSchema>): VariableSamplingSet {
  if (typeof parsed === "number") return new DiscreteSet(parsed);
  if (Array.isArray(parsed)) return new RealInterval(parsed);
  switch (parsed.type) {
    case "RealInterval":
      return new RealInterval([parsed.start, parsed.stop]);
    case "IntegerRange":
      return new IntegerRange([parsed.start, parsed.stop]);
    case "ComplexRectangle":
      return new ComplexRectangle({ re: parsed.re, im: parsed.im });
    case "ComplexSector":
      return new ComplexSector({ modulus: parsed.modulus, argument: parsed.argument });
    case "DiscreteSet": {
      const { values } = parsed;
      const list = Array.isArray(values) ? values : [values];
      return new DiscreteSet(list.map((v) => (typeof v === "number" ? complex(v) : complex(v.re, v.im))));
    }
  }
}

function buildArraySet(parsed: z.output<typeof ArraySetSchema>): VariableSamplingSet {
  switch (parsed.type) {
    case "RealVectors":
      return new RealVectors({ shape: parsed.shape, norm: parsed.norm });
    case "ComplexVectors":
      return new ComplexVectors({ shape: parsed.shape, norm: parsed.norm });
    case "RealMatrices":
      return new RealMatrices(parsed);
    case "ComplexMatrices":
      return new ComplexMatrices(parsed);
    case "SquareMatrices":
      return new SquareMatrices(parsed);
    case "IdentityMatrixMultiples":
      return new IdentityMatrixMultiples({
        dimension: parsed.dimension,
        sampler: parsed.sampler === undefined ? undefined : buildScalarSet(parsed.sampler),
      });
    case "OrthogonalMatrices":
      return new OrthogonalMatrices(parsed);
    case "UnitaryMatrices":
      return new UnitaryMatrices(parsed);
  }
}

function isScalarSet(
  parsed: z.output<typeof VariableSetSchema>,
): parsed is z.output<typeof ScalarSamplerSchema> {
  if (typeof parsed === "number" || Array.isArray(parsed)) return true;
  return ScalarSetSchema.options.some((option) => option.shape.type.value === parsed.type);
}

/**
 * Build a variable's sampling set from its data description.
 *
 * @example
 * buildVariableSet([0, 1])                           // RealInterval on [0, 1)
 * buildVariableSet({ type: "RealVectors", shape: 2 }) // random 2-vectors
 */
export function buildVariableSet(description: unknown, name = "sample_from"): VariableSamplingSet | DependentSampler {
  const result = VariableSetSchema.safeParse(description);
  if (!result.success) {
    throw new ConfigError(`Invalid sampling set for '${name}': ${describeIssues(result.error)}`);
  }
  const parsed = result.data;
  if (isScalarSet(parsed)) return buildScalarSet(parsed);
  if (parsed.type === "DependentSampler") {
    return new DependentSampler({ depends: parsed.depends, formula: parsed.formula });
  }
  return buildArraySet(parsed);
}

function defaultFunction(name: string): MathFunction {
  const fn = DEFAULT_FUNCTIONS.get(name);
  if (fn === undefined) {
    throw new ConfigError(`Unknown default function: ${name}`);
  }
  return fn;
}

/** Build a user function entry: a fixed function, or a set drawn once per trial */
export function buildFunctionSet(description: unknown, name = "user_functions"): MathFunction | FunctionSamplingSet {
  const result = FunctionSetSchema.safeParse(description);
  if (!result.success) {
    throw new ConfigError(`Invalid function for '${name}': ${describeIssues(result.error)}`);
  }
  const parsed = result.data;
  if (typeof parsed === "string") return defaultFunction(parsed);
  if (Array.isArray(parsed)) return new SpecificFunctions(parsed.map(defaultFunction));
  if (parsed.type === "SpecificFunctions") return new SpecificFunctions(parsed.functions.map(defaultFunction));
  return new RandomFunction(parsed);
}

// =============================================================================
// INSTANCES
// =============================================================================

export function isSamplingSet(value: unknown): value is SamplingSet {
  return (
    value instanceof DependentSampler ||
    (typeof value === "object" &&
      value !== null &&
      "kind" in value &&
      (value.kind === "variable" || value.kind === "function") &&
      "sample" in value &&
      typeof value.sample === "function")
  );
}
