import { z } from "zod";
import { ConfigError, isGraderError } from "../lib/errors.ts";
import { buildConstant } from "../lib/grading/kinds.ts";
import type { Value } from "../lib/math/array.ts";
import { formatValue } from "../lib/math/array.ts";
import { evaluate } from "../lib/math/evaluator.ts";
import { defaultScope, type Scope } from "../lib/math/functions.ts";
import { formatConfigError } from "./grade.ts";
import { log, session } from "./context.ts";

/**
 * Evaluate tool - compute an expression at fixed values, using the same
 * parser and default functions the grader samples with
 */
export const evaluateTool = {
  name: "evaluate",
  description: `Evaluate a math expression at given variable values.

Supports complex numbers, vectors and matrices ([1, 2], [[1, 2], [3, 4]]),
the grader's default functions and constants, and the % suffix.
Useful for checking what an instructor answer evaluates to.`,

  parameters: z.object({
    expression: z.string().describe("Expression to evaluate, e.g. 'sin(x)^2 + cos(x)^2'"),
    variables: z
      .record(z.string(), z.unknown())
      .default({})
      .describe("Values by name: a number, { re, im }, or nested arrays of those"),
    metric_suffixes: z.boolean().default(false).describe("Allow k, M, m, u, n ... suffixes on numbers"),
    max_array_dim: z.number().int().nonnegative().optional().describe("Highest array rank allowed in input"),
  }),

  execute: async (args: {
    expression: string;
    variables?: Record<string, unknown>;
    metric_suffixes?: boolean;
    max_array_dim?: number;
  }): Promise<string> => {
    try {
      const scope = buildScope(args.variables ?? {}, args.metric_suffixes ?? false);
      const parsed = session.parse(args.expression);
      const { value, usage } = evaluate(parsed, scope, { maxArrayDim: args.max_array_dim });
      const lines = [`**Result:** \`${formatValue(value)}\``];
      if (usage.functions.size > 0) {
        lines.push(`**Functions:** ${[...usage.functions].sort().join(", ")}`);
      }
      return lines.join("\n");
    } catch (error) {
      if (error instanceof ConfigError) {
        log.error({ err: error }, "evaluate variables rejected");
        return formatConfigError(error);
      }
      if (!isGraderError(error)) throw error;
      return `**${error.kind}:** ${error.message}`;
    }
  },
};

function buildScope(variables: Record<string, unknown>, metricSuffixes: boolean): Scope {
  const scope = defaultScope({ metricSuffixes, arrayFunctions: true });
  const bindings = new Map<string, Value>(scope.variables);
  for (const [name, input] of Object.entries(variables)) {
    const value = buildConstant(input, name);
    if (value === null) {
      bindings.delete(name);
    } else {
      bindings.set(name, value);
    }
  }
  return { ...scope, variables: bindings };
}
