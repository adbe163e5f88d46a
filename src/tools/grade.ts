import { z } from "zod";
import { ConfigError } from "../lib/errors.ts";
import { formatTolerance } from "../lib/grading/tolerance.ts";
import { type GradeResult, Grader, type Submission } from "../lib/grading/grader.ts";
import { parseGraderConfig } from "../lib/grading/config.ts";
import { log, session } from "./context.ts";

/**
 * Grade tool - compare a student expression with the configured answers
 * by numerical sampling
 */
export const gradeTool = {
  name: "grade",
  description: `Grade a student's math expression against one or more expected answers.

Both expressions are evaluated on randomly sampled variable values and compared
within a tolerance. Pass a seed to make the result reproducible; the seed used
is always reported.

Kinds: formula (default), numerical, matrix, sum, integral.`,

  parameters: z.object({
    config: z
      .record(z.string(), z.unknown())
      .describe("Grader configuration, e.g. { answers: 'x^2', variables: ['x'] }"),
    student: z
      .union([z.string(), z.array(z.string()), z.record(z.string(), z.string())])
      .describe("The submission; sum and integral kinds also take their fields as a list or object"),
    seed: z.number().int().optional().describe("Seed for the sampled values"),
    samples: z.number().int().positive().optional().describe("Override the number of trials"),
  }),

  execute: async (args: {
    config: Record<string, unknown>;
    student: Submission;
    seed?: number;
    samples?: number;
  }): Promise<string> => {
    try {
      const grader = new Grader(parseGraderConfig(args.config), { session });
      const result = grader.grade(args.student, { seed: args.seed, samples: args.samples });
      return formatGradeResult(result, formatTolerance(grader.settings.tolerance));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      log.error({ err: error }, "grader configuration rejected");
      return formatConfigError(error);
    }
  },
};

function verdictLabel(result: GradeResult): string {
  if (result.matched === true) return "✅ Correct";
  if (result.matched === "partial") return "🟡 Partially correct";
  return "❌ Incorrect";
}

export function formatGradeResult(result: GradeResult, tolerance: string): string {
  const lines = [
    `**${verdictLabel(result)}**`,
    "",
    `**Credit:** ${result.credit}`,
    `**Seed:** ${result.seed} (${result.trials} trial${result.trials === 1 ? "" : "s"}, tolerance ${tolerance})`,
  ];

  if (result.diagnostic) {
    lines.push(`**${result.diagnostic.kind}:** ${result.diagnostic.message}`);
  } else if (result.message) {
    lines.push(`**Message:** ${result.message}`);
  }

  if (result.debug && result.debug.length > 0) {
    lines.push("", "**Debug**", "```", ...result.debug, "```");
  }

  return lines.join("\n");
}

export function formatConfigError(error: ConfigError): string {
  return ["**Configuration error**", "", "```", error.message, "```"].join("\n");
}
