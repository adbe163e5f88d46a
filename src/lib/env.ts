import { z } from "zod";
import { ConfigError } from "./errors.ts";

/**
 * Process environment schema
 * Every variable is optional and falls back to a development default
 */
const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  // Grading
  GRADER_DEBUG: z
    .string()
    .default("false")
    .transform((v) => v.toLowerCase() === "true"),
  PARSE_CACHE_SIZE: z.string().regex(/^\d+$/).default("500").transform(Number),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment record.
 * Throws a ConfigError listing every invalid variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => `  - ${err.path.join(".")}: ${err.message}`)
      .join("\n");
    throw new ConfigError(`Environment variable validation failed:\n${errors}`);
  }

  return result.data;
}

export const env = loadEnv();
