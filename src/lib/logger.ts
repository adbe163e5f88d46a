import pino, { type Logger } from "pino";
import { env } from "./env.ts";

/**
 * Root logger. Writes to stderr: stdout is reserved for the MCP stdio transport.
 */
export const logger = pino(
  {
    level: env.LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: "expression-grader",
      env: env.NODE_ENV,
    },
  },
  pino.destination(2),
);

export type { Logger };

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
