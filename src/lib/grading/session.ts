/**
 * Grading Session
 * Owns the state graders share: the parse cache and the logger.
 *
 * Graders built on the same session reuse parsed expressions. Nothing else
 * crosses between grade calls; each call seeds its own random stream.
 */

import { env } from "../env.ts";
import { ConfigError, errorMessage } from "../errors.ts";
import type { LRUCacheStats } from "../LRUCache.ts";
import { type Logger, moduleLogger } from "../logger.ts";
import { ParseCache } from "../math/cache.ts";
import type { ParsedExpression } from "../math/parser.ts";

interface GradingSessionConfig {
  parse_cache_size: number;
  debug: boolean;
}

const DEFAULT_CONFIG: GradingSessionConfig = {
  parse_cache_size: env.PARSE_CACHE_SIZE,
  debug: env.GRADER_DEBUG,
};

export class GradingSession {
  readonly config: GradingSessionConfig;
  readonly log: Logger;
  private readonly cache: ParseCache;

  constructor(config: Partial<GradingSessionConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.cache = new ParseCache(this.config.parse_cache_size);
    this.log = moduleLogger("grader");
  }

  /** Parse a student expression; failures propagate as ParseError */
  parse(expr: string): ParsedExpression {
    return this.cache.parse(expr);
  }

  /** Parse an instructor expression; any failure is an authoring mistake */
  parseInstructor(expr: string): ParsedExpression {
    try {
      return this.cache.parse(expr);
    } catch (error) {
      throw new ConfigError(`Invalid instructor expression '${expr}': ${errorMessage(error)}`);
    }
  }

  getStats(): LRUCacheStats {
    return this.cache.getStats();
  }

  clear(): void {
    this.cache.clear();
  }
}
