/**
 * Parse cache
 * Bounded LRU store of parsed expressions keyed by whitespace-stripped source.
 */

import { LRUCache, type LRUCacheStats } from "../LRUCache.ts";
import { type ParsedExpression, parse } from "./parser.ts";
import { stripWhitespace } from "./tokenizer.ts";

export class ParseCache {
  private readonly cache: LRUCache<string, ParsedExpression>;

  constructor(maxSize = 500) {
    this.cache = new LRUCache({ maxSize });
  }

  /**
   * Parse an expression, reusing a cached AST when the stripped source matches.
   * Parsing does not depend on grader configuration (suffixes are validated
   * at scope-check time), so the stripped source is the whole key.
   * Failures are not cached.
   */
  parse(expr: string): ParsedExpression {
    const key = stripWhitespace(expr);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    const parsed = parse(key);
    this.cache.set(key, parsed);
    return parsed;
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): LRUCacheStats {
    return this.cache.getStats();
  }

  clear(): void {
    this.cache.clear();
  }
}
