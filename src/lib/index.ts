/**
 * Main barrel export for src/lib/
 * Everything needed to grade submissions without the MCP server
 */

export * from "./errors.ts";
export * from "./grading/index.ts";
export { LRUCache, type LRUCacheConfig, type LRUCacheStats } from "./LRUCache.ts";
export * from "./math/index.ts";
export * from "./sampling/index.ts";
