import { z } from "zod";
import { log, session } from "./context.ts";

/**
 * Parse cache management
 */
export const parseCacheTool = {
  name: "parse_cache",
  description: "Show parse cache statistics, or clear the cache",
  parameters: z.object({
    action: z.enum(["stats", "clear"]).default("stats").describe("stats (default) or clear"),
  }),
  execute: async (args: { action?: "stats" | "clear" }) => {
    if (args.action === "clear") {
      const { size } = session.getStats();
      session.clear();
      log.info({ cleared: size }, "parse cache cleared");
      return `Cleared ${size} cached expression${size === 1 ? "" : "s"}.`;
    }

    const stats = session.getStats();
    const lookups = stats.hits + stats.misses;
    const hitRate = lookups === 0 ? 0 : stats.hits / lookups;
    return [
      "**Parse Cache**",
      "",
      "| Size | Max | Hits | Misses | Evictions | Hit rate |",
      "|------|-----|------|--------|-----------|----------|",
      `| ${stats.size} | ${stats.maxSize} | ${stats.hits} | ${stats.misses} | ${stats.evictions} | ${(hitRate * 100).toFixed(0)}% |`,
    ].join("\n");
  },
};
