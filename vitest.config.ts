import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Keep pino quiet on stderr during test runs
    env: { LOG_LEVEL: "silent" },
  },
});
