import { FastMCP } from "fastmcp";
import { logger } from "./lib/logger.ts";
import { evaluateTool, gradeTool, parseCacheTool } from "./tools/index.ts";

const server = new FastMCP({
  name: "Expression Grader",
  version: "0.1.0",
});

// Register tools
server.addTool(gradeTool);
server.addTool(evaluateTool);
server.addTool(parseCacheTool);

// Start server (stdio for local MCP agents)
server.start({ transportType: "stdio" }).catch((error: unknown) => {
  logger.fatal({ err: error }, "server failed to start");
  process.exitCode = 1;
});
