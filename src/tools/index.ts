export { parseCacheTool } from "./cache.ts";
export { evaluateTool } from "./evaluate.ts";
export { gradeTool } from "./grade.ts";
