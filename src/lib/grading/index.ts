/**
 * Grading module
 * Comparers, grader kinds and the grade entry points.
 */

export * from "./checks.ts";
export * from "./comparers.ts";
export * from "./config.ts";
export * from "./grader.ts";
export * from "./integration.ts";
export * from "./kinds.ts";
export * from "./linear.ts";
export * from "./session.ts";
export * from "./summation.ts";
export * from "./tolerance.ts";
