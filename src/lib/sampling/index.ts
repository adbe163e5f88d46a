/**
 * Sampling module
 * Seeded random sources for grader variables and functions.
 */

export * from "./arrays.ts";
export * from "./engine.ts";
export * from "./functions.ts";
export * from "./rng.ts";
export * from "./schema.ts";
export * from "./sets.ts";
