/**
 * Math module barrel export
 * Tokenizer, parser, value model, default scope and evaluator
 */

export * from "./arithmetic.ts";
export * from "./array.ts";
export * from "./ast.ts";
export * from "./cache.ts";
export * from "./complex.ts";
export * from "./domain.ts";
export * from "./evaluator.ts";
export * from "./functions.ts";
export * from "./operators.ts";
export * from "./parser.ts";
export * from "./tokenizer.ts";
