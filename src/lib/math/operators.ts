/**
 * Math Operator Utilities
 * Operator and bracket tables shared by the tokenizer and parser
 */

/** Binary operators, lowest to highest precedence level */
export type BinaryOperator = "+" | "-" | "*" | "/" | "||" | "^";

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: addition/subtraction
 * - Level 2: multiplication/division
 * - Level 3: parallel combination (a||b = 1/(1/a + 1/b))
 * - Level 4: negation (prefix "-", handled by the parser)
 * - Level 5: exponentiation, right-associative
 */
export const OPERATOR_PRECEDENCE: Record<BinaryOperator, number> = {
  "+": 1,
  "-": 1,
  "*": 2,
  "/": 2,
  "||": 3,
  "^": 5,
};

export const NEGATION_PRECEDENCE = 4;

/** Single characters that start an operator token */
const OPERATOR_CHARS = new Set(["+", "-", "*", "/", "^", "|"]);

/** Unicode em dash, read as a minus sign */
export const EM_DASH = "—";

export function isOperatorChar(char: string): boolean {
  return OPERATOR_CHARS.has(char) || char === EM_DASH;
}

/** Normalize operator spelling to its canonical ASCII form */
export function normalizeOperator(op: string): string {
  return op === EM_DASH ? "-" : op;
}

export function getOperatorPrecedence(op: BinaryOperator): number {
  return OPERATOR_PRECEDENCE[op];
}

export function isRightAssociative(op: BinaryOperator): boolean {
  return op === "^";
}

// =============================================================================
// BRACKETS
// =============================================================================

export interface Bracket {
  char: string;
  partner: string;
  isCloser: boolean;
  name: string;
  plural: string;
}

/** Curly braces only appear in indices like x_{0} but are balanced all the same */
export const BRACKETS: Record<string, Bracket> = {
  "{": { char: "{", partner: "}", isCloser: false, name: "curly brace", plural: "curly braces" },
  "}": { char: "}", partner: "{", isCloser: true, name: "curly brace", plural: "curly braces" },
  "(": { char: "(", partner: ")", isCloser: false, name: "parenthesis", plural: "parentheses" },
  ")": { char: ")", partner: "(", isCloser: true, name: "parenthesis", plural: "parentheses" },
  "[": { char: "[", partner: "]", isCloser: false, name: "square bracket", plural: "square brackets" },
  "]": { char: "]", partner: "[", isCloser: true, name: "square bracket", plural: "square brackets" },
};

export function getBracket(char: string): Bracket | undefined {
  return Object.hasOwn(BRACKETS, char) ? BRACKETS[char] : undefined;
}
