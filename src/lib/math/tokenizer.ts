/**
 * Math Expression Tokenizer
 * Strips whitespace, validates bracket balance, and splits an expression into typed tokens
 */

import { ParseError } from "../errors.ts";
import { type Bracket, getBracket, isOperatorChar, normalizeOperator } from "./operators.ts";

// =============================================================================
// WHITESPACE
// =============================================================================

/** All whitespace is insignificant to the grammar */
export function stripWhitespace(expr: string): string {
  return expr.replace(/\s+/g, "");
}

// =============================================================================
// BRACKET VALIDATION
// =============================================================================

interface StackEntry {
  index: number;
  bracket: Bracket;
}

/** Wrap the characters at the given indices in <mark> tags */
export function highlightFormula(formula: string, indices: number[]): string {
  const sorted = [...indices].sort((a, b) => b - a);
  let result = formula;
  for (const index of sorted) {
    result = `${result.slice(0, index)}<mark>${result.charAt(index)}</mark>${result.slice(index + 1)}`;
  }
  return `<code>${result}</code>`;
}

/**
 * Scan a formula for unbalanced brackets.
 * Throws a ParseError positioned at the offending bracket.
 *
 * @example
 * validateBrackets("(1+2");  // ParseError at 0
 * validateBrackets("1+2)");  // ParseError at 3
 */
export function validateBrackets(formula: string): void {
  const stack: StackEntry[] = [];

  for (let index = 0; index < formula.length; index++) {
    const bracket = getBracket(formula.charAt(index));
    if (!bracket) continue;

    if (!bracket.isCloser) {
      stack.push({ index, bracket });
      continue;
    }

    const previous = stack.pop();
    if (!previous) {
      throw new ParseError(
        `Invalid Input: a ${bracket.name} was closed without ever being opened, highlighted below.\n` +
          highlightFormula(formula, [index]),
        "unbalanced_brackets",
        index,
      );
    }
    if (bracket.partner !== previous.bracket.char) {
      throw new ParseError(
        `Invalid Input: a ${previous.bracket.name} was opened and then closed by a ${bracket.name}, highlighted below.\n` +
          highlightFormula(formula, [previous.index, index]),
        "unbalanced_brackets",
        index,
      );
    }
  }

  const first = stack[0];
  if (first) {
    throw new ParseError(describeUnclosed(formula, stack), "unbalanced_brackets", first.index);
  }
}

function describeUnclosed(formula: string, stack: StackEntry[]): string {
  const counts = new Map<string, { bracket: Bracket; count: number }>();
  for (const entry of stack) {
    const current = counts.get(entry.bracket.char);
    if (current) {
      current.count++;
    } else {
      counts.set(entry.bracket.char, { bracket: entry.bracket, count: 1 });
    }
  }

  // Sorted by bracket name so messages come out in a definite order
  const lines = [...counts.values()]
    .sort((a, b) => a.bracket.name.localeCompare(b.bracket.name))
    .map(({ bracket, count }) =>
      count === 1
        ? `${count} ${bracket.name} was opened without being closed (highlighted below)`
        : `${count} ${bracket.plural} were opened without being closed (highlighted below)`,
    );

  const indices = stack.map((entry) => entry.index);
  return `Invalid Input:\n${lines.join("\n")}\n${highlightFormula(formula, indices)}`;
}

// =============================================================================
// TOKEN TYPES
// =============================================================================

/** Token types for math expression tokenization */
export type TokenType = "number" | "identifier" | "operator" | "open" | "close" | "comma";

/** A single token from a whitespace-stripped expression */
export interface Token {
  type: TokenType;
  /** Literal text (numbers exclude their suffix) */
  value: string;
  /** Offset of the first character */
  position: number;
  /** Offset one past the last character, suffix included */
  end: number;
  /** For numbers: trailing letters or % */
  suffix?: string;
}

// =============================================================================
// TOKENIZER
// =============================================================================

const DIGIT = /[0-9]/;
const LETTER = /[A-Za-z]/;
const ALNUM = /[A-Za-z0-9]/;
const SUBSCRIPT = /[A-Za-z0-9_]/;
const SUFFIX = /[A-Za-z%]/;

/**
 * Tokenize an expression.
 * Whitespace is removed first, so token positions index the stripped string.
 *
 * @example
 * tokenize("2 * x_{0}")
 * // [
 * //   { type: "number", value: "2", position: 0, end: 1 },
 * //   { type: "operator", value: "*", position: 1, end: 2 },
 * //   { type: "identifier", value: "x_{0}", position: 2, end: 7 },
 * // ]
 */
export function tokenize(expr: string): Token[] {
  const formula = stripWhitespace(expr);
  validateBrackets(formula);

  const tokens: Token[] = [];
  let i = 0;

  while (i < formula.length) {
    const char = formula.charAt(i);

    if (char === "(" || char === "[") {
      tokens.push({ type: "open", value: char, position: i, end: i + 1 });
      i++;
      continue;
    }

    if (char === ")" || char === "]") {
      tokens.push({ type: "close", value: char, position: i, end: i + 1 });
      i++;
      continue;
    }

    if (char === ",") {
      tokens.push({ type: "comma", value: char, position: i, end: i + 1 });
      i++;
      continue;
    }

    if (isOperatorChar(char)) {
      if (char === "|") {
        if (formula.charAt(i + 1) !== "|") {
          throw unexpectedCharacter(formula, i);
        }
        tokens.push({ type: "operator", value: "||", position: i, end: i + 2 });
        i += 2;
        continue;
      }
      tokens.push({ type: "operator", value: normalizeOperator(char), position: i, end: i + 1 });
      i++;
      continue;
    }

    if (DIGIT.test(char) || (char === "." && DIGIT.test(formula.charAt(i + 1)))) {
      const token = readNumber(formula, i);
      tokens.push(token);
      i = token.end;
      continue;
    }

    if (LETTER.test(char)) {
      const end = readName(formula, i);
      tokens.push({ type: "identifier", value: formula.slice(i, end), position: i, end });
      i = end;
      continue;
    }

    throw unexpectedCharacter(formula, i);
  }

  return tokens;
}

function unexpectedCharacter(formula: string, index: number): ParseError {
  const found = index < formula.length ? `unexpected character '${formula.charAt(index)}'` : "unexpected end";
  return new ParseError(
    `Invalid Input: ${found} at position ${index} in '${formula}'`,
    "invalid_character",
    index,
  );
}

/** Scan digits starting at i, returning the index after the last digit */
function skipDigits(formula: string, i: number): number {
  let j = i;
  while (j < formula.length && DIGIT.test(formula.charAt(j))) j++;
  return j;
}

/**
 * Read a number: 1, 1., 1.5, .5 with an optional exponent (1e3, 2.5E-4),
 * then an optional suffix made of letters or %.
 */
function readNumber(formula: string, start: number): Token {
  let i = skipDigits(formula, start);
  if (formula.charAt(i) === ".") {
    i = skipDigits(formula, i + 1);
  }

  // Exponent only counts when digits follow, so "2e" leaves "e" as a suffix
  const expChar = formula.charAt(i);
  if (expChar === "e" || expChar === "E") {
    let j = i + 1;
    const sign = formula.charAt(j);
    if (sign === "+" || sign === "-") j++;
    if (DIGIT.test(formula.charAt(j))) {
      i = skipDigits(formula, j);
    }
  }

  const value = formula.slice(start, i);
  let end = i;
  while (end < formula.length && SUFFIX.test(formula.charAt(end))) end++;

  const token: Token = { type: "number", value, position: start, end };
  if (end > i) {
    token.suffix = formula.slice(i, end);
  }
  return token;
}

/**
 * Read a variable or function name, returning the index after it.
 *
 * Forms:
 *   front [ _subscript ] primes
 *   front [ _{(-)index} ] [ ^{(-)index} ] primes
 * where front is a letter followed by letters/digits.
 */
function readName(formula: string, start: number): number {
  let i = start + 1;
  while (i < formula.length && ALNUM.test(formula.charAt(i))) i++;

  if (formula.charAt(i) === "_" && formula.charAt(i + 1) !== "{") {
    let j = i + 1;
    while (j < formula.length && SUBSCRIPT.test(formula.charAt(j))) j++;
    // A plain subscript may not run into a braced index
    if (formula.charAt(j) !== "{") {
      i = j;
    }
  } else {
    i = readIndex(formula, i, "_");
    i = readIndex(formula, i, "^");
  }

  while (formula.charAt(i) === "'") i++;
  return i;
}

/** Read "_{(-)alnum}" or "^{(-)alnum}" at i if present */
function readIndex(formula: string, i: number, marker: "_" | "^"): number {
  if (formula.charAt(i) !== marker || formula.charAt(i + 1) !== "{") {
    return i;
  }
  let j = i + 2;
  if (formula.charAt(j) === "-") j++;
  const contentStart = j;
  while (j < formula.length && ALNUM.test(formula.charAt(j))) j++;
  if (j === contentStart || formula.charAt(j) !== "}") {
    throw unexpectedCharacter(formula, j);
  }
  return j + 1;
}
