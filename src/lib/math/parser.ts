/**
 * Math Expression Parser
 * Recursive-descent parser over tokenizer output.
 *
 * Grammar, lowest precedence first:
 *   sum      := ['+'] product (('+' | '-') product)*
 *   product  := parallel (('*' | '/') parallel)*
 *   parallel := negation ('||' negation)*
 *   negation := '-'* power
 *   power    := atom ('^' ['-'] power)?
 *   atom     := number | name '(' args ')' | name | '(' sum ')' | '[' args ']'
 *   args     := sum (',' sum)*
 *
 * There is no implicit multiplication: adjacent operands are an error.
 */

import { ParseError } from "../errors.ts";
import { type ASTNode, collectUsage, type ExpressionUsage } from "./ast.ts";
import type { BinaryOperator } from "./operators.ts";
import { stripWhitespace, type Token, tokenize } from "./tokenizer.ts";

/** A parsed expression: immutable, safe to cache and share */
export interface ParsedExpression {
  /** Whitespace-stripped source; AST positions index into it */
  source: string;
  ast: ASTNode;
  usage: ExpressionUsage;
}

/**
 * Parse an expression into an AST.
 * Throws ParseError with the offending character range.
 *
 * @example
 * parse("2^-2^2").ast  // 2 ^ (-(2 ^ 2))
 * parse("2x")          // number 2 with suffix "x"; rejected later by scope checks
 * parse("(1)(2)")      // ParseError: missing_operator at 3
 */
export function parse(expr: string): ParsedExpression {
  const source = stripWhitespace(expr);
  if (source === "") {
    throw new ParseError("Invalid Input: the expression is empty", "empty_expression", 0, 0);
  }

  const parser = new Parser(tokenize(source), source);
  const ast = parser.parseExpression();
  parser.expectEnd();
  return { source, ast, usage: collectUsage(ast) };
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  parseExpression(): ASTNode {
    return this.parseSum();
  }

  /** After a complete expression nothing may remain */
  expectEnd(): void {
    const token = this.peek();
    if (token) {
      throw this.unexpectedAfterOperand(token);
    }
  }

  // ===========================================================================
  // PRECEDENCE LEVELS
  // ===========================================================================

  private parseSum(): ASTNode {
    if (this.peekOperator("+")) {
      this.pos++;
    }
    let left = this.parseProduct();
    for (let op = this.peekOperator("+", "-"); op; op = this.peekOperator("+", "-")) {
      this.pos++;
      const right = this.parseProduct();
      left = binary(op, left, right);
    }
    return left;
  }

  private parseProduct(): ASTNode {
    let left = this.parseParallel();
    for (let op = this.peekOperator("*", "/"); op; op = this.peekOperator("*", "/")) {
      this.pos++;
      const right = this.parseParallel();
      left = binary(op, left, right);
    }
    return left;
  }

  private parseParallel(): ASTNode {
    let left = this.parseNegation();
    while (this.peekOperator("||")) {
      this.pos++;
      const right = this.parseNegation();
      left = binary("||", left, right);
    }
    return left;
  }

  private parseNegation(): ASTNode {
    const minus = this.peek();
    if (minus && this.peekOperator("-")) {
      this.pos++;
      const operand = this.parseNegation();
      return { type: "unary", operator: "-", operand, start: minus.position, end: operand.end };
    }
    return this.parsePower();
  }

  private parsePower(): ASTNode {
    const base = this.parseAtom();
    if (!this.peekOperator("^")) {
      return base;
    }
    this.pos++;

    // A single minus may follow the caret: 2^-2^2 = 2^(-(2^2))
    const minus = this.peek();
    if (minus && this.peekOperator("-")) {
      this.pos++;
      const inner = this.parsePower();
      const exponent: ASTNode = { type: "unary", operator: "-", operand: inner, start: minus.position, end: inner.end };
      return binary("^", base, exponent);
    }
    return binary("^", base, this.parsePower());
  }

  // ===========================================================================
  // ATOMS
  // ===========================================================================

  private parseAtom(): ASTNode {
    const token = this.peek();
    if (!token) {
      throw this.missingOperandAtEnd();
    }

    switch (token.type) {
      case "number":
        this.pos++;
        return {
          type: "number",
          value: Number.parseFloat(token.value),
          text: token.value,
          ...(token.suffix !== undefined ? { suffix: token.suffix } : {}),
          start: token.position,
          end: token.end,
        };

      case "identifier":
        this.pos++;
        return this.parseNameTail(token);

      case "open":
        this.pos++;
        return token.value === "(" ? this.parseParentheses(token) : this.parseArray(token);

      case "operator":
        throw new ParseError(
          `Invalid Input: unexpected operator '${token.value}' at position ${token.position}; an operand is missing`,
          "missing_operand",
          token.position,
          token.end,
        );

      case "close":
      case "comma":
        throw new ParseError(
          `Invalid Input: expected an operand before '${token.value}' at position ${token.position}`,
          "missing_operand",
          token.position,
          token.end,
        );
    }
  }

  /** A name is a function call when directly followed by "(" */
  private parseNameTail(name: Token): ASTNode {
    const next = this.peek();
    if (next?.type === "open" && next.value === "[") {
      throw new ParseError(
        `Invalid Input: '${name.value}' is followed by '[' at position ${next.position}; ` +
          "functions are called with parentheses and there is no implicit multiplication",
        "function_call",
        name.position,
        next.end,
      );
    }
    if (next?.type !== "open") {
      return { type: "variable", name: name.value, start: name.position, end: name.end };
    }

    this.pos++;
    const closer = this.peek();
    if (closer?.type === "close") {
      throw new ParseError(
        `Invalid Input: ${name.value}() was called without any inputs`,
        "empty_expression",
        name.position,
        closer.end,
      );
    }
    const args = this.parseList(")");
    const end = this.expectClose(")");
    return { type: "call", name: name.value, args, start: name.position, end };
  }

  private parseParentheses(open: Token): ASTNode {
    const closer = this.peek();
    if (closer?.type === "close") {
      throw new ParseError(
        `Invalid Input: empty parentheses at position ${open.position}`,
        "empty_expression",
        open.position,
        closer.end,
      );
    }
    const inner = this.parseSum();
    const end = this.expectClose(")");
    return { ...inner, start: open.position, end, grouped: true };
  }

  private parseArray(open: Token): ASTNode {
    const closer = this.peek();
    if (closer?.type === "close") {
      throw new ParseError(
        `Invalid Input: empty square brackets at position ${open.position}`,
        "empty_expression",
        open.position,
        closer.end,
      );
    }
    const items = this.parseList("]");
    const end = this.expectClose("]");
    return { type: "array", items, start: open.position, end };
  }

  /** Comma-separated expressions, stopping before the closing bracket */
  private parseList(closer: ")" | "]"): ASTNode[] {
    const items = [this.parseSum()];
    while (this.peek()?.type === "comma") {
      this.pos++;
      items.push(this.parseSum());
    }
    const next = this.peek();
    if (next && !(next.type === "close" && next.value === closer)) {
      throw this.unexpectedAfterOperand(next);
    }
    return items;
  }

  private expectClose(closer: ")" | "]"): number {
    const token = this.peek();
    if (!token) {
      throw this.missingOperandAtEnd();
    }
    if (token.type !== "close" || token.value !== closer) {
      throw this.unexpectedAfterOperand(token);
    }
    this.pos++;
    return token.end;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  /** The operator at the cursor, if it is one of the given operators */
  private peekOperator<T extends BinaryOperator>(...ops: T[]): T | undefined {
    const token = this.peek();
    if (token?.type !== "operator") return undefined;
    return ops.find((op) => op === token.value);
  }

  private missingOperandAtEnd(): ParseError {
    const last = this.tokens[this.tokens.length - 1];
    const after = last ? ` after '${last.value}'` : "";
    return new ParseError(
      `Invalid Input: the expression ends unexpectedly${after}; an operand is missing`,
      "missing_operand",
      this.source.length,
      this.source.length,
    );
  }

  /** Error for a token that follows a complete operand without an operator */
  private unexpectedAfterOperand(token: Token): ParseError {
    if (token.type === "comma" || token.type === "close") {
      return new ParseError(
        `Invalid Input: unexpected '${token.value}' at position ${token.position} in '${this.source}'`,
        "invalid_character",
        token.position,
        token.end,
      );
    }
    return new ParseError(
      `Invalid Input: missing an operator before '${token.value}' at position ${token.position} ` +
        "(did you forget to use * for multiplication?)",
      "missing_operator",
      token.position,
      token.end,
    );
  }
}

function binary(operator: BinaryOperator, left: ASTNode, right: ASTNode): ASTNode {
  return { type: "binary", operator, left, right, start: left.start, end: right.end };
}
