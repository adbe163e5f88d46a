/**
 * Tokenizer and parser tests
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../src/lib/errors.ts";
import { formatAST } from "../src/lib/math/ast.ts";
import { getOperatorPrecedence, isRightAssociative, NEGATION_PRECEDENCE } from "../src/lib/math/operators.ts";
import { parse } from "../src/lib/math/parser.ts";
import { stripWhitespace, tokenize, validateBrackets } from "../src/lib/math/tokenizer.ts";

function parseFailure(expr: string): ParseError {
  try {
    parse(expr);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`Expected '${expr}' to fail parsing`);
}

// =============================================================================
// TOKENIZER
// =============================================================================

describe("tokenize", () => {
  test("positions index the stripped string", () => {
    expect(tokenize("2 * x_{0}")).toEqual([
      { type: "number", value: "2", position: 0, end: 1 },
      { type: "operator", value: "*", position: 1, end: 2 },
      { type: "identifier", value: "x_{0}", position: 2, end: 7 },
    ]);
  });

  test("numbers carry exponents and suffixes", () => {
    expect(tokenize("1.5e-3k")).toEqual([{ type: "number", value: "1.5e-3", position: 0, end: 7, suffix: "k" }]);
    // No digits after e, so e is a suffix
    expect(tokenize("2e")).toEqual([{ type: "number", value: "2", position: 0, end: 2, suffix: "e" }]);
    expect(tokenize(".5")).toEqual([{ type: "number", value: ".5", position: 0, end: 2 }]);
    expect(tokenize("5%")).toEqual([{ type: "number", value: "5", position: 0, end: 2, suffix: "%" }]);
  });

  test("names take subscripts, indices and primes", () => {
    const names = (expr: string) => tokenize(expr).map((t) => t.value);
    expect(names("f'")).toEqual(["f'"]);
    expect(names("x_1a")).toEqual(["x_1a"]);
    expect(names("T_{-2}^{3}")).toEqual(["T_{-2}^{3}"]);
    expect(names("sigma_x")).toEqual(["sigma_x"]);
  });

  test("reads || and the em dash as operators", () => {
    expect(tokenize("a||b").map((t) => t.value)).toEqual(["a", "||", "b"]);
    expect(tokenize("a—b").map((t) => t.value)).toEqual(["a", "-", "b"]);
  });

  test("rejects a single bar and unknown characters", () => {
    expect(() => tokenize("a|b")).toThrow("Invalid Input: unexpected character '|' at position 1 in 'a|b'");
    expect(() => tokenize("2 # 3")).toThrow("Invalid Input: unexpected character '#' at position 1 in '2#3'");
  });

  test("stripWhitespace removes every kind of whitespace", () => {
    expect(stripWhitespace(" a +\tb\n")).toBe("a+b");
  });
});

// =============================================================================
// BRACKETS
// =============================================================================

describe("validateBrackets", () => {
  test("points at an unclosed opener", () => {
    try {
      validateBrackets("(1+2");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.start).toBe(0);
      expect(error.reason).toBe("unbalanced_brackets");
      expect(error.message).toBe(
        "Invalid Input:\n1 parenthesis was opened without being closed (highlighted below)\n<code><mark>(</mark>1+2</code>",
      );
    }
  });

  test("points at a stray closer", () => {
    try {
      validateBrackets("1+2)");
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      expect(error.start).toBe(3);
      expect(error.message).toBe(
        "Invalid Input: a parenthesis was closed without ever being opened, highlighted below.\n<code>1+2<mark>)</mark></code>",
      );
    }
  });

  test("reports mismatched pairs", () => {
    expect(() => validateBrackets("(1]")).toThrow(
      "Invalid Input: a parenthesis was opened and then closed by a square bracket, highlighted below.\n" +
        "<code><mark>(</mark>1<mark>]</mark></code>",
    );
  });

  test("counts several unclosed brackets of each kind", () => {
    expect(() => validateBrackets("((x+[1")).toThrow(
      "Invalid Input:\n2 parentheses were opened without being closed (highlighted below)\n" +
        "1 square bracket was opened without being closed (highlighted below)\n" +
        "<code><mark>(</mark><mark>(</mark>x+<mark>[</mark>1</code>",
    );
  });
});

// =============================================================================
// PARSER
// =============================================================================

describe("parse", () => {
  test("applies precedence and associativity", () => {
    expect(formatAST(parse("2^-2^2").ast)).toBe("2^-2^2");
    expect(formatAST(parse("(a+b)*c").ast)).toBe("(a + b) * c");
    expect(formatAST(parse("a-(b-c)").ast)).toBe("a - (b - c)");
    expect(formatAST(parse("a-b-c").ast)).toBe("a - b - c");
    expect(formatAST(parse("(a^b)^c").ast)).toBe("(a^b)^c");
    expect(formatAST(parse("a*b||c").ast)).toBe("a * b || c");
  });

  test("negated sums and powers format from the operator table", () => {
    expect(formatAST(parse("-(a+b)*c").ast)).toBe("(-(a + b)) * c");
    expect(formatAST(parse("-a^2").ast)).toBe("-a^2");
    expect(getOperatorPrecedence("||")).toBeLessThan(NEGATION_PRECEDENCE);
    expect(getOperatorPrecedence("^")).toBeGreaterThan(NEGATION_PRECEDENCE);
    expect(isRightAssociative("^")).toBe(true);
    expect(isRightAssociative("-")).toBe(false);
  });

  test("negation binds looser than powers", () => {
    const { ast } = parse("-x^2");
    expect(ast.type).toBe("unary");
    if (ast.type === "unary") {
      expect(ast.operand.type).toBe("binary");
    }
  });

  test("collects usage by role", () => {
    const { usage } = parse("x^2 + f(y) * 3%");
    expect([...usage.variables].sort()).toEqual(["x", "y"]);
    expect([...usage.functions]).toEqual(["f"]);
    expect([...usage.suffixes]).toEqual(["%"]);
  });

  test("parses function calls and arrays", () => {
    expect(formatAST(parse("max(1, 2, x)").ast)).toBe("max(1, 2, x)");
    expect(formatAST(parse("[[1,2],[3,4]]").ast)).toBe("[[1, 2], [3, 4]]");
  });

  test("a leading plus is dropped", () => {
    expect(formatAST(parse("+x").ast)).toBe("x");
  });

  test("keeps the stripped source", () => {
    expect(parse(" x  + 1 ").source).toBe("x+1");
  });
});

describe("parse errors", () => {
  test("empty input", () => {
    const error = parseFailure("   ");
    expect(error.reason).toBe("empty_expression");
    expect(error.message).toBe("Invalid Input: the expression is empty");
  });

  test("no implicit multiplication", () => {
    const error = parseFailure("(1)(2)");
    expect(error.reason).toBe("missing_operator");
    expect(error.start).toBe(3);
    expect(error.message).toBe(
      "Invalid Input: missing an operator before '(' at position 3 (did you forget to use * for multiplication?)",
    );
  });

  test("missing operands", () => {
    expect(parseFailure("1+").message).toBe(
      "Invalid Input: the expression ends unexpectedly after '+'; an operand is missing",
    );
    expect(parseFailure("*2").message).toBe(
      "Invalid Input: unexpected operator '*' at position 0; an operand is missing",
    );
  });

  test("empty calls and brackets", () => {
    expect(parseFailure("sin()").message).toBe("Invalid Input: sin() was called without any inputs");
    expect(parseFailure("2*()").message).toBe("Invalid Input: empty parentheses at position 2");
    expect(parseFailure("[]").message).toBe("Invalid Input: empty square brackets at position 0");
  });

  test("a name followed by a square bracket", () => {
    const error = parseFailure("f[1]");
    expect(error.reason).toBe("function_call");
    expect(error.start).toBe(0);
    expect(error.end).toBe(2);
  });

  test("unbalanced brackets surface from parse", () => {
    const error = parseFailure("(1+2");
    expect(error.reason).toBe("unbalanced_brackets");
    expect(error.start).toBe(0);
  });
});
