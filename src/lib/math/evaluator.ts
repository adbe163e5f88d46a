/**
 * Math Expression Evaluator
 * Walks a parsed AST against a scope, producing a scalar or array value.
 *
 * Every node is checked after it is computed: NaN anywhere makes the whole
 * result NaN, and an infinite entry is an overflow unless allowInf is set.
 */

import {
  DomainError,
  isGraderError,
  OverflowError,
  ShapeError,
  UnknownIdentifierError,
  ZeroDivisionError,
} from "../errors.ts";
import {
  addValues,
  divideValues,
  multiplyValues,
  negateValue,
  parallelValues,
  powerValues,
  subtractValues,
} from "./arithmetic.ts";
import { isArray, isVector, MathArray, type Value, valueEntries } from "./array.ts";
import type { ASTNode, BinaryNode, CallNode, ExpressionUsage } from "./ast.ts";
import { complex, isInfinite, isNaNComplex } from "./complex.ts";
import type { MathFunction } from "./domain.ts";
import { defaultScope, type Scope } from "./functions.ts";
import type { ParsedExpression } from "./parser.ts";
import { parse } from "./parser.ts";

export interface EvaluationOptions {
  /** Permit infinite results instead of raising an overflow */
  allowInf?: boolean;
  /** Highest array rank a literal may have; undefined means unlimited */
  maxArrayDim?: number;
  /** Allow negative integer matrix powers */
  negativePowers?: boolean;
}

export interface EvaluationUsage extends ExpressionUsage {
  /** Highest rank of any array literal in the expression (0 if none) */
  maxArrayDim: number;
}

export interface EvaluationResult {
  value: Value;
  usage: EvaluationUsage;
}

const NAN = complex(Number.NaN);

const RAGGED_ARRAY_MESSAGE =
  "Unable to parse vector/matrix. If you're trying to enter a matrix, this is most likely caused by an unequal number of elements in each row.";

const TRIPLE_VECTOR_MESSAGE =
  "Multiplying three or more vectors is ambiguous. Please place parentheses around vector multiplications.";

// =============================================================================
// SCOPE CHECK
// =============================================================================

/** Names in scope that differ from one of the given names only by case */
function caseHint(names: string[], available: Iterable<string>): string {
  const lowered = new Set(names.map((name) => name.toLowerCase()));
  const matches = [...available].filter((name) => lowered.has(name.toLowerCase())).sort();
  return matches.length > 0 ? ` (did you mean '${matches.join("', '")}'?)` : "";
}

const MULTIPLICATION_HINT = " (did you forget to use * for multiplication?)";

/**
 * Confirm every name the expression uses is in scope.
 * Variables are checked first, then functions, then suffixes.
 *
 * @example
 * checkScope(parse("X+1"), scopeWith("x"))
 * // UnknownIdentifierError: Invalid Input: 'X' not permitted in answer as a variable (did you mean 'x'?)
 */
export function checkScope(parsed: ParsedExpression, scope: Scope): void {
  const { variables, functions, suffixes } = parsed.usage;

  const badVariables = [...variables].filter((name) => !scope.variables.has(name)).sort();
  if (badVariables.length > 0) {
    const message =
      `Invalid Input: '${badVariables.join("', '")}' not permitted in answer as a variable` +
      caseHint(badVariables, scope.variables.keys());
    throw new UnknownIdentifierError(message, "variable", badVariables);
  }

  const badFunctions = [...functions].filter((name) => !scope.functions.has(name)).sort();
  if (badFunctions.length > 0) {
    let message = `Invalid Input: '${badFunctions.join("', '")}' not permitted in answer as a function`;
    if (badFunctions.some((name) => scope.variables.has(name))) {
      message += MULTIPLICATION_HINT;
    }
    message += caseHint(badFunctions, scope.functions.keys());
    throw new UnknownIdentifierError(message, "function", badFunctions);
  }

  const badSuffixes = [...suffixes].filter((name) => !scope.suffixes.has(name)).sort();
  if (badSuffixes.length > 0) {
    let message = `Invalid Input: '${badSuffixes.join("', '")}' not permitted directly after a number`;
    if (badSuffixes.some((name) => scope.variables.has(name))) {
      message += MULTIPLICATION_HINT;
    }
    message += caseHint(badSuffixes, scope.suffixes.keys());
    throw new UnknownIdentifierError(message, "suffix", badSuffixes);
  }
}

// =============================================================================
// EVALUATION
// =============================================================================

function hasNaN(value: Value): boolean {
  return valueEntries(value).some(isNaNComplex);
}

function isNaNScalar(value: Value): boolean {
  return !isArray(value) && isNaNComplex(value);
}

class Evaluator {
  maxArrayDim = 0;

  constructor(
    private readonly scope: Scope,
    private readonly options: EvaluationOptions,
  ) {}

  visit(node: ASTNode): Value {
    const result = this.compute(node);
    if (!this.options.allowInf && valueEntries(result).some(isInfinite)) {
      throw new OverflowError();
    }
    return hasNaN(result) ? NAN : result;
  }

  /** Evaluate children; undefined when one of them is NaN */
  private visitAll(nodes: readonly ASTNode[]): Value[] | undefined {
    const values = nodes.map((child) => this.visit(child));
    return values.some(isNaNScalar) ? undefined : values;
  }

  private compute(node: ASTNode): Value {
    switch (node.type) {
      case "number": {
        const factor = node.suffix === undefined ? 1 : (this.scope.suffixes.get(node.suffix) ?? Number.NaN);
        return complex(node.value * factor);
      }

      case "variable": {
        const value = this.scope.variables.get(node.name);
        if (value === undefined) {
          throw new UnknownIdentifierError(
            `Invalid Input: '${node.name}' not permitted in answer as a variable`,
            "variable",
            [node.name],
          );
        }
        return value;
      }

      case "call":
        return this.call(node);

      case "unary": {
        const operand = this.visit(node.operand);
        return isNaNScalar(operand) ? NAN : negateValue(operand);
      }

      case "array":
        return this.array(node.items);

      case "binary":
        return this.binary(node);
    }
  }

  private binary(node: BinaryNode): Value {
    if (node.operator === "*" || node.operator === "/") {
      return this.product(node);
    }

    const operands = this.visitAll([node.left, node.right]);
    const [left, right] = operands ?? [];
    if (left === undefined || right === undefined) return NAN;

    switch (node.operator) {
      case "+":
        return addValues(left, right);
      case "-":
        return subtractValues(left, right);
      case "||":
        return parallelValues([left, right]);
      case "^":
        return powerValues(left, right, { negativePowers: this.options.negativePowers ?? true });
    }
  }

  /**
   * Multiply and divide left to right over an ungrouped chain.
   * a*b*c with three vectors is ambiguous and rejected.
   */
  private product(node: BinaryNode): Value {
    const steps: Array<{ operator: "*" | "/"; operand: ASTNode }> = [];
    let current: ASTNode = node;
    while (
      current.type === "binary" &&
      (current.operator === "*" || current.operator === "/") &&
      (current === node || !current.grouped)
    ) {
      steps.unshift({ operator: current.operator, operand: current.right });
      current = current.left;
    }

    const values = this.visitAll([current, ...steps.map((step) => step.operand)]);
    if (values === undefined) return NAN;

    let [result = NAN] = values;
    let doubleVectorProduct = false;
    steps.forEach((step, k) => {
      const value = values[k + 1] ?? NAN;
      if (step.operator === "/") {
        result = divideValues(result, value);
        return;
      }
      if (isVector(value)) {
        if (doubleVectorProduct) {
          throw new ShapeError(TRIPLE_VECTOR_MESSAGE);
        }
        if (isVector(result)) {
          doubleVectorProduct = true;
        }
      }
      result = multiplyValues(result, value);
    });
    return result;
  }

  private array(items: readonly ASTNode[]): Value {
    const values = this.visitAll(items);
    if (values === undefined) return NAN;
    const stacked = MathArray.stack(values);
    if (stacked === null) {
      throw new ShapeError(RAGGED_ARRAY_MESSAGE);
    }
    this.maxArrayDim = Math.max(this.maxArrayDim, stacked.ndim);
    return stacked;
  }

  private call(node: CallNode): Value {
    const { name } = node;
    const fn = this.scope.functions.get(name);
    if (fn === undefined) {
      throw new UnknownIdentifierError(`Invalid Input: '${name}' not permitted in answer as a function`, "function", [
        name,
      ]);
    }

    const args = this.visitAll(node.args);
    if (args === undefined) return NAN;

    if (!fn.validated) {
      validateArgumentCount(fn, name, args.length);
    }
    return invoke(fn, name, args);
  }
}

function validateArgumentCount(fn: MathFunction, name: string, received: number): void {
  const expected = fn.arity ?? fn.length;
  if (expected !== received) {
    throw new DomainError(
      `Wrong number of arguments passed to ${name}(...): Expected ${expected} inputs, but received ${received}.`,
    );
  }
}

/** Call a scope function, recasting its failures as student-facing errors */
function invoke(fn: MathFunction, name: string, args: Value[]): Value {
  const domainMessage = `There was an error evaluating ${name}(...). Its input does not seem to be in its domain.`;
  try {
    return fn(...args);
  } catch (error) {
    if (error instanceof ZeroDivisionError) {
      throw new ZeroDivisionError(domainMessage);
    }
    if (error instanceof OverflowError) {
      throw new OverflowError(`There was an error evaluating ${name}(...). (Numerical overflow).`);
    }
    if (isGraderError(error)) {
      throw error;
    }
    throw new DomainError(domainMessage);
  }
}

function arrayDimMessage(maxArrayDim: number): string {
  if (maxArrayDim === 0) return "Vector and matrix expressions have been forbidden in this entry.";
  if (maxArrayDim === 1) return "Matrix expressions have been forbidden in this entry.";
  return "Tensor expressions have been forbidden in this entry.";
}

/**
 * Evaluate a parsed expression in a scope.
 * Scope is checked first, so unknown names fail before any arithmetic runs.
 */
export function evaluate(parsed: ParsedExpression, scope: Scope, options: EvaluationOptions = {}): EvaluationResult {
  checkScope(parsed, scope);

  const evaluator = new Evaluator(scope, options);
  const value = evaluator.visit(parsed.ast);

  if (options.maxArrayDim !== undefined && evaluator.maxArrayDim > options.maxArrayDim) {
    throw new DomainError(arrayDimMessage(options.maxArrayDim));
  }

  return { value, usage: { ...parsed.usage, maxArrayDim: evaluator.maxArrayDim } };
}

/**
 * Parse and evaluate a string in the default scope plus extra variables.
 *
 * @example
 * evaluateExpression("x^2", { variables: new Map([["x", complex(3)]]) }).value  // 9
 */
export function evaluateExpression(
  expr: string,
  extra: { variables?: ReadonlyMap<string, Value>; scope?: Scope } = {},
  options: EvaluationOptions = {},
): EvaluationResult {
  const base = extra.scope ?? defaultScope();
  const scope: Scope = extra.variables
    ? { ...base, variables: new Map([...base.variables, ...extra.variables]) }
    : base;
  return evaluate(parse(expr), scope, options);
}
