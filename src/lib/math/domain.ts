/**
 * Function Domains
 * Callable values in an evaluation scope, and a combinator that checks the
 * shape of every argument before calling the wrapped implementation.
 */

import { DomainError } from "../errors.ts";
import { describeShape, describeValue, isArray, MathArray, sameShape, type Value } from "./array.ts";
import type { Complex } from "./complex.ts";

/**
 * A function in scope.
 * Unless `validated` is set, the evaluator checks the argument count against
 * `arity` (falling back to the function's declared parameter count).
 */
export type MathFunction = ((...args: Value[]) => Value) & {
  validated?: boolean;
  arity?: number;
};

/**
 * Expected shape of one input:
 * - 1: a scalar
 * - k > 1: a vector of length k
 * - [r, c] (or any list): an array of exactly that shape
 * - "square": a square matrix of any size
 */
export type ShapeSpec = number | readonly number[] | "square";

export interface DomainSpec {
  input: readonly ShapeSpec[];
  /** Name used in error messages */
  name: string;
  /** Accept this many or more inputs, each checked against input[0] */
  minInputs?: number;
  /** Reject scalar inputs with a nonzero imaginary part */
  realOnly?: boolean;
}

// =============================================================================
// DESCRIPTIONS
// =============================================================================

/** 1st, 2nd, 3rd, then 4th, 5th, ... */
export function lowOrdinal(n: number): string {
  switch (n) {
    case 1:
      return "1st";
    case 2:
      return "2nd";
    case 3:
      return "3rd";
    default:
      return `${n}th`;
  }
}

function normalizeSpec(spec: ShapeSpec): readonly number[] | "square" {
  return typeof spec === "number" ? [spec] : spec;
}

export function describeSpec(spec: ShapeSpec): string {
  const shape = normalizeSpec(spec);
  if (shape === "square") return "square matrix";
  if (shape.length === 1 && shape[0] === 1) return "scalar";
  return describeShape(shape);
}

/** The argument, with size-1 arrays unwrapped when a scalar is expected; or an error line */
function checkArgument(spec: ShapeSpec, arg: Value): { value: Value } | { error: string } {
  const shape = normalizeSpec(spec);
  const mismatch = { error: `received a ${describeValue(arg)}, expected a ${describeSpec(spec)}` };

  if (shape !== "square" && shape.length === 1 && shape[0] === 1) {
    if (!isArray(arg)) return { value: arg };
    const item = arg.size === 1 ? arg.data[0] : undefined;
    return item === undefined ? mismatch : { value: item };
  }
  if (!(arg instanceof MathArray)) return mismatch;
  if (shape === "square") return arg.isSquare ? { value: arg } : mismatch;
  return sameShape(arg.shape, shape) ? { value: arg } : mismatch;
}

// =============================================================================
// COMBINATOR
// =============================================================================

/**
 * Wrap a function so that its inputs are validated before it runs.
 *
 * @example
 * const cross = specifyDomain({ input: [3, 3], name: "cross" }, crossProduct);
 * cross(ONE)
 * // DomainError: There was an error evaluating function cross(...): expected 2 inputs, but received 1.
 */
export function specifyDomain(spec: DomainSpec, fn: (...args: Value[]) => Value): MathFunction {
  const { name, minInputs } = spec;

  const wrapped = (...args: Value[]): Value => {
    const specs = minInputs === undefined ? spec.input : args.map(() => spec.input[0] ?? 1);

    if (minInputs !== undefined && args.length < minInputs) {
      throw new DomainError(
        `There was an error evaluating function ${name}(...): expected at least ${minInputs} inputs, but received ${args.length}.`,
      );
    }
    if (minInputs === undefined && args.length !== specs.length) {
      throw new DomainError(
        `There was an error evaluating function ${name}(...): expected ${specs.length} inputs, but received ${args.length}.`,
      );
    }

    const checked = args.map((arg, k) => checkArgument(specs[k] ?? 1, arg));
    const values: Value[] = [];
    for (const result of checked) {
      if ("value" in result) values.push(result.value);
    }

    if (values.length !== checked.length) {
      const lines = [`There was an error evaluating function ${name}(...)`];
      checked.forEach((result, k) => {
        const ordinal = lowOrdinal(k + 1);
        lines.push(
          "error" in result
            ? `${ordinal} input has an error: ${result.error}`
            : `${ordinal} input is ok: received a ${describeSpec(specs[k] ?? 1)} as expected`,
        );
      });
      throw new DomainError(lines.join("\n"));
    }

    if (spec.realOnly && values.some((v) => !isArray(v) && v.im !== 0)) {
      throw new DomainError(`There was an error evaluating function ${name}(...): its inputs must be real.`);
    }

    return fn(...values);
  };

  return Object.assign(wrapped, { validated: true });
}

/** Narrow a validated scalar argument */
export function scalarArgument(value: Value | undefined): Complex {
  if (value === undefined || isArray(value)) {
    throw new TypeError("Expected a scalar argument");
  }
  return value;
}

/** Narrow a validated array argument */
export function arrayArgument(value: Value | undefined): MathArray {
  if (!(value instanceof MathArray)) {
    throw new TypeError("Expected an array argument");
  }
  return value;
}
