/**
 * Default Scope
 * Constants, suffixes and functions available to every expression.
 *
 * Scalar functions are wrapped by specifyDomain so that an array argument
 * produces a per-input breakdown instead of a generic domain error.
 * Real inputs stay real wherever the real function is defined; outside that
 * range results go complex (sqrt(-4) = 2*i).
 */

import { DomainError } from "../errors.ts";
import { determinant, norm, trace, transpose } from "./arithmetic.ts";
import { isArray, MathArray, type Value } from "./array.ts";
import {
  add,
  asComplex,
  type Complex,
  complex,
  conj,
  divide,
  exp,
  I,
  isInteger,
  isReal,
  ln,
  math,
  modulus,
  multiply,
  ONE,
  sqrt,
  subtract,
  ZERO,
} from "./complex.ts";
import { arrayArgument, type MathFunction, scalarArgument, specifyDomain } from "./domain.ts";

export type ScalarImpl = (z: Complex) => Complex;

// =============================================================================
// SCALAR BUILDING BLOCKS
// =============================================================================

const everywhere = (): boolean => true;

/** Use the real function on its real domain, the complex one elsewhere */
function elementary(
  real: (x: number) => number,
  general: (z: Complex) => unknown,
  realDomain: (x: number) => boolean = everywhere,
): ScalarImpl {
  return (z) => (isReal(z) && realDomain(z.re) ? complex(real(z.re)) : asComplex(general(z)));
}

function reciprocal(f: ScalarImpl): ScalarImpl {
  return (z) => divide(ONE, f(z));
}

function ofReciprocal(f: ScalarImpl): ScalarImpl {
  return (z) => f(divide(ONE, z));
}

const sin = elementary(Math.sin, (z) => math.sin(z));
const cos = elementary(Math.cos, (z) => math.cos(z));
const tan = elementary(Math.tan, (z) => math.tan(z));
const arccos = elementary(Math.acos, (z) => math.acos(z), (x) => Math.abs(x) <= 1);
const arcsin = elementary(Math.asin, (z) => math.asin(z), (x) => Math.abs(x) <= 1);
const arctan = elementary(Math.atan, (z) => math.atan(z));
const sinh = elementary(Math.sinh, (z) => math.sinh(z));
const cosh = elementary(Math.cosh, (z) => math.cosh(z));
const tanh = elementary(Math.tanh, (z) => math.tanh(z));
const arcsinh = elementary(Math.asinh, (z) => math.asinh(z));
const arccosh = elementary(Math.acosh, (z) => math.acosh(z), (x) => x >= 1);
const arctanh = elementary(Math.atanh, (z) => math.atanh(z), (x) => Math.abs(x) < 1);
const log10 = (z: Complex): Complex => divide(ln(z), complex(Math.LN10));
const log2 = (z: Complex): Complex => divide(ln(z), complex(Math.LN2));

function arccot(z: Complex): Complex {
  const half = complex(Math.PI / 2);
  return z.re < 0 ? subtract(complex(-Math.PI / 2), arctan(z)) : subtract(half, arctan(z));
}

/** n! as gamma(n + 1); poles at the negative integers */
function factorial(z: Complex): Complex {
  if (isInteger(z) && z.re < 0) {
    throw new DomainError(
      "Error evaluating factorial() or fact() in input. These functions cannot be used at negative integer values.",
    );
  }
  const shifted = add(z, ONE);
  if (isReal(shifted)) {
    return complex(math.gamma(shifted.re));
  }
  return asComplex(math.gamma(shifted));
}

const SCALAR_IMPLEMENTATIONS: Record<string, ScalarImpl> = {
  sin,
  cos,
  tan,
  sec: reciprocal(cos),
  csc: reciprocal(sin),
  cot: reciprocal(tan),
  sqrt,
  log10,
  log2,
  ln,
  exp,
  arccos,
  arcsin,
  arctan,
  arcsec: ofReciprocal(arccos),
  arccsc: ofReciprocal(arcsin),
  arccot,
  abs: (z) => complex(modulus(z)),
  fact: factorial,
  factorial,
  sinh,
  cosh,
  tanh,
  sech: reciprocal(cosh),
  csch: reciprocal(sinh),
  coth: reciprocal(tanh),
  arcsinh,
  arccosh,
  arctanh,
  arcsech: ofReciprocal(arccosh),
  arccsch: ofReciprocal(arcsinh),
  arccoth: ofReciprocal(arctanh),
  floor: (z) => complex(Math.floor(z.re)),
  ceil: (z) => complex(Math.ceil(z.re)),
};

const REAL_ONLY = new Set(["floor", "ceil"]);

/** A one-scalar-input function with shape checking */
export function scalarFunction(name: string, impl: ScalarImpl, realOnly = false): MathFunction {
  return specifyDomain({ input: [1], name, realOnly }, (z) => impl(scalarArgument(z)));
}

/**
 * Wrap a real-valued function of real scalars for use in expressions.
 *
 * @example
 * realFunction("f", (x, y) => x * y);  // f(2, 3) = 6; f(i, 1) is a domain error
 */
export function realFunction(name: string, fn: (...xs: number[]) => number): MathFunction {
  const input = new Array<number>(fn.length).fill(1);
  return specifyDomain({ input, name, realOnly: true }, (...args) =>
    complex(fn(...args.map((arg) => scalarArgument(arg).re))),
  );
}

// =============================================================================
// MULTI-INPUT AND ELEMENTWISE FUNCTIONS
// =============================================================================

const arctan2 = realFunction("arctan2", (a, b) => {
  if (a === 0 && b === 0) {
    throw new DomainError("arctan2(0, 0) is undefined");
  }
  return Math.atan2(b, a);
});

const kronecker = specifyDomain({ input: [1, 1], name: "kronecker" }, (x, y) => {
  const a = scalarArgument(x);
  const b = scalarArgument(y);
  return a.re === b.re && a.im === b.im ? ONE : ZERO;
});

function extremum(name: string, pick: (...xs: number[]) => number): MathFunction {
  return specifyDomain({ input: [1], name, minInputs: 2, realOnly: true }, (...args) =>
    complex(pick(...args.map((arg) => scalarArgument(arg).re))),
  );
}

/** Apply a scalar function to a scalar or to every entry of an array */
function elementwise(impl: ScalarImpl): MathFunction {
  return (value: Value): Value => (isArray(value) ? value.map(impl) : impl(value));
}

// =============================================================================
// ARRAY FUNCTIONS
// =============================================================================

function transposeValue(value: Value): Value {
  if (!isArray(value) || value.isVector) return value;
  if (value.isMatrix) return transpose(value);
  throw new RangeError("Cannot transpose a tensor");
}

function conjugateTranspose(value: Value): Value {
  const t = transposeValue(value);
  return isArray(t) ? t.map(conj) : conj(t);
}

/** abs(...) of a vector is its length; matrices must use norm(...) */
function arrayAbs(value: Value): Value {
  if (isArray(value) && value.ndim > 1) {
    throw new DomainError(
      `The abs(...) function expects a scalar or vector. To take the norm of a ${value.shapeName}, try norm(...) instead.`,
    );
  }
  return complex(norm(value));
}

const cross = specifyDomain({ input: [3, 3], name: "cross" }, (u, v) => {
  const a = arrayArgument(u);
  const b = arrayArgument(v);
  const component = (i: number, j: number): Complex =>
    subtract(multiply(a.entry(i), b.entry(j)), multiply(b.entry(i), a.entry(j)));
  return MathArray.vector([component(1, 2), component(2, 0), component(0, 1)]);
});

// =============================================================================
// SCOPE TABLES
// =============================================================================

export const DEFAULT_VARIABLES: ReadonlyMap<string, Value> = new Map<string, Value>([
  ["i", I],
  ["j", I],
  ["e", complex(Math.E)],
  ["pi", complex(Math.PI)],
]);

export const DEFAULT_FUNCTIONS: ReadonlyMap<string, MathFunction> = new Map<string, MathFunction>([
  ...Object.entries(SCALAR_IMPLEMENTATIONS).map(
    ([name, impl]): [string, MathFunction] => [name, scalarFunction(name, impl, REAL_ONLY.has(name))],
  ),
  ["arctan2", arctan2],
  ["kronecker", kronecker],
  ["min", extremum("min", Math.min)],
  ["max", extremum("max", Math.max)],
  ["re", elementwise((z) => complex(z.re))],
  ["im", elementwise((z) => complex(z.im))],
  ["conj", elementwise(conj)],
]);

/** Functions that only make sense once arrays are allowed */
export const ARRAY_ONLY_FUNCTIONS: ReadonlyMap<string, MathFunction> = new Map<string, MathFunction>([
  ["norm", (value: Value): Value => complex(norm(value))],
  ["abs", arrayAbs],
  ["trans", transposeValue],
  ["det", specifyDomain({ input: ["square"], name: "det" }, (m) => determinant(arrayArgument(m)))],
  ["trace", specifyDomain({ input: ["square"], name: "trace" }, (m) => trace(arrayArgument(m)))],
  ["ctrans", conjugateTranspose],
  ["adj", conjugateTranspose],
  ["cross", cross],
]);

export const DEFAULT_SUFFIXES: ReadonlyMap<string, number> = new Map([["%", 0.01]]);

export const METRIC_SUFFIXES: ReadonlyMap<string, number> = new Map([
  ["k", 1e3],
  ["M", 1e6],
  ["G", 1e9],
  ["T", 1e12],
  ["m", 1e-3],
  ["u", 1e-6],
  ["n", 1e-9],
  ["p", 1e-12],
]);

const NEG_I = complex(0, -1);

export const PAULI_MATRICES: ReadonlyMap<string, Value> = new Map<string, Value>([
  ["sigma_x", MathArray.fromRows([[ZERO, ONE], [ONE, ZERO]])],
  ["sigma_y", MathArray.fromRows([[ZERO, NEG_I], [I, ZERO]])],
  ["sigma_z", MathArray.fromRows([[ONE, ZERO], [ZERO, complex(-1)]])],
]);

export const CARTESIAN_XYZ: ReadonlyMap<string, Value> = new Map<string, Value>([
  ["hatx", MathArray.fromReal([3], [1, 0, 0])],
  ["haty", MathArray.fromReal([3], [0, 1, 0])],
  ["hatz", MathArray.fromReal([3], [0, 0, 1])],
]);

export const CARTESIAN_IJK: ReadonlyMap<string, Value> = new Map<string, Value>([
  ["hati", MathArray.fromReal([3], [1, 0, 0])],
  ["hatj", MathArray.fromReal([3], [0, 1, 0])],
  ["hatk", MathArray.fromReal([3], [0, 0, 1])],
]);

// =============================================================================
// SCOPE
// =============================================================================

/** Names an expression may refer to during one evaluation */
export interface Scope {
  variables: ReadonlyMap<string, Value>;
  functions: ReadonlyMap<string, MathFunction>;
  suffixes: ReadonlyMap<string, number>;
}

export interface ScopeOptions {
  metricSuffixes?: boolean;
  /** Add array-only functions and replace abs with its vector-aware version */
  arrayFunctions?: boolean;
}

/** The default scope, optionally extended for arrays and metric suffixes */
export function defaultScope(options: ScopeOptions = {}): Scope {
  const functions = new Map(DEFAULT_FUNCTIONS);
  if (options.arrayFunctions) {
    for (const [name, fn] of ARRAY_ONLY_FUNCTIONS) functions.set(name, fn);
  }
  const suffixes = new Map(DEFAULT_SUFFIXES);
  if (options.metricSuffixes) {
    for (const [name, value] of METRIC_SUFFIXES) suffixes.set(name, value);
  }
  return { variables: new Map(DEFAULT_VARIABLES), functions, suffixes };
}

/** A scope with extra bindings layered over a base */
export function extendScope(
  base: Scope,
  extra: {
    variables?: Iterable<[string, Value]>;
    functions?: Iterable<[string, MathFunction]>;
  },
): Scope {
  return {
    variables: new Map([...base.variables, ...(extra.variables ?? [])]),
    functions: new Map([...base.functions, ...(extra.functions ?? [])]),
    suffixes: base.suffixes,
  };
}
