/**
 * Value Arithmetic
 * Operator semantics over scalars and MathArrays, with student-facing shape errors.
 *
 * Rules:
 * - size-1 arrays behave like scalars in *, / and ^
 * - adding zero to an array returns the array
 * - vector * vector is the unconjugated dot product
 * - a product with a single entry collapses to a scalar
 */

import { DomainError, ShapeError } from "../errors.ts";
import { isArray, MathArray, sameShape, type Value } from "./array.ts";
import {
  add,
  asComplex,
  type Complex,
  divide,
  isInteger,
  isZero,
  math,
  modulus,
  multiply,
  negate,
  ONE,
  power,
  ZERO,
} from "./complex.ts";

export interface PowerOptions {
  /** Allow negative integer matrix powers (inverses) */
  negativePowers?: boolean;
}

// =============================================================================
// HELPERS
// =============================================================================

/** The single entry of a size-1 array, or undefined */
function numberlike(value: MathArray): Complex | undefined {
  return value.size === 1 ? value.data[0] : undefined;
}

function isZeroValue(value: Value): boolean {
  if (!isArray(value)) return isZero(value);
  const item = numberlike(value);
  return item !== undefined && isZero(item);
}

/** Convert a mathjs nested array (or Matrix) to rows of Complex */
export function toComplexRows(value: unknown): Complex[][] {
  const nested: unknown = math.isMatrix(value) ? value.toArray() : value;
  if (!Array.isArray(nested)) {
    throw new TypeError("Expected a nested array");
  }
  const rows: unknown[] = nested;
  return rows.map((row) => {
    if (!Array.isArray(row)) {
      throw new TypeError("Expected a nested array");
    }
    const entries: unknown[] = row;
    return entries.map(asComplex);
  });
}

// =============================================================================
// ADDITION
// =============================================================================

export function addValues(a: Value, b: Value): Value {
  if (!isArray(a) && !isArray(b)) {
    return add(a, b);
  }
  if (isArray(a) && isArray(b)) {
    if (sameShape(a.shape, b.shape)) {
      return new MathArray(
        a.shape,
        a.data.map((z, k) => add(z, b.data[k] ?? ZERO)),
      );
    }
    if (isZeroValue(b)) return a;
    if (isZeroValue(a)) return b;
    throw new ShapeError(`Cannot add/subtract a ${a.description} with a ${b.description}.`);
  }

  const array = isArray(a) ? a : b;
  const scalar = isArray(a) ? b : a;
  if (isZeroValue(scalar)) {
    return array;
  }
  const item = numberlike(array);
  if (item !== undefined && !isArray(scalar)) {
    return add(item, scalar);
  }
  throw new ShapeError(`Cannot add/subtract scalars to a ${array.shapeName}.`);
}

export function negateValue(a: Value): Value {
  return isArray(a) ? a.map(negate) : negate(a);
}

export function subtractValues(a: Value, b: Value): Value {
  return addValues(a, negateValue(b));
}

// =============================================================================
// MULTIPLICATION
// =============================================================================

function scaleArray(array: MathArray, factor: Complex): MathArray {
  return array.map((z) => multiply(z, factor));
}

function dot(a: readonly Complex[], b: readonly Complex[]): Complex {
  let sum = ZERO;
  for (let k = 0; k < a.length; k++) {
    sum = add(sum, multiply(a[k] ?? ZERO, b[k] ?? ZERO));
  }
  return sum;
}

/** Matrix product of row-major (m x n) and (n x p) data */
function matmul(a: MathArray, b: MathArray): MathArray {
  const m = a.rowCount;
  const n = a.colCount;
  const p = b.colCount;
  const data: Complex[] = [];
  for (let r = 0; r < m; r++) {
    for (let c = 0; c < p; c++) {
      let sum = ZERO;
      for (let k = 0; k < n; k++) {
        sum = add(sum, multiply(a.at(r, k), b.at(k, c)));
      }
      data.push(sum);
    }
  }
  return new MathArray([m, p], data);
}

function collapse(result: MathArray): Value {
  return numberlike(result) ?? result;
}

export function multiplyValues(a: Value, b: Value): Value {
  if (!isArray(a)) {
    return isArray(b) ? scaleArray(b, a) : multiply(a, b);
  }
  if (!isArray(b)) {
    return scaleArray(a, b);
  }

  const aItem = numberlike(a);
  if (aItem !== undefined) return multiplyValues(aItem, b);
  const bItem = numberlike(b);
  if (bItem !== undefined) return scaleArray(a, bItem);

  if (a.ndim > 2 || b.ndim > 2) {
    throw new ShapeError("Multiplication of tensor arrays is not currently supported.");
  }

  if (a.isVector && b.isVector) {
    if (a.size !== b.size) {
      throw new ShapeError(`Cannot calculate the dot product of a ${a.description} with a ${b.description}`);
    }
    return dot(a.data, b.data);
  }

  // Inner dimensions: a vector acts as a column on the right and a row on the left
  const inner = a.isVector ? a.size : a.colCount;
  const outer = b.isVector ? b.size : b.rowCount;
  if (inner !== outer) {
    throw new ShapeError(`Cannot multiply a ${a.description} with a ${b.description}.`);
  }

  if (a.isVector) {
    const row = new MathArray([1, a.size], a.data);
    const product = matmul(row, b);
    return collapse(MathArray.vector(product.data));
  }
  if (b.isVector) {
    const column = new MathArray([b.size, 1], b.data);
    const product = matmul(a, column);
    return collapse(MathArray.vector(product.data));
  }
  return collapse(matmul(a, b));
}

// =============================================================================
// DIVISION
// =============================================================================

export function divideValues(a: Value, b: Value): Value {
  let divisor: Complex;
  if (isArray(b)) {
    const item = numberlike(b);
    if (item === undefined) {
      if (isArray(a)) {
        throw new ShapeError(`Cannot divide a ${a.shapeName} by a ${b.shapeName}`);
      }
      throw new ShapeError(`Cannot divide by a ${b.shapeName}`);
    }
    divisor = item;
  } else {
    divisor = b;
  }
  return isArray(a) ? a.map((z) => divide(z, divisor)) : divide(a, divisor);
}

// =============================================================================
// POWERS
// =============================================================================

/** Inverse of a square matrix; singular matrices are outside the domain */
export function invertMatrix(matrix: MathArray): MathArray {
  const det = asComplex(math.det(matrix.rows()));
  if (isZero(det)) {
    throw new DomainError("Cannot invert a singular matrix.");
  }
  return MathArray.fromRows(toComplexRows(math.inv(matrix.rows())));
}

function matrixPower(matrix: MathArray, exponent: number): MathArray {
  let base = exponent < 0 ? invertMatrix(matrix) : matrix;
  let n = Math.abs(exponent);
  let result = MathArray.identity(matrix.rowCount);
  while (n > 0) {
    if (n % 2 === 1) result = matmul(result, base);
    base = matmul(base, base);
    n = Math.floor(n / 2);
  }
  return result;
}

function scalarPower(base: Complex, exponent: Value): Complex {
  if (!isArray(exponent)) return power(base, exponent);
  const item = numberlike(exponent);
  if (item === undefined) {
    throw new ShapeError(`Cannot raise a scalar to power of a ${exponent.shapeName}.`);
  }
  return power(base, item);
}

export function powerValues(base: Value, exponent: Value, options: PowerOptions = {}): Value {
  const negativePowers = options.negativePowers ?? true;

  if (!isArray(base)) {
    return scalarPower(base, exponent);
  }
  const baseItem = numberlike(base);
  if (baseItem !== undefined) {
    return scalarPower(baseItem, exponent);
  }

  const matrix = base;
  if (!matrix.isMatrix) {
    throw new ShapeError(`Cannot raise a ${matrix.shapeName} to powers.`);
  }
  if (!matrix.isSquare) {
    throw new ShapeError("Cannot raise a non-square matrix to powers.");
  }

  let e: Complex;
  if (isArray(exponent)) {
    const item = numberlike(exponent);
    if (item === undefined) {
      throw new ShapeError(`Cannot raise a matrix to ${exponent.shapeName} powers.`);
    }
    e = item;
  } else {
    e = exponent;
  }

  if (!isInteger(e)) {
    throw new ShapeError("Cannot raise a matrix to non-integer powers.");
  }
  if (e.re < 0 && !negativePowers) {
    throw new ShapeError("Negative matrix powers have been disabled.");
  }
  return matrixPower(matrix, e.re);
}

// =============================================================================
// PARALLEL AND NORM
// =============================================================================

/** a || b || ... = 1 / (1/a + 1/b + ...), exactly zero if any operand is zero */
export function parallelValues(operands: readonly Value[]): Value {
  let sum = ZERO;
  for (const operand of operands) {
    if (isArray(operand)) {
      throw new ShapeError(`Cannot combine a ${operand.shapeName} in parallel.`);
    }
    if (isZero(operand)) {
      return ZERO;
    }
    sum = add(sum, divide(ONE, operand));
  }
  return divide(ONE, sum);
}

/** Frobenius norm for arrays, modulus for scalars */
export function norm(value: Value): number {
  if (!isArray(value)) return modulus(value);
  let sum = 0;
  for (const z of value.data) {
    const m = modulus(z);
    sum += m * m;
  }
  return Math.sqrt(sum);
}

export function transpose(matrix: MathArray): MathArray {
  const rows = matrix.rowCount;
  const cols = matrix.colCount;
  const data: Complex[] = [];
  for (let c = 0; c < cols; c++) {
    for (let r = 0; r < rows; r++) {
      data.push(matrix.at(r, c));
    }
  }
  return new MathArray([cols, rows], data);
}

export function trace(matrix: MathArray): Complex {
  let sum = ZERO;
  for (let k = 0; k < matrix.rowCount; k++) {
    sum = add(sum, matrix.at(k, k));
  }
  return sum;
}

export function determinant(matrix: MathArray): Complex {
  if (matrix.rowCount === 1) return matrix.at(0, 0);
  return asComplex(math.det(matrix.rows()));
}
