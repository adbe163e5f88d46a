/**
 * Array Value Model
 * Shape-tagged vectors, matrices and tensors over complex scalars
 *
 * Terminology:
 * - scalar: a single complex number (shape [])
 * - vector: rank 1, e.g. [1, 2, 3]
 * - matrix: rank 2, e.g. [[1, 2], [3, 4]]
 * - tensor: rank 3 and above
 *
 * A vector is never treated as a one-row or one-column matrix.
 */

import { type Complex, complex, formatComplex, isComplex, ONE, ZERO } from "./complex.ts";

/** Any value an expression can evaluate to */
export type Value = Complex | MathArray;

export type Shape = readonly number[];

export type ShapeName = "scalar" | "vector" | "matrix" | "tensor";

// =============================================================================
// SHAPE DESCRIPTIONS
// =============================================================================

export function getShapeName(ndim: number): ShapeName {
  switch (ndim) {
    case 0:
      return "scalar";
    case 1:
      return "vector";
    case 2:
      return "matrix";
    default:
      return "tensor";
  }
}

/**
 * Describe a shape in words.
 *
 * @example
 * describeShape([3])     // "vector of length 3"
 * describeShape([2, 3])  // "matrix of shape (rows: 2, cols: 3)"
 */
export function describeShape(shape: Shape): string {
  const name = getShapeName(shape.length);
  switch (shape.length) {
    case 0:
      return name;
    case 1:
      return `${name} of length ${shape[0]}`;
    case 2:
      return `${name} of shape (rows: ${shape[0]}, cols: ${shape[1]})`;
    default:
      return `${name} of shape (${shape.join(", ")})`;
  }
}

export function sameShape(a: Shape, b: Shape): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

function product(shape: Shape): number {
  return shape.reduce((acc, n) => acc * n, 1);
}

// =============================================================================
// MATH ARRAY
// =============================================================================

export class MathArray {
  readonly shape: Shape;
  readonly data: readonly Complex[];

  /** Row-major storage; data.length must equal the product of the shape */
  constructor(shape: Shape, data: readonly Complex[]) {
    if (shape.length === 0) {
      throw new RangeError("MathArray needs at least one dimension");
    }
    if (data.length !== product(shape)) {
      throw new RangeError(`MathArray data length ${data.length} does not match shape (${shape.join(", ")})`);
    }
    this.shape = [...shape];
    this.data = data;
  }

  get ndim(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get shapeName(): ShapeName {
    return getShapeName(this.ndim);
  }

  get description(): string {
    return describeShape(this.shape);
  }

  get isVector(): boolean {
    return this.ndim === 1;
  }

  get isMatrix(): boolean {
    return this.ndim === 2;
  }

  get isSquare(): boolean {
    return this.ndim === 2 && this.shape[0] === this.shape[1];
  }

  get rowCount(): number {
    return this.shape[0] ?? 0;
  }

  get colCount(): number {
    return this.shape[1] ?? 0;
  }

  /** Matrix entry (row, col) */
  at(row: number, col: number): Complex {
    return this.data[row * this.colCount + col] ?? ZERO;
  }

  /** Vector entry */
  entry(index: number): Complex {
    return this.data[index] ?? ZERO;
  }

  map(fn: (z: Complex, index: number) => Complex): MathArray {
    return new MathArray(this.shape, this.data.map(fn));
  }

  /** Matrix rows as nested arrays */
  rows(): Complex[][] {
    const rows: Complex[][] = [];
    for (let r = 0; r < this.rowCount; r++) {
      rows.push(this.data.slice(r * this.colCount, (r + 1) * this.colCount));
    }
    return rows;
  }

  /** Sub-arrays along the first axis (rows of a matrix, entries of a vector) */
  slices(): Value[] {
    if (this.ndim === 1) {
      return [...this.data];
    }
    const inner = this.shape.slice(1);
    const step = product(inner);
    const result: Value[] = [];
    for (let k = 0; k < this.rowCount; k++) {
      result.push(new MathArray(inner, this.data.slice(k * step, (k + 1) * step)));
    }
    return result;
  }

  toString(): string {
    return formatValue(this);
  }

  // ===========================================================================
  // CONSTRUCTORS
  // ===========================================================================

  static vector(entries: readonly Complex[]): MathArray {
    return new MathArray([entries.length], entries);
  }

  static fromRows(rows: readonly (readonly Complex[])[]): MathArray {
    const cols = rows[0]?.length ?? 0;
    return new MathArray([rows.length, cols], rows.flat());
  }

  static fromReal(shape: Shape, values: readonly number[]): MathArray {
    return new MathArray(shape, values.map((x) => complex(x)));
  }

  static zeros(shape: Shape): MathArray {
    return new MathArray(shape, new Array<Complex>(product(shape)).fill(ZERO));
  }

  static identity(n: number): MathArray {
    const data: Complex[] = [];
    for (let r = 0; r < n; r++) {
      for (let c = 0; c < n; c++) {
        data.push(r === c ? ONE : ZERO);
      }
    }
    return new MathArray([n, n], data);
  }

  /**
   * Stack equal-shaped values along a new leading axis.
   * Returns null when the items are ragged or mix scalars with arrays.
   */
  static stack(items: readonly Value[]): MathArray | null {
    const first = items[0];
    if (first === undefined) return null;

    if (isComplex(first)) {
      const scalars: Complex[] = [];
      for (const item of items) {
        if (!isComplex(item)) return null;
        scalars.push(item);
      }
      return MathArray.vector(scalars);
    }

    const data: Complex[] = [];
    for (const item of items) {
      if (!(item instanceof MathArray) || !sameShape(item.shape, first.shape)) return null;
      data.push(...item.data);
    }
    return new MathArray([items.length, ...first.shape], data);
  }
}

// =============================================================================
// VALUE HELPERS
// =============================================================================

export function isArray(value: Value): value is MathArray {
  return value instanceof MathArray;
}

export function isVector(value: Value): value is MathArray {
  return value instanceof MathArray && value.ndim === 1;
}

export function shapeOf(value: Value): Shape {
  return value instanceof MathArray ? value.shape : [];
}

export function describeValue(value: Value): string {
  return describeShape(shapeOf(value));
}

export function valueEntries(value: Value): readonly Complex[] {
  return value instanceof MathArray ? value.data : [value];
}

/** Format a value as a nested list: [[1, 2], [3, 4]] */
export function formatValue(value: Value): string {
  if (!(value instanceof MathArray)) {
    return formatComplex(value);
  }
  return `[${value.slices().map(formatValue).join(", ")}]`;
}
