/**
 * Array Sampling Sets
 * Random vectors and matrices with a controlled norm, symmetry or group structure.
 *
 * Entries start uniform in [-0.5, 0.5) (real and imaginary parts for complex
 * sets); symmetry is imposed next, then the array is rescaled to a norm drawn
 * from the configured range.
 */

import { determinant, norm, toComplexRows, trace } from "../math/arithmetic.ts";
import { MathArray, type Shape, type Value } from "../math/array.ts";
import {
  add,
  type Complex,
  complex,
  conj,
  divide,
  isZero,
  math,
  modulus,
  multiply,
  power,
  scale,
  subtract,
  ZERO,
} from "../math/complex.ts";
import { ConfigError } from "../errors.ts";
import type { Rng } from "./rng.ts";
import { type Range, RealInterval, type VariableSamplingSet } from "./sets.ts";

/** Thrown by a symmetry or normalization step to request a fresh draw */
class Retry extends Error {}

const MAX_ATTEMPTS = 100;

function uniformEntries(rng: Rng, count: number, isComplex: boolean): Complex[] {
  const data: Complex[] = [];
  for (let k = 0; k < count; k++) {
    const re = rng.nextFloat() - 0.5;
    data.push(isComplex ? complex(re, rng.nextFloat() - 0.5) : complex(re));
  }
  return data;
}

/** Build an n x n matrix from an entry function */
function squareFrom(n: number, entry: (row: number, col: number) => Complex): MathArray {
  const data: Complex[] = [];
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) data.push(entry(r, c));
  }
  return new MathArray([n, n], data);
}

// =============================================================================
// BASE
// =============================================================================

export interface ArraySamplingOptions {
  norm?: Range;
  complex?: boolean;
}

export abstract class ArraySamplingSet implements VariableSamplingSet {
  readonly kind = "variable";
  abstract readonly type: string;
  abstract readonly shape: Shape;
  protected readonly normRange: RealInterval;
  readonly complex: boolean;

  constructor(options: ArraySamplingOptions = {}) {
    this.normRange = new RealInterval(options.norm ?? [1, 5]);
    this.complex = options.complex ?? false;
  }

  sample(rng: Rng): Value {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      try {
        return this.generate(rng);
      } catch (error) {
        if (!(error instanceof Retry)) throw error;
      }
    }
    throw new ConfigError(`Unable to construct sample for ${this.type}`);
  }

  protected generate(rng: Rng): MathArray {
    const size = this.shape.reduce((acc, n) => acc * n, 1);
    const raw = new MathArray(this.shape, uniformEntries(rng, size, this.complex));
    return this.normalize(this.applySymmetry(raw), rng);
  }

  protected applySymmetry(array: MathArray): MathArray {
    return array;
  }

  /** Rescale to a norm drawn from the configured range */
  protected normalize(array: MathArray, rng: Rng): MathArray {
    const actual = norm(array);
    if (actual === 0) throw new Retry();
    const factor = this.normRange.draw(rng) / actual;
    return array.map((z) => scale(z, factor));
  }
}

function positiveIntegers(shape: readonly number[], label: string): void {
  if (shape.length === 0 || !shape.every((n) => Number.isInteger(n) && n > 0)) {
    throw new ConfigError(`${label} shape must be a list of positive integers, received [${shape.join(", ")}]`);
  }
}

// =============================================================================
// VECTORS AND GENERAL MATRICES
// =============================================================================

export class RealVectors extends ArraySamplingSet {
  readonly type: string = "RealVectors";
  readonly shape: Shape;

  constructor(options: { shape?: number; norm?: Range } = {}) {
    super({ norm: options.norm, complex: false });
    this.shape = [options.shape ?? 3];
    positiveIntegers(this.shape, this.type);
  }
}

export class ComplexVectors extends ArraySamplingSet {
  readonly type: string = "ComplexVectors";
  readonly shape: Shape;

  constructor(options: { shape?: number; norm?: Range } = {}) {
    super({ norm: options.norm, complex: true });
    this.shape = [options.shape ?? 3];
    positiveIntegers(this.shape, this.type);
  }
}

export type Triangular = "upper" | "lower" | null;

export interface MatrixOptions {
  shape?: readonly [number, number];
  norm?: Range;
  triangular?: Triangular;
}

abstract class GeneralMatrices extends ArraySamplingSet {
  readonly shape: Shape;
  readonly triangular: Triangular;

  constructor(options: MatrixOptions, isComplex: boolean) {
    super({ norm: options.norm, complex: isComplex });
    this.shape = options.shape ?? [2, 2];
    this.triangular = options.triangular ?? null;
    positiveIntegers(this.shape, "Matrix");
  }

  protected override applySymmetry(array: MathArray): MathArray {
    const { triangular } = this;
    if (triangular === null) return array;
    const cols = array.colCount;
    return array.map((z, k) => {
      const row = Math.floor(k / cols);
      const col = k % cols;
      const keep = triangular === "upper" ? col >= row : col <= row;
      return keep ? z : ZERO;
    });
  }
}

export class RealMatrices extends GeneralMatrices {
  readonly type: string = "RealMatrices";

  constructor(options: MatrixOptions = {}) {
    super(options, false);
  }
}

export class ComplexMatrices extends GeneralMatrices {
  readonly type: string = "ComplexMatrices";

  constructor(options: MatrixOptions = {}) {
    super(options, true);
  }
}

// =============================================================================
// SQUARE MATRICES
// =============================================================================

export type Symmetry = "diagonal" | "symmetric" | "antisymmetric" | "hermitian" | "antihermitian" | null;

export interface SquareMatrixOptions {
  dimension?: number;
  norm?: Range;
  complex?: boolean;
  symmetry?: Symmetry;
  traceless?: boolean;
  determinant?: 0 | 1 | null;
}

function checkDimension(dimension: number, label: string): number {
  if (!Number.isInteger(dimension) || dimension < 2) {
    throw new ConfigError(`${label} dimension must be an integer of at least 2, received ${dimension}`);
  }
  return dimension;
}

/**
 * Square matrices with optional symmetry, tracelessness and fixed determinant.
 * Steps run in that order; a unit determinant replaces the norm rescaling.
 */
export class SquareMatrices extends ArraySamplingSet {
  readonly type: string = "SquareMatrices";
  readonly shape: Shape;
  readonly dimension: number;
  readonly symmetry: Symmetry;
  readonly traceless: boolean;
  readonly determinant: 0 | 1 | null;

  constructor(options: SquareMatrixOptions = {}) {
    const symmetry = options.symmetry ?? null;
    super({
      norm: options.norm,
      complex: symmetry === "hermitian" || symmetry === "antihermitian" ? true : (options.complex ?? false),
    });
    this.dimension = checkDimension(options.dimension ?? 2, this.type);
    this.shape = [this.dimension, this.dimension];
    this.symmetry = symmetry;
    this.traceless = options.traceless ?? false;
    this.determinant = options.determinant ?? null;
    this.validateCombination();
  }

  private validateCombination(): void {
    const { determinant: det, symmetry, traceless, dimension } = this;
    if (det === 0) {
      if (symmetry === "antisymmetric") {
        throw new ConfigError("Unable to generate zero determinant antisymmetric matrices");
      }
      if (traceless) {
        throw new ConfigError("Unable to generate zero determinant traceless matrices");
      }
    }
    if (det === 1) {
      if (dimension === 2 && traceless) {
        if (symmetry === "diagonal" && !this.complex) {
          throw new ConfigError("No real, traceless, unit-determinant, diagonal 2x2 matrix exists");
        }
        if (symmetry === "symmetric" && !this.complex) {
          throw new ConfigError("No real, traceless, unit-determinant, symmetric 2x2 matrix exists");
        }
        if (symmetry === "hermitian") {
          throw new ConfigError("No traceless, unit-determinant, Hermitian 2x2 matrix exists");
        }
      }
      if (dimension % 2 === 1) {
        if (symmetry === "antisymmetric") {
          throw new ConfigError("No unit-determinant antisymmetric matrix exists in odd dimensions");
        }
        if (symmetry === "antihermitian") {
          throw new ConfigError("No unit-determinant antihermitian matrix exists in odd dimensions");
        }
      }
    }
  }

  protected override applySymmetry(array: MathArray): MathArray {
    const n = this.dimension;
    const a = (r: number, c: number): Complex => array.at(r, c);
    let working: MathArray;
    switch (this.symmetry) {
      case "diagonal":
        working = squareFrom(n, (r, c) => (r === c ? a(r, c) : ZERO));
        break;
      case "symmetric":
        working = squareFrom(n, (r, c) => add(a(r, c), a(c, r)));
        break;
      case "antisymmetric":
        working = squareFrom(n, (r, c) => subtract(a(r, c), a(c, r)));
        break;
      case "hermitian":
        working = squareFrom(n, (r, c) => add(a(r, c), conj(a(c, r))));
        break;
      case "antihermitian":
        working = squareFrom(n, (r, c) => subtract(a(r, c), conj(a(c, r))));
        break;
      case null:
        working = array;
        break;
    }

    if (this.traceless) {
      const shift = divide(trace(working), complex(n));
      const current = working;
      working = squareFrom(n, (r, c) => (r === c ? subtract(current.at(r, c), shift) : current.at(r, c)));
    }
    return working;
  }

  protected override normalize(array: MathArray, rng: Rng): MathArray {
    if (this.determinant === 1) {
      return this.makeDeterminantOne(array);
    }
    const working = this.determinant === 0 ? this.makeDeterminantZero(array, rng) : array;
    return super.normalize(working, rng);
  }

  /** Rescale to unit determinant, or ask for a new draw when no real rescaling exists */
  private makeDeterminantOne(array: MathArray): MathArray {
    const n = this.dimension;
    const det = determinant(array);
    const rescale = (factor: Complex): MathArray => array.map((z) => divide(z, factor));
    const realRoot = (x: number): Complex => complex(x ** (1 / n));

    const realOnly =
      !this.complex || this.symmetry === "hermitian" || this.symmetry === "antihermitian";
    if (!realOnly) {
      if (modulus(det) < 1e-13) throw new Retry();
      return rescale(power(det, complex(1 / n)));
    }

    const realDet = det.re;
    if (realDet > 0) {
      return rescale(realRoot(realDet));
    }
    if (n % 2 === 1 && realDet < 0) {
      return rescale(realRoot(-realDet)).map((z) => scale(z, -1));
    }
    throw new Retry();
  }

  /**
   * Make the matrix singular while keeping its symmetry.
   * A rank-one correction removes the component along a random direction u:
   * general matrices lose A u, Hermitian and symmetric ones lose
   * (A u)(A u)^H / (u^H A u), which is Hermitian (or symmetric) itself.
   */
  private makeDeterminantZero(array: MathArray, rng: Rng): MathArray {
    const n = this.dimension;
    if (this.symmetry === "diagonal") {
      const index = rng.integer(0, n - 1);
      return squareFrom(n, (r, c) => (r === c && r === index ? ZERO : array.at(r, c)));
    }

    const u = uniformEntries(rng, n, false);
    const au: Complex[] = [];
    for (let r = 0; r < n; r++) {
      let sum = ZERO;
      for (let c = 0; c < n; c++) sum = add(sum, multiply(array.at(r, c), u[c] ?? ZERO));
      au.push(sum);
    }

    if (this.symmetry === "symmetric" || this.symmetry === "hermitian") {
      let quadratic = ZERO;
      for (let r = 0; r < n; r++) quadratic = add(quadratic, multiply(conj(u[r] ?? ZERO), au[r] ?? ZERO));
      if (modulus(quadratic) < 1e-12) throw new Retry();
      const conjugate = this.symmetry === "hermitian" ? conj : (z: Complex): Complex => z;
      return squareFrom(n, (r, c) =>
        subtract(array.at(r, c), divide(multiply(au[r] ?? ZERO, conjugate(au[c] ?? ZERO)), quadratic)),
      );
    }

    let uu = 0;
    for (const z of u) uu += modulus(z) ** 2;
    if (uu === 0) throw new Retry();
    return squareFrom(n, (r, c) =>
      subtract(array.at(r, c), scale(multiply(au[r] ?? ZERO, conj(u[c] ?? ZERO)), 1 / uu)),
    );
  }
}

// =============================================================================
// STRUCTURED MATRICES
// =============================================================================

/** Scalar multiples of the identity */
export class IdentityMatrixMultiples implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "IdentityMatrixMultiples";
  readonly dimension: number;
  private readonly sampler: VariableSamplingSet;

  constructor(options: { dimension?: number; sampler?: VariableSamplingSet } = {}) {
    this.dimension = checkDimension(options.dimension ?? 2, this.type);
    this.sampler = options.sampler ?? new RealInterval();
  }

  sample(rng: Rng): Value {
    const factor = this.sampler.sample(rng);
    if (factor instanceof MathArray) {
      throw new ConfigError("IdentityMatrixMultiples needs a scalar sampler");
    }
    return MathArray.identity(this.dimension).map((z) => multiply(z, factor));
  }
}

/** Gaussian matrix, QR factorized, with R's diagonal phases moved into Q */
function haarQ(rng: Rng, n: number, isComplex: boolean): MathArray {
  const rows: Complex[][] = [];
  for (let r = 0; r < n; r++) {
    const row: Complex[] = [];
    for (let c = 0; c < n; c++) {
      row.push(isComplex ? complex(rng.normal(), rng.normal()) : complex(rng.normal()));
    }
    rows.push(row);
  }

  const { Q, R } = math.qr(rows);
  const q = MathArray.fromRows(toComplexRows(Q));
  const r = MathArray.fromRows(toComplexRows(R));
  const phases: Complex[] = [];
  for (let k = 0; k < n; k++) {
    const d = r.at(k, k);
    if (isZero(d)) throw new Retry();
    phases.push(divide(d, complex(modulus(d))));
  }
  return q.map((z, k) => multiply(z, phases[k % n] ?? ZERO));
}

export class OrthogonalMatrices implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "OrthogonalMatrices";
  readonly dimension: number;
  readonly unitdet: boolean;

  constructor(options: { dimension?: number; unitdet?: boolean } = {}) {
    this.dimension = checkDimension(options.dimension ?? 2, this.type);
    this.unitdet = options.unitdet ?? true;
  }

  sample(rng: Rng): Value {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      try {
        const q = haarQ(rng, this.dimension, false);
        if (!this.unitdet || determinant(q).re > 0) return q;
        // Flipping the first column turns det -1 into det +1
        return q.map((z, k) => (k % this.dimension === 0 ? scale(z, -1) : z));
      } catch (error) {
        if (!(error instanceof Retry)) throw error;
      }
    }
    throw new ConfigError(`Unable to construct sample for ${this.type}`);
  }
}

export class UnitaryMatrices implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "UnitaryMatrices";
  readonly dimension: number;
  readonly unitdet: boolean;

  constructor(options: { dimension?: number; unitdet?: boolean } = {}) {
    this.dimension = checkDimension(options.dimension ?? 2, this.type);
    this.unitdet = options.unitdet ?? true;
  }

  sample(rng: Rng): Value {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      try {
        const q = haarQ(rng, this.dimension, true);
        if (!this.unitdet) return q;
        const root = power(determinant(q), complex(1 / this.dimension));
        return q.map((z) => divide(z, root));
      } catch (error) {
        if (!(error instanceof Retry)) throw error;
      }
    }
    throw new ConfigError(`Unable to construct sample for ${this.type}`);
  }
}
