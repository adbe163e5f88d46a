/**
 * Complex scalars
 * Every scalar is a mathjs Complex internally; this module owns the mathjs
 * instance and narrows its loosely typed results back to Complex.
 */

import { all, type Complex, create } from "mathjs";
import { ZeroDivisionError } from "../errors.ts";

export type { Complex };

export const math = create(all, { predictable: false });

// =============================================================================
// CONSTRUCTION AND NARROWING
// =============================================================================

export function complex(re: number, im = 0): Complex {
  return math.complex(re, im);
}

export const ZERO = complex(0);
export const ONE = complex(1);
export const I = complex(0, 1);

export function isComplex(value: unknown): value is Complex {
  return math.isComplex(value);
}

/** Narrow a mathjs result (number or Complex) to Complex */
export function asComplex(value: unknown): Complex {
  if (typeof value === "number") {
    return complex(value);
  }
  if (math.isComplex(value)) {
    return value;
  }
  throw new TypeError(`Expected a numeric scalar, received ${typeof value}`);
}

// =============================================================================
// PREDICATES
// =============================================================================

export function isReal(z: Complex): boolean {
  return z.im === 0;
}

export function isZero(z: Complex): boolean {
  return z.re === 0 && z.im === 0;
}

export function isNaNComplex(z: Complex): boolean {
  return Number.isNaN(z.re) || Number.isNaN(z.im);
}

export function isInfinite(z: Complex): boolean {
  return !isNaNComplex(z) && (!Number.isFinite(z.re) || !Number.isFinite(z.im));
}

/** Real and integer-valued */
export function isInteger(z: Complex): boolean {
  return isReal(z) && Number.isInteger(z.re);
}

export function modulus(z: Complex): number {
  if (z.im === 0) return Math.abs(z.re);
  return Math.hypot(z.re, z.im);
}

// =============================================================================
// ARITHMETIC
// =============================================================================

export function add(a: Complex, b: Complex): Complex {
  return asComplex(math.add(a, b));
}

export function subtract(a: Complex, b: Complex): Complex {
  return asComplex(math.subtract(a, b));
}

export function multiply(a: Complex, b: Complex): Complex {
  return asComplex(math.multiply(a, b));
}

export function negate(a: Complex): Complex {
  return complex(-a.re, -a.im);
}

export function conj(a: Complex): Complex {
  return complex(a.re, -a.im);
}

/** Division; dividing by exactly zero raises ZeroDivisionError */
export function divide(a: Complex, b: Complex): Complex {
  if (isZero(b)) {
    throw new ZeroDivisionError();
  }
  return asComplex(math.divide(a, b));
}

export function scale(a: Complex, factor: number): Complex {
  return complex(a.re * factor, a.im * factor);
}

/**
 * Power that stays real whenever it can.
 * A negative real base with a fractional exponent gives the principal complex root;
 * zero to a negative power is a division by zero.
 */
export function power(base: Complex, exponent: Complex): Complex {
  if (isReal(base) && isReal(exponent)) {
    const b = base.re;
    const e = exponent.re;
    if (b === 0 && e < 0) {
      throw new ZeroDivisionError();
    }
    if (b >= 0 || Number.isInteger(e)) {
      return complex(b ** e);
    }
  }
  if (isZero(base)) {
    if (exponent.re > 0) return ZERO;
    throw new ZeroDivisionError();
  }
  return asComplex(math.pow(base, exponent));
}

export function sqrt(z: Complex): Complex {
  if (isReal(z) && z.re >= 0) return complex(Math.sqrt(z.re));
  return asComplex(math.sqrt(z));
}

export function exp(z: Complex): Complex {
  if (isReal(z)) return complex(Math.exp(z.re));
  return asComplex(math.exp(z));
}

/** Natural log; log(0) is a pole */
export function ln(z: Complex): Complex {
  if (isZero(z)) {
    throw new RangeError("Logarithm of zero is undefined");
  }
  if (isReal(z) && z.re > 0) return complex(Math.log(z.re));
  return asComplex(math.log(z));
}

// =============================================================================
// FORMATTING
// =============================================================================

function formatReal(x: number): string {
  if (Number.isInteger(x) && Math.abs(x) < 1e15) return String(x);
  return String(Number(x.toPrecision(12)));
}

/** Format a scalar the way students type them: 2, -1.5, 3+4*i */
export function formatComplex(z: Complex): string {
  if (isNaNComplex(z)) return "nan";
  if (z.im === 0) return formatReal(z.re);
  const im = Math.abs(z.im) === 1 ? "i" : `${formatReal(Math.abs(z.im))}*i`;
  if (z.re === 0) return z.im < 0 ? `-${im}` : im;
  return `${formatReal(z.re)} ${z.im < 0 ? "-" : "+"} ${im}`;
}
