/**
 * Scalar Sampling Sets
 * Random sources for one variable: intervals, integer ranges, complex regions,
 * discrete sets, and samples derived from other variables.
 */

import { ConfigError, errorMessage } from "../errors.ts";
import type { Value } from "../math/array.ts";
import { type Complex, complex, isComplex } from "../math/complex.ts";
import type { MathFunction } from "../math/domain.ts";
import { evaluate } from "../math/evaluator.ts";
import { defaultScope, extendScope } from "../math/functions.ts";
import { type ParsedExpression, parse } from "../math/parser.ts";
import type { Rng } from "./rng.ts";

/** Produces one value per trial */
export interface VariableSamplingSet {
  readonly kind: "variable";
  readonly type: string;
  sample(rng: Rng): Value;
}

/** Produces one function per trial */
export interface FunctionSamplingSet {
  readonly kind: "function";
  readonly type: string;
  /** The name is used in the function's own error messages */
  sample(rng: Rng, name: string): MathFunction;
}

export type SamplingSet = VariableSamplingSet | FunctionSamplingSet | DependentSampler;

export type Range = readonly [number, number];

/** Order a [start, stop] pair, rejecting non-finite ends */
export function orderedRange(range: Range, label: string): Range {
  const [a, b] = range;
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    throw new ConfigError(`${label} must have finite start and stop, received [${a}, ${b}]`);
  }
  return a <= b ? [a, b] : [b, a];
}

// =============================================================================
// REAL AND INTEGER
// =============================================================================

export class RealInterval implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "RealInterval";
  readonly start: number;
  readonly stop: number;

  /** Uniform reals in [start, stop); a reversed range is swapped */
  constructor(range: Range = [1, 5]) {
    [this.start, this.stop] = orderedRange(range, "RealInterval");
  }

  draw(rng: Rng): number {
    return rng.uniform(this.start, this.stop);
  }

  sample(rng: Rng): Value {
    return complex(this.draw(rng));
  }
}

export class IntegerRange implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "IntegerRange";
  readonly start: number;
  readonly stop: number;

  /** Integers from start to stop, both included */
  constructor(range: Range = [1, 5]) {
    const [start, stop] = orderedRange(range, "IntegerRange");
    if (!Number.isInteger(start) || !Number.isInteger(stop)) {
      throw new ConfigError(`IntegerRange needs integer start and stop, received [${start}, ${stop}]`);
    }
    this.start = start;
    this.stop = stop;
  }

  sample(rng: Rng): Value {
    return complex(rng.integer(this.start, this.stop));
  }
}

// =============================================================================
// COMPLEX
// =============================================================================

export class ComplexRectangle implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "ComplexRectangle";
  private readonly re: RealInterval;
  private readonly im: RealInterval;

  constructor(options: { re?: Range; im?: Range } = {}) {
    this.re = new RealInterval(options.re ?? [1, 3]);
    this.im = new RealInterval(options.im ?? [1, 3]);
  }

  sample(rng: Rng): Value {
    const re = this.re.draw(rng);
    return complex(re, this.im.draw(rng));
  }
}

/** An annular sector: modulus and argument drawn independently */
export class ComplexSector implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "ComplexSector";
  private readonly modulus: RealInterval;
  private readonly argument: RealInterval;

  constructor(options: { modulus?: Range; argument?: Range } = {}) {
    this.modulus = new RealInterval(options.modulus ?? [1, 3]);
    this.argument = new RealInterval(options.argument ?? [0, Math.PI / 2]);
  }

  sample(rng: Rng): Value {
    const r = this.modulus.draw(rng);
    const theta = this.argument.draw(rng);
    return complex(r * Math.cos(theta), r * Math.sin(theta));
  }
}

// =============================================================================
// DISCRETE
// =============================================================================

export class DiscreteSet implements VariableSamplingSet {
  readonly kind = "variable";
  readonly type = "DiscreteSet";
  readonly values: readonly Value[];

  constructor(values: number | Complex | readonly (number | Value)[]) {
    const list: readonly (number | Value)[] = typeof values === "number" || isComplex(values) ? [values] : values;
    if (list.length === 0) {
      throw new ConfigError("DiscreteSet needs at least one value");
    }
    this.values = list.map((v: number | Value) => (typeof v === "number" ? complex(v) : v));
  }

  sample(rng: Rng): Value {
    return this.values[rng.integer(0, this.values.length - 1)] ?? complex(Number.NaN);
  }
}

// =============================================================================
// DEPENDENT
// =============================================================================

/**
 * A variable computed from other variables of the same trial.
 *
 * @example
 * new DependentSampler({ depends: ["x", "y"], formula: "sqrt(x^2+y^2)" })
 */
export class DependentSampler {
  readonly kind = "dependent";
  readonly type = "DependentSampler";
  readonly depends: readonly string[];
  readonly formula: string;
  private readonly parsed: ParsedExpression;

  constructor(options: { depends: readonly string[]; formula: string }) {
    this.depends = [...options.depends];
    this.formula = options.formula;
    try {
      this.parsed = parse(options.formula);
    } catch (error) {
      throw new ConfigError(
        `Formula error in dependent sampling formula: ${options.formula} (${errorMessage(error)})`,
      );
    }
  }

  /** Evaluate the formula against the values sampled so far */
  compute(bindings: ReadonlyMap<string, Value>): Value {
    const scope = extendScope(defaultScope(), { variables: bindings });
    try {
      return evaluate(this.parsed, scope).value;
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      throw new ConfigError(`Formula error in dependent sampling formula: ${this.formula} (${errorMessage(error)})`);
    }
  }
}
