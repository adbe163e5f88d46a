/**
 * Function Sampling Sets
 * Random smooth functions, or a random pick from a fixed list.
 */

import { ConfigError } from "../errors.ts";
import { MathArray, type Value } from "../math/array.ts";
import { add, type Complex, complex, scale, ZERO } from "../math/complex.ts";
import { type MathFunction, scalarArgument, specifyDomain } from "../math/domain.ts";
import type { Rng } from "./rng.ts";
import type { FunctionSamplingSet } from "./sets.ts";

export interface RandomFunctionOptions {
  /** Number of scalar inputs */
  input_dim?: number;
  /** 1 gives a scalar output, more gives a vector */
  output_dim?: number;
  num_terms?: number;
  center?: number;
  amplitude?: number;
}

function positiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`RandomFunction ${label} must be a positive integer, received ${value}`);
  }
  return value;
}

function complexSin(z: Complex): Complex {
  return complex(Math.sin(z.re) * Math.cosh(z.im), Math.cos(z.re) * Math.sinh(z.im));
}

/**
 * A sum of sinusoids with random amplitude, frequency and phase.
 *
 * Y_i = center + amplitude / num_terms * sum_jk A_ijk sin(B_ijk x_k + C_ijk)
 * with A in [0.5, 1), B in [-pi, pi), C in [0, 2 pi). Outputs stay within
 * center +- amplitude for real inputs.
 */
export class RandomFunction implements FunctionSamplingSet {
  readonly kind = "function";
  readonly type = "RandomFunction";
  readonly inputDim: number;
  readonly outputDim: number;
  readonly numTerms: number;
  readonly center: number;
  readonly amplitude: number;

  constructor(options: RandomFunctionOptions = {}) {
    this.inputDim = positiveInteger(options.input_dim ?? 1, "input_dim");
    this.outputDim = positiveInteger(options.output_dim ?? 1, "output_dim");
    this.numTerms = positiveInteger(options.num_terms ?? 3, "num_terms");
    this.center = options.center ?? 0;
    this.amplitude = options.amplitude ?? 10;
    if (!(this.amplitude > 0) || !Number.isFinite(this.center)) {
      throw new ConfigError("RandomFunction needs a finite center and a positive amplitude");
    }
  }

  sample(rng: Rng, name: string): MathFunction {
    const count = this.outputDim * this.numTerms * this.inputDim;
    const draw = (fn: () => number): number[] => Array.from({ length: count }, fn);
    const a = draw(() => rng.nextFloat() / 2 + 0.5);
    const b = draw(() => 2 * Math.PI * (rng.nextFloat() - 0.5));
    const c = draw(() => 2 * Math.PI * rng.nextFloat());

    const factor = this.amplitude / this.numTerms;
    const { inputDim, outputDim, numTerms, center } = this;

    return specifyDomain({ input: new Array<number>(inputDim).fill(1), name }, (...args: Value[]): Value => {
      const xs = args.map(scalarArgument);
      const outputs: Complex[] = [];
      for (let i = 0; i < outputDim; i++) {
        let sum = ZERO;
        for (let j = 0; j < numTerms; j++) {
          xs.forEach((x, k) => {
            const index = (i * numTerms + j) * inputDim + k;
            const phase = add(scale(x, b[index] ?? 0), complex(c[index] ?? 0));
            sum = add(sum, scale(complexSin(phase), a[index] ?? 0));
          });
        }
        outputs.push(add(scale(sum, factor), complex(center)));
      }
      const [first = ZERO] = outputs;
      return outputDim > 1 ? MathArray.vector(outputs) : first;
    });
  }
}

/** One function from a fixed list per trial */
export class SpecificFunctions implements FunctionSamplingSet {
  readonly kind = "function";
  readonly type = "SpecificFunctions";
  readonly functions: readonly MathFunction[];

  constructor(functions: MathFunction | readonly MathFunction[]) {
    this.functions = typeof functions === "function" ? [functions] : [...functions];
    if (this.functions.length === 0) {
      throw new ConfigError("SpecificFunctions needs at least one function");
    }
  }

  sample(rng: Rng): MathFunction {
    const picked = this.functions[rng.integer(0, this.functions.length - 1)];
    if (picked === undefined) {
      throw new ConfigError("SpecificFunctions needs at least one function");
    }
    return picked;
  }
}
