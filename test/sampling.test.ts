/**
 * Sampling tests: seeded streams, scalar and array sets, function sets,
 * dependent samplers and the plan that orders them
 */

import { describe, expect, test } from "vitest";
import { ConfigError, DomainError } from "../src/lib/errors.ts";
import { determinant, multiplyValues, norm, trace, transpose } from "../src/lib/math/arithmetic.ts";
import { MathArray, type Value, formatValue } from "../src/lib/math/array.ts";
import { complex, conj, modulus } from "../src/lib/math/complex.ts";
import { DEFAULT_FUNCTIONS } from "../src/lib/math/functions.ts";
import {
  IdentityMatrixMultiples,
  OrthogonalMatrices,
  RealVectors,
  SquareMatrices,
  UnitaryMatrices,
} from "../src/lib/sampling/arrays.ts";
import {
  createPlan,
  numberedVarsRegExp,
  resolveVariableSets,
  sampleBindings,
  sampleTrials,
  type VariableSet,
} from "../src/lib/sampling/engine.ts";
import { RandomFunction, SpecificFunctions } from "../src/lib/sampling/functions.ts";
import { createRng } from "../src/lib/sampling/rng.ts";
import { buildFunctionSet, buildVariableSet, isSamplingSet } from "../src/lib/sampling/schema.ts";
import {
  ComplexSector,
  DependentSampler,
  DiscreteSet,
  IntegerRange,
  orderedRange,
  RealInterval,
} from "../src/lib/sampling/sets.ts";

function asArray(value: Value): MathArray {
  if (!(value instanceof MathArray)) throw new Error("expected an array");
  return value;
}

function scalar(value: Value): { re: number; im: number } {
  if (value instanceof MathArray) throw new Error("expected a scalar");
  return value;
}

// =============================================================================
// RNG
// =============================================================================

describe("createRng", () => {
  test("the same seed replays the same stream", () => {
    const a = createRng(42);
    const b = createRng(42);
    const drawsA = Array.from({ length: 5 }, () => a.nextFloat());
    const drawsB = Array.from({ length: 5 }, () => b.nextFloat());
    expect(drawsA).toEqual(drawsB);
    expect(createRng(43).nextFloat()).not.toBe(drawsA[0]);
  });

  test("draws stay in range", () => {
    const rng = createRng(7);
    const seen = new Set<number>();
    for (let k = 0; k < 300; k++) {
      const f = rng.nextFloat();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
      const n = rng.integer(1, 3);
      expect([1, 2, 3]).toContain(n);
      seen.add(n);
      const u = rng.uniform(-2, 2);
      expect(u).toBeGreaterThanOrEqual(-2);
      expect(u).toBeLessThan(2);
    }
    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3]);
  });

  test("the seed is stored as an unsigned 32-bit integer", () => {
    expect(createRng(-1).seed).toBe(4294967295);
  });
});

// =============================================================================
// SCALAR SETS
// =============================================================================

describe("scalar sets", () => {
  test("RealInterval swaps a reversed range", () => {
    const set = new RealInterval([5, 1]);
    expect([set.start, set.stop]).toEqual([1, 5]);
    const rng = createRng(1);
    for (let k = 0; k < 50; k++) {
      const x = scalar(set.sample(rng)).re;
      expect(x).toBeGreaterThanOrEqual(1);
      expect(x).toBeLessThan(5);
    }
  });

  test("ranges must be finite", () => {
    expect(() => orderedRange([0, Number.POSITIVE_INFINITY], "RealInterval")).toThrow(
      "RealInterval must have finite start and stop, received [0, Infinity]",
    );
  });

  test("IntegerRange needs integer ends and includes both", () => {
    expect(() => new IntegerRange([1.5, 3])).toThrow("IntegerRange needs integer start and stop, received [1.5, 3]");
    const set = new IntegerRange([-1, 1]);
    const rng = createRng(3);
    const seen = new Set<number>();
    for (let k = 0; k < 100; k++) seen.add(scalar(set.sample(rng)).re);
    expect([...seen].sort((a, b) => a - b)).toEqual([-1, 0, 1]);
  });

  test("ComplexSector draws from the annulus", () => {
    const set = new ComplexSector({ modulus: [1, 3], argument: [0, Math.PI / 2] });
    const rng = createRng(9);
    for (let k = 0; k < 50; k++) {
      const z = scalar(set.sample(rng));
      expect(Math.hypot(z.re, z.im)).toBeGreaterThanOrEqual(1 - 1e-12);
      expect(Math.hypot(z.re, z.im)).toBeLessThan(3);
      expect(z.re).toBeGreaterThanOrEqual(-1e-12);
      expect(z.im).toBeGreaterThanOrEqual(0);
    }
  });

  test("DiscreteSet picks from its values", () => {
    expect(() => new DiscreteSet([])).toThrow("DiscreteSet needs at least one value");
    const set = new DiscreteSet([2, 4]);
    const rng = createRng(11);
    for (let k = 0; k < 20; k++) {
      expect([2, 4]).toContain(scalar(set.sample(rng)).re);
    }
    expect(scalar(new DiscreteSet(3.5).sample(rng)).re).toBe(3.5);
  });
});

// =============================================================================
// ARRAY SETS
// =============================================================================

describe("array sets", () => {
  test("RealVectors have the requested length and a norm in range", () => {
    const set = new RealVectors({ shape: 2, norm: [2, 3] });
    const rng = createRng(5);
    for (let k = 0; k < 20; k++) {
      const v = asArray(set.sample(rng));
      expect(v.shape).toEqual([2]);
      expect(norm(v)).toBeGreaterThanOrEqual(2 - 1e-9);
      expect(norm(v)).toBeLessThan(3 + 1e-9);
    }
  });

  test("SquareMatrices honour symmetry, trace and determinant", () => {
    const rng = createRng(17);

    const symmetric = asArray(new SquareMatrices({ dimension: 3, symmetry: "symmetric" }).sample(rng));
    expect(symmetric.at(0, 2).re).toBeCloseTo(symmetric.at(2, 0).re, 12);
    expect(symmetric.at(1, 2).re).toBeCloseTo(symmetric.at(2, 1).re, 12);

    const traceless = asArray(new SquareMatrices({ dimension: 3, traceless: true }).sample(rng));
    expect(trace(traceless).re).toBeCloseTo(0, 10);

    const unit = asArray(new SquareMatrices({ dimension: 2, determinant: 1 }).sample(rng));
    expect(determinant(unit).re).toBeCloseTo(1, 9);

    const singular = asArray(new SquareMatrices({ dimension: 3, determinant: 0 }).sample(rng));
    expect(modulus(determinant(singular))).toBeLessThan(1e-9);
  });

  test("hermitian matrices equal their conjugate transpose", () => {
    const m = asArray(new SquareMatrices({ dimension: 2, symmetry: "hermitian" }).sample(createRng(23)));
    const adjoint = transpose(m).map(conj);
    m.data.forEach((z, k) => {
      const w = adjoint.data[k] ?? complex(Number.NaN);
      expect(z.re).toBeCloseTo(w.re, 12);
      expect(z.im).toBeCloseTo(w.im, 12);
    });
  });

  test("impossible combinations are configuration errors", () => {
    expect(() => new SquareMatrices({ symmetry: "antisymmetric", determinant: 0 })).toThrow(
      "Unable to generate zero determinant antisymmetric matrices",
    );
    expect(() => new SquareMatrices({ dimension: 3, symmetry: "antisymmetric", determinant: 1 })).toThrow(
      "No unit-determinant antisymmetric matrix exists in odd dimensions",
    );
    expect(() => new SquareMatrices({ dimension: 1 })).toThrow(
      "SquareMatrices dimension must be an integer of at least 2, received 1",
    );
  });

  test("orthogonal samples are rotations", () => {
    const q = asArray(new OrthogonalMatrices({ dimension: 3 }).sample(createRng(29)));
    const product = asArray(multiplyValues(q, transpose(q)));
    product.data.forEach((z, k) => {
      const expected = Math.floor(k / 3) === k % 3 ? 1 : 0;
      expect(z.re).toBeCloseTo(expected, 9);
    });
    expect(determinant(q).re).toBeCloseTo(1, 9);
  });

  test("unitary samples with unit determinant", () => {
    const u = asArray(new UnitaryMatrices({ dimension: 2 }).sample(createRng(31)));
    const det = determinant(u);
    expect(det.re).toBeCloseTo(1, 9);
    expect(det.im).toBeCloseTo(0, 9);
  });

  test("identity multiples take their factor from the sampler", () => {
    const set = new IdentityMatrixMultiples({ dimension: 3, sampler: new DiscreteSet(2) });
    expect(formatValue(set.sample(createRng(1)))).toBe("[[2, 0, 0], [0, 2, 0], [0, 0, 2]]");
  });
});

// =============================================================================
// FUNCTION SETS
// =============================================================================

describe("function sets", () => {
  test("RandomFunction stays within center plus or minus amplitude", () => {
    const set = new RandomFunction({ center: 5, amplitude: 2 });
    const f = set.sample(createRng(13), "f");
    for (const x of [-3, 0, 0.5, 10]) {
      const y = scalar(f(complex(x))).re;
      expect(Math.abs(y - 5)).toBeLessThanOrEqual(2);
    }
  });

  test("RandomFunction is replayed by its seed", () => {
    const set = new RandomFunction({ input_dim: 2 });
    const f = set.sample(createRng(99), "f");
    const g = set.sample(createRng(99), "f");
    expect(scalar(f(complex(1), complex(2)))).toEqual(scalar(g(complex(1), complex(2))));
    expect(() => f(complex(1))).toThrow(DomainError);
    expect(() => f(complex(1))).toThrow("There was an error evaluating function f(...): expected 2 inputs, but received 1.");
  });

  test("vector-valued RandomFunction", () => {
    const f = new RandomFunction({ output_dim: 2 }).sample(createRng(4), "F");
    expect(asArray(f(complex(1))).shape).toEqual([2]);
  });

  test("RandomFunction dimensions must be positive integers", () => {
    expect(() => new RandomFunction({ input_dim: 0 })).toThrow(
      "RandomFunction input_dim must be a positive integer, received 0",
    );
  });

  test("SpecificFunctions picks one of its functions", () => {
    const sin = DEFAULT_FUNCTIONS.get("sin");
    const cos = DEFAULT_FUNCTIONS.get("cos");
    if (sin === undefined || cos === undefined) throw new Error("missing defaults");
    const set = new SpecificFunctions([sin, cos]);
    const rng = createRng(8);
    for (let k = 0; k < 10; k++) {
      expect([sin, cos]).toContain(set.sample(rng));
    }
  });
});

// =============================================================================
// SCHEMA BUILDERS
// =============================================================================

describe("buildVariableSet", () => {
  test("shorthand forms", () => {
    const interval = buildVariableSet([0, 1]);
    expect(interval).toBeInstanceOf(RealInterval);
    if (interval instanceof RealInterval) {
      expect([interval.start, interval.stop]).toEqual([0, 1]);
    }
    expect(buildVariableSet(3.5)).toBeInstanceOf(DiscreteSet);
  });

  test("sets by type name", () => {
    const vectors = buildVariableSet({ type: "RealVectors", shape: 2 });
    expect(vectors).toBeInstanceOf(RealVectors);
    if (vectors instanceof RealVectors) {
      expect(vectors.shape).toEqual([2]);
    }
    expect(buildVariableSet({ type: "IntegerRange", start: 0, stop: 3 })).toBeInstanceOf(IntegerRange);
    expect(buildVariableSet({ type: "DependentSampler", depends: ["x"], formula: "2*x" })).toBeInstanceOf(
      DependentSampler,
    );
  });

  test("rejects unknown descriptions", () => {
    expect(() => buildVariableSet({ type: "Bogus" }, "x")).toThrow(ConfigError);
    expect(() => buildVariableSet({ type: "Bogus" }, "x")).toThrow(/^Invalid sampling set for 'x': /);
  });
});

describe("buildFunctionSet", () => {
  test("names resolve to default functions", () => {
    expect(buildFunctionSet("sin")).toBe(DEFAULT_FUNCTIONS.get("sin"));
    expect(buildFunctionSet(["sin", "cos"])).toBeInstanceOf(SpecificFunctions);
    expect(buildFunctionSet({ type: "RandomFunction" })).toBeInstanceOf(RandomFunction);
  });

  test("unknown names are configuration errors", () => {
    expect(() => buildFunctionSet("nosuch")).toThrow("Unknown default function: nosuch");
  });

  test("isSamplingSet recognises built sets only", () => {
    expect(isSamplingSet(new RealInterval())).toBe(true);
    expect(isSamplingSet(new DependentSampler({ depends: [], formula: "1" }))).toBe(true);
    expect(isSamplingSet({})).toBe(false);
  });
});

// =============================================================================
// ENGINE
// =============================================================================

describe("sampling plan", () => {
  test("dependent samplers run after their dependencies", () => {
    const variables = new Map<string, VariableSet>([
      ["s", new DependentSampler({ depends: ["r"], formula: "2*r" })],
      ["r", new DependentSampler({ depends: ["x", "y"], formula: "sqrt(x^2+y^2)" })],
      ["x", new DiscreteSet(3)],
      ["y", new DiscreteSet(4)],
    ]);
    const plan = createPlan(variables);
    expect(plan.dependent.map(([name]) => name)).toEqual(["r", "s"]);

    const bindings = sampleBindings(plan, createRng(1));
    expect(formatValue(bindings.get("r") ?? complex(Number.NaN))).toBe("5");
    expect(formatValue(bindings.get("s") ?? complex(Number.NaN))).toBe("10");
  });

  test("cycles are rejected when the plan is built", () => {
    const variables = new Map<string, VariableSet>([
      ["b", new DependentSampler({ depends: ["a"], formula: "a" })],
      ["a", new DependentSampler({ depends: ["b"], formula: "b" })],
    ]);
    expect(() => createPlan(variables)).toThrow("Circularly dependent DependentSamplers detected: a, b");
  });

  test("unknown dependencies are rejected", () => {
    const variables = new Map<string, VariableSet>([["r", new DependentSampler({ depends: ["z"], formula: "z" })]]);
    expect(() => createPlan(variables)).toThrow("DependentSampler for 'r' depends on unknown variables: ['z']");
  });

  test("formula parse errors are configuration errors", () => {
    expect(() => new DependentSampler({ depends: [], formula: "x^" })).toThrow(
      "Formula error in dependent sampling formula: x^ (Invalid Input: the expression ends unexpectedly after '^'; an operand is missing)",
    );
  });

  test("trials are replayed by their seed", () => {
    const plan = createPlan(new Map([["x", new RealInterval()]]));
    const first = sampleTrials(plan, createRng(77), 3).map((t) => t.variables.get("x"));
    const second = sampleTrials(plan, createRng(77), 3).map((t) => t.variables.get("x"));
    expect(first).toHaveLength(3);
    expect(first).toEqual(second);
  });
});

describe("numbered variables", () => {
  test("indices are integers without leading zeros", () => {
    const pattern = numberedVarsRegExp(["a"]);
    expect(pattern.exec("a_{-3}")?.[1]).toBe("a");
    expect(pattern.test("a_{0}")).toBe(true);
    expect(pattern.test("a_{05}")).toBe(false);
    expect(pattern.test("b_{1}")).toBe(false);
  });

  test("used instances get their head's set", () => {
    const seven = new DiscreteSet(7);
    const resolved = resolveVariableSets({
      variables: ["x"],
      numberedVars: ["a"],
      sampleFrom: new Map([["a", seven]]),
      used: ["x", "a_{2}", "a_{1}", "b_{1}"],
      defaultSet: () => new RealInterval(),
    });
    expect([...resolved.keys()]).toEqual(["x", "a_{1}", "a_{2}"]);
    expect(resolved.get("a_{1}")).toBe(seven);
    expect(resolved.get("x")).toBeInstanceOf(RealInterval);
  });
});
