/**
 * Sampling Engine
 * Turns a grader's sampling configuration into per-trial variable and
 * function bindings.
 *
 * A plan is built once per answer check: plain sets are drawn in declaration
 * order, then dependent samplers in dependency order. Cycles among dependent
 * samplers are rejected when the plan is built.
 */

import { ConfigError } from "../errors.ts";
import type { Value } from "../math/array.ts";
import type { MathFunction } from "../math/domain.ts";
import type { Rng } from "./rng.ts";
import { DependentSampler, type FunctionSamplingSet, type VariableSamplingSet } from "./sets.ts";

export type VariableSet = VariableSamplingSet | DependentSampler;

export interface SamplingPlan {
  readonly independent: ReadonlyArray<readonly [string, VariableSamplingSet]>;
  /** Dependent samplers, each after everything it depends on */
  readonly dependent: ReadonlyArray<readonly [string, DependentSampler]>;
  readonly functions: ReadonlyArray<readonly [string, FunctionSamplingSet]>;
}

const formatNames = (names: readonly string[]): string => `['${names.join("', '")}']`;

// =============================================================================
// NUMBERED VARIABLES
// =============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Regexp matching numbered instances of the given heads, capturing the head.
 * Indices are integers without leading zeros: a_{0}, a_{12}, a_{-3}.
 *
 * @example
 * numberedVarsRegExp(["a"]).exec("a_{-3}")?.[1]  // "a"
 * numberedVarsRegExp(["a"]).test("a_{05}")       // false
 */
export function numberedVarsRegExp(heads: readonly string[]): RegExp {
  const alternatives = heads.map(escapeRegExp).join("|");
  return new RegExp(`^(${alternatives})_\\{(?:-?[1-9]\\d*|0)\\}$`);
}

/**
 * Resolve the variables an evaluation needs to their sampling sets.
 * Declared variables come first; used names matching a numbered head get the
 * head's set, one independent draw per instance.
 */
export function resolveVariableSets(options: {
  variables: readonly string[];
  numberedVars: readonly string[];
  sampleFrom: ReadonlyMap<string, VariableSet>;
  used: Iterable<string>;
  defaultSet: () => VariableSamplingSet;
}): Map<string, VariableSet> {
  const { variables, numberedVars, sampleFrom, used, defaultSet } = options;
  const resolved = new Map<string, VariableSet>();
  for (const name of variables) {
    resolved.set(name, sampleFrom.get(name) ?? defaultSet());
  }
  if (numberedVars.length === 0) return resolved;

  const pattern = numberedVarsRegExp(numberedVars);
  const instances = [...new Set(used)].filter((name) => !resolved.has(name)).sort();
  for (const name of instances) {
    const head = pattern.exec(name)?.[1];
    if (head !== undefined) {
      resolved.set(name, sampleFrom.get(head) ?? defaultSet());
    }
  }
  return resolved;
}

// =============================================================================
// PLAN
// =============================================================================

/** Order dependent samplers so each comes after its dependencies */
function orderDependents(
  dependents: ReadonlyArray<readonly [string, DependentSampler]>,
  independent: ReadonlySet<string>,
): Array<readonly [string, DependentSampler]> {
  const known = new Set([...independent, ...dependents.map(([name]) => name)]);
  for (const [name, sampler] of dependents) {
    const missing = sampler.depends.filter((dep) => !known.has(dep)).sort();
    if (missing.length > 0) {
      throw new ConfigError(`DependentSampler for '${name}' depends on unknown variables: ${formatNames(missing)}`);
    }
  }

  const ordered: Array<readonly [string, DependentSampler]> = [];
  const resolved = new Set(independent);
  let pending = [...dependents];
  while (pending.length > 0) {
    const ready = pending.filter(([, sampler]) => sampler.depends.every((dep) => resolved.has(dep)));
    if (ready.length === 0) {
      const names = pending.map(([name]) => name).sort();
      throw new ConfigError(`Circularly dependent DependentSamplers detected: ${names.join(", ")}`);
    }
    for (const entry of ready) {
      ordered.push(entry);
      resolved.add(entry[0]);
    }
    pending = pending.filter((entry) => !ready.includes(entry));
  }
  return ordered;
}

export function createPlan(
  variables: ReadonlyMap<string, VariableSet>,
  functions: ReadonlyMap<string, FunctionSamplingSet> = new Map(),
): SamplingPlan {
  const independent: Array<readonly [string, VariableSamplingSet]> = [];
  const dependent: Array<readonly [string, DependentSampler]> = [];
  for (const [name, set] of variables) {
    if (set instanceof DependentSampler) {
      dependent.push([name, set]);
    } else {
      independent.push([name, set]);
    }
  }
  return {
    independent,
    dependent: orderDependents(dependent, new Set(independent.map(([name]) => name))),
    functions: [...functions],
  };
}

// =============================================================================
// DRAWS
// =============================================================================

/** One trial's variable values */
export function sampleBindings(plan: SamplingPlan, rng: Rng): Map<string, Value> {
  const bindings = new Map<string, Value>();
  for (const [name, set] of plan.independent) {
    bindings.set(name, set.sample(rng));
  }
  for (const [name, sampler] of plan.dependent) {
    const inputs = new Map<string, Value>();
    for (const dep of sampler.depends) {
      const value = bindings.get(dep);
      if (value !== undefined) inputs.set(dep, value);
    }
    bindings.set(name, sampler.compute(inputs));
  }
  return bindings;
}

/** One trial's random functions */
export function sampleFunctions(plan: SamplingPlan, rng: Rng): Map<string, MathFunction> {
  return new Map(plan.functions.map(([name, set]) => [name, set.sample(rng, name)]));
}

export interface TrialSample {
  variables: Map<string, Value>;
  functions: Map<string, MathFunction>;
}

/** Draw every trial up front so instructor and student see the same values */
export function sampleTrials(plan: SamplingPlan, rng: Rng, trials: number): TrialSample[] {
  const variables = Array.from({ length: trials }, () => sampleBindings(plan, rng));
  const functions = Array.from({ length: trials }, () => sampleFunctions(plan, rng));
  return variables.map((bindings, k) => ({ variables: bindings, functions: functions[k] ?? new Map() }));
}
