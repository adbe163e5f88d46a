/**
 * Seeded Random Numbers
 * One stream per grading call; the same seed replays the same draws.
 */

/**
 * RNG interface.
 * All sampling goes through one of these so that a grade can be replayed.
 */
export interface Rng {
  readonly seed: number;
  /** Next unsigned 32-bit integer */
  nextU32(): number;
  /** Float in [0, 1) */
  nextFloat(): number;
  /** Float in [low, high) */
  uniform(low: number, high: number): number;
  /** Integer in [low, high], both ends included */
  integer(low: number, high: number): number;
  /** Standard normal draw */
  normal(): number;
}

const TWO_POW_32 = 4294967296;

/** Mulberry32 step function over a 32-bit state */
function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return (x ^ (x >>> 14)) >>> 0;
  };
}

export function createRng(seed: number): Rng {
  const next = mulberry32(seed);
  let spareNormal: number | undefined;

  const rng: Rng = {
    seed: seed >>> 0,
    nextU32: next,
    nextFloat: () => next() / TWO_POW_32,
    uniform: (low, high) => low + (high - low) * rng.nextFloat(),
    integer: (low, high) => low + Math.floor(rng.nextFloat() * (high - low + 1)),
    normal: () => {
      if (spareNormal !== undefined) {
        const value = spareNormal;
        spareNormal = undefined;
        return value;
      }
      // Box-Muller; 1 - u keeps the log argument in (0, 1]
      const u = 1 - rng.nextFloat();
      const v = rng.nextFloat();
      const radius = Math.sqrt(-2 * Math.log(u));
      spareNormal = radius * Math.sin(2 * Math.PI * v);
      return radius * Math.cos(2 * Math.PI * v);
    },
  };
  return rng;
}

/** A fresh seed for calls that do not supply one */
export function randomSeed(): number {
  return Math.floor(Math.random() * TWO_POW_32) >>> 0;
}
