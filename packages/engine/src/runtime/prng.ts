// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic random source for rule evaluation. One instance per
// battle side; identical seeds and call order give identical battles.

import type { RandomSource } from "./evaluation-context";

/**
 * mulberry32, a 32-bit seeded PRNG.
 * Returns a function that produces the next pseudo-random float in [0, 1).
 */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRng implements RandomSource {
  private readonly rng: () => number;
  private draws = 0;

  constructor(readonly seed: number) {
    this.rng = mulberry32(seed);
  }

  /** How many values have been drawn so far. */
  get drawCount(): number {
    return this.draws;
  }

  /** Returns the next pseudo-random float in [0, 1). */
  next(): number {
    this.draws++;
    return this.rng();
  }

  /**
   * Returns a pseudo-random integer in [min, max).
   * @throws {RangeError} if min >= max or either value is not a safe integer.
   */
  nextInt(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new RangeError("min and max must be safe integers");
    }
    if (min >= max) {
      throw new RangeError(`min (${min}) must be less than max (${max})`);
    }
    return min + Math.floor(this.next() * (max - min));
  }
}

/** Creates a new SeededRng from the given seed. */
export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}
