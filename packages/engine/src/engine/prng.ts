// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic shuffling for the initial deal, so a game created from
// a seed can be reproduced exactly.

/** mulberry32: returns the next pseudo-random float in [0, 1) per call. */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRng {
  private readonly rng: () => number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.rng = mulberry32(seed);
  }

  /**
   * Returns a pseudo-random integer in [0, bound).
   * @throws {RangeError} if bound is not a positive safe integer.
   */
  below(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive safe integer, got ${bound}`);
    }
    return Math.floor(this.rng() * bound);
  }

  /**
   * Fisher-Yates shuffle. Returns a **new** array; the input is never
   * mutated.
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = items.slice();
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.below(i + 1);
      [result[i], result[j]] = [result[j]!, result[i]!];
    }
    return result;
  }
}

export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}
