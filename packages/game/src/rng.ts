/** Source of randomness shared by the oracle fallback, the AI and the UI delay */
export interface RandomSource {
  /** Return a float in [0, 1) */
  nextFloat(): number;
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
  /** Return a uniformly chosen element; throws on an empty array */
  pick<T>(items: readonly T[]): T;
}

abstract class BaseRandom implements RandomSource {
  abstract nextFloat(): number;

  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error("Cannot pick from an empty list");
    }
    return items[this.nextInt(items.length)];
  }
}

/**
 * Deterministic seeded PRNG using xorshift32.
 * Seed is derived by hashing the seed string into a 32-bit integer.
 */
export class SeededRng extends BaseRandom {
  private state: number;

  constructor(seed: string) {
    super();
    this.state = SeededRng.hashString(seed);
    if (this.state === 0) this.state = 1; // xorshift cannot have state 0
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    return hash === 0 ? 1 : Math.abs(hash);
  }

  /** Return next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.next() / 4294967296;
  }
}

export class MathRandom extends BaseRandom {
  nextFloat(): number {
    return Math.random();
  }
}

/** Seeded when a seed is given, otherwise backed by Math.random */
export function createRandom(seed?: string): RandomSource {
  return seed ? new SeededRng(seed) : new MathRandom();
}
