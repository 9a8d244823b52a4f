/**
 * Seeded random data for property tests
 */

/**
 * Deterministic PRNG (mulberry32)
 */
export class SeededRandom {
  #state: number;

  constructor(seed: number) {
    this.#state = seed >>> 0;
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    this.#state = (this.#state + 0x6d2b79f5) >>> 0;
    let t = this.#state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Integer in [min, max] inclusive
   */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /**
   * Float in [min, max)
   */
  float(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /**
   * Inclusive range [left, right] inside [0, size)
   */
  range(size: number): [number, number] {
    const a = this.int(0, size - 1);
    const b = this.int(0, size - 1);
    return a <= b ? [a, b] : [b, a];
  }
}

/**
 * Sequence of floats drawn uniformly from [min, max)
 */
export function randomSequence(rng: SeededRandom, size: number, min = -1000, max = 1000): number[] {
  return Array.from({ length: size }, () => rng.float(min, max));
}
