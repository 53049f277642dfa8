// Seeded PRNG used by the row generator. One instance per generation call,
// never shared between calls.

/**
 * Deterministic, fast PRNG (mulberry32) over a uint32 state.
 */
export class Mulberry32 {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  nextFloat01(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Uniform integer in [min, max] inclusive. Bounds must be safe integers.
   */
  nextInt(min: number, max: number): number {
    const span = max - min + 1;
    if (span <= 0x100000000) {
      return min + Math.floor(this.nextFloat01() * span);
    }
    // Wide ranges: combine two draws for 53 bits of entropy.
    const hi = Math.floor(this.nextFloat01() * 0x200000);
    const lo = Math.floor(this.nextFloat01() * 0x100000000);
    const u = (hi * 0x100000000 + lo) / 2 ** 53;
    return Math.min(max, min + Math.floor(u * span));
  }

  /** Uniform pick among a non-empty list. */
  pick<T>(items: readonly T[]): T {
    const idx = Math.floor(this.nextFloat01() * items.length);
    const item = items[idx];
    if (item === undefined) {
      throw new RangeError('pick() called with an empty list');
    }
    return item;
  }
}

/**
 * Draw a fresh uint32 seed for callers that did not ask for reproducibility.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}
