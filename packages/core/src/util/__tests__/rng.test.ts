import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { Mulberry32, randomSeed } from '../rng.js';

const TEST_SEED = 424242;

describe('Mulberry32', () => {
  it('produces the same sequence for the same seed', () => {
    const a = new Mulberry32(TEST_SEED);
    const b = new Mulberry32(TEST_SEED);
    const seqA = Array.from({ length: 20 }, () => a.nextFloat01());
    const seqB = Array.from({ length: 20 }, () => b.nextFloat01());
    expect(seqA).toEqual(seqB);
  });

  it('treats seeds modulo 2^32', () => {
    const a = new Mulberry32(-1);
    const b = new Mulberry32(0xffffffff);
    expect(a.nextFloat01()).toBe(b.nextFloat01());
  });

  it('nextFloat01 stays in [0, 1)', () => {
    const rng = new Mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const u = rng.nextFloat01();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });

  it('nextInt stays within inclusive bounds', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1_000_000, max: 1_000_000 }),
        fc.integer({ min: 0, max: 1_000 }),
        fc.integer(),
        (min, width, seed) => {
          const rng = new Mulberry32(seed);
          for (let i = 0; i < 20; i++) {
            const v = rng.nextInt(min, min + width);
            expect(Number.isInteger(v)).toBe(true);
            expect(v).toBeGreaterThanOrEqual(min);
            expect(v).toBeLessThanOrEqual(min + width);
          }
        }
      ),
      { seed: TEST_SEED, numRuns: 100 }
    );
  });

  it('nextInt handles ranges wider than 2^32', () => {
    const rng = new Mulberry32(1);
    for (let i = 0; i < 200; i++) {
      const v = rng.nextInt(Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
      expect(Number.isSafeInteger(v)).toBe(true);
    }
  });

  it('nextInt returns the single value of a degenerate range', () => {
    const rng = new Mulberry32(3);
    expect(rng.nextInt(5, 5)).toBe(5);
    expect(rng.nextInt(-2, -2)).toBe(-2);
  });

  it('pick covers every item of a small list', () => {
    const rng = new Mulberry32(11);
    const seen = new Set<string>();
    for (let i = 0; i < 200; i++) {
      seen.add(rng.pick(['a', 'b', 'c']));
    }
    expect([...seen].sort()).toEqual(['a', 'b', 'c']);
  });

  it('pick rejects an empty list', () => {
    const rng = new Mulberry32(1);
    expect(() => rng.pick([])).toThrow(RangeError);
  });
});

describe('randomSeed', () => {
  it('returns a uint32', () => {
    const seed = randomSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});
