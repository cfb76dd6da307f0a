import { describe, expect, it } from 'vitest';
import { chance, createRng, nextInt } from '../src/rng.js';
import type { Rng } from '../src/rng.js';

function fixed(value: number): Rng {
  return { next: () => value };
}

describe('createRng', () => {
  it('replays the same stream for the same seed', () => {
    const a = createRng(123);
    const b = createRng(123);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('produces different streams for different seeds', () => {
    const a = createRng(1);
    const b = createRng(2);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  it('stays in [0, 1)', () => {
    const rng = createRng(99);
    for (let i = 0; i < 10_000; i++) {
      const x = rng.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });
});

describe('nextInt', () => {
  it('maps 0 to min', () => {
    expect(nextInt(fixed(0), 100, 201)).toBe(100);
  });

  it('maps values just below 1 to maxExclusive - 1', () => {
    expect(nextInt(fixed(0.999999), 100, 201)).toBe(200);
  });

  it('covers the whole range for a seeded stream', () => {
    const rng = createRng(5);
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i++) {
      seen.add(nextInt(rng, 0, 4));
    }
    expect([...seen].sort()).toEqual([0, 1, 2, 3]);
  });
});

describe('chance', () => {
  it('is true when the draw is below p', () => {
    expect(chance(fixed(0.3), 0.5)).toBe(true);
    expect(chance(fixed(0.5), 0.5)).toBe(false);
  });

  it('never fires for p = 0 and always fires for p = 1', () => {
    expect(chance(fixed(0), 0)).toBe(false);
    expect(chance(fixed(0.999999), 1)).toBe(true);
  });
});
