/**
 * Random stream shared by every operation that draws: agent instantiation,
 * per-turn decisions and the pool's pair/turn sampling. One stream, consumed
 * in call order, so a seeded stream replays a run exactly.
 */
export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** mulberry32 over a 32-bit seed. */
export function createRng(seed: number): Rng {
  let t = seed >>> 0;
  return {
    next() {
      t = (t + 0x6d2b79f5) >>> 0;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Uniform integer in [min, maxExclusive). */
export function nextInt(rng: Rng, min: number, maxExclusive: number): number {
  return min + Math.floor(rng.next() * (maxExclusive - min));
}

/** True with probability p. Always draws, even for p of 0 or 1. */
export function chance(rng: Rng, p: number): boolean {
  return rng.next() < p;
}
