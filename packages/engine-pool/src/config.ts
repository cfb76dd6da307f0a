import { DEFAULT_WEIGHTS } from '@dilemma/engine-core';
import type { Weights } from '@dilemma/engine-core';
import type { PoolConfig } from './types.js';

/** k-factor for pools built from configuration. */
export const DEFAULT_K_FACTOR = 32;

export const DEFAULT_POOL_CONFIG: Readonly<PoolConfig> = {
  weights: DEFAULT_WEIGHTS,
  starting_points: 700,
  scale: 100,
  k_factor: DEFAULT_K_FACTOR,
  min_turns: 100,
  max_turns: 200,
};

/** Pool configuration with every field optional; weights may be given partially. */
export type PoolConfigInput = Partial<Omit<PoolConfig, 'weights'>> & {
  weights?: Partial<Weights>;
};

/** Fill missing fields from DEFAULT_POOL_CONFIG. Does not validate. */
export function resolvePoolConfig(input: PoolConfigInput = {}): PoolConfig {
  const d = DEFAULT_POOL_CONFIG;
  const w = input.weights ?? {};
  return {
    weights: {
      dd: w.dd ?? d.weights.dd,
      dc_win: w.dc_win ?? d.weights.dc_win,
      dc_lose: w.dc_lose ?? d.weights.dc_lose,
      cc: w.cc ?? d.weights.cc,
    },
    starting_points: input.starting_points ?? d.starting_points,
    scale: input.scale ?? d.scale,
    k_factor: input.k_factor ?? d.k_factor,
    min_turns: input.min_turns ?? d.min_turns,
    max_turns: input.max_turns ?? d.max_turns,
  };
}
