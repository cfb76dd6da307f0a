import type { EngineError, Weights } from '@dilemma/engine-core';
import type { EloPool } from './pool/elo-pool.js';

/** Rating pool configuration. Turn bounds are both inclusive. */
export interface PoolConfig {
  weights: Weights;
  /** Rating every strategy starts from. Non-negative integer. */
  starting_points: number;
  /** Rating gap at which the expected outcome approaches tanh(1) ≈ 0.76. */
  scale: number;
  /** Maximum correction applied after a single match. */
  k_factor: number;
  min_turns: number;
  max_turns: number;
}

/** Result of createPool: the pool, or the first configuration error. */
export type PoolResult =
  | { pool: EloPool; error?: undefined; error_detail?: undefined }
  | { pool?: undefined; error: EngineError; error_detail?: string };
