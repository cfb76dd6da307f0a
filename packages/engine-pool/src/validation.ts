import { EngineError, maxDiff, validateWeights } from '@dilemma/engine-core';
import type { ValidationFailure } from '@dilemma/engine-core';
import type { PoolConfig } from './types.js';

export function validateTurnRange(minTurns: number, maxTurns: number): EngineError | null {
  if (!Number.isSafeInteger(minTurns) || !Number.isSafeInteger(maxTurns)) {
    return EngineError.INVALID_TURN_RANGE;
  }
  if (minTurns < 1 || maxTurns < minTurns) {
    return EngineError.INVALID_TURN_RANGE;
  }
  return null;
}

/** Validate a full PoolConfig. Returns the first error found, or null. */
export function validatePoolConfig(config: PoolConfig): ValidationFailure | null {
  const wErr = validateWeights(config.weights);
  if (wErr) {
    const { dd, dc_win, dc_lose, cc } = config.weights;
    return { error: wErr, detail: `weights=${dd},${dc_win}-${dc_lose},${cc}` };
  }

  const tErr = validateTurnRange(config.min_turns, config.max_turns);
  if (tErr) {
    return { error: tErr, detail: `turns=${config.min_turns}..${config.max_turns}` };
  }

  // Per-match point totals stay exact only within safe integers.
  if (!Number.isSafeInteger(maxDiff(config.weights) * config.max_turns)) {
    return { error: EngineError.PAYOFF_OVERFLOW };
  }

  if (!Number.isFinite(config.scale) || config.scale <= 0) {
    return { error: EngineError.INVALID_SCALE, detail: `scale=${config.scale}` };
  }

  if (!Number.isFinite(config.k_factor) || config.k_factor < 0) {
    return { error: EngineError.INVALID_K_FACTOR, detail: `k_factor=${config.k_factor}` };
  }

  if (!Number.isSafeInteger(config.starting_points) || config.starting_points < 0) {
    return {
      error: EngineError.INVALID_STARTING_POINTS,
      detail: `starting_points=${config.starting_points}`,
    };
  }

  return null;
}
