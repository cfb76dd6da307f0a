import type { ValidationFailure, Weights } from './types.js';
import { EngineError } from './types.js';
import { maxDiff } from './payoff/outcome.js';
import { validateStrategyKind } from './strategy/catalog.js';
import type { StrategyKind } from './strategy/types.js';

function isPayoff(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Weights must be non-negative safe integers and defecting against a
 * collaborator must pay differently from being defected on.
 */
export function validateWeights(w: Weights): EngineError | null {
  if (!isPayoff(w.dd) || !isPayoff(w.dc_win) || !isPayoff(w.dc_lose) || !isPayoff(w.cc)) {
    return EngineError.INVALID_WEIGHTS;
  }
  if (maxDiff(w) === 0) {
    return EngineError.ZERO_MAX_DIFF;
  }
  return null;
}

/** Validate every kind in a catalog. Returns the first error found, or null. */
export function validateCatalog(catalog: readonly StrategyKind[]): ValidationFailure | null {
  for (let i = 0; i < catalog.length; i++) {
    const err = validateStrategyKind(catalog[i]);
    if (err) {
      return { error: err, detail: `catalog[${i}]` };
    }
  }
  return null;
}
