import type { Choice, Weights } from '../types.js';

/**
 * Payoffs for one simultaneous turn, in argument order.
 *
 * (D, D) → (dd, dd)
 * (D, C) → (dc_win, dc_lose)
 * (C, D) → (dc_lose, dc_win)
 * (C, C) → (cc, cc)
 */
export function outcome(weights: Weights, a: Choice, b: Choice): [number, number] {
  if (a === 'DEFECT') {
    return b === 'DEFECT' ? [weights.dd, weights.dd] : [weights.dc_win, weights.dc_lose];
  }
  return b === 'DEFECT' ? [weights.dc_lose, weights.dc_win] : [weights.cc, weights.cc];
}

/**
 * Largest per-turn payoff gap between the two sides: |dc_win - dc_lose|.
 * Zero means defecting confers no advantage; match scores are undefined then.
 */
export function maxDiff(weights: Weights): number {
  return Math.abs(weights.dc_win - weights.dc_lose);
}
