import type { Choice, Weights } from '../types.js';
import type { Rng } from '../rng.js';
import { outcome, maxDiff } from '../payoff/outcome.js';
import { decide, instantiate } from '../strategy/agent.js';
import type { StrategyKind } from '../strategy/types.js';

/**
 * Play `turnCount` simultaneous turns between fresh agents of `kindA` and
 * `kindB` and return A's normalized margin in [-1, 1]:
 *
 *   score = Σ(payoff_A - payoff_B) / (maxDiff * turnCount)
 *
 * +1 means A took the largest possible advantage every turn, 0 an even match.
 *
 * Preconditions: maxDiff(weights) > 0 and turnCount >= 1. The result is NaN or
 * infinite otherwise; the rating pool rejects such configurations up front.
 *
 * Draw order on `rng`: instantiate A, instantiate B, then per turn A's
 * decision followed by B's.
 */
export function playMatch(
  kindA: StrategyKind,
  kindB: StrategyKind,
  weights: Weights,
  turnCount: number,
  rng: Rng,
): number {
  const agentA = instantiate(kindA, weights, rng);
  const agentB = instantiate(kindB, weights, rng);
  const historyA: Choice[] = [];
  const historyB: Choice[] = [];
  let points = 0;

  for (let turn = 0; turn < turnCount; turn++) {
    // Both decide against the pre-turn histories.
    const moveA = decide(agentA, { own: historyA, opponent: historyB }, rng);
    const moveB = decide(agentB, { own: historyB, opponent: historyA }, rng);
    historyA.push(moveA);
    historyB.push(moveB);

    const [payoffA, payoffB] = outcome(weights, moveA, moveB);
    points += payoffA - payoffB;
  }

  return points / (maxDiff(weights) * turnCount);
}
