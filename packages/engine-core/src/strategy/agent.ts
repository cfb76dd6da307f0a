import type { Choice, MoveHistory, Weights } from '../types.js';
import type { Rng } from '../rng.js';
import { chance } from '../rng.js';
import { choiceFromBool } from '../utils.js';
import type { Agent, StrategyKind } from './types.js';

/** Probability MEAN collaborates with before the opponent has moved. */
const MEAN_OPENING_P = 0.5;

/**
 * Create a fresh agent for one match. Only RANDOM_FIXED_AT_START draws here.
 * Weights are part of the signature so archetypes may read the payoff table;
 * none of the current ones do.
 */
export function instantiate(kind: StrategyKind, _weights: Weights, rng: Rng): Agent {
  switch (kind.type) {
    case 'ALWAYS_DEFECT': return { type: 'ALWAYS_DEFECT' };
    case 'ALWAYS_COLLABORATE': return { type: 'ALWAYS_COLLABORATE' };
    case 'RANDOM_EACH_TURN': return { type: 'RANDOM_EACH_TURN', p: kind.p };
    case 'RANDOM_FIXED_AT_START':
      return chance(rng, kind.p) ? { type: 'ALWAYS_COLLABORATE' } : { type: 'ALWAYS_DEFECT' };
    case 'TIT_FOR_TAT': return { type: 'TIT_FOR_TAT' };
    case 'TIT_FOR_TAT_DEFECT_FIRST': return { type: 'TIT_FOR_TAT_DEFECT_FIRST' };
    case 'MEAN': return { type: 'MEAN' };
    case 'PAVLOV': return { type: 'PAVLOV' };
    case 'GRIM': return { type: 'GRIM', triggered: false };
  }
}

/**
 * Next move for `agent` given the history so far. Mutates GRIM's trigger flag;
 * every other agent is read-only here.
 */
export function decide(agent: Agent, history: MoveHistory, rng: Rng): Choice {
  const { own, opponent } = history;
  const lastOwn = lastMove(own);
  const lastOpponent = lastMove(opponent);

  switch (agent.type) {
    case 'ALWAYS_DEFECT':
      return 'DEFECT';
    case 'ALWAYS_COLLABORATE':
      return 'COLLABORATE';
    case 'RANDOM_EACH_TURN':
      return choiceFromBool(chance(rng, agent.p));
    case 'TIT_FOR_TAT':
      return lastOpponent ?? 'COLLABORATE';
    case 'TIT_FOR_TAT_DEFECT_FIRST':
      return lastOpponent ?? 'DEFECT';
    case 'MEAN':
      return choiceFromBool(chance(rng, collaborationRate(opponent)));
    case 'PAVLOV':
      // Both undefined on turn 1 compares equal.
      return choiceFromBool(lastOwn === lastOpponent);
    case 'GRIM':
      if (lastOpponent === 'DEFECT') {
        agent.triggered = true;
      }
      return agent.triggered ? 'DEFECT' : 'COLLABORATE';
  }
}

function lastMove(moves: readonly Choice[]): Choice | undefined {
  return moves.length > 0 ? moves[moves.length - 1] : undefined;
}

/** Fraction of COLLABORATE moves, or MEAN_OPENING_P for an empty history. */
export function collaborationRate(moves: readonly Choice[]): number {
  if (moves.length === 0) return MEAN_OPENING_P;
  let collaborations = 0;
  for (const move of moves) {
    if (move === 'COLLABORATE') collaborations++;
  }
  return collaborations / moves.length;
}
