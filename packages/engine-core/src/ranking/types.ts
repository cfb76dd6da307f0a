import type { StrategyKind } from '../strategy/types.js';

/** A strategy and its current rating (non-negative integer). */
export interface RatingEntry {
  kind: StrategyKind;
  rating: number;
}

export interface RankedStrategy {
  rank: number;
  name: string;
  description: string;
  rating: number;
  kind: StrategyKind;
}
