import { strategyDescription, strategyName } from '../strategy/catalog.js';
import type { RankedStrategy, RatingEntry } from './types.js';

/**
 * Rank entries by rating, highest first. Ties keep their input order.
 * Does not mutate `entries`.
 */
export function rankStrategies(entries: readonly RatingEntry[]): RankedStrategy[] {
  const sorted = [...entries].sort((a, b) => b.rating - a.rating);

  return sorted.map((entry, i) => ({
    rank: i + 1,
    name: strategyName(entry.kind),
    description: strategyDescription(entry.kind),
    rating: entry.rating,
    kind: entry.kind,
  }));
}
