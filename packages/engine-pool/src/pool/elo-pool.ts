import {
  nextInt,
  playMatch,
  standardCatalog,
  validateCatalog,
  type RatingEntry,
  type Rng,
  type StrategyKind,
} from '@dilemma/engine-core';
import { resolvePoolConfig, type PoolConfigInput } from '../config.js';
import { applyCorrection, computeCorrection, expectedOutcome } from '../rating/elo.js';
import type { PoolConfig, PoolResult } from '../types.js';
import { validatePoolConfig } from '../validation.js';

/**
 * Rating pool over a fixed catalog of strategies.
 *
 * Each step pairs two distinct entries at random, plays one match of random
 * length and moves `correction` points from the loser's rating to the
 * winner's. Only the ratings persist between steps.
 *
 * The constructor trusts its config; use createPool to validate first.
 */
export class EloPool {
  private readonly entries: RatingEntry[];
  private readonly config: PoolConfig;

  constructor(config: PoolConfig, catalog: readonly StrategyKind[] = standardCatalog()) {
    this.config = config;
    this.entries = catalog.map((kind) => ({ kind, rating: config.starting_points }));
  }

  /**
   * Play one rated match. No-op when the pool holds fewer than two entries.
   *
   * Draw order on `rng`: index A, index B (redrawn until distinct), turn
   * count, then the match itself.
   */
  step(rng: Rng): void {
    const n = this.entries.length;
    if (n < 2) return;

    // Redraw only the second index; fine for a small fixed catalog.
    const i = nextInt(rng, 0, n);
    let j = nextInt(rng, 0, n);
    while (j === i) {
      j = nextInt(rng, 0, n);
    }

    const { weights, scale, k_factor, min_turns, max_turns } = this.config;
    const turns = nextInt(rng, min_turns, max_turns + 1);

    const a = this.entries[i];
    const b = this.entries[j];
    const score = playMatch(a.kind, b.kind, weights, turns, rng);

    const expected = expectedOutcome(a.rating - b.rating, scale);
    const correction = computeCorrection(score, expected, k_factor);

    a.rating = applyCorrection(a.rating, correction);
    b.rating = applyCorrection(b.rating, -correction);
  }

  /** Snapshot of (strategy, rating) pairs in catalog order. */
  ratings(): readonly RatingEntry[] {
    return this.entries.map((e) => ({ kind: e.kind, rating: e.rating }));
  }

  /** Resolved configuration this pool runs with. */
  getConfig(): Readonly<PoolConfig> {
    return this.config;
  }
}

/**
 * Build a pool from a partial configuration, falling back to
 * DEFAULT_POOL_CONFIG per field. Returns the first validation error instead
 * of a pool when the configuration or catalog is invalid.
 */
export function createPool(
  input: PoolConfigInput = {},
  catalog: readonly StrategyKind[] = standardCatalog(),
): PoolResult {
  const config = resolvePoolConfig(input);

  const configErr = validatePoolConfig(config);
  if (configErr) {
    return { error: configErr.error, error_detail: configErr.detail };
  }

  const catalogErr = validateCatalog(catalog);
  if (catalogErr) {
    return { error: catalogErr.error, error_detail: catalogErr.detail };
  }

  return { pool: new EloPool(config, catalog) };
}
