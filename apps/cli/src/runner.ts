import type { Rng } from "@dilemma/engine-core";
import type { EloPool } from "@dilemma/engine-pool";
import type { Logger } from "./logger.js";

/** Milliseconds since some fixed origin. */
export type Clock = () => number;

/** Step `pool` until `budgetMs` has elapsed on `clock`. Returns the number of steps. */
export function runFor(pool: EloPool, rng: Rng, budgetMs: number, clock: Clock = Date.now): number {
  const start = clock();
  let steps = 0;
  while (clock() - start < budgetMs) {
    pool.step(rng);
    steps++;
  }
  return steps;
}

export interface TournamentOptions {
  pool: EloPool;
  rng: Rng;
  refreshMs: number;
  /** Refresh intervals to run before returning. Undefined runs forever. */
  refreshes?: number;
  render: (pool: EloPool) => void;
  logger: Logger;
  clock?: Clock;
}

/**
 * Render, play for one refresh interval, repeat. With a refresh limit the
 * leaderboard is rendered once more after the last interval.
 * Returns the total number of steps played.
 */
export function runTournament(opts: TournamentOptions): number {
  const { pool, rng, refreshMs, refreshes, render, logger, clock = Date.now } = opts;
  let total = 0;

  for (let interval = 0; refreshes === undefined || interval < refreshes; interval++) {
    render(pool);
    const steps = runFor(pool, rng, refreshMs, clock);
    total += steps;
    logger.debug({ interval, steps, total }, "refresh interval finished");
  }

  render(pool);
  return total;
}
