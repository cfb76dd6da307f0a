import { randomInt } from "node:crypto";
import { createRng } from "@dilemma/engine-core";
import { createPool } from "@dilemma/engine-pool";
import { parseCliArgs, USAGE } from "./args.js";
import type { Logger } from "./logger.js";
import { renderLeaderboard, type Output } from "./render.js";
import { runTournament, type Clock } from "./runner.js";

export interface AppContext {
  env: Readonly<Record<string, string | undefined>>;
  stdout: Output;
  stderr: Output;
  logger: Logger;
  /** Clear the screen before each leaderboard. */
  clearScreen: boolean;
  clock?: Clock;
  /** Seed used when neither --seed nor DILEMMA_SEED is given. */
  entropySeed?: () => number;
}

/** Exit codes: 0 ok, 1 invalid pool configuration, 2 bad arguments. */
export function run(argv: readonly string[], ctx: AppContext): number {
  const parsed = parseCliArgs(argv, ctx.env);
  if (!parsed.ok) {
    ctx.stderr.write(`${parsed.message}\n\n${USAGE}`);
    return 2;
  }

  const { options } = parsed;
  if (options.help) {
    ctx.stdout.write(USAGE);
    return 0;
  }

  const result = createPool(options.pool);
  if (result.error) {
    ctx.logger.error({ error: result.error, detail: result.error_detail }, "invalid pool configuration");
    ctx.stderr.write(`Invalid configuration: ${result.error}${result.error_detail ? ` (${result.error_detail})` : ""}\n`);
    return 1;
  }

  const seed = options.seed ?? (ctx.entropySeed ?? defaultEntropySeed)();
  ctx.logger.info({ seed, config: options.pool, refreshMs: options.refreshMs }, "starting tournament");

  const total = runTournament({
    pool: result.pool,
    rng: createRng(seed),
    refreshMs: options.refreshMs,
    refreshes: options.refreshes,
    render: (pool) => renderLeaderboard(pool.ratings(), ctx.stdout, ctx.clearScreen),
    logger: ctx.logger,
    clock: ctx.clock,
  });

  ctx.logger.info({ seed, steps: total }, "tournament finished");
  return 0;
}

function defaultEntropySeed(): number {
  return randomInt(0, 2 ** 32);
}
