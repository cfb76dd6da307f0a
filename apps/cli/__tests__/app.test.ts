import { describe, expect, it, vi } from "vitest";
import { pino } from "pino";
import { createRng } from "@dilemma/engine-core";
import { createPool } from "@dilemma/engine-pool";
import { run, type AppContext } from "../src/app.js";
import { USAGE } from "../src/args.js";
import { formatLeaderboard } from "../src/render.js";

function buffer() {
  const chunks: string[] = [];
  return { write: (chunk: string) => chunks.push(chunk), text: () => chunks.join("") };
}

function context(overrides: Partial<AppContext> = {}) {
  const stdout = buffer();
  const stderr = buffer();
  const ctx: AppContext = {
    env: {},
    stdout,
    stderr,
    logger: pino({ level: "silent" }),
    clearScreen: false,
    ...overrides,
  };
  return { ctx, stdout, stderr };
}

/** Advances 10 ms on every read. */
function tickingClock() {
  let t = 0;
  return () => (t += 10);
}

describe("run", () => {
  it("plays a seeded tournament and prints the leaderboard per refresh", () => {
    const { ctx, stdout } = context({ clock: tickingClock() });
    const code = run(["--seed", "42", "--refreshes", "1", "-r", "0.05"], ctx);
    expect(code).toBe(0);

    const expected = createPool();
    if (!expected.pool) throw new Error("default pool must be valid");
    const before = formatLeaderboard(expected.pool.ratings());
    const rng = createRng(42);
    for (let i = 0; i < 4; i++) expected.pool.step(rng);
    const after = formatLeaderboard(expected.pool.ratings());

    expect(stdout.text()).toBe(`${before}\n${after}\n`);
  });

  it("draws an entropy seed when none is given", () => {
    const entropySeed = vi.fn(() => 5);
    const { ctx } = context({ entropySeed });
    expect(run(["--refreshes", "0"], ctx)).toBe(0);
    expect(entropySeed).toHaveBeenCalledTimes(1);
  });

  it("does not draw an entropy seed when DILEMMA_SEED is set", () => {
    const entropySeed = vi.fn(() => 5);
    const { ctx } = context({ entropySeed, env: { DILEMMA_SEED: "3" } });
    expect(run(["--refreshes", "0"], ctx)).toBe(0);
    expect(entropySeed).not.toHaveBeenCalled();
  });

  it("prints usage for --help", () => {
    const { ctx, stdout } = context();
    expect(run(["--help"], ctx)).toBe(0);
    expect(stdout.text()).toBe(USAGE);
  });

  it("exits with 2 and the flag name on bad arguments", () => {
    const { ctx, stderr } = context();
    expect(run(["--scale", "abc"], ctx)).toBe(2);
    expect(stderr.text()).toBe(`--scale: expected a number\n\n${USAGE}`);
  });

  it("refuses a seed wider than 32 bits instead of aliasing it", () => {
    const { ctx, stderr, stdout } = context();
    expect(run(["--seed", "4294967296", "--refreshes", "0"], ctx)).toBe(2);
    expect(stderr.text()).toBe(`--seed: must fit in 32 bits\n\n${USAGE}`);
    expect(stdout.text()).toBe("");
  });

  it("exits with 1 on a degenerate payoff table", () => {
    const { ctx, stderr, stdout } = context();
    expect(run(["-w", "2,3-3,1"], ctx)).toBe(1);
    expect(stderr.text()).toBe("Invalid configuration: ZERO_MAX_DIFF (weights=2,3-3,1)\n");
    expect(stdout.text()).toBe("");
  });
});
