import { parseArgs } from "node:util";
import { z } from "zod";
import type { Weights } from "@dilemma/engine-core";
import type { PoolConfig } from "@dilemma/engine-pool";

export const USAGE = `Usage: dilemma [options]

Options:
  -w, --weights <dd,dcw-dcl,cc>  payoff table (default: 2,3-0,1)
  -p, --starting-points <n>      starting rating (default: 700)
  -s, --scale <x>                rating gap scale (default: 100)
  -k, --k-factor <x>             correction factor (default: 32)
  -t, --min-turns <n>            minimum turns per match (default: 100)
  -T, --max-turns <n>            maximum turns per match (default: 200)
  -r, --refresh <seconds>        seconds between leaderboard refreshes (default: 2)
      --seed <n>                 seed for a reproducible run, 0..4294967295 (env: DILEMMA_SEED)
      --refreshes <n>            stop after n refresh intervals (default: run forever)
  -h, --help                     show this help
`;

/** Parsed command line, with every pool field resolved. */
export interface CliOptions {
  pool: PoolConfig;
  refreshMs: number;
  seed?: number;
  refreshes?: number;
  help: boolean;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; message: string };

/** Largest seed createRng distinguishes. */
export const MAX_SEED = 0xffffffff;

const WEIGHTS_FORMAT = /^(\d+),(\d+)-(\d+),(\d+)$/;

/** Parse `dd,dcw-dcl,cc` into Weights. */
export function parseWeights(input: string): { weights: Weights } | { message: string } {
  const match = WEIGHTS_FORMAT.exec(input.trim());
  if (!match) {
    return { message: "The weights must be in the format `dd,dcw-dcl,cc`" };
  }

  const fields = ["dd", "dcw", "dcl", "cc"] as const;
  const values: number[] = [];
  for (let i = 0; i < fields.length; i++) {
    const value = Number(match[i + 1]);
    if (!Number.isSafeInteger(value)) {
      return { message: `Integer overflow in ${fields[i]}` };
    }
    values.push(value);
  }

  const [dd, dc_win, dc_lose, cc] = values;
  return { weights: { dd, dc_win, dc_lose, cc } };
}

function nonNegativeInt(flag: string) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${flag}: expected a non-negative integer`)
    .transform(Number)
    .refine(Number.isSafeInteger, `${flag}: integer overflow`);
}

function finiteNumber(flag: string) {
  return z
    .string()
    .trim()
    .refine((s) => s !== "" && Number.isFinite(Number(s)), `${flag}: expected a number`)
    .transform(Number);
}

const weightsSchema = z.string().transform((value, ctx) => {
  const parsed = parseWeights(value);
  if ("message" in parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `--weights: ${parsed.message}` });
    return z.NEVER;
  }
  return parsed.weights;
});

const argsSchema = z.object({
  weights: weightsSchema.default("2,3-0,1"),
  "starting-points": nonNegativeInt("--starting-points").default("700"),
  scale: finiteNumber("--scale").default("100"),
  "k-factor": finiteNumber("--k-factor").default("32"),
  "min-turns": nonNegativeInt("--min-turns").default("100"),
  "max-turns": nonNegativeInt("--max-turns").default("200"),
  refresh: finiteNumber("--refresh")
    .refine((s) => s > 0, "--refresh: must be positive")
    .refine((s) => Math.round(s * 1000) >= 1, "--refresh: must be at least 0.001 seconds")
    .default("2"),
  // createRng keeps 32 bits of state; wider seeds would alias
  seed: nonNegativeInt("--seed")
    .refine((n) => n <= MAX_SEED, "--seed: must fit in 32 bits")
    .optional(),
  refreshes: nonNegativeInt("--refreshes").optional(),
  help: z.boolean().default(false),
});

/**
 * Parse argv (without the node and script entries). `--seed` falls back to
 * DILEMMA_SEED from `env`. Every failure message names the offending flag.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): ParseResult {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        weights: { type: "string", short: "w" },
        "starting-points": { type: "string", short: "p" },
        scale: { type: "string", short: "s" },
        "k-factor": { type: "string", short: "k" },
        "min-turns": { type: "string", short: "t" },
        "max-turns": { type: "string", short: "T" },
        refresh: { type: "string", short: "r" },
        seed: { type: "string" },
        refreshes: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }

  const envSeed = env.DILEMMA_SEED;
  const seedSource = values.seed === undefined && envSeed ? { seed: envSeed } : {};

  const parsed = argsSchema.safeParse({ ...values, ...seedSource });
  if (!parsed.success) {
    return { ok: false, message: parsed.error.issues[0].message };
  }

  const a = parsed.data;
  return {
    ok: true,
    options: {
      pool: {
        weights: a.weights,
        starting_points: a["starting-points"],
        scale: a.scale,
        k_factor: a["k-factor"],
        min_turns: a["min-turns"],
        max_turns: a["max-turns"],
      },
      refreshMs: Math.round(a.refresh * 1000),
      seed: a.seed,
      refreshes: a.refreshes,
      help: a.help,
    },
  };
}
