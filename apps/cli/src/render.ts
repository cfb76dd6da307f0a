import { rankStrategies, type RatingEntry } from "@dilemma/engine-core";

/** Erase the terminal and move the cursor home (ANSI). */
export const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/** Minimal writable target: process.stdout or a test buffer. */
export interface Output {
  write(chunk: string): unknown;
}

/**
 * One line per strategy, highest rating first:
 * `<name padded to the longest name>\t<rating>\t(<description>)`.
 */
export function formatLeaderboard(entries: readonly RatingEntry[]): string {
  const ranked = rankStrategies(entries);
  const width = Math.max(0, ...ranked.map((r) => r.name.length));
  return ranked
    .map((r) => `${r.name.padEnd(width)}\t${r.rating}\t(${r.description})`)
    .join("\n");
}

export function renderLeaderboard(
  entries: readonly RatingEntry[],
  out: Output,
  clear: boolean,
): void {
  out.write(`${clear ? CLEAR_SCREEN : ""}${formatLeaderboard(entries)}\n`);
}
