import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Structured logger on stderr, so the leaderboard owns stdout.
 * Synchronous writes: the tournament loop never yields to the event loop.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ name: "dilemma", level }, pino.destination({ dest: 2, sync: true }));
}
