/** One side's move in a single turn. */
export type Choice = 'DEFECT' | 'COLLABORATE';

/**
 * Payoff table. dc_win goes to the defector and dc_lose to the collaborator
 * when exactly one side defects. All values are non-negative integers.
 */
export interface Weights {
  dd: number;
  dc_win: number;
  dc_lose: number;
  cc: number;
}

/** Move history as seen by one side: its own moves and the opponent's, oldest first. */
export interface MoveHistory {
  own: readonly Choice[];
  opponent: readonly Choice[];
}

/** Engine validation errors. */
export enum EngineError {
  INVALID_WEIGHTS = 'INVALID_WEIGHTS',
  ZERO_MAX_DIFF = 'ZERO_MAX_DIFF',
  INVALID_PROBABILITY = 'INVALID_PROBABILITY',
  INVALID_TURN_RANGE = 'INVALID_TURN_RANGE',
  INVALID_SCALE = 'INVALID_SCALE',
  INVALID_K_FACTOR = 'INVALID_K_FACTOR',
  INVALID_STARTING_POINTS = 'INVALID_STARTING_POINTS',
  PAYOFF_OVERFLOW = 'PAYOFF_OVERFLOW',
}

/** Validation failure with an optional human-readable detail. */
export interface ValidationFailure {
  error: EngineError;
  detail?: string;
}

export const DEFAULT_WEIGHTS: Readonly<Weights> = { dd: 2, dc_win: 3, dc_lose: 0, cc: 1 };
