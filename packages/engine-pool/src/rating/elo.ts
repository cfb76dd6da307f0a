import { clamp } from '@dilemma/engine-core';

/** Highest rating representable; corrections saturate here. */
export const MAX_RATING = Number.MAX_SAFE_INTEGER;

/**
 * Expected match score for the higher-rated side, from the rating gap alone.
 * expected = tanh(ratingDiff / scale), in (-1, 1).
 */
export function expectedOutcome(ratingDiff: number, scale: number): number {
  return Math.tanh(ratingDiff / scale);
}

/**
 * Integer rating delta for side A: round(kFactor * (score - expected)).
 * The caller picks the k-factor; EloPool passes its configured `k_factor`.
 * Halves round away from zero, so swapping the sides negates the delta exactly.
 */
export function computeCorrection(
  score: number,
  expected: number,
  kFactor: number,
): number {
  const raw = kFactor * (score - expected);
  const rounded = Math.sign(raw) * Math.round(Math.abs(raw));
  // Math.sign(-0.2) * 0 yields -0
  return rounded === 0 ? 0 : rounded;
}

/** rating + delta, saturating in [0, MAX_RATING]. */
export function applyCorrection(rating: number, delta: number): number {
  return clamp(rating + delta, 0, MAX_RATING);
}
