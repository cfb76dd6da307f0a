import type { Choice } from './types.js';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** true → COLLABORATE, false → DEFECT. */
export function choiceFromBool(collaborate: boolean): Choice {
  return collaborate ? 'COLLABORATE' : 'DEFECT';
}
