import { describe, expect, it } from 'vitest';
import { maxDiff, outcome } from '../src/payoff/outcome.js';
import { DEFAULT_WEIGHTS } from '../src/types.js';
import type { Choice, Weights } from '../src/types.js';

const w: Weights = { dd: 2, dc_win: 3, dc_lose: 0, cc: 1 };

describe('outcome', () => {
  it('both defect → (dd, dd)', () => {
    expect(outcome(w, 'DEFECT', 'DEFECT')).toEqual([2, 2]);
  });

  it('defector gets dc_win, collaborator dc_lose', () => {
    expect(outcome(w, 'DEFECT', 'COLLABORATE')).toEqual([3, 0]);
    expect(outcome(w, 'COLLABORATE', 'DEFECT')).toEqual([0, 3]);
  });

  it('both collaborate → (cc, cc)', () => {
    expect(outcome(w, 'COLLABORATE', 'COLLABORATE')).toEqual([1, 1]);
  });

  it('swapping the arguments swaps the payoffs', () => {
    const choices: Choice[] = ['DEFECT', 'COLLABORATE'];
    const weights: Weights = { dd: 4, dc_win: 9, dc_lose: 2, cc: 6 };
    for (const a of choices) {
      for (const b of choices) {
        const [pa, pb] = outcome(weights, a, b);
        expect(outcome(weights, b, a)).toEqual([pb, pa]);
      }
    }
  });
});

describe('maxDiff', () => {
  it('is 3 for the default weights', () => {
    expect(maxDiff(DEFAULT_WEIGHTS)).toBe(3);
  });

  it('is the absolute difference regardless of order', () => {
    expect(maxDiff({ dd: 0, dc_win: 1, dc_lose: 6, cc: 0 })).toBe(5);
  });

  it('is 0 when defecting confers no advantage', () => {
    expect(maxDiff({ dd: 2, dc_win: 3, dc_lose: 3, cc: 1 })).toBe(0);
  });
});
