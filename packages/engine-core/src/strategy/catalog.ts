import { EngineError } from '../types.js';
import type { StrategyKind } from './types.js';

function percent(p: number): string {
  return `${Math.round(100 * p)}%`;
}

export function strategyName(kind: StrategyKind): string {
  switch (kind.type) {
    case 'ALWAYS_DEFECT': return 'Defector';
    case 'ALWAYS_COLLABORATE': return 'Collaborator';
    case 'RANDOM_EACH_TURN': return `Random ${percent(kind.p)}`;
    case 'RANDOM_FIXED_AT_START': return `RandomFixed ${percent(kind.p)}`;
    case 'TIT_FOR_TAT': return 'TitForTat';
    case 'TIT_FOR_TAT_DEFECT_FIRST': return 'SuspiciousTitForTat';
    case 'MEAN': return 'Mean';
    case 'PAVLOV': return 'Pavlov';
    case 'GRIM': return 'Grim';
  }
}

export function strategyDescription(kind: StrategyKind): string {
  switch (kind.type) {
    case 'ALWAYS_DEFECT': return 'Always defect';
    case 'ALWAYS_COLLABORATE': return 'Always collaborate';
    case 'RANDOM_EACH_TURN': return `Collaborate ${percent(kind.p)} of times`;
    case 'RANDOM_FIXED_AT_START':
      return `Choose the move at the start (collaborate ${percent(kind.p)}), then stick with it`;
    case 'TIT_FOR_TAT': return 'Collaborate, then answer with the last move';
    case 'TIT_FOR_TAT_DEFECT_FIRST': return 'Defect, then answer with the last move';
    case 'MEAN': return 'Mean the other moves, then answer with the same distribution';
    case 'PAVLOV': return 'Cooperate if the opponent moved alike';
    case 'GRIM': return 'Cooperate until defected';
  }
}

/** The 13 archetypes a standard pool rates, in display order. */
export function standardCatalog(): StrategyKind[] {
  return [
    { type: 'ALWAYS_DEFECT' },
    { type: 'ALWAYS_COLLABORATE' },
    { type: 'RANDOM_EACH_TURN', p: 0.5 },
    { type: 'RANDOM_EACH_TURN', p: 0.9 },
    { type: 'RANDOM_EACH_TURN', p: 0.1 },
    { type: 'RANDOM_FIXED_AT_START', p: 0.5 },
    { type: 'RANDOM_FIXED_AT_START', p: 0.9 },
    { type: 'RANDOM_FIXED_AT_START', p: 0.1 },
    { type: 'TIT_FOR_TAT' },
    { type: 'TIT_FOR_TAT_DEFECT_FIRST' },
    { type: 'MEAN' },
    { type: 'PAVLOV' },
    { type: 'GRIM' },
  ];
}

/** Probability parameters must lie in [0, 1]. */
export function validateStrategyKind(kind: StrategyKind): EngineError | null {
  if (kind.type === 'RANDOM_EACH_TURN' || kind.type === 'RANDOM_FIXED_AT_START') {
    if (!(kind.p >= 0 && kind.p <= 1)) {
      return EngineError.INVALID_PROBABILITY;
    }
  }
  return null;
}
