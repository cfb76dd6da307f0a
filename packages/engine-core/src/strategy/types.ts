/** Archetype tags. The set is closed; every switch over it is exhaustive. */
export type StrategyType =
  | 'ALWAYS_DEFECT'
  | 'ALWAYS_COLLABORATE'
  | 'RANDOM_EACH_TURN'
  | 'RANDOM_FIXED_AT_START'
  | 'TIT_FOR_TAT'
  | 'TIT_FOR_TAT_DEFECT_FIRST'
  | 'MEAN'
  | 'PAVLOV'
  | 'GRIM';

/** Immutable description of a decision policy. `p` is a collaboration probability in [0, 1]. */
export type StrategyKind =
  | { readonly type: 'ALWAYS_DEFECT' }
  | { readonly type: 'ALWAYS_COLLABORATE' }
  | { readonly type: 'RANDOM_EACH_TURN'; readonly p: number }
  | { readonly type: 'RANDOM_FIXED_AT_START'; readonly p: number }
  | { readonly type: 'TIT_FOR_TAT' }
  | { readonly type: 'TIT_FOR_TAT_DEFECT_FIRST' }
  | { readonly type: 'MEAN' }
  | { readonly type: 'PAVLOV' }
  | { readonly type: 'GRIM' };

/**
 * Match-scoped player created from a StrategyKind.
 *
 * RANDOM_FIXED_AT_START has no agent of its own: its draw happens at
 * instantiation and yields an ALWAYS_DEFECT or ALWAYS_COLLABORATE agent.
 * GRIM is the only variant with mutable state.
 */
export type Agent =
  | { type: 'ALWAYS_DEFECT' }
  | { type: 'ALWAYS_COLLABORATE' }
  | { type: 'RANDOM_EACH_TURN'; p: number }
  | { type: 'TIT_FOR_TAT' }
  | { type: 'TIT_FOR_TAT_DEFECT_FIRST' }
  | { type: 'MEAN' }
  | { type: 'PAVLOV' }
  | { type: 'GRIM'; triggered: boolean };
