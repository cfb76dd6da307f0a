// Types
export type { Choice, Weights, MoveHistory, ValidationFailure } from './types.js';
export { EngineError, DEFAULT_WEIGHTS } from './types.js';

// Strategy types
export type { StrategyType, StrategyKind, Agent } from './strategy/types.js';

// Ranking types
export type { RatingEntry, RankedStrategy } from './ranking/types.js';

// Randomness
export type { Rng } from './rng.js';
export { createRng, nextInt, chance } from './rng.js';

// Payoff model
export { outcome, maxDiff } from './payoff/outcome.js';

// Strategies
export { instantiate, decide, collaborationRate } from './strategy/agent.js';
export {
  strategyName,
  strategyDescription,
  standardCatalog,
  validateStrategyKind,
} from './strategy/catalog.js';

// Match engine
export { playMatch } from './match/play.js';

// Ranking
export { rankStrategies } from './ranking/leaderboard.js';

// Validation
export { validateWeights, validateCatalog } from './validation.js';

// Utils
export { clamp, choiceFromBool } from './utils.js';
