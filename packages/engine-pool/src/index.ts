// Config types + defaults
export type { PoolConfig, PoolResult } from './types.js';
export type { PoolConfigInput } from './config.js';
export { DEFAULT_POOL_CONFIG, DEFAULT_K_FACTOR, resolvePoolConfig } from './config.js';

// Validation
export { validatePoolConfig, validateTurnRange } from './validation.js';

// Rating math
export {
  expectedOutcome,
  computeCorrection,
  applyCorrection,
  MAX_RATING,
} from './rating/elo.js';

// Pool
export { EloPool, createPool } from './pool/elo-pool.js';
