/**
 * Core mtstat module exports
 */

// Error handling system
export { StatsError, ErrorCode, isStatsError, wrapError } from './errors';

// Configuration
export { DEFAULT_CONFIG, resolveConfig, loadConfigFromEnv } from './config';
export type { StatsConfig } from './config';

// Random number generation
export { MersenneTwister, DEFAULT_SEED, MAX_SEED, STATE_SIZE } from './math/MersenneTwister';
export type { WordSource } from './math/MersenneTwister';
export { RNG } from './math/random';
export { lnFac, besselKScaled } from './math/special';
export { PiecewiseLinearInterpolant } from './math/interpolation';

// Empirical distributions and goodness of fit
export * from './empirical';
export * from './gof';
