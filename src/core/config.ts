/**
 * Numerical limits and tolerances shared by the samplers and the
 * goodness-of-fit engine.
 */

import { StatsError, ErrorCode } from './errors';

export interface StatsConfig {
  /** Redraws or restarts a single sampling call may make before giving up */
  maxRejectionIterations: number;
  /** Stop the Kolmogorov series once a term drops below this */
  ksSeriesTolerance: number;
  /** Hard cap on Kolmogorov series terms */
  ksSeriesMaxTerms: number;
  /** Stop the Cramér–von Mises limit series once a term drops below this */
  cvmSeriesTolerance: number;
  /** Use the exact two-sample KS probability while n0 * n1 stays at or below this */
  exactKSMaxProduct: number;
  /** Distance below the smallest value where the inverse CDF is anchored at probability 0 */
  anchorOffset: number;
  /** Emit diagnostic console output */
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<StatsConfig> = Object.freeze({
  maxRejectionIterations: 1_000_000,
  ksSeriesTolerance: 1e-12,
  ksSeriesMaxTerms: 100,
  cvmSeriesTolerance: 1e-10,
  exactKSMaxProduct: 10_000,
  anchorOffset: 1e-6,
  debug: false,
});

function requirePositive(key: keyof StatsConfig, value: number, integer: boolean): void {
  const valid = Number.isFinite(value) && value > 0 && (!integer || Number.isInteger(value));
  if (!valid) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid configuration: ${key} must be a positive ${integer ? 'integer' : 'number'}`,
      { key, value }
    );
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<StatsConfig> = {}): StatsConfig {
  const config: StatsConfig = { ...DEFAULT_CONFIG, ...overrides };

  requirePositive('maxRejectionIterations', config.maxRejectionIterations, true);
  requirePositive('ksSeriesTolerance', config.ksSeriesTolerance, false);
  requirePositive('ksSeriesMaxTerms', config.ksSeriesMaxTerms, true);
  requirePositive('cvmSeriesTolerance', config.cvmSeriesTolerance, false);
  requirePositive('exactKSMaxProduct', config.exactKSMaxProduct, true);
  requirePositive('anchorOffset', config.anchorOffset, false);

  return config;
}

function parseNumberEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const val = env[key];
  if (val === undefined || val.trim() === '') return undefined;
  const parsed = Number(val);
  if (Number.isNaN(parsed)) {
    throw new StatsError(ErrorCode.INVALID_ARGUMENT, `Environment variable ${key} is not a number`, {
      key,
      value: val,
    });
  }
  return parsed;
}

function parseBoolEnv(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const val = env[key];
  if (val === undefined) return undefined;
  return val.toLowerCase() === 'true' || val === '1';
}

/**
 * Read overrides from MTSTAT_* environment variables.
 * Unset variables fall back to the defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StatsConfig {
  const overrides: Partial<StatsConfig> = {};

  const entries: Array<[Exclude<keyof StatsConfig, 'debug'>, string]> = [
    ['maxRejectionIterations', 'MTSTAT_MAX_REJECTION_ITERATIONS'],
    ['ksSeriesTolerance', 'MTSTAT_KS_SERIES_TOLERANCE'],
    ['ksSeriesMaxTerms', 'MTSTAT_KS_SERIES_MAX_TERMS'],
    ['cvmSeriesTolerance', 'MTSTAT_CVM_SERIES_TOLERANCE'],
    ['exactKSMaxProduct', 'MTSTAT_EXACT_KS_MAX_PRODUCT'],
    ['anchorOffset', 'MTSTAT_ANCHOR_OFFSET'],
  ];

  for (const [key, envKey] of entries) {
    const value = parseNumberEnv(env, envKey);
    if (value !== undefined) overrides[key] = value;
  }

  const debug = parseBoolEnv(env, 'MTSTAT_DEBUG');
  if (debug !== undefined) overrides.debug = debug;

  return resolveConfig(overrides);
}
