// src/core/math/random.ts
/**
 * Uniform, normal and Poisson sampling on top of the MT19937 word stream
 */

import { MersenneTwister, DEFAULT_SEED } from './MersenneTwister';
import { lnFac } from './special';
import { resolveConfig, type StatsConfig } from '../config';
import { debugWarn } from '../logging';
import { StatsError, ErrorCode } from '../errors';

const TWO_POW_32 = 0x100000000;

// Poisson thresholds
const POISSON_TINY = 1e-6;
const POISSON_INVERSION_LIMIT = 17;
const POISSON_MAX_LAMBDA = 2e9;
const POISSON_CHOPDOWN_BOUND = 130;
// Ratio-of-uniforms hat constants: 8/e and 3 - sqrt(12/e)
const SHAT1 = 2.943035529371538573;
const SHAT2 = 0.8989161620588987408;

/**
 * Seeded random number generator.
 *
 * Every draw is derived from `nextWord()` of the owned MT19937 engine, so a
 * given seed reproduces the same values everywhere. Results that floating
 * point rounding pushes outside the requested half-open range are redrawn,
 * at most `maxRejectionIterations` times per call.
 */
export class RNG {
  private readonly engine: MersenneTwister;
  private readonly config: StatsConfig;

  constructor(seed: number | MersenneTwister = DEFAULT_SEED, config: Partial<StatsConfig> = {}) {
    this.engine = typeof seed === 'number' ? new MersenneTwister(seed) : seed;
    this.config = resolveConfig(config);
  }

  getSeed(): number {
    return this.engine.getSeed();
  }

  reseed(seed: number): void {
    this.engine.reseed(seed);
  }

  /**
   * Reseed from the clock; returns the chosen seed
   */
  randomize(): number {
    return this.engine.randomize();
  }

  /**
   * Raw unsigned 32-bit word
   */
  word(): number {
    return this.engine.nextWord();
  }

  bool(): boolean {
    return this.engine.nextWord() % 2 === 1;
  }

  /**
   * Uniform in [0, 1) with 64 random bits behind each value
   */
  uniform(): number {
    return this.rejectUntil('uniform', () => {
      const moreSignificant = this.engine.nextWord();
      const lessSignificant = this.engine.nextWord() / TWO_POW_32;
      return (moreSignificant + lessSignificant) / TWO_POW_32;
    }, (value) => value >= 0 && value < 1);
  }

  /**
   * Uniform real in [0, max) or, with two arguments, [min, max)
   */
  real(max: number): number;
  real(min: number, max: number): number;
  real(minOrMax: number, max?: number): number {
    const [lo, hi] = max === undefined ? [0, minOrMax] : [minOrMax, max];
    assertRealRange(lo, hi);
    return this.uniformIn(lo, hi);
  }

  /**
   * Uniform integer in [0, max) or, with two arguments, [min, max)
   */
  integer(max: number): number;
  integer(min: number, max: number): number;
  integer(minOrMax: number, max?: number): number {
    const [lo, hi] = max === undefined ? [0, minOrMax] : [minOrMax, max];
    assertIntegerRange(lo, hi, false);
    return this.integerIn(lo, hi);
  }

  /**
   * Uniform integer in [0, max) or [min, max), with both bounds in [0, 2^32]
   */
  unsignedInteger(max: number): number;
  unsignedInteger(min: number, max: number): number;
  unsignedInteger(minOrMax: number, max?: number): number {
    const [lo, hi] = max === undefined ? [0, minOrMax] : [minOrMax, max];
    assertIntegerRange(lo, hi, true);
    return this.integerIn(lo, hi);
  }

  /**
   * Normal deviate by the Marsaglia polar method
   */
  normal(mean: number = 0, stdDev: number = 1): number {
    if (!Number.isFinite(mean) || !Number.isFinite(stdDev) || stdDev < 0) {
      throw new StatsError(
        ErrorCode.INVALID_ARGUMENT,
        `Invalid normal parameters: mean=${mean}, stdDev=${stdDev}`,
        { mean, stdDev }
      );
    }

    let x1 = 0;
    const w = this.rejectUntil('normal', () => {
      x1 = this.uniformIn(-1, 1);
      const x2 = this.uniformIn(-1, 1);
      return x1 * x1 + x2 * x2;
    }, (candidate) => candidate < 1 && candidate >= 1e-30);

    return x1 * Math.sqrt((-2 * Math.log(w)) / w) * stdDev + mean;
  }

  /**
   * Poisson deviate with mean `lambda`, 0 ≤ lambda ≤ 2e9
   */
  poisson(lambda: number): number {
    if (!Number.isFinite(lambda) || lambda < 0) {
      throw new StatsError(
        ErrorCode.INVALID_ARGUMENT,
        `Poisson mean must be a finite value >= 0, got ${lambda}`,
        { lambda }
      );
    }
    if (lambda > POISSON_MAX_LAMBDA) {
      throw new StatsError(
        ErrorCode.INVALID_ARGUMENT,
        `Poisson mean ${lambda} is too large to sample (max ${POISSON_MAX_LAMBDA})`,
        { lambda, max: POISSON_MAX_LAMBDA }
      );
    }

    if (lambda === 0) return 0;
    if (lambda < POISSON_TINY) return this.poissonTiny(lambda);
    if (lambda < POISSON_INVERSION_LIMIT) return this.poissonInversion(lambda);
    return this.poissonRatioOfUniforms(lambda);
  }

  uniforms(n: number): number[] {
    return Array.from({ length: n }, () => this.uniform());
  }

  normals(n: number, mean: number = 0, stdDev: number = 1): number[] {
    return Array.from({ length: n }, () => this.normal(mean, stdDev));
  }

  /**
   * Second-order expansion that avoids exp(-lambda) ≈ 1
   */
  private poissonTiny(lambda: number): number {
    const d = Math.sqrt(lambda);
    if (this.uniform() >= d) return 0;
    const r = this.uniform() * d;
    if (r > lambda * (1 - lambda)) return 0;
    if (r > 0.5 * lambda * lambda * (1 - lambda)) return 1;
    return 2;
  }

  /**
   * Chop-down inversion, restarted when the tail passes the bound
   */
  private poissonInversion(lambda: number): number {
    const f0 = Math.exp(-lambda);

    for (let attempt = 0; attempt < this.config.maxRejectionIterations; attempt++) {
      let r = this.uniform();
      let f = f0;
      let x = 0;
      do {
        r -= f;
        if (r <= 0) return x;
        x++;
        f *= lambda;
        r *= x;
      } while (x <= POISSON_CHOPDOWN_BOUND);
    }

    throw this.rejectionLimit('poisson', { lambda });
  }

  /**
   * Ratio-of-uniforms with a squeeze for lambda >= 17
   */
  private poissonRatioOfUniforms(lambda: number): number {
    const a = lambda + 0.5;
    const mode = Math.trunc(lambda);
    const logLambda = Math.log(lambda);
    const f0 = mode * logLambda - lnFac(mode);
    const h = Math.sqrt(SHAT1 * a) + SHAT2;
    const bound = Math.trunc(a + 6 * h);

    for (let attempt = 0; attempt < this.config.maxRejectionIterations; attempt++) {
      const u = this.uniform();
      if (u === 0) continue;

      const x = a + (h * (this.uniform() - 0.5)) / u;
      if (x < 0 || x >= bound) continue;

      const k = Math.trunc(x);
      const lf = k * logLambda - lnFac(k) - f0;
      // quick acceptance
      if (lf >= u * (4 - u) - 3) return k;
      // quick rejection
      if (u * (u - lf) > 1) continue;
      if (2 * Math.log(u) <= lf) return k;
    }

    throw this.rejectionLimit('poisson', { lambda });
  }

  private uniformIn(min: number, max: number): number {
    return this.rejectUntil(
      'real',
      () => min + this.uniform() * (max - min),
      (value) => value >= min && value < max
    );
  }

  private integerIn(min: number, max: number): number {
    return this.rejectUntil(
      'integer',
      () => Math.floor(this.uniformIn(min, max)),
      (value) => value >= min && value < max
    );
  }

  private rejectUntil(sampler: string, draw: () => number, accept: (value: number) => boolean): number {
    for (let attempt = 0; attempt < this.config.maxRejectionIterations; attempt++) {
      const value = draw();
      if (accept(value)) return value;
    }
    throw this.rejectionLimit(sampler);
  }

  private rejectionLimit(sampler: string, context: Record<string, unknown> = {}): StatsError {
    const details = { sampler, maxRejectionIterations: this.config.maxRejectionIterations, ...context };
    debugWarn(this.config, 'Rejection limit reached', details);
    return new StatsError(
      ErrorCode.REJECTION_LIMIT,
      `${sampler} sampler exceeded ${this.config.maxRejectionIterations} rejection iterations`,
      details
    );
  }
}

function assertRealRange(min: number, max: number): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || !(min < max)) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid range [${min}, ${max}): bounds must be finite with min < max`,
      { min, max }
    );
  }
}

function assertIntegerRange(min: number, max: number, unsigned: boolean): void {
  const integral = Number.isSafeInteger(min) && Number.isSafeInteger(max);
  const inUnsignedRange = !unsigned || (min >= 0 && max <= TWO_POW_32);
  if (!integral || !inUnsignedRange || !(min < max)) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid ${unsigned ? 'unsigned ' : ''}integer range [${min}, ${max})`,
      { min, max }
    );
  }
}
