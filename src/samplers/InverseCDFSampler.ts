/**
 * Inverse-transform sampler for an empirical distribution
 */

import { resolveConfig, type StatsConfig } from '../core/config';
import { EmpiricalDistribution1D } from '../core/empirical/EmpiricalDistribution1D';
import { StatsError, ErrorCode } from '../core/errors';
import { PiecewiseLinearInterpolant } from '../core/math/interpolation';
import { DEFAULT_SEED } from '../core/math/MersenneTwister';
import { RNG } from '../core/math/random';
import type { CumulativeTable } from '../core/gof/distance';

/**
 * Ascending values with the cumulative probability reached at each one,
 * e.g. an EmpiricalDistribution1D
 */
export type CumulativeColumns = Pick<CumulativeTable, 'values' | 'cumulative'>;

/**
 * Largest double strictly below a finite x
 */
function nextBelow(x: number): number {
  if (x === 0) return -Number.MIN_VALUE;
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, x);
  const bits = view.getBigUint64(0);
  view.setBigUint64(0, x > 0 ? bits - 1n : bits + 1n);
  return view.getFloat64(0);
}

function isCumulativeColumns(source: CumulativeColumns | ArrayLike<number>): source is CumulativeColumns {
  return 'cumulative' in source && 'values' in source;
}

/**
 * Draws values distributed like a given empirical distribution.
 *
 * The cumulative table is anchored at probability 0 `anchorOffset` below the
 * smallest value (at least one float step below it), then inverted into a
 * piecewise-linear map from probability to value; each draw pushes one
 * uniform through that map.
 */
export class InverseCDFSampler {
  private readonly rng: RNG;
  private readonly inverse: PiecewiseLinearInterpolant;

  constructor(
    source: CumulativeColumns | ArrayLike<number>,
    seed: number = DEFAULT_SEED,
    config: Partial<StatsConfig> = {}
  ) {
    const resolved = resolveConfig(config);
    const table = isCumulativeColumns(source) ? source : EmpiricalDistribution1D.fromSamples(source, resolved);

    this.inverse = InverseCDFSampler.buildInverse(table.values, table.cumulative, resolved.anchorOffset);
    this.rng = new RNG(seed, resolved);
  }

  private static buildInverse(
    values: readonly number[],
    cumulative: readonly number[],
    anchorOffset: number
  ): PiecewiseLinearInterpolant {
    if (values.length === 0 || values.length !== cumulative.length) {
      throw new StatsError(ErrorCode.INVALID_ARGUMENT, 'Cumulative table needs matching, non-empty columns', {
        values: values.length,
        cumulative: cumulative.length,
      });
    }
    for (let i = 0; i < cumulative.length; i++) {
      const p = cumulative[i];
      if (!(p >= 0 && p <= 1) || (i > 0 && p < cumulative[i - 1])) {
        throw new StatsError(
          ErrorCode.PRECONDITION_VIOLATION,
          'Cumulative table must be non-decreasing within [0, 1]',
          { index: i, probability: p }
        );
      }
    }

    // far from 0 the offset can be below one float step
    const anchor = Number.isFinite(values[0]) ? Math.min(values[0] - anchorOffset, nextBelow(values[0])) : values[0];
    const anchored = new PiecewiseLinearInterpolant([anchor, ...values], [0, ...cumulative]);
    return anchored.invert();
  }

  getSeed(): number {
    return this.rng.getSeed();
  }

  reseed(seed: number): void {
    this.rng.reseed(seed);
  }

  randomize(): number {
    return this.rng.randomize();
  }

  draw(): number {
    return this.inverse.evaluate(this.rng.uniform());
  }

  drawMany(n: number): number[] {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new StatsError(ErrorCode.INVALID_ARGUMENT, `Sample count must be a non-negative integer, got ${n}`, { n });
    }
    return Array.from({ length: n }, () => this.draw());
  }
}
