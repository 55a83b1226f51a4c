/**
 * Empirical distribution function of a one-dimensional sample
 */

import { StatsError, ErrorCode } from '../errors';
import { resolveConfig, type StatsConfig } from '../config';
import { debugLog } from '../logging';
import { countLessOrEqual } from '../math/search';
import { computeDistance1D, type CumulativeTable } from '../gof/distance';
import type { DistanceResult } from '../gof/DistanceResult';
import {
  samplesToHistogram,
  discreteToHistogram,
  valueCountsToHistogram,
  copyHistogram,
  type Histogram1D,
} from './histogram';
import { writeToSink, writeTextFile, type TextSink } from './output';

export interface EcdfPoint {
  value: number;
  probability: number;
}

/**
 * Immutable table of ascending values and the cumulative probability reached
 * at each of them. The last cumulative value is exactly 1.
 */
export class EmpiricalDistribution1D implements CumulativeTable {
  private constructor(
    readonly values: readonly number[],
    readonly cumulative: readonly number[],
    readonly numSamples: number
  ) {}

  /**
   * From raw samples; NaN and ±Infinity are ignored
   */
  static fromSamples(samples: ArrayLike<number>, config: Partial<StatsConfig> = {}): EmpiricalDistribution1D {
    const { histogram, discarded } = samplesToHistogram(samples);
    if (discarded > 0) {
      debugLog(resolveConfig(config), 'Ignoring non-finite samples', { discarded, total: samples.length });
    }
    return EmpiricalDistribution1D.initialize(histogram);
  }

  /**
   * From a histogram of integer events: counts[i] occurrences of value i
   */
  static fromDiscreteHistogram(counts: ArrayLike<number>): EmpiricalDistribution1D {
    return EmpiricalDistribution1D.initialize(discreteToHistogram(counts));
  }

  /**
   * From parallel vectors of values and their counts; counts of non-finite
   * values are ignored
   */
  static fromValueHistogram(
    values: ArrayLike<number>,
    counts: ArrayLike<number>,
    config: Partial<StatsConfig> = {}
  ): EmpiricalDistribution1D {
    const { histogram, discarded } = valueCountsToHistogram(values, counts);
    if (discarded > 0) {
      debugLog(resolveConfig(config), 'Ignoring counts of non-finite values', { discarded });
    }
    return EmpiricalDistribution1D.initialize(histogram);
  }

  /**
   * From a value → count mapping; non-finite keys are ignored
   */
  static fromHistogram(
    source: ReadonlyMap<number, number>,
    config: Partial<StatsConfig> = {}
  ): EmpiricalDistribution1D {
    const { histogram, discarded } = copyHistogram(source);
    if (discarded > 0) {
      debugLog(resolveConfig(config), 'Ignoring counts of non-finite values', { discarded });
    }
    return EmpiricalDistribution1D.initialize(histogram);
  }

  private static initialize(histogram: Histogram1D): EmpiricalDistribution1D {
    const values = [...histogram.keys()].sort((x, y) => x - y);

    let total = 0;
    for (const value of values) {
      total += histogram.get(value) ?? 0;
    }
    if (total === 0) {
      throw new StatsError(ErrorCode.INSUFFICIENT_DATA, 'An empirical distribution needs at least one sample', {
        distinctValues: values.length,
      });
    }

    // running integer counts keep the final entry at exactly 1
    let running = 0;
    const cumulative = values.map((value) => {
      running += histogram.get(value) ?? 0;
      return running / total;
    });

    return new EmpiricalDistribution1D(Object.freeze(values), Object.freeze(cumulative), total);
  }

  get size(): number {
    return this.values.length;
  }

  get min(): number {
    return this.values[0];
  }

  get max(): number {
    return this.values[this.values.length - 1];
  }

  /**
   * Right-continuous distribution function: share of samples ≤ x
   */
  cdf(x: number): number {
    const k = countLessOrEqual(this.values, x);
    return k === 0 ? 0 : this.cumulative[k - 1];
  }

  entries(): EcdfPoint[] {
    return this.values.map((value, i) => ({ value, probability: this.cumulative[i] }));
  }

  /**
   * Distances between the two distribution functions. Pure: neither
   * distribution is modified.
   */
  computeDistanceTo(other: EmpiricalDistribution1D): DistanceResult {
    return computeDistance1D(this, other);
  }

  /**
   * One "value probability" line per entry
   */
  format(): string {
    return this.values.map((value, i) => `${value} ${this.cumulative[i]}\n`).join('');
  }

  /**
   * Staircase for gnuplot: each value appears with the probability before
   * and after its jump
   */
  formatForGnuplot(): string {
    let previous = 0;
    return this.values
      .map((value, i) => {
        const lines = `${value} ${previous}\n${value} ${this.cumulative[i]}\n`;
        previous = this.cumulative[i];
        return lines;
      })
      .join('');
  }

  dump(out: TextSink): void {
    writeToSink(out, this.format());
  }

  writeTo(path: string, gnuplot: boolean = false): void {
    writeTextFile(path, gnuplot ? this.formatForGnuplot() : this.format());
  }
}
