/**
 * Conversions from raw samples and count vectors to value → count histograms
 */

import { StatsError, ErrorCode } from '../errors';

/** value → number of occurrences */
export type Histogram1D = Map<number, number>;

/** x → (y → number of occurrences) */
export type Histogram2D = Map<number, Map<number, number>>;

function assertCount(count: number, index: number): void {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new StatsError(ErrorCode.INVALID_ARGUMENT, `Histogram counts must be non-negative integers`, {
      index,
      count,
    });
  }
}

/**
 * Count occurrences of each finite sample; NaN and ±Infinity are dropped
 */
export function samplesToHistogram(samples: ArrayLike<number>): { histogram: Histogram1D; discarded: number } {
  const histogram: Histogram1D = new Map();
  let discarded = 0;

  for (let i = 0; i < samples.length; i++) {
    const value = samples[i];
    if (Number.isFinite(value)) {
      histogram.set(value, (histogram.get(value) ?? 0) + 1);
    } else {
      discarded++;
    }
  }

  return { histogram, discarded };
}

/**
 * Bin index i becomes value i
 */
export function discreteToHistogram(counts: ArrayLike<number>): Histogram1D {
  const histogram: Histogram1D = new Map();
  for (let i = 0; i < counts.length; i++) {
    assertCount(counts[i], i);
    histogram.set(i, counts[i]);
  }
  return histogram;
}

/**
 * Pair each value with its count; repeated values accumulate and entries with
 * a non-finite value are dropped
 */
export function valueCountsToHistogram(
  values: ArrayLike<number>,
  counts: ArrayLike<number>
): { histogram: Histogram1D; discarded: number } {
  if (values.length !== counts.length) {
    throw new StatsError(ErrorCode.INVALID_ARGUMENT, 'Value and count vectors differ in length', {
      values: values.length,
      counts: counts.length,
    });
  }

  const histogram: Histogram1D = new Map();
  let discarded = 0;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    assertCount(counts[i], i);
    if (Number.isFinite(value)) {
      histogram.set(value, (histogram.get(value) ?? 0) + counts[i]);
    } else {
      discarded += counts[i];
    }
  }
  return { histogram, discarded };
}

/**
 * Validate a caller-built histogram and copy it without its non-finite keys
 */
export function copyHistogram(source: ReadonlyMap<number, number>): { histogram: Histogram1D; discarded: number } {
  const histogram: Histogram1D = new Map();
  let discarded = 0;
  let index = 0;
  for (const [value, count] of source) {
    assertCount(count, index);
    if (Number.isFinite(value)) {
      histogram.set(value, count);
    } else {
      discarded += count;
    }
    index++;
  }
  return { histogram, discarded };
}

/**
 * Count paired samples. Expects exactly two coordinate sequences of equal
 * length; pairs with a non-finite coordinate are dropped.
 */
export function pairedSamplesToHistogram(
  samples: ReadonlyArray<ArrayLike<number>>
): { histogram: Histogram2D; discarded: number } {
  if (samples.length !== 2) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `2D samples need exactly two coordinate sequences, got ${samples.length}`,
      { components: samples.length }
    );
  }

  const [xs, ys] = samples;
  if (xs.length !== ys.length) {
    throw new StatsError(ErrorCode.INVALID_ARGUMENT, '2D coordinate sequences differ in length', {
      xLength: xs.length,
      yLength: ys.length,
    });
  }

  const histogram: Histogram2D = new Map();
  let discarded = 0;

  for (let i = 0; i < xs.length; i++) {
    const x = xs[i];
    const y = ys[i];
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      discarded++;
      continue;
    }
    let column = histogram.get(x);
    if (!column) {
      column = new Map();
      histogram.set(x, column);
    }
    column.set(y, (column.get(y) ?? 0) + 1);
  }

  return { histogram, discarded };
}
