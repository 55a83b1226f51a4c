/**
 * Outcome of comparing two empirical distributions
 */

import { StatsError, ErrorCode } from '../errors';

export interface DistanceResult {
  /** L2 distance of the distribution functions on the domain mapped to [0, 1] (or [0, 1]²) */
  readonly l2: number;
  /** L∞ (Kolmogorov–Smirnov) distance of the distribution functions */
  readonly ks: number;
  /** Square root of the Cramér–von Mises integral, weighted by the pooled mass */
  readonly cvm: number;
  /** Sample count of the first distribution */
  readonly n0: number;
  /** Sample count of the second distribution */
  readonly n1: number;
}

export function createDistanceResult(fields: DistanceResult): DistanceResult {
  return Object.freeze({ ...fields });
}

function assertComplete(result: DistanceResult): void {
  const countsValid = result.n0 > 0 && result.n1 > 0 && Number.isInteger(result.n0) && Number.isInteger(result.n1);
  const distancesValid = [result.l2, result.ks, result.cvm].every((d) => Number.isFinite(d) && d >= 0);
  if (!countsValid || !distancesValid) {
    throw new StatsError(
      ErrorCode.PRECONDITION_VIOLATION,
      'Distance result is incomplete; compute the distance between two distributions first',
      { ...result }
    );
  }
}

/**
 * sqrt(n0 n1 / (n0 + n1)), the factor turning a distance into a test statistic
 */
export function sampleSizeFactor(result: DistanceResult): number {
  assertComplete(result);
  const { n0, n1 } = result;
  return Math.sqrt((n0 * n1) / (n0 + n1));
}

/**
 * Kolmogorov–Smirnov statistic, input for `kolmogorovProb`
 */
export function scaledKSDistance(result: DistanceResult): number {
  return sampleSizeFactor(result) * result.ks;
}

/**
 * Square root of the two-sample Cramér–von Mises statistic T, input for
 * `cramerVonMisesProb`
 */
export function scaledCvMDistance(result: DistanceResult): number {
  return sampleSizeFactor(result) * result.cvm;
}

export function scaledL2Distance(result: DistanceResult): number {
  return sampleSizeFactor(result) * result.l2;
}

/**
 * L2 distance for the domain interpreted as [0, 1], without sample-size scaling
 */
export function domainScaledL2Distance(result: DistanceResult): number {
  assertComplete(result);
  return result.l2;
}
