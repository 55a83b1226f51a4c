/**
 * Goodness-of-fit exports
 */

export type { DistanceResult } from './DistanceResult';
export {
  createDistanceResult,
  sampleSizeFactor,
  scaledKSDistance,
  scaledCvMDistance,
  scaledL2Distance,
  domainScaledL2Distance,
} from './DistanceResult';
export { computeDistance1D, computeDistance2D } from './distance';
export type { CumulativeTable, QuadrantTables, QuadrantSide } from './distance';
export {
  kolmogorovProb,
  kolmogorovProbTwoSmallSamples,
  cramerVonMisesProb,
  cramerVonMisesLimitCdf,
} from './probabilities';
export { twoSampleTest } from './twoSampleTest';
export type { TwoSampleTestResult, KSMethod } from './twoSampleTest';
