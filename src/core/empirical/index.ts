/**
 * Empirical distribution exports
 */

export { EmpiricalDistribution1D } from './EmpiricalDistribution1D';
export type { EcdfPoint } from './EmpiricalDistribution1D';
export { EmpiricalDistribution2D } from './EmpiricalDistribution2D';
export {
  samplesToHistogram,
  discreteToHistogram,
  valueCountsToHistogram,
  pairedSamplesToHistogram,
} from './histogram';
export type { Histogram1D, Histogram2D } from './histogram';
export type { TextSink } from './output';
