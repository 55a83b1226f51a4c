/**
 * mtstat - Reproducible sampling and empirical-distribution tests
 *
 * A Mersenne Twister generator with uniform, normal and Poisson samplers,
 * empirical distribution functions in one and two dimensions, and
 * Kolmogorov–Smirnov / Cramér–von Mises comparisons between samples.
 */

export * from './core';

// Samplers
export { InverseCDFSampler } from './samplers/InverseCDFSampler';
export type { CumulativeColumns } from './samplers/InverseCDFSampler';
