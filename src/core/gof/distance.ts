/**
 * L2, Kolmogorov–Smirnov and Cramér–von Mises distances between empirical
 * distribution functions
 */

import { countLessOrEqual } from '../math/search';
import { createDistanceResult, type DistanceResult } from './DistanceResult';

/**
 * Ascending breakpoints with the cumulative probability reached at each one
 */
export interface CumulativeTable {
  readonly values: readonly number[];
  readonly cumulative: readonly number[];
  readonly numSamples: number;
}

export type QuadrantSide = 0 | 1;

/**
 * Quadrant masses of a 2D sample. Side 0 means "≤ the query coordinate",
 * side 1 means "> the query coordinate". Indices count how many of the
 * table's own coordinates are ≤ the query.
 */
export interface QuadrantTables {
  readonly xCoordinates: readonly number[];
  readonly yCoordinates: readonly number[];
  readonly numSamples: number;
  quadrantMassAt(xSide: QuadrantSide, ySide: QuadrantSide, ix: number, iy: number): number;
}

const QUADRANTS: ReadonlyArray<readonly [QuadrantSide, QuadrantSide]> = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, 1],
];

/**
 * Walk the union of breakpoints of both step functions in ascending order
 */
export function computeDistance1D(a: CumulativeTable, b: CumulativeTable): DistanceResult {
  const n0 = a.numSamples;
  const n1 = b.numSamples;
  const na = a.values.length;
  const nb = b.values.length;

  const first = Math.min(a.values[0], b.values[0]);
  const last = Math.max(a.values[na - 1], b.values[nb - 1]);
  const extent = last - first;

  let i = 0;
  let j = 0;
  let fa = 0;
  let fb = 0;
  let pooledPrev = 0;
  let prevValue = first;
  let prevDiff = 0;

  let ks = 0;
  let l2Sum = 0;
  let cvmSum = 0;

  while (i < na || j < nb) {
    const takeA = j >= nb || (i < na && a.values[i] <= b.values[j]);
    const u = takeA ? a.values[i] : b.values[j];

    if (i < na && a.values[i] === u) {
      fa = a.cumulative[i];
      i++;
    }
    if (j < nb && b.values[j] === u) {
      fb = b.cumulative[j];
      j++;
    }

    l2Sum += prevDiff * prevDiff * (u - prevValue);

    const diff = fa - fb;
    ks = Math.max(ks, Math.abs(diff));

    const pooled = (n0 * fa + n1 * fb) / (n0 + n1);
    cvmSum += diff * diff * (pooled - pooledPrev);

    pooledPrev = pooled;
    prevValue = u;
    prevDiff = diff;
  }

  return createDistanceResult({
    l2: extent > 0 ? Math.sqrt(l2Sum / extent) : 0,
    ks,
    cvm: Math.sqrt(cvmSum),
    n0,
    n1,
  });
}

/**
 * Sorted, de-duplicated union of two ascending coordinate lists
 */
function unionCoordinates(a: readonly number[], b: readonly number[]): number[] {
  const merged: number[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    const next = j >= b.length || (i < a.length && a[i] <= b[j]) ? a[i] : b[j];
    if (i < a.length && a[i] === next) i++;
    if (j < b.length && b[j] === next) j++;
    merged.push(next);
  }
  return merged;
}

/**
 * Measure of each grid cell [c_k, c_{k+1}) with the axis extent mapped to 1.
 * A single coordinate spans the whole unit interval.
 */
function cellWidths(coords: readonly number[]): number[] {
  if (coords.length === 1) return [1];
  const extent = coords[coords.length - 1] - coords[0];
  return coords.map((c, k) => (k + 1 < coords.length ? (coords[k + 1] - c) / extent : 0));
}

/**
 * Compare two 2D samples on the union of their coordinate grids.
 *
 * The KS-type distance is the largest quadrant-mass difference over all four
 * quadrant orientations (Fasano–Franceschini style); L2 and Cramér–von Mises
 * use the joint distribution function (the x ≤ X, y ≤ Y quadrant).
 */
export function computeDistance2D(a: QuadrantTables, b: QuadrantTables): DistanceResult {
  const n0 = a.numSamples;
  const n1 = b.numSamples;

  const xs = unionCoordinates(a.xCoordinates, b.xCoordinates);
  const ys = unionCoordinates(a.yCoordinates, b.yCoordinates);

  const ixA = xs.map((x) => countLessOrEqual(a.xCoordinates, x));
  const ixB = xs.map((x) => countLessOrEqual(b.xCoordinates, x));
  const iyA = ys.map((y) => countLessOrEqual(a.yCoordinates, y));
  const iyB = ys.map((y) => countLessOrEqual(b.yCoordinates, y));

  const xWidths = cellWidths(xs);
  const yWidths = cellWidths(ys);

  const pooledCdf = (i: number, j: number): number => {
    if (i < 0 || j < 0) return 0;
    const fa = a.quadrantMassAt(0, 0, ixA[i], iyA[j]);
    const fb = b.quadrantMassAt(0, 0, ixB[i], iyB[j]);
    return (n0 * fa + n1 * fb) / (n0 + n1);
  };

  let ks = 0;
  let l2Sum = 0;
  let cvmSum = 0;

  for (let i = 0; i < xs.length; i++) {
    for (let j = 0; j < ys.length; j++) {
      for (const [xSide, ySide] of QUADRANTS) {
        const diff = a.quadrantMassAt(xSide, ySide, ixA[i], iyA[j]) - b.quadrantMassAt(xSide, ySide, ixB[i], iyB[j]);
        ks = Math.max(ks, Math.abs(diff));
      }

      const cdfDiff = a.quadrantMassAt(0, 0, ixA[i], iyA[j]) - b.quadrantMassAt(0, 0, ixB[i], iyB[j]);
      const squared = cdfDiff * cdfDiff;
      l2Sum += squared * xWidths[i] * yWidths[j];

      // pooled point mass at (xs[i], ys[j]) by inclusion–exclusion
      const pointMass = pooledCdf(i, j) - pooledCdf(i - 1, j) - pooledCdf(i, j - 1) + pooledCdf(i - 1, j - 1);
      cvmSum += squared * pointMass;
    }
  }

  return createDistanceResult({
    l2: Math.sqrt(l2Sum),
    ks,
    cvm: Math.sqrt(Math.max(0, cvmSum)),
    n0,
    n1,
  });
}
