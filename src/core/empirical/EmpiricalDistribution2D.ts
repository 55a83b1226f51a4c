/**
 * Empirical distribution of paired samples
 */

import { resolveConfig, type StatsConfig } from '../config';
import { StatsError, ErrorCode } from '../errors';
import { debugLog } from '../logging';
import { countLessOrEqual } from '../math/search';
import { computeDistance2D, type QuadrantSide, type QuadrantTables } from '../gof/distance';
import type { DistanceResult } from '../gof/DistanceResult';
import { pairedSamplesToHistogram, type Histogram2D } from './histogram';
import { writeToSink, writeTextFile, type TextSink } from './output';

/** (nx + 1) × (ny + 1) table of probability masses */
type GridTable = readonly (readonly number[])[];

/** Indexed [xSide][ySide] */
type QuadrantGrid = readonly [readonly [GridTable, GridTable], readonly [GridTable, GridTable]];

/**
 * Distinct coordinates per axis plus four quadrant tables. Entry [ix][iy] of
 * table [a][b] is the share of samples with x on side a and y on side b of
 * the query point, where ix (iy) own x (y) coordinates are ≤ the query.
 */
export class EmpiricalDistribution2D implements QuadrantTables {
  private constructor(
    readonly xCoordinates: readonly number[],
    readonly yCoordinates: readonly number[],
    private readonly quadrants: QuadrantGrid,
    readonly numSamples: number
  ) {}

  /**
   * From exactly two equal-length coordinate sequences [xs, ys]
   */
  static fromSamples(
    samples: ReadonlyArray<ArrayLike<number>>,
    config: Partial<StatsConfig> = {}
  ): EmpiricalDistribution2D {
    const { histogram, discarded } = pairedSamplesToHistogram(samples);
    if (discarded > 0) {
      debugLog(resolveConfig(config), 'Ignoring sample pairs with non-finite coordinates', { discarded });
    }
    return EmpiricalDistribution2D.initialize(histogram);
  }

  private static initialize(histogram: Histogram2D): EmpiricalDistribution2D {
    const xs = [...histogram.keys()].sort((p, q) => p - q);
    const yValues = new Set<number>();
    for (const column of histogram.values()) {
      for (const y of column.keys()) yValues.add(y);
    }
    const ys = [...yValues].sort((p, q) => p - q);

    const nx = xs.length;
    const ny = ys.length;
    const yIndex = new Map(ys.map((y, k) => [y, k]));

    // counts[ix][iy]: samples with x ≤ xs[ix-1] and y ≤ ys[iy-1]
    const counts: number[][] = Array.from({ length: nx + 1 }, () => new Array<number>(ny + 1).fill(0));
    xs.forEach((x, k) => {
      const column = histogram.get(x);
      if (!column) return;
      for (const [y, count] of column) {
        const iy = yIndex.get(y);
        if (iy !== undefined) counts[k + 1][iy + 1] += count;
      }
    });
    for (let ix = 1; ix <= nx; ix++) {
      for (let iy = 1; iy <= ny; iy++) {
        counts[ix][iy] += counts[ix - 1][iy] + counts[ix][iy - 1] - counts[ix - 1][iy - 1];
      }
    }

    const total = counts[nx][ny];
    if (total === 0) {
      throw new StatsError(ErrorCode.INSUFFICIENT_DATA, 'A 2D empirical distribution needs at least one sample pair');
    }

    const table = (mass: (ix: number, iy: number) => number): GridTable =>
      Object.freeze(
        Array.from({ length: nx + 1 }, (_, ix) =>
          Object.freeze(Array.from({ length: ny + 1 }, (_, iy) => mass(ix, iy) / total))
        )
      );

    const quadrants: QuadrantGrid = [
      [
        table((ix, iy) => counts[ix][iy]),
        table((ix, iy) => counts[ix][ny] - counts[ix][iy]),
      ],
      [
        table((ix, iy) => counts[nx][iy] - counts[ix][iy]),
        table((ix, iy) => total - counts[ix][ny] - counts[nx][iy] + counts[ix][iy]),
      ],
    ];

    return new EmpiricalDistribution2D(Object.freeze(xs), Object.freeze(ys), quadrants, total);
  }

  quadrantMassAt(xSide: QuadrantSide, ySide: QuadrantSide, ix: number, iy: number): number {
    return this.quadrants[xSide][ySide][ix][iy];
  }

  /**
   * Share of samples on the given sides of (x, y)
   */
  quadrantMass(xSide: QuadrantSide, ySide: QuadrantSide, x: number, y: number): number {
    return this.quadrantMassAt(
      xSide,
      ySide,
      countLessOrEqual(this.xCoordinates, x),
      countLessOrEqual(this.yCoordinates, y)
    );
  }

  /**
   * Joint distribution function: share of samples with x' ≤ x and y' ≤ y
   */
  cdf(x: number, y: number): number {
    return this.quadrantMass(0, 0, x, y);
  }

  getCoord(ix: number, iy: number): { x: number; y: number } {
    if (ix < 0 || ix >= this.xCoordinates.length || iy < 0 || iy >= this.yCoordinates.length) {
      throw new StatsError(ErrorCode.INVALID_ARGUMENT, 'Grid index out of range', {
        ix,
        iy,
        nx: this.xCoordinates.length,
        ny: this.yCoordinates.length,
      });
    }
    return { x: this.xCoordinates[ix], y: this.yCoordinates[iy] };
  }

  computeDistanceTo(other: EmpiricalDistribution2D): DistanceResult {
    return computeDistance2D(this, other);
  }

  /**
   * "x y probability" lines of the joint distribution function on the grid,
   * one block per x coordinate separated by blank lines (gnuplot splot)
   */
  format(): string {
    return this.xCoordinates
      .map((x, ix) =>
        this.yCoordinates.map((y, iy) => `${x} ${y} ${this.quadrantMassAt(0, 0, ix + 1, iy + 1)}\n`).join('')
      )
      .join('\n');
  }

  dump(out: TextSink): void {
    writeToSink(out, this.format());
  }

  writeTo(path: string): void {
    writeTextFile(path, this.format());
  }
}
