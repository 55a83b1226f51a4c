/**
 * Piecewise-linear interpolation through sorted support points
 */

import { StatsError, ErrorCode } from '../errors';
import { countLessOrEqual } from './search';

export class PiecewiseLinearInterpolant {
  private readonly xs: readonly number[];
  private readonly ys: readonly number[];

  /**
   * @param xs - strictly increasing abscissae
   * @param ys - ordinates, same length as `xs`
   */
  constructor(xs: readonly number[], ys: readonly number[]) {
    if (xs.length !== ys.length) {
      throw new StatsError(ErrorCode.INVALID_ARGUMENT, 'Interpolant abscissae and ordinates differ in length', {
        xLength: xs.length,
        yLength: ys.length,
      });
    }
    if (xs.length < 2) {
      throw new StatsError(ErrorCode.INSUFFICIENT_DATA, 'An interpolant needs at least two support points', {
        points: xs.length,
      });
    }
    for (let i = 0; i < xs.length; i++) {
      if (!Number.isFinite(xs[i]) || !Number.isFinite(ys[i])) {
        throw new StatsError(ErrorCode.INVALID_ARGUMENT, 'Interpolant support points must be finite', {
          index: i,
          x: xs[i],
          y: ys[i],
        });
      }
      if (i > 0 && !(xs[i] > xs[i - 1])) {
        throw new StatsError(ErrorCode.PRECONDITION_VIOLATION, 'Interpolant abscissae must be strictly increasing', {
          index: i,
          previous: xs[i - 1],
          current: xs[i],
        });
      }
    }

    this.xs = [...xs];
    this.ys = [...ys];
  }

  get domain(): { min: number; max: number } {
    return { min: this.xs[0], max: this.xs[this.xs.length - 1] };
  }

  get size(): number {
    return this.xs.length;
  }

  /**
   * Value at x; constant continuation outside the domain
   */
  evaluate(x: number): number {
    const last = this.xs.length - 1;
    if (x <= this.xs[0]) return this.ys[0];
    if (x >= this.xs[last]) return this.ys[last];

    // xs[i - 1] <= x < xs[i]
    const i = countLessOrEqual(this.xs, x);
    const x0 = this.xs[i - 1];
    const x1 = this.xs[i];
    const y0 = this.ys[i - 1];
    const y1 = this.ys[i];
    return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
  }

  /**
   * Swap the roles of x and y. Requires non-decreasing ordinates; where several
   * points share an ordinate only the first one survives.
   */
  invert(): PiecewiseLinearInterpolant {
    const xs: number[] = [];
    const ys: number[] = [];

    for (let i = 0; i < this.ys.length; i++) {
      const y = this.ys[i];
      if (i > 0 && y < this.ys[i - 1]) {
        throw new StatsError(ErrorCode.PRECONDITION_VIOLATION, 'Cannot invert a non-monotonic interpolant', {
          index: i,
          previous: this.ys[i - 1],
          current: y,
        });
      }
      if (xs.length > 0 && y === xs[xs.length - 1]) continue;
      xs.push(y);
      ys.push(this.xs[i]);
    }

    return new PiecewiseLinearInterpolant(xs, ys);
  }
}
