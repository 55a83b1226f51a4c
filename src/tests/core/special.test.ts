import { describe, it, expect } from 'vitest';
import { lnFac, besselKScaled } from '../../core/math/special';
import { ErrorCode } from '../../core/errors';
import { expectStatsError } from '../utilities/expectStatsError';

function lnFacBySum(n: number): number {
  let sum = 0;
  for (let i = 2; i <= n; i++) sum += Math.log(i);
  return sum;
}

describe('lnFac', () => {
  it('should be 0 for 0! and 1!', () => {
    expect(lnFac(0)).toBe(0);
    expect(lnFac(1)).toBe(0);
  });

  it('should match ln(10!)', () => {
    expect(lnFac(10)).toBeCloseTo(Math.log(3628800), 9);
  });

  it.each([99, 100, 101, 150, 1000, 20000])('should agree with a direct sum at n = %i', (n) => {
    const reference = lnFacBySum(n);
    expect(Math.abs(lnFac(n) - reference) / reference).toBeLessThan(1e-10);
  });

  it('should increase by ln(n) from one argument to the next', () => {
    expect(lnFac(100) - lnFac(99)).toBeCloseTo(Math.log(100), 9);
    expect(lnFac(500) - lnFac(499)).toBeCloseTo(Math.log(500), 9);
  });

  it.each([-1, 2.5, Number.NaN, Infinity])('should reject %s', (n) => {
    expectStatsError(() => lnFac(n), ErrorCode.INVALID_ARGUMENT);
  });
});

describe('besselKScaled', () => {
  it.each([0.05, 0.5, 2, 10, 50])('should match the closed form for order 1/2 at x = %s', (x) => {
    // e^x K_{1/2}(x) = sqrt(pi / (2x))
    expect(besselKScaled(0.5, x)).toBeCloseTo(Math.sqrt(Math.PI / (2 * x)), 12);
  });

  it('should be even in the order', () => {
    expect(besselKScaled(-0.25, 1.3)).toBe(besselKScaled(0.25, 1.3));
  });

  it('should decrease with x', () => {
    expect(besselKScaled(0.25, 0.5)).toBeGreaterThan(besselKScaled(0.25, 1));
    expect(besselKScaled(0.25, 1)).toBeGreaterThan(besselKScaled(0.25, 5));
  });

  it('should reject non-positive arguments', () => {
    expectStatsError(() => besselKScaled(0.25, 0), ErrorCode.INVALID_ARGUMENT);
    expectStatsError(() => besselKScaled(0.25, -1), ErrorCode.INVALID_ARGUMENT);
    expectStatsError(() => besselKScaled(Number.NaN, 1), ErrorCode.INVALID_ARGUMENT);
  });
});
