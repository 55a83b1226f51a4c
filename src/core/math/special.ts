// src/core/math/special.ts
/**
 * Special functions needed by the samplers and the goodness-of-fit engine
 */

import { StatsError, ErrorCode } from '../errors';

const FAC_TABLE_SIZE = 100;

// Stirling series coefficients: C0 = ln(sqrt(2π))
const STIRLING_C0 = 0.918938533204672722;
const STIRLING_C1 = 1 / 12;
const STIRLING_C3 = -1 / 360;

/**
 * ln(n!) for n < 100, built once when the module loads
 */
const LN_FAC_TABLE: readonly number[] = (() => {
  const table = new Array<number>(FAC_TABLE_SIZE);
  let sum = 0;
  table[0] = 0;
  for (let i = 1; i < FAC_TABLE_SIZE; i++) {
    sum += Math.log(i);
    table[i] = sum;
  }
  return Object.freeze(table);
})();

/**
 * Natural log of n factorial.
 * Exact table lookup below 100, Stirling series from there on.
 */
export function lnFac(n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `lnFac requires a non-negative integer, got ${n}`,
      { n }
    );
  }

  if (n < FAC_TABLE_SIZE) {
    return LN_FAC_TABLE[n];
  }

  const r = 1 / n;
  return (n + 0.5) * Math.log(n) - n + STIRLING_C0 + r * (STIRLING_C1 + r * r * STIRLING_C3);
}

/**
 * Exponentially scaled modified Bessel function of the second kind,
 * e^x · K_nu(x), for x > 0.
 *
 * Trapezoidal rule on K_nu(x) = ∫_0^∞ exp(-x cosh t) cosh(nu t) dt. The
 * integrand is even and analytic, so the rule converges geometrically in the
 * step size.
 */
export function besselKScaled(nu: number, x: number): number {
  if (!(x > 0) || !Number.isFinite(x) || !Number.isFinite(nu)) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `besselKScaled requires finite nu and x > 0, got nu=${nu}, x=${x}`,
      { nu, x }
    );
  }

  // exp(-x (cosh t - 1)) < e^-60 beyond tMax
  const tMax = Math.acosh(1 + 60 / x);
  const h = Math.min(0.02, 0.25 / Math.sqrt(x));
  const steps = Math.ceil(tMax / h);

  let sum = 0.5;
  for (let k = 1; k <= steps; k++) {
    const t = k * h;
    sum += Math.exp(-x * (Math.cosh(t) - 1)) * Math.cosh(nu * t);
  }
  return sum * h;
}
