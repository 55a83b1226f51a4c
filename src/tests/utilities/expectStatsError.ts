import { expect } from 'vitest';
import { ErrorCode, StatsError, isStatsError } from '../../core/errors';

/**
 * Run `fn`, assert it throws a StatsError with `code`, and return the error
 */
export function expectStatsError(fn: () => unknown, code: ErrorCode): StatsError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(StatsError);
  if (!isStatsError(caught)) {
    throw new Error(`Expected a StatsError with code ${code}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}
