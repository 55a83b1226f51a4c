import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EmpiricalDistribution1D } from '../../core/empirical/EmpiricalDistribution1D';
import { ErrorCode } from '../../core/errors';
import { expectStatsError } from '../utilities/expectStatsError';

describe('EmpiricalDistribution1D', () => {
  describe('construction', () => {
    it('should sort samples and accumulate their shares', () => {
      const dist = EmpiricalDistribution1D.fromSamples([2, 1, 2, 3]);

      expect(dist.values).toEqual([1, 2, 3]);
      expect(dist.cumulative).toEqual([0.25, 0.75, 1]);
      expect(dist.numSamples).toBe(4);
      expect(dist.size).toBe(3);
      expect(dist.min).toBe(1);
      expect(dist.max).toBe(3);
    });

    it('should ignore non-finite samples', () => {
      const dist = EmpiricalDistribution1D.fromSamples([2, Number.NaN, 1, Infinity, 2, -Infinity, 3]);

      expect(dist.values).toEqual([1, 2, 3]);
      expect(dist.numSamples).toBe(4);
    });

    it('should accept typed arrays', () => {
      const dist = EmpiricalDistribution1D.fromSamples(new Float64Array([0.5, -0.5]));
      expect(dist.values).toEqual([-0.5, 0.5]);
      expect(dist.cumulative).toEqual([0.5, 1]);
    });

    it('should build from a histogram of integer events', () => {
      const dist = EmpiricalDistribution1D.fromDiscreteHistogram([3, 0, 5]);

      expect(dist.values).toEqual([0, 1, 2]);
      expect(dist.cumulative).toEqual([0.375, 0.375, 1]);
      expect(dist.numSamples).toBe(8);
    });

    it('should build from parallel value and count vectors', () => {
      const dist = EmpiricalDistribution1D.fromValueHistogram([2, 1, 2], [4, 3, 1]);

      expect(dist.values).toEqual([1, 2]);
      expect(dist.cumulative).toEqual([0.375, 1]);
      expect(dist.numSamples).toBe(8);
    });

    it('should build from a value to count map without keeping a reference to it', () => {
      const histogram = new Map([
        [2, 5],
        [1, 3],
      ]);
      const dist = EmpiricalDistribution1D.fromHistogram(histogram);
      histogram.set(0, 100);

      expect(dist.values).toEqual([1, 2]);
      expect(dist.cumulative).toEqual([0.375, 1]);
    });

    it('should end at exactly 1 for awkward sample counts', () => {
      const dist = EmpiricalDistribution1D.fromSamples(Array.from({ length: 49 }, (_, i) => i / 7));
      expect(dist.cumulative[dist.cumulative.length - 1]).toBe(1);
    });

    it('should be immutable', () => {
      const dist = EmpiricalDistribution1D.fromSamples([1, 2]);
      expect(Object.isFrozen(dist.values)).toBe(true);
      expect(Object.isFrozen(dist.cumulative)).toBe(true);
    });

    it('should require at least one sample', () => {
      expectStatsError(() => EmpiricalDistribution1D.fromSamples([]), ErrorCode.INSUFFICIENT_DATA);
      expectStatsError(() => EmpiricalDistribution1D.fromSamples([Number.NaN]), ErrorCode.INSUFFICIENT_DATA);
      expectStatsError(() => EmpiricalDistribution1D.fromDiscreteHistogram([0, 0]), ErrorCode.INSUFFICIENT_DATA);
    });

    it('should reject malformed histograms', () => {
      expectStatsError(() => EmpiricalDistribution1D.fromDiscreteHistogram([1.5]), ErrorCode.INVALID_ARGUMENT);
      expectStatsError(() => EmpiricalDistribution1D.fromDiscreteHistogram([2, -1]), ErrorCode.INVALID_ARGUMENT);
      expectStatsError(() => EmpiricalDistribution1D.fromValueHistogram([1], [1, 2]), ErrorCode.INVALID_ARGUMENT);
      expectStatsError(
        () => EmpiricalDistribution1D.fromHistogram(new Map([[1, -2]])),
        ErrorCode.INVALID_ARGUMENT
      );
    });

    it('should ignore the counts of non-finite values', () => {
      const fromVectors = EmpiricalDistribution1D.fromValueHistogram([Number.NaN, 1, Infinity, 2], [4, 3, 2, 5]);
      expect(fromVectors.values).toEqual([1, 2]);
      expect(fromVectors.cumulative).toEqual([0.375, 1]);
      expect(fromVectors.numSamples).toBe(8);

      const fromMap = EmpiricalDistribution1D.fromHistogram(
        new Map([
          [-Infinity, 6],
          [1, 3],
          [2, 5],
        ])
      );
      expect(fromMap.values).toEqual([1, 2]);
      expect(fromMap.numSamples).toBe(8);
    });

    it('should need a finite value with a positive count', () => {
      expectStatsError(
        () => EmpiricalDistribution1D.fromValueHistogram([Number.NaN], [1]),
        ErrorCode.INSUFFICIENT_DATA
      );
      expectStatsError(
        () => EmpiricalDistribution1D.fromHistogram(new Map([[Infinity, 1]])),
        ErrorCode.INSUFFICIENT_DATA
      );
    });
  });

  describe('cdf', () => {
    const dist = EmpiricalDistribution1D.fromSamples([2, 1, 2, 3]);

    it('should be 0 below the smallest value', () => {
      expect(dist.cdf(0.5)).toBe(0);
      expect(dist.cdf(-Infinity)).toBe(0);
    });

    it('should be right-continuous at the jumps', () => {
      expect(dist.cdf(1)).toBe(0.25);
      expect(dist.cdf(1.999)).toBe(0.25);
      expect(dist.cdf(2)).toBe(0.75);
    });

    it('should be 1 from the largest value on', () => {
      expect(dist.cdf(3)).toBe(1);
      expect(dist.cdf(1e9)).toBe(1);
    });

    it('should list its points', () => {
      expect(dist.entries()).toEqual([
        { value: 1, probability: 0.25 },
        { value: 2, probability: 0.75 },
        { value: 3, probability: 1 },
      ]);
    });
  });

  describe('output', () => {
    const dist = EmpiricalDistribution1D.fromValueHistogram([1, 2], [3, 5]);
    let dir = '';

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'mtstat-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('should format one line per value', () => {
      expect(dist.format()).toBe('1 0.375\n2 1\n');
    });

    it('should format a staircase for gnuplot', () => {
      expect(dist.formatForGnuplot()).toBe('1 0\n1 0.375\n2 0.375\n2 1\n');
    });

    it('should dump to a text sink', () => {
      const chunks: string[] = [];
      dist.dump({ write: (chunk: string) => chunks.push(chunk) });
      expect(chunks.join('')).toBe('1 0.375\n2 1\n');
    });

    it('should wrap sink failures', () => {
      const failure = new Error('closed');
      const error = expectStatsError(
        () =>
          dist.dump({
            write: () => {
              throw failure;
            },
          }),
        ErrorCode.IO_ERROR
      );
      expect(error.cause).toBe(failure);
    });

    it('should write either layout to a file', () => {
      const plain = join(dir, 'ecdf.txt');
      const staircase = join(dir, 'ecdf.dat');

      dist.writeTo(plain);
      dist.writeTo(staircase, true);

      expect(readFileSync(plain, 'utf8')).toBe('1 0.375\n2 1\n');
      expect(readFileSync(staircase, 'utf8')).toBe('1 0\n1 0.375\n2 0.375\n2 1\n');
    });

    it('should report unwritable paths', () => {
      const path = join(dir, 'missing', 'ecdf.txt');
      const error = expectStatsError(() => dist.writeTo(path), ErrorCode.IO_ERROR);
      expect(error.context).toEqual({ path });
    });
  });

  describe('debug logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should report discarded samples when debug is on', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      EmpiricalDistribution1D.fromSamples([1, Number.NaN, 2, Infinity], { debug: true });

      expect(log).toHaveBeenCalledWith('[mtstat] Ignoring non-finite samples', { discarded: 2, total: 4 });
    });

    it('should report ignored histogram counts when debug is on', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      EmpiricalDistribution1D.fromValueHistogram([1, Number.NaN], [2, 3], { debug: true });

      expect(log).toHaveBeenCalledWith('[mtstat] Ignoring counts of non-finite values', { discarded: 3 });
    });

    it('should stay quiet by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      EmpiricalDistribution1D.fromSamples([1, Number.NaN]);

      expect(log).not.toHaveBeenCalled();
    });
  });
});
