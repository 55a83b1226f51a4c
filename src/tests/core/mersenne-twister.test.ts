/**
 * MT19937 word stream: golden vectors, reseeding and ownership rules
 */

import { describe, it, expect } from 'vitest';
import { MersenneTwister19937 } from 'random-js';
import { MersenneTwister, STATE_SIZE } from '../../core/math/MersenneTwister';
import { ErrorCode } from '../../core/errors';
import { expectStatsError } from '../utilities/expectStatsError';

function words(generator: MersenneTwister, count: number): number[] {
  return Array.from({ length: count }, () => generator.nextWord());
}

describe('MersenneTwister', () => {
  describe('golden vectors', () => {
    it('should reproduce the reference output for seed 5489', () => {
      const generator = new MersenneTwister(5489);
      expect(words(generator, 5)).toEqual([3499211612, 581869302, 3890346734, 3586334585, 545404204]);
    });

    it('should reproduce the reference 10000th word for seed 5489', () => {
      const generator = new MersenneTwister(5489);
      const stream = words(generator, 10000);
      expect(stream[9999]).toBe(4123659995);
    });

    it('should default to seed 0', () => {
      const generator = new MersenneTwister();
      expect(generator.getSeed()).toBe(0);
      expect(words(generator, 3)).toEqual([2357136044, 2546248239, 3071714933]);
    });

    it.each([0, 1, 42, 5489, 2 ** 31, 0xffffffff])('should match random-js MT19937 for seed %i', (seed) => {
      const generator = new MersenneTwister(seed);
      const reference = MersenneTwister19937.seed(seed);

      // three full twists
      const count = 3 * STATE_SIZE + 17;
      const expected = Array.from({ length: count }, () => reference.next() >>> 0);
      expect(words(generator, count)).toEqual(expected);
    });
  });

  describe('output range', () => {
    it('should only emit unsigned 32-bit integers', () => {
      const generator = new MersenneTwister(123);
      for (const word of words(generator, 5000)) {
        expect(Number.isInteger(word)).toBe(true);
        expect(word).toBeGreaterThanOrEqual(0);
        expect(word).toBeLessThanOrEqual(0xffffffff);
      }
    });
  });

  describe('seeding', () => {
    it('should give identical streams for identical seeds', () => {
      expect(words(new MersenneTwister(77), 700)).toEqual(words(new MersenneTwister(77), 700));
    });

    it('should restart the stream on reseed', () => {
      const generator = new MersenneTwister(9);
      const first = words(generator, 1000);

      generator.reseed(9);
      expect(words(generator, 1000)).toEqual(first);

      generator.reseed(10);
      expect(generator.getSeed()).toBe(10);
      expect(words(generator, 5)).toEqual(words(new MersenneTwister(10), 5));
    });

    it('should not disturb other instances', () => {
      const a = new MersenneTwister(1);
      const b = new MersenneTwister(1);
      a.nextWord();
      a.reseed(2);
      expect(b.nextWord()).toBe(new MersenneTwister(1).nextWord());
    });

    it('should randomize to a valid, reported seed', () => {
      const generator = new MersenneTwister(3);
      const seed = generator.randomize();

      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
      expect(generator.getSeed()).toBe(seed);
      expect(words(generator, 4)).toEqual(words(new MersenneTwister(seed), 4));
    });

    it.each([-1, 1.5, 2 ** 32, Number.NaN])('should reject seed %s', (seed) => {
      expectStatsError(() => new MersenneTwister(seed), ErrorCode.INVALID_ARGUMENT);
      expectStatsError(() => new MersenneTwister(0).reseed(seed), ErrorCode.INVALID_ARGUMENT);
    });
  });

  describe('ownership', () => {
    it('should refuse to copy live state', () => {
      const generator = new MersenneTwister(5);
      expectStatsError(() => generator.clone(), ErrorCode.UNSUPPORTED_OPERATION);
      expectStatsError(() => JSON.stringify(generator), ErrorCode.UNSUPPORTED_OPERATION);
    });

    it('should fork an independent generator from a new seed', () => {
      const generator = new MersenneTwister(5);
      generator.nextWord();

      const forked = generator.fork(6);
      expect(forked).not.toBe(generator);
      expect(forked.getSeed()).toBe(6);
      expect(words(forked, 3)).toEqual(words(new MersenneTwister(6), 3));
      expect(generator.getSeed()).toBe(5);
    });
  });
});
