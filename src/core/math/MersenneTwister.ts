/**
 * MT19937 word generator
 *
 * M. Matsumoto, T. Nishimura: Mersenne Twister: A 623-Dimensionally
 * Equidistributed Uniform Pseudo-Random Number Generator. ACM TOMACS 8(1),
 * 1998, pp. 3-30.
 *
 * For a fixed seed the word sequence is identical on every platform. All state
 * arithmetic stays in unsigned 32-bit integers. Not suitable for cryptographic
 * use, and an instance must not be shared between concurrently running tasks.
 */

import { nativeMath } from 'random-js';
import { StatsError, ErrorCode } from '../errors';

export const STATE_SIZE = 624;
const SHIFT_SIZE = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;
const INIT_MULTIPLIER = 1812433253;

export const DEFAULT_SEED = 0;
export const MAX_SEED = 0xffffffff;

/**
 * Anything that can hand out unsigned 32-bit words
 */
export interface WordSource {
  nextWord(): number;
}

export function assertSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new StatsError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid seed: ${seed}. Seeds must be integers in [0, 2^32).`,
      { seed }
    );
  }
}

export class MersenneTwister implements WordSource {
  private seedValue: number;
  private index = STATE_SIZE;
  private readonly words = new Uint32Array(STATE_SIZE);

  constructor(seed: number = DEFAULT_SEED) {
    assertSeed(seed);
    this.seedValue = seed;
    this.initializeWords();
  }

  getSeed(): number {
    return this.seedValue;
  }

  /**
   * Restart the sequence from a new seed. Earlier output is not reproducible
   * from this instance afterwards.
   */
  reseed(seed: number): void {
    assertSeed(seed);
    this.seedValue = seed;
    this.initializeWords();
  }

  /**
   * Reseed from the clock mixed with Math.random entropy.
   * Returns the seed that was chosen so a run can be replayed.
   */
  randomize(): number {
    const seed = (Date.now() ^ nativeMath.next()) >>> 0;
    this.reseed(seed);
    return seed;
  }

  /**
   * Next tempered 32-bit word, as an unsigned number
   */
  nextWord(): number {
    if (this.index >= STATE_SIZE) {
      this.twist();
    }

    let y = this.words[this.index++];
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  /**
   * A new, independent generator started from `seed`. This never duplicates
   * the live state of this instance.
   */
  fork(seed: number): MersenneTwister {
    return new MersenneTwister(seed);
  }

  /**
   * Live generator state is never copied; use `fork` for a second generator.
   */
  clone(): never {
    throw new StatsError(
      ErrorCode.UNSUPPORTED_OPERATION,
      'MersenneTwister state cannot be copied; use fork(seed) for an independent generator',
      { seed: this.seedValue }
    );
  }

  toJSON(): never {
    return this.clone();
  }

  private initializeWords(): void {
    const words = this.words;
    words[0] = this.seedValue;
    for (let i = 1; i < STATE_SIZE; i++) {
      const prev = words[i - 1];
      words[i] = (Math.imul(INIT_MULTIPLIER, prev ^ (prev >>> 30)) + i) >>> 0;
    }
    this.index = STATE_SIZE;
  }

  private twist(): void {
    const words = this.words;
    for (let i = 0; i < STATE_SIZE; i++) {
      const y = (words[i] & UPPER_MASK) | (words[(i + 1) % STATE_SIZE] & LOWER_MASK);
      words[i] = words[(i + SHIFT_SIZE) % STATE_SIZE] ^ (y >>> 1) ^ (y & 1 ? MATRIX_A : 0);
    }
    this.index = 0;
  }
}
