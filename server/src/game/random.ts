/**
 * Randomness sources for shuffling
 *
 * Sessions never reach for a global generator; they are handed a RandomSource.
 * The crypto source keeps no state, so one instance is shared by every
 * concurrently running session.
 */

import { randomInt } from 'node:crypto';

export interface RandomSource {
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
}

/** Unbiased integers from the operating system CSPRNG */
export const cryptoRandom: RandomSource = {
  nextInt: (bound: number): number => randomInt(bound),
};

/**
 * Mulberry32 PRNG for reproducible shuffles.
 * Period 2^32; not for production deals.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Ensure unsigned 32-bit integer
    this.state = seed >>> 0;
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    let z = (this.state += 0x6d2b79f5);
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}
