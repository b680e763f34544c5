/**
 * Seeded Random
 *
 * Mulberry32 generator: a 32-bit state advanced by a fixed increment and
 * mixed into a uniform float in [0, 1). The same seed always yields the
 * same stream, which is what makes seeded generation and dropout
 * reproducible.
 *
 * @module tensor/random
 */

import { ConfigError } from '../errors/model-error.js';

export const MIN_SEED = -2147483648;
export const MAX_SEED = 2147483647;

export function isSeed(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_SEED && value <= MAX_SEED;
}

export class SeededRandom {
  readonly seed: number;
  private state: number;
  private spareGaussian: number | null = null;

  constructor(seed: number) {
    if (!isSeed(seed)) {
      throw new ConfigError(`SeededRandom: seed must be an int32 integer, got ${seed}`);
    }
    this.seed = seed;
    this.state = this.seed;
  }

  /**
   * Seed from the clock, for unseeded generation requests.
   */
  static fromClock(): SeededRandom {
    return new SeededRandom((Date.now() ^ Math.floor(performance.now() * 1000)) | 0);
  }

  /**
   * Uniform float in [0, 1).
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Uniform integer in [0, n).
   */
  nextInt(n: number): number {
    return Math.floor(this.next() * n);
  }

  /**
   * Standard normal sample (Box-Muller, second value cached).
   */
  nextGaussian(): number {
    if (this.spareGaussian !== null) {
      const spare = this.spareGaussian;
      this.spareGaussian = null;
      return spare;
    }
    const u1 = 1 - this.next();  // (0, 1], keeps log finite
    const u2 = this.next();
    const r = Math.sqrt(-2 * Math.log(u1));
    this.spareGaussian = r * Math.sin(2 * Math.PI * u2);
    return r * Math.cos(2 * Math.PI * u2);
  }
}
