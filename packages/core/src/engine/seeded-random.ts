/**
 * Seeded Random Source
 *
 * Deterministic pseudo-random stream owned by a single game. Two games built
 * from the same seed and fed the same turns produce the same food placements.
 */

import { randomBytes } from 'node:crypto';

/** Anything that can draw a uniform integer in [0, maxExclusive) */
export interface RandomSource {
  nextInt(maxExclusive: number): number;
}

/**
 * mulberry32 generator over a 32-bit state
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }
}

/**
 * 32-bit seed from the OS entropy pool, for games that need not be replayable
 */
export function randomSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
