// packages/core/src/engine/random.ts -- Random sources for loop ordering

import { MAX_SEED } from '../utils/constants.js';

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/** mulberry32 over a 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer from 0 to ${MAX_SEED}, got ${seed}`);
  }
  let state = seed;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Fisher-Yates shuffle of 0..n-1. */
export function permutation(n: number, random: RandomSource): number[] {
  const order = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    [order[i], order[j]] = [order[j], order[i]];
  }
  return order;
}
