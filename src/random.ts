/**
 * Source of uniformly distributed integers, injected into the random policy
 * so runs can be replayed.
 */
export interface RandomSource {
  /** Integer in [0, bound) */
  nextInt(bound: number): number;
}

/**
 * mulberry32: 32-bit state, full period, good enough for picking victims.
 * Seeds are taken modulo 2^32; validated configs never exceed that range.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt(bound: number): number {
      if (!Number.isInteger(bound) || bound <= 0) {
        throw new Error(`bound must be a positive integer, got ${bound}`);
      }
      return Math.floor(next() * bound);
    }
  };
}

export const randomSeed = (): number => Math.floor(Math.random() * 0x100000000);
