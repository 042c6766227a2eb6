export interface SeededRNG {
  /** Next value in [0, 1). */
  next(): number;
  /** Uniformly picks an index in [0, length). */
  nextIndex(length: number): number;
}

/**
 * Mulberry32 generator. Same seed, same sequence; never touches Math.random.
 */
export function createSeededRNG(seed: number): SeededRNG {
  let s = seed >>> 0;
  const next = (): number => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    next,
    nextIndex(length: number): number {
      if (!Number.isInteger(length) || length <= 0) {
        throw new Error(`nextIndex: length must be a positive integer, got ${length}`);
      }
      return Math.floor(next() * length);
    },
  };
}
