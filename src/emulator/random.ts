export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/**
 * mulberry32: small, fast, and good enough for synthetic readings.
 * The same seed always yields the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function systemRandom(): RandomSource {
  return { next: () => Math.random() };
}

/** Replays a fixed list of draws, then repeats it. */
export function scriptedRandom(draws: number[]): RandomSource {
  if (draws.length === 0) throw new Error("scriptedRandom needs at least one draw");
  let i = 0;
  return {
    next() {
      const value = draws[i % draws.length];
      i++;
      return value;
    },
  };
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}
