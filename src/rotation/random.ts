/** Source of uniform numbers in [0, 1). Injected so tests can seed it. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Small seeded PRNG; same seed, same sequence. */
export function mulberry32(seed: number): RandomSource {
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

/** Uniform float in [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Uniform integer in [0, upperExclusive). */
export function randomIndex(random: RandomSource, upperExclusive: number): number {
  return Math.min(Math.floor(random.next() * upperExclusive), upperExclusive - 1);
}
