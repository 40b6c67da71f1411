/**
 * Seeded pseudo-random source for the paper venue
 *
 * mulberry32 for uniforms, Box-Muller for standard normals.
 * The same seed always yields the same sequence.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  /** Standard normal */
  nextGaussian(): number;
}

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
    next,
    nextGaussian: () => {
      // 1 - u keeps the log argument in (0, 1]
      const u1 = 1 - next();
      const u2 = next();
      return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    },
  };
}
