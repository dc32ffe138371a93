/**
 * Random sources for exploration.
 *
 * Policies take a RandomSource instead of calling Math.random so a run can
 * be replayed from a seed.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * mulberry32: small 32-bit seeded generator
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick an index in [0, length)
 */
export function randomIndex(random: RandomSource, length: number): number {
  // Guard against generators that return exactly 1
  return Math.min(length - 1, Math.floor(random() * length));
}
