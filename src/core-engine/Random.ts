/**
 * Random sources for the War simulator.
 *
 * Everything that shuffles or samples takes a `RandomSource`, so games
 * can be replayed exactly by supplying a seeded generator.
 */

/** Returns a value in [0, 1), the same contract as Math.random. */
export type RandomSource = () => number;

/**
 * Create a deterministic generator from a numeric seed.
 *
 * Linear congruential generator with the Numerical Recipes constants;
 * the same seed always yields the same sequence.
 */
export function createSeededRng(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}
