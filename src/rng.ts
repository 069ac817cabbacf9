/** Random sources for the session.  Hosts pass a seeded one; tests script their own. */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded mulberry32 generator.  The same seed always yields the same session.
 * @param seed - Any finite number; only its low 32 bits matter.
 */
export function createRng(seed: number): RandomSource {
  let state = Number.isFinite(seed) ? Math.floor(seed) >>> 0 : 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };
}

/**
 * Integer in [0, n); 0 when n is not positive.
 * @param rng - Source to draw from.
 * @param n - Exclusive upper bound.
 */
export function randInt(rng: RandomSource, n: number): number {
  if (n <= 0) return 0;
  return Math.min(n - 1, Math.floor(rng() * n));
}
