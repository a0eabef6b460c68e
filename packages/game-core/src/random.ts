// packages/game-core/src/random.ts
//
// Randomness used by word selection and the opening reveal.
//
// A Random is any function returning a float in [0, 1). Math.random fits;
// createSeededRandom gives a reproducible one for seeded play and tests.
// The app creates a single generator at startup and passes it down, so
// nothing here keeps global state.

export type Random = () => number;

/**
 * hashSeed folds a string into a 32-bit unsigned integer (FNV-1a).
 */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * createSeededRandom returns a deterministic generator.
 *
 * @param seed - a string (hashed with hashSeed) or an integer state
 * @returns    - a Random advancing a 32-bit LCG on every call
 *
 * Example:
 *   const a = createSeededRandom('daily'), b = createSeededRandom('daily');
 *   a() === b()  // true
 */
export function createSeededRandom(seed: string | number): Random {
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return () => {
    state = (Math.imul(1664525, state) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/** randomIndex draws a uniform integer in [0, length). */
export function randomIndex(random: Random, length: number): number {
  return Math.floor(random() * length);
}
