/**
 * Deterministic random number source for dealing.
 */

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a simple linear congruential generator (LCG) compatible
 * with the shuffle() function's () => number contract.
 *
 * The seed is reduced to an unsigned 32-bit integer first, so
 * negative and fractional seeds still yield values in [0, 1).
 */
export function createSeededRng(seed: number): () => number {
  let s = Math.trunc(seed) >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/** Pick a fresh seed when the caller did not supply one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}
