// packages/game-core/src/random.ts
//
// Random sources for drawing the secret number.
//
// The session never touches a process-wide generator directly; it receives a
// RandomSource instead. Production uses Math.random, tests and seeded play use
// seededRandom(seed), which hashes the seed string (FNV-1a) and feeds the
// result into a mulberry32 generator.

/** A function returning a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** 32-bit FNV-1a hash of a string, one step per code point. */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.codePointAt(0) ?? 0;
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** mulberry32: small deterministic PRNG over a 32-bit state. */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seededRandom(seed: string): RandomSource {
  return mulberry32(hashSeed(seed));
}

/**
 * drawSecret picks an integer uniformly from the closed range [min, max].
 *
 * Example:
 *   drawSecret(() => 0, 1, 100)      → 1
 *   drawSecret(() => 0.999, 1, 100)  → 100
 */
export function drawSecret(random: RandomSource, min: number, max: number): number {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
    throw new RangeError(`Invalid secret range [${min}, ${max}]`);
  }
  return min + Math.floor(random() * (max - min + 1));
}
