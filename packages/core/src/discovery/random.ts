/**
 * Injectable random sources.
 *
 * Every randomized decision in discovery takes a `RandomSource` so tests can
 * script the draws or replay a seed.
 */

/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Deterministic mulberry32 generator. The same seed yields the same sequence. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Float in [min, max). */
export function randomUniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** `count` distinct items, in draw order. */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  return shuffle(items, random).slice(0, Math.max(0, count));
}
