/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Deterministic generator (mulberry32) for tests and `--seed` runs.
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

export function pick<T>(items: readonly T[], rng: RandomSource): T {
  const item = items[Math.floor(rng() * items.length)];
  if (item === undefined) throw new Error('Cannot pick from an empty list');
  return item;
}

export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const a = copy[i];
    const b = copy[j];
    if (a === undefined || b === undefined) continue;
    copy[i] = b;
    copy[j] = a;
  }
  return copy;
}

/** `k` distinct items in random order. */
export function sample<T>(items: readonly T[], k: number, rng: RandomSource): T[] {
  return shuffle(items, rng).slice(0, Math.max(0, k));
}

/**
 * Seeded source when `seed` is given (CLI `--seed`), otherwise Math.random.
 */
export function randomFromSeed(seed?: string | number): RandomSource {
  if (seed === undefined || seed === '') return defaultRandom;
  const n = Number(seed);
  if (!Number.isFinite(n)) throw new Error(`Invalid seed: ${seed}`);
  return seededRandom(n);
}
