/**
 * Source of uniform floats in [0, 1). Injected wherever content selection is
 * random so tests can pin the sequence.
 */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic generator (mulberry32) for reproducible runs and tests
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

/**
 * Draw `count` distinct items (partial Fisher-Yates on a copy)
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  if (count > items.length) {
    throw new Error(`Sample larger than population (${count} > ${items.length})`);
  }
  const pool = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + Math.min(pool.length - i - 1, Math.floor(random.next() * (pool.length - i)));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count);
}
