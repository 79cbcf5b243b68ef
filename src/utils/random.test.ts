import { describe, it, expect } from 'vitest';
import { pickOne, sample, seededRandom } from './random.js';

describe('seededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = seededRandom(123);
    const b = seededRandom(123);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true);
  });
});

describe('sample', () => {
  it('returns distinct items from the population', () => {
    const random = seededRandom(9);
    const population = ['a', 'b', 'c', 'd'];
    for (let i = 0; i < 20; i++) {
      const picked = sample(population, 3, random);
      expect(new Set(picked).size).toBe(3);
      expect(picked.every((item) => population.includes(item))).toBe(true);
    }
  });

  it('does not modify the population', () => {
    const population = ['a', 'b', 'c'];
    sample(population, 3, seededRandom(1));
    expect(population).toEqual(['a', 'b', 'c']);
  });

  it('refuses a sample larger than the population', () => {
    expect(() => sample(['a'], 2, seededRandom(1))).toThrow(/larger than population/);
  });
});

describe('pickOne', () => {
  it('stays in range when the source returns values close to 1', () => {
    expect(pickOne(['a', 'b'], { next: () => 0.9999999999 })).toBe('b');
  });

  it('refuses an empty list', () => {
    expect(() => pickOne([], seededRandom(1))).toThrow('Cannot pick from an empty list');
  });
});
