/**
 * Seeded random tests
 */

import { describe, it, expect } from 'vitest';
import { SeededRandom, createRandom } from '../utils/random.js';

function draws(random: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => random.random());
}

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    expect(draws(createRandom(7), 20)).toEqual(draws(createRandom(7), 20));
  });

  it('produces different sequences for different seeds', () => {
    expect(draws(createRandom(7), 20)).not.toEqual(draws(createRandom(8), 20));
  });

  it('keeps random() within [0, 1)', () => {
    for (const value of draws(createRandom(1), 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('covers the inclusive int range', () => {
    const random = createRandom(3);
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i++) {
      const value = random.int(3, 5);
      expect(value).toBeGreaterThanOrEqual(3);
      expect(value).toBeLessThanOrEqual(5);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([3, 4, 5]);
  });

  it('picks members of the list', () => {
    const random = createRandom(11);
    const items = ['a', 'b', 'c'] as const;
    for (let i = 0; i < 100; i++) {
      expect(items).toContain(random.pick(items));
    }
  });

  it('honours bool probabilities at the extremes', () => {
    const random = createRandom(5);
    expect(Array.from({ length: 50 }, () => random.bool(0)).some(Boolean)).toBe(false);
    expect(Array.from({ length: 50 }, () => random.bool(1)).every(Boolean)).toBe(true);
  });
});
