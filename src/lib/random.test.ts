import { describe, expect, it } from 'vitest';
import { coordinateSeed, pickIndex, seededRandom } from './random';

describe('seededRandom', () => {
  it('returns the same value for the same seed and step', () => {
    expect(seededRandom(42)(3)).toBe(seededRandom(42)(3));
  });

  it('stays within [0, 1)', () => {
    const random = seededRandom(7);
    for (let n = 0; n < 100; n++) {
      const value = random(n);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('pickIndex', () => {
  it('is reproducible with a seed', () => {
    expect(pickIndex(10, 42)).toBe(pickIndex(10, 42));
  });

  it('always picks the only element', () => {
    expect(pickIndex(1, 5)).toBe(0);
    expect(pickIndex(1)).toBe(0);
  });

  it('rejects an empty list', () => {
    expect(() => pickIndex(0, 1)).toThrow(RangeError);
  });
});

describe('coordinateSeed', () => {
  it('combines latitude and longitude', () => {
    expect(coordinateSeed(48.8566, 2.3522)).toBeCloseTo(49091.82, 6);
    expect(coordinateSeed(-10, 0)).toBe(10000);
  });
});
