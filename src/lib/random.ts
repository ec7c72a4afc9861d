/**
 * Deterministic pseudo-random values for a seed: the same (seed, n) always gives the same number in [0, 1).
 */
export function seededRandom(seed: number): (n: number) => number {
  return (n: number) => {
    const x = Math.sin(seed + n * 9999) * 10000;
    return x - Math.floor(x);
  };
}

/**
 * Index in [0, length). Seeded picks are reproducible, unseeded ones use Math.random.
 */
export function pickIndex(length: number, seed?: number): number {
  if (length <= 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const value = seed === undefined ? Math.random() : seededRandom(seed)(1);
  return Math.min(length - 1, Math.floor(value * length));
}

/**
 * Seed derived from a location, so a city always draws the same way.
 */
export function coordinateSeed(lat: number, long: number): number {
  return Math.abs(lat * 1000 + long * 100);
}
