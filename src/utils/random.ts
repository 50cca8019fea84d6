/**
 * Returns a float in [0, 1). Matches the contract of Math.random so either can be
 * injected wherever a RandomSource is taken.
 */
export type RandomSource = () => number;

/**
 * Small seedable generator (mulberry32) for reproducible synthetic prices.
 */
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

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}

// Round to 2 decimal places, avoiding floating-point noise in prices
export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}
