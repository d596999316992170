/**
 * A source of uniform floats in [0, 1).
 */
export type Rng = () => number;

/**
 * Seeded random number generator (mulberry32).
 * Produces a deterministic sequence for reproducible simulations.
 */
export function mulberry32(seed: number): Rng {
  let state = seed | 0;
  return function() {
    state = state + 0x6D2B79F5 | 0;
    let t = Math.imul(state ^ state >>> 15, 1 | state);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  };
}

/** Pick a generator: seeded when a seed is given, Math.random otherwise */
export function createRng(seed?: number): Rng {
  return seed !== undefined ? mulberry32(seed) : Math.random;
}
