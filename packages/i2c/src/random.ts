/** A source of uniform floats in [0, 1). */
export type Rng = () => number;

/**
 * Deterministic linear congruential generator.
 * The same seed always yields the same sequence.
 */
export function createRng(seed: number): Rng {
  let s = (seed >>> 0) || 1;
  return () => {
    s = (1664525 * s + 1013904223) >>> 0;
    return s / 0x100000000;
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
