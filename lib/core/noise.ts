// lib/core/noise.ts
// Random sources for the stochastic drawing passes.

import seedrandom from 'seedrandom';

/** Uniform float in [0, 1). Same shape as a seedrandom prng. */
export type RandomSource = () => number;

/**
 * Seeded when a seed is given (numbers are stringified first),
 * auto-seeded from entropy otherwise.
 */
export function makeRandomSource(seed?: number | string): RandomSource {
  if (seed === undefined) return seedrandom();
  return seedrandom(String(seed));
}

/** Derived source for one frame of a seeded run; unseeded runs stay unseeded. */
export function forkRandomSource(seed: number | string | undefined, salt: string | number): RandomSource {
  if (seed === undefined) return seedrandom();
  return seedrandom(`${seed}:${salt}`);
}

export function chance(rng: RandomSource, p: number): boolean {
  return rng() < p;
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}

/** Integer in [0, n). */
export function randomIndex(rng: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(rng() * n));
}
