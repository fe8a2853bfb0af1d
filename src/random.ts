/**
 * @file random.ts
 * @description RandomSource implementations.
 *
 * The AI and the particle spawner never call Math.random() themselves; they
 * take a RandomSource so tests (and replays within one process) can supply a
 * deterministic one.
 */

import type { RandomSource } from './types.js';

/**
 * @function intFromUnit
 * @description Maps a uniform draw in [0, 1) onto the inclusive integer range
 *              [min, max], swapping reversed bounds.
 */
function intFromUnit(unit: number, min: number, max: number): number
{
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);

  return lo + Math.floor(unit * (hi - lo + 1));
}

/** Process-wide default backed by Math.random(). */
export const mathRandom: RandomSource =
{
  nextInt(min: number, max: number): number
  {
    return intFromUnit(Math.random(), min, max);
  },
};

/**
 * @function createSeededRandom
 * @description Deterministic RandomSource (mulberry32).  The same seed always
 *              yields the same sequence of draws.
 *
 * @param seed  Any finite number; only its low 32 bits are used.
 */
export function createSeededRandom(seed: number): RandomSource
{
  if (!Number.isFinite(seed))
  {
    throw new RangeError(`seed must be a finite number, got ${seed}`);
  }

  let state = seed >>> 0;

  const next = (): number =>
  {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt(min: number, max: number): number
    {
      return intFromUnit(next(), min, max);
    },
  };
}
