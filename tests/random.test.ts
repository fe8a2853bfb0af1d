/**
 * @file random.test.ts
 * @description Unit tests for the RandomSource implementations.
 */

import { describe, test, expect } from 'vitest';
import { createSeededRandom, mathRandom } from '../src/random.js';

describe('createSeededRandom', () =>
{
  test('the same seed replays the same draws', () =>
  {
    const a = createSeededRandom(1234);
    const b = createSeededRandom(1234);

    const drawsA = Array.from({ length: 20 }, () => a.nextInt(0, 1000));
    const drawsB = Array.from({ length: 20 }, () => b.nextInt(0, 1000));

    expect(drawsA).toEqual(drawsB);
  });

  test('different seeds diverge', () =>
  {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);

    const drawsA = Array.from({ length: 20 }, () => a.nextInt(0, 1000));
    const drawsB = Array.from({ length: 20 }, () => b.nextInt(0, 1000));

    expect(drawsA).not.toEqual(drawsB);
  });

  test('draws are integers inside the inclusive range', () =>
  {
    const rng = createSeededRandom(42);
    const seen = new Set<number>();

    for (let i = 0; i < 500; i++)
    {
      const v = rng.nextInt(-2, 2);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(-2);
      expect(v).toBeLessThanOrEqual(2);
      seen.add(v);
    }

    /* Both ends are reachable. */
    expect(seen.has(-2)).toBe(true);
    expect(seen.has(2)).toBe(true);
  });

  test('reversed bounds are swapped', () =>
  {
    const rng = createSeededRandom(7);

    for (let i = 0; i < 100; i++)
    {
      const v = rng.nextInt(-60, -120);
      expect(v).toBeGreaterThanOrEqual(-120);
      expect(v).toBeLessThanOrEqual(-60);
    }
  });

  test('equal bounds always return that value', () =>
  {
    expect(createSeededRandom(3).nextInt(5, 5)).toBe(5);
  });

  test('rejects a non-finite seed', () =>
  {
    expect(() => createSeededRandom(Number.NaN)).toThrow(RangeError);
    expect(() => createSeededRandom(Infinity)).toThrow(RangeError);
  });
});

describe('mathRandom', () =>
{
  test('stays inside the inclusive range', () =>
  {
    for (let i = 0; i < 200; i++)
    {
      const v = mathRandom.nextInt(0, 1);
      expect(v === 0 || v === 1).toBe(true);
    }
  });
});
