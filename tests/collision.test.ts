/**
 * @file collision.test.ts
 * @description Unit tests for the pure geometry helpers in collision.ts.
 */

import { describe, test, expect } from 'vitest';
import { circlesIntersect, circleIntersectsRect, normalize, reflect, clampSpeed } from '../src/collision.js';

/* ═══════════════════════════════════════════════════════════════════════════
   1. circlesIntersect
   ═══════════════════════════════════════════════════════════════════════════ */

describe('circlesIntersect', () =>
{
  test('touching circles intersect', () =>
  {
    expect(circlesIntersect({ x: 0, y: 0 }, 10, { x: 20, y: 0 }, 10)).toBe(true);
  });

  test('separated circles do not', () =>
  {
    expect(circlesIntersect({ x: 0, y: 0 }, 10, { x: 21, y: 0 }, 10)).toBe(false);
  });

  test('concentric circles intersect', () =>
  {
    expect(circlesIntersect({ x: 5, y: 5 }, 1, { x: 5, y: 5 }, 1)).toBe(true);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   2. circleIntersectsRect
   ═══════════════════════════════════════════════════════════════════════════ */

describe('circleIntersectsRect', () =>
{
  const rect = { x: 0, y: 0, width: 10, height: 10 };

  test('circle resting on the top edge intersects', () =>
  {
    expect(circleIntersectsRect({ x: 5, y: -3 }, 3, rect)).toBe(true);
  });

  test('circle just above the top edge does not', () =>
  {
    expect(circleIntersectsRect({ x: 5, y: -3.1 }, 3, rect)).toBe(false);
  });

  test('centre inside the rectangle intersects', () =>
  {
    expect(circleIntersectsRect({ x: 2, y: 8 }, 1, rect)).toBe(true);
  });

  /** Near a corner the bounding-box test passes but the corner distance decides. */
  test('corner region uses distance to the corner', () =>
  {
    /* Corner (10, 10); centre (13, 13) is √18 ≈ 4.24 away. */
    expect(circleIntersectsRect({ x: 13, y: 13 }, 4, rect)).toBe(false);
    expect(circleIntersectsRect({ x: 13, y: 13 }, 5, rect)).toBe(true);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   3. Vector helpers
   ═══════════════════════════════════════════════════════════════════════════ */

describe('normalize', () =>
{
  test('returns a unit vector', () =>
  {
    const n = normalize({ x: 3, y: 4 });
    expect(n).not.toBeNull();
    expect(n?.x).toBeCloseTo(0.6, 10);
    expect(n?.y).toBeCloseTo(0.8, 10);
  });

  test('returns null for the zero vector', () =>
  {
    expect(normalize({ x: 0, y: 0 })).toBeNull();
  });
});

describe('reflect', () =>
{
  test('mirrors velocity about a unit normal', () =>
  {
    expect(reflect({ x: 1, y: -1 }, { x: 0, y: 1 })).toEqual({ x: 1, y: 1 });
  });

  test('normalises a non-unit normal first', () =>
  {
    expect(reflect({ x: 1, y: -1 }, { x: 0, y: 5 })).toEqual({ x: 1, y: 1 });
  });

  test('zero normal leaves the velocity unchanged in a fresh object', () =>
  {
    const v = { x: 2, y: -3 };
    const r = reflect(v, { x: 0, y: 0 });

    expect(r).toEqual({ x: 2, y: -3 });
    expect(r).not.toBe(v);
  });
});

describe('clampSpeed', () =>
{
  test('leaves slow vectors alone', () =>
  {
    expect(clampSpeed({ x: 3, y: 4 }, 10)).toEqual({ x: 3, y: 4 });
  });

  test('rescales fast vectors to the limit, keeping direction', () =>
  {
    const v = clampSpeed({ x: 30, y: 40 }, 10);
    expect(v.x).toBeCloseTo(6, 10);
    expect(v.y).toBeCloseTo(8, 10);
  });
});
