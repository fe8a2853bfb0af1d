/**
 * @file collision.ts
 * @description Pure intersection tests and impulse helpers.
 *
 * Nothing in here mutates its arguments; every function either answers a
 * yes/no question or returns a fresh vector.  physics.ts decides what to do
 * with the answers.
 */

import type { Vec2, Rect } from './types.js';

/* ═══════════════════════════════════════════════════════════════════════════
   INTERSECTION TESTS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function circlesIntersect
 * @description True when two circles touch or overlap.
 */
export function circlesIntersect(c1: Vec2, r1: number, c2: Vec2, r2: number): boolean
{
  const dx = c2.x - c1.x;
  const dy = c2.y - c1.y;

  return Math.sqrt(dx * dx + dy * dy) <= r1 + r2;
}

/**
 * @function circleIntersectsRect
 * @description Circle vs. axis-aligned rectangle.
 *
 * Works in the rectangle's half-extents: fold the circle centre into the
 * first quadrant relative to the rectangle centre, reject on either axis,
 * accept when the centre lies within an edge band, and otherwise test the
 * distance to the nearest corner.
 */
export function circleIntersectsRect(center: Vec2, radius: number, rect: Rect): boolean
{
  const halfW = rect.width  / 2;
  const halfH = rect.height / 2;

  const dx = Math.abs(center.x - (rect.x + halfW));
  const dy = Math.abs(center.y - (rect.y + halfH));

  if (dx > halfW + radius) return false;
  if (dy > halfH + radius) return false;

  if (dx <= halfW) return true;
  if (dy <= halfH) return true;

  /* Corner region. */
  const cx = dx - halfW;
  const cy = dy - halfH;

  return cx * cx + cy * cy <= radius * radius;
}

/* ═══════════════════════════════════════════════════════════════════════════
   VECTOR HELPERS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function normalize
 * @description Unit vector in the direction of `v`, or null for a zero vector.
 */
export function normalize(v: Vec2): Vec2 | null
{
  const length = Math.sqrt(v.x * v.x + v.y * v.y);
  if (length === 0) return null;

  return { x: v.x / length, y: v.y / length };
}

/**
 * @function reflect
 * @description Mirrors a velocity about a surface normal: v' = v − 2(v·n)n.
 *
 * The normal does not need to be unit length; it is normalised here.  A
 * zero-length normal (concentric centres) has no direction to reflect about,
 * so the velocity comes back unchanged.
 *
 * @param velocity  Incoming velocity.
 * @param normal    Direction from the other body's centre to this body's centre.
 */
export function reflect(velocity: Vec2, normal: Vec2): Vec2
{
  const n = normalize(normal);
  if (n === null) return { x: velocity.x, y: velocity.y };

  const dot = velocity.x * n.x + velocity.y * n.y;

  return {
    x: velocity.x - 2 * dot * n.x,
    y: velocity.y - 2 * dot * n.y,
  };
}

/**
 * @function clampSpeed
 * @description Uniformly rescales `v` so its magnitude does not exceed `max`.
 *              Direction is preserved.
 */
export function clampSpeed(v: Vec2, max: number): Vec2
{
  const speed = Math.sqrt(v.x * v.x + v.y * v.y);
  if (speed <= max) return { x: v.x, y: v.y };

  return {
    x: (v.x / speed) * max,
    y: (v.y / speed) * max,
  };
}
