/**
 * @file physics.ts
 * @description Ball physics for Blob Volley.
 *
 * DESIGN PHILOSOPHY — NEARLY PURE FUNCTIONS
 * ------------------------------------------
 * These functions mutate the structs they receive but never own state and
 * never decide match outcomes.  updateBall() reports *what happened* (a
 * PhysicsResult-style summary) and the Game turns that into scores, particles
 * and events, all inside the same tick.
 *
 * COORDINATE SYSTEM
 * -----------------
 *   (0, 0) is the top-left corner of the court.
 *   X increases to the right, Y increases DOWNWARD.
 *   The ground is the line y = GROUND_LEVEL; the net stands on it at NET_X.
 *
 * FIXED STEP
 * ----------
 * Velocities are in pixels per frame.  One call = one 1/60 s frame.
 *
 * RESOLUTION ORDER
 * ----------------
 * Collisions are resolved one after another, each seeing the position and
 * velocity left by the previous one:
 *
 *   walls → ceiling → net → player 1 → player 2 → ground
 *
 * This is not a simultaneous impulse solve.  Changing the order changes
 * trajectories, so keep it.
 */

import type { Ball, Player, PlayerSide, Rect, BounceSurface } from './types.js';
import
{
  COURT_WIDTH,
  GROUND_LEVEL,
  NET_X, NET_WIDTH, NET_HEIGHT,
  BALL_RADIUS, BALL_GRAVITY, BALL_BOUNCE_DAMPING, BALL_MAX_SPEED,
  BALL_SERVE_Y, BALL_SPIN_FACTOR,
  TRAIL_LENGTH, TRAIL_SAMPLE_INTERVAL,
  NET_VY_DAMPING,
  PLAYER_HIT_RETENTION, PLAYER_HIT_TRANSFER_X, PLAYER_HIT_TRANSFER_Y,
  SPIKE_VY_THRESHOLD, SPIKE_BOOST,
} from './constants.js';
import { circlesIntersect, circleIntersectsRect, normalize, reflect, clampSpeed } from './collision.js';

/* ═══════════════════════════════════════════════════════════════════════════
   NET GEOMETRY
   ═══════════════════════════════════════════════════════════════════════════ */

/** The net post as a rectangle standing on the ground, centred on NET_X. */
export const NET_RECT: Readonly<Rect> =
{
  x:      NET_X - NET_WIDTH / 2,
  y:      GROUND_LEVEL - NET_HEIGHT,
  width:  NET_WIDTH,
  height: NET_HEIGHT,
};

/* ═══════════════════════════════════════════════════════════════════════════
   BALL CREATION / SERVE
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function serveX
 * @description Horizontal serve position: the middle of the serving half.
 */
export function serveX(side: PlayerSide): number
{
  return side === 'LEFT' ? COURT_WIDTH / 4 : (COURT_WIDTH * 3) / 4;
}

/**
 * @function makeBall
 * @description A fresh ball already reset for the given serving side.
 */
export function makeBall(servingSide: PlayerSide = 'LEFT'): Ball
{
  const ball: Ball = { x: 0, y: 0, vx: 0, vy: 0, radius: BALL_RADIUS, trail: [], rotation: 0 };
  resetBall(ball, servingSide);
  return ball;
}

/**
 * @function resetBall
 * @description Re-serves the ball: hangs it motionless above the middle of
 *              the serving half, clears the trail and the sprite rotation.
 *
 *              Depends only on `side`, so calling it twice in a row leaves
 *              the ball exactly as one call does.
 *
 * @param ball  The Ball to reset (mutated in place).
 * @param side  Which half serves.
 */
export function resetBall(ball: Ball, side: PlayerSide): void
{
  ball.x = serveX(side);
  ball.y = BALL_SERVE_Y;

  ball.vx = 0;
  ball.vy = 0;

  ball.trail    = [];
  ball.rotation = 0;
}

/* ═══════════════════════════════════════════════════════════════════════════
   PHYSICS RESULT
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface BallStepResult
 * @description What happened during the most recent updateBall() call.
 *              The Game reads this to spawn particles, award points and
 *              emit events.
 */
export interface BallStepResult
{
  /** Surfaces that produced an audible bounce this frame, in resolution order. */
  bounces: BounceSurface[];

  /**
   * X of the ground contact this frame, or null when the ball stayed airborne.
   * Scoring uses this value, so it is the post-collision ball x.
   */
  groundContactX: number | null;
}

/* ═══════════════════════════════════════════════════════════════════════════
   MAIN BALL UPDATE
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function updateBall
 * @description Advances the ball by one frame and returns a summary of what
 *              it touched.
 *
 * Order of operations:
 *   1. Integrate   — position += velocity, then gravity into vy.
 *   2. Rotation    — sprite spin proportional to horizontal speed.
 *   3. Trail       — sampled on every TRAIL_SAMPLE_INTERVAL-th frame.
 *   4. Side walls  — clamp and invert vx.
 *   5. Ceiling     — clamp and invert vy.
 *   6. Net         — invert vx, damp vy, push out on the approach side.
 *   7. Players     — each blob independently, skipped during score delay.
 *   8. Ground      — clamp, invert vy, report the contact x.
 *
 * @param ball        The ball (mutated in place).
 * @param player1     Left blob.
 * @param player2     Right blob.
 * @param frame       Global frame counter, used for trail sampling.
 * @param scoreDelay  Frames left in the post-point grace period.
 */
export function updateBall(
  ball: Ball,
  player1: Player,
  player2: Player,
  frame: number,
  scoreDelay: number
): BallStepResult
{
  const result: BallStepResult = { bounces: [], groundContactX: null };

  /* ── 1. Integrate ─────────────────────────────────────────────────────
     Position first, then gravity: the new vy is felt next frame.        */
  ball.x  += ball.vx;
  ball.y  += ball.vy;
  ball.vy += BALL_GRAVITY;

  /* ── 2. Rotation ──────────────────────────────────────────────────────
     Rolling-without-slipping look: angular speed ∝ |vx| / radius.
     Only the renderer reads this.                                       */
  ball.rotation += (Math.abs(ball.vx) / ball.radius) * BALL_SPIN_FACTOR;

  /* ── 3. Trail ── */
  if (frame % TRAIL_SAMPLE_INTERVAL === 0)
  {
    pushTrail(ball);
  }

  /* ── 4. Side walls ── */
  if (ball.x - ball.radius <= 0)
  {
    ball.x   = ball.radius;
    ball.vx *= -BALL_BOUNCE_DAMPING;
  }
  if (ball.x + ball.radius >= COURT_WIDTH)
  {
    ball.x   = COURT_WIDTH - ball.radius;
    ball.vx *= -BALL_BOUNCE_DAMPING;
  }

  /* ── 5. Ceiling ── */
  if (ball.y - ball.radius <= 0)
  {
    ball.y   = ball.radius;
    ball.vy *= -BALL_BOUNCE_DAMPING;
  }

  /* ── 6. Net ── */
  if (resolveNetCollision(ball))
  {
    result.bounces.push('NET');
  }

  /* ── 7. Players ───────────────────────────────────────────────────────
     During the score delay the ball is dead: it still flies and bounces
     off the court, but blobs pass straight through it.                  */
  if (scoreDelay === 0)
  {
    if (resolvePlayerHit(ball, player1)) result.bounces.push('PLAYER');
    if (resolvePlayerHit(ball, player2)) result.bounces.push('PLAYER');
  }

  /* ── 8. Ground ── */
  if (ball.y + ball.radius >= GROUND_LEVEL)
  {
    ball.y   = GROUND_LEVEL - ball.radius;
    ball.vy *= -BALL_BOUNCE_DAMPING;
    result.groundContactX = ball.x;
  }

  return result;
}

/* ═══════════════════════════════════════════════════════════════════════════
   TRAIL
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function pushTrail
 * @description Records the current position at the front of the trail and
 *              drops the oldest point beyond TRAIL_LENGTH.
 */
export function pushTrail(ball: Ball): void
{
  ball.trail.unshift({ x: ball.x, y: ball.y });
  if (ball.trail.length > TRAIL_LENGTH) ball.trail.pop();
}

/* ═══════════════════════════════════════════════════════════════════════════
   COLLISION RESOLUTION
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function resolveNetCollision
 * @description Bounces the ball off the net post if they overlap.
 *
 *   - vx is inverted (the post is a vertical wall).
 *   - vy keeps 90%; clipping the post costs a little lift.
 *   - The ball is moved flush against the face on the side of NET_X its
 *     centre is on, so the overlap cannot re-trigger next frame.
 *
 * @returns {boolean} true if a collision was resolved.
 */
export function resolveNetCollision(ball: Ball): boolean
{
  if (!circleIntersectsRect(ball, ball.radius, NET_RECT)) return false;

  ball.vx *= -BALL_BOUNCE_DAMPING;
  ball.vy *= NET_VY_DAMPING;

  if (ball.x < NET_X)
  {
    ball.x = NET_RECT.x - ball.radius;
  }
  else
  {
    ball.x = NET_RECT.x + NET_RECT.width + ball.radius;
  }

  return true;
}

/**
 * @function resolvePlayerHit
 * @description Bounces the ball off a blob if they overlap.
 *
 * Response, in order:
 *   1. Reflect velocity about the blob→ball normal.
 *   2. Keep PLAYER_HIT_RETENTION of the reflected speed.
 *   3. Add a share of the blob's own velocity (momentum transfer).
 *   4. Spike boost: a blob moving up faster than SPIKE_VY_THRESHOLD kicks
 *      the ball an extra SPIKE_BOOST upward.
 *   5. Clamp to BALL_MAX_SPEED.
 *   6. Place the ball exactly touching the blob along the normal.
 *
 * Concentric centres give no normal; the hit is skipped for this frame.
 *
 * @param ball    The ball (mutated in place).
 * @param player  The blob to test against (read only).
 * @returns {boolean} true if a collision was resolved.
 */
export function resolvePlayerHit(ball: Ball, player: Player): boolean
{
  if (!circlesIntersect(ball, ball.radius, player, player.radius)) return false;

  const n = normalize({ x: ball.x - player.x, y: ball.y - player.y });
  if (n === null) return false;

  const reflected = reflect({ x: ball.vx, y: ball.vy }, n);

  const vx = reflected.x * PLAYER_HIT_RETENTION + player.vx * PLAYER_HIT_TRANSFER_X;
  let   vy = reflected.y * PLAYER_HIT_RETENTION + player.vy * PLAYER_HIT_TRANSFER_Y;

  if (player.vy < SPIKE_VY_THRESHOLD)
  {
    vy -= SPIKE_BOOST;
  }

  const clamped = clampSpeed({ x: vx, y: vy }, BALL_MAX_SPEED);
  ball.vx = clamped.x;
  ball.vy = clamped.y;

  /* ── Separate ── */
  const contact = player.radius + ball.radius;
  ball.x = player.x + n.x * contact;
  ball.y = player.y + n.y * contact;

  return true;
}
