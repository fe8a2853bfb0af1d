/**
 * @file ai.ts
 * @description AIController — drives the right-side (Player 2) blob in single-player mode.
 *
 * ALGORITHM OVERVIEW — "WATCH, CHASE, JUMP"
 * -----------------------------------------
 * A deliberately simple heuristic; the goal is a fun opponent, not an
 * optimal one.
 *
 *   1. WATCH — Is the ball our problem?  It is when it is already on our
 *              half, or still on the far half but travelling toward us.
 *              If not, walk back to the middle of our half and wait.
 *
 *   2. CHASE — Steer under the ball at 80% of the human move speed, with a
 *              small dead band so the blob doesn't jitter.
 *
 *   3. JUMP  — When the ball is close horizontally and within a vertical
 *              window around the blob, jump (at 90% of the human jump force).
 *              A cooldown prevents jump-spam, and roughly one in five valid
 *              jumps is skipped on purpose so rallies can be won.
 *
 * Chasing and jumping only write velocity (and the grounded flag on a jump);
 * integratePlayer() moves and clamps the blob like any other.  The walk home
 * moves x directly and leaves vx at 0, so an idling blob carries no
 * momentum into a hit.
 */

import type { Ball, Player, RandomSource } from './types.js';
import
{
  COURT_WIDTH,
  NET_X,
  PLAYER_MOVE_SPEED, PLAYER_JUMP_FORCE,
  AI_REACTION_DISTANCE, AI_JUMP_THRESHOLD, AI_JUMP_REACH,
  AI_POSITION_TOLERANCE, AI_JUMP_COOLDOWN,
  AI_CHASE_SPEED_FACTOR, AI_DRIFT_SPEED_FACTOR, AI_JUMP_FORCE_FACTOR,
  AI_JUMP_ROLL_MAX, AI_JUMP_SKIP_ROLL,
} from './constants.js';
import { mathRandom } from './random.js';
import { clampToCourtHalf } from './player.js';

/** Middle of the right half, where the AI idles. */
const HOME_X = NET_X + (COURT_WIDTH - NET_X) / 2;

/**
 * @function isBallComingToward
 * @description True when the ball is on the right half, or on the left half
 *              but moving right.
 */
export function isBallComingToward(ball: Ball): boolean
{
  return (ball.vx > 0 && ball.x < NET_X) || ball.x >= NET_X;
}

/**
 * @function steer
 * @description Velocity that moves from `from` toward `to` at `speed`, or 0
 *              inside the tolerance band.
 */
function steer(from: number, to: number, speed: number): number
{
  const diff = to - from;

  if (diff < -AI_POSITION_TOLERANCE) return -speed;
  if (diff >  AI_POSITION_TOLERANCE) return  speed;
  return 0;
}

/**
 * @class AIController
 * @description Heuristic controller for the computer blob.
 *
 * Ownership model:
 *   - The Game owns one AIController for its lifetime.
 *   - Each PLAYING tick in SINGLE_PLAYER mode the Game calls update().
 *   - reset() is called when a new match starts.
 */
export class AIController
{
  /** Frames until the next jump is allowed. */
  private jumpCooldown = 0;

  /**
   * @param random  Source for the deliberate-miss roll.  Inject a seeded
   *                source for reproducible behaviour.
   */
  constructor(private readonly random: RandomSource = mathRandom) {}

  /** Frames left before the AI may jump again. */
  get cooldown(): number
  {
    return this.jumpCooldown;
  }

  /**
   * @method update
   * @description Decides this tick's velocity for the AI blob.
   *
   * @param player  The AI blob (player 2); x (walk home only), vx, vy and
   *                onGround are written.
   * @param ball    Current ball state, read only.
   * @returns {boolean} true if the AI jumped this tick.
   */
  update(player: Player, ball: Ball): boolean
  {
    if (this.jumpCooldown > 0) this.jumpCooldown--;

    /* ── Step 1: WATCH ── */
    if (!isBallComingToward(ball))
    {
      /* Drift is a walk, not momentum: the blob is placed, vx stays 0. */
      player.x += steer(player.x, HOME_X, PLAYER_MOVE_SPEED * AI_DRIFT_SPEED_FACTOR);
      player.vx = 0;
      clampToCourtHalf(player);
      return false;
    }

    /* ── Step 2: CHASE ── */
    const distanceX = ball.x - player.x;
    player.vx = steer(player.x, ball.x, PLAYER_MOVE_SPEED * AI_CHASE_SPEED_FACTOR);

    /* ── Step 3: JUMP ─────────────────────────────────────────────────────
       distanceY > 0 means the ball is above the blob's centre.           */
    const distanceY = player.y - ball.y;

    const inRange =
      Math.abs(distanceX) < AI_REACTION_DISTANCE &&
      distanceY > -AI_JUMP_THRESHOLD &&
      distanceY < AI_JUMP_REACH;

    if (!inRange || this.jumpCooldown !== 0 || !player.onGround) return false;

    /* Deliberate miss. */
    if (this.random.nextInt(0, AI_JUMP_ROLL_MAX) <= AI_JUMP_SKIP_ROLL) return false;

    player.vy          = PLAYER_JUMP_FORCE * AI_JUMP_FORCE_FACTOR;
    player.onGround    = false;
    this.jumpCooldown  = AI_JUMP_COOLDOWN;

    return true;
  }

  /**
   * @method reset
   * @description Clears the jump cooldown so a new match starts fresh.
   */
  reset(): void
  {
    this.jumpCooldown = 0;
  }
}
