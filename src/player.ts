/**
 * @file player.ts
 * @description Player controller — turns one tick of input into blob motion.
 *
 * Movement model:
 *   - Horizontal speed is *set*, not accumulated: holding a direction gives
 *     exactly PLAYER_MOVE_SPEED, releasing stops dead.
 *   - A jump is an edge (press, not hold) and only counts while grounded.
 *   - Gravity is heavier than the ball's and capped at a terminal speed.
 *   - A blob can never leave its half: the clamp runs after every move.
 *
 * The AIController writes the same vx / vy fields, so both human and
 * computer blobs go through integratePlayer() each tick.
 */

import type { Player, PlayerSide, PlayerControls } from './types.js';
import
{
  COURT_WIDTH,
  GROUND_LEVEL,
  NET_X, NET_WIDTH,
  PLAYER_RADIUS, PLAYER_MOVE_SPEED, PLAYER_JUMP_FORCE,
  PLAYER_GRAVITY, PLAYER_MAX_VELOCITY_Y,
  COLOR_P1, COLOR_P2,
} from './constants.js';

/**
 * @function makePlayer
 * @description A blob standing on the ground in the middle of its half.
 */
export function makePlayer(side: PlayerSide): Player
{
  return {
    x:        side === 'LEFT' ? COURT_WIDTH / 4 : (COURT_WIDTH * 3) / 4,
    y:        GROUND_LEVEL - PLAYER_RADIUS,
    vx:       0,
    vy:       0,
    radius:   PLAYER_RADIUS,
    side,
    color:    side === 'LEFT' ? COLOR_P1 : COLOR_P2,
    score:    0,
    onGround: true,
  };
}

/**
 * @function courtBounds
 * @description Allowed range for a blob's centre x on the given side.
 *              The net's half-width is excluded on both sides.
 *
 * @returns {[number, number]} [minX, maxX]
 */
export function courtBounds(side: PlayerSide, radius: number): [number, number]
{
  if (side === 'LEFT')
  {
    return [radius, NET_X - NET_WIDTH / 2 - radius];
  }

  return [NET_X + NET_WIDTH / 2 + radius, COURT_WIDTH - radius];
}

/**
 * @function clampToCourtHalf
 * @description Pulls the blob back inside its half.  Velocity is left alone.
 */
export function clampToCourtHalf(player: Player): void
{
  const [minX, maxX] = courtBounds(player.side, player.radius);
  player.x = Math.max(minX, Math.min(maxX, player.x));
}

/**
 * @function applyPlayerInput
 * @description Sets the blob's velocity from this tick's controls.
 *
 *   left  → vx = -PLAYER_MOVE_SPEED
 *   right → vx = +PLAYER_MOVE_SPEED   (ignored while left is also held)
 *   none  → vx = 0
 *   jump edge while grounded → vy = PLAYER_JUMP_FORCE, onGround = false
 *
 * @returns {boolean} true if a jump started this tick.
 */
export function applyPlayerInput(player: Player, controls: PlayerControls): boolean
{
  if (controls.left)
  {
    player.vx = -PLAYER_MOVE_SPEED;
  }
  else if (controls.right)
  {
    player.vx = PLAYER_MOVE_SPEED;
  }
  else
  {
    player.vx = 0;
  }

  if (controls.jump && player.onGround)
  {
    player.vy       = PLAYER_JUMP_FORCE;
    player.onGround = false;
    return true;
  }

  return false;
}

/**
 * @function integratePlayer
 * @description Advances one blob by one frame.
 *
 * Order: move by velocity → gravity into vy → terminal-speed cap → ground
 * contact → court-half clamp.
 */
export function integratePlayer(player: Player): void
{
  player.x  += player.vx;
  player.y  += player.vy;
  player.vy  = Math.min(player.vy + PLAYER_GRAVITY, PLAYER_MAX_VELOCITY_Y);

  /* ── Ground contact ── */
  if (player.y + player.radius >= GROUND_LEVEL)
  {
    player.y        = GROUND_LEVEL - player.radius;
    player.vy       = 0;
    player.onGround = true;
  }
  else
  {
    player.onGround = false;
  }

  clampToCourtHalf(player);
}
