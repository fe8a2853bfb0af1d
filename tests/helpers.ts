/**
 * @file helpers.ts
 * @description Shared factories and stand-ins for Blob Volley unit tests.
 *
 * Every test starts from a fully-populated object that mirrors the live game's
 * initial state.  Overrides let each test tweak only the fields it cares
 * about.
 *
 * Import pattern:
 *   import { makeBall, makeP1, makeP2, sequenceRandom, ScriptedInput } from './helpers.js';
 */

import type { Action, Ball, InputSource, Player, RandomSource } from '../src/types.js';
import
{
  COURT_WIDTH, GROUND_LEVEL,
  BALL_RADIUS, BALL_SERVE_Y,
  PLAYER_RADIUS,
  COLOR_P1, COLOR_P2,
} from '../src/constants.js';

/* ═══════════════════════════════════════════════════════════════════════════
   BALL FACTORY
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makeBall
 * @description A motionless ball at the left serve point, no trail.
 */
export function makeBall(overrides: Partial<Ball> = {}): Ball
{
  return {
    x:        COURT_WIDTH / 4,
    y:        BALL_SERVE_Y,
    vx:       0,
    vy:       0,
    radius:   BALL_RADIUS,
    trail:    [],
    rotation: 0,
    ...overrides,
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   PLAYER FACTORIES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makeP1
 * @description Left blob standing on the ground in the middle of its half.
 */
export function makeP1(overrides: Partial<Player> = {}): Player
{
  return {
    x:        COURT_WIDTH / 4,
    y:        GROUND_LEVEL - PLAYER_RADIUS,
    vx:       0,
    vy:       0,
    radius:   PLAYER_RADIUS,
    side:     'LEFT',
    color:    COLOR_P1,
    score:    0,
    onGround: true,
    ...overrides,
  };
}

/**
 * @function makeP2
 * @description Right blob standing on the ground in the middle of its half.
 */
export function makeP2(overrides: Partial<Player> = {}): Player
{
  return {
    x:        (COURT_WIDTH * 3) / 4,
    y:        GROUND_LEVEL - PLAYER_RADIUS,
    vx:       0,
    vy:       0,
    radius:   PLAYER_RADIUS,
    side:     'RIGHT',
    color:    COLOR_P2,
    score:    0,
    onGround: true,
    ...overrides,
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   RANDOM STAND-IN
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function sequenceRandom
 * @description RandomSource that replays `values` in order, cycling, and
 *              records every (min, max) it was asked for.  Values are
 *              returned as given, so the caller is responsible for keeping
 *              them inside the requested range.
 */
export function sequenceRandom(values: readonly number[]): RandomSource & { calls: Array<[number, number]> }
{
  let index = 0;
  const calls: Array<[number, number]> = [];

  return {
    calls,
    nextInt(min: number, max: number): number
    {
      calls.push([min, max]);
      const value = values[index % values.length] ?? min;
      index++;
      return value;
    },
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   INPUT STAND-IN
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @class ScriptedInput
 * @description InputSource with directly settable held / pressed sets.
 *              Nothing is cleared automatically; tests set exactly what one
 *              tick should see.
 */
export class ScriptedInput implements InputSource
{
  held    = new Set<Action>();
  pressed = new Set<Action>();

  constructor(held: readonly Action[] = [], pressed: readonly Action[] = [])
  {
    for (const a of held) this.held.add(a);
    for (const a of pressed) this.pressed.add(a);
  }

  isHeld(action: Action): boolean
  {
    return this.held.has(action);
  }

  wasPressed(action: Action): boolean
  {
    return this.pressed.has(action);
  }
}

/** An InputSource with nothing held and nothing pressed. */
export const NO_INPUT: InputSource = new ScriptedInput();

/** A single-tick press of `actions`. */
export function press(...actions: Action[]): ScriptedInput
{
  return new ScriptedInput([], actions);
}
