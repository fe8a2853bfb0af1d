/**
 * @file loop.test.ts
 * @description Unit tests for GameLoop, driven by fake timers.
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { GameLoop } from '../src/loop.js';
import { Game } from '../src/game.js';
import { InputState } from '../src/input.js';
import { createSeededRandom } from '../src/random.js';
import type { GameSnapshot } from '../src/types.js';

describe('GameLoop', () =>
{
  beforeEach(() =>
  {
    vi.useFakeTimers();
  });

  afterEach(() =>
  {
    vi.useRealTimers();
  });

  function setup(rate = 10)
  {
    const game   = new Game({ random: createSeededRandom(5) });
    const input  = new InputState();
    const frames: GameSnapshot[] = [];
    const loop   = new GameLoop(game, input, { rate, render: (s) => frames.push(s) });

    return { game, input, frames, loop };
  }

  test('ticks once per interval while running', () =>
  {
    const { loop, frames } = setup();

    loop.start();
    vi.advanceTimersByTime(350);

    expect(loop.tickCount).toBe(3);
    expect(frames.map((s) => s.frameCount)).toEqual([1, 2, 3]);

    loop.stop();
    vi.advanceTimersByTime(500);
    expect(loop.tickCount).toBe(3);
    expect(loop.running).toBe(false);
  });

  test('starting twice does not double the rate', () =>
  {
    const { loop } = setup();

    loop.start();
    loop.start();
    vi.advanceTimersByTime(100);

    expect(loop.tickCount).toBe(1);
    loop.stop();
  });

  /** Edges must last exactly one tick. */
  test('step flushes the just-pressed edges after the tick', () =>
  {
    const { game, input, loop } = setup();

    input.press('CONFIRM');
    loop.step();

    expect(game.state).toEqual({ kind: 'PLAYING', mode: 'SINGLE_PLAYER', paused: false });
    expect(input.wasPressed('CONFIRM')).toBe(false);
    expect(input.isHeld('CONFIRM')).toBe(true);
  });

  test('stops by itself once the game asks to exit', () =>
  {
    const { input, loop } = setup();

    loop.start();
    input.press('MENU_UP');
    input.press('CONFIRM');
    vi.advanceTimersByTime(100);

    expect(loop.running).toBe(false);
    expect(loop.tickCount).toBe(1);
  });

  test('rejects a non-positive rate', () =>
  {
    const game  = new Game();
    const input = new InputState();

    expect(() => new GameLoop(game, input, { rate: 0 })).toThrow(RangeError);
    expect(() => new GameLoop(game, input, { rate: Number.NaN })).toThrow(RangeError);
  });
});
