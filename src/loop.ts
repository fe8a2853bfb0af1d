// GameLoop — drives a Game at a fixed rate from a timer

import type { GameSnapshot } from './types.js';
import { TARGET_FPS } from './constants.js';
import type { Game } from './game.js';
import type { InputState } from './input.js';

export type RenderCallback = (snapshot: GameSnapshot) => void;

export interface GameLoopOptions {
  /** Ticks per second.  Defaults to TARGET_FPS. */
  rate?: number;

  /** Receives a snapshot after every tick. */
  render?: RenderCallback;
}

/**
 * One tick per timer callback, never more.  A late timer does not trigger
 * catch-up ticks; the simulation simply runs slow, the same way the frame
 * loop would on a slow display.
 */
export class GameLoop {
  private readonly intervalMs: number;
  private readonly render: RenderCallback | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;

  constructor(
    private readonly game: Game,
    private readonly input: InputState,
    options: GameLoopOptions = {},
  ) {
    const rate = options.rate ?? TARGET_FPS;
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new RangeError(`rate must be a positive number, got ${rate}`);
    }
    this.intervalMs = 1000 / rate;
    this.render = options.render;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Ticks run since construction. */
  get tickCount(): number {
    return this.ticks;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.step(), this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Runs exactly one tick.  Also what the timer calls. */
  step(): void {
    this.game.tick(this.input);
    this.input.flush();
    this.ticks++;

    this.render?.(this.game.snapshot());

    if (this.game.exitRequested) this.stop();
  }
}
