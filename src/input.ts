/**
 * @file input.ts
 * @description Logical-action input state for Blob Volley.
 *
 * The host (keyboard listener, gamepad poller, test script…) reports presses
 * and releases; the core asks two questions per tick:
 *
 *   held         — actions currently held down (level-triggered)
 *   justPressed  — actions that went down *this tick* (edge-triggered,
 *                  cleared by flush())
 *
 * Call flush() exactly once per tick, AFTER Game.tick() has read the input,
 * so that edge events last exactly one tick.
 */

import type { Action, InputSource } from './types.js';

/**
 * @constant DEFAULT_KEY_BINDINGS
 * @description Key names (as reported by a keyboard layer) → logical actions.
 *
 *   P1: W jump, A/D move.   P2: ArrowUp jump, ArrowLeft/ArrowRight move.
 *   P pauses, Enter confirms, Escape cancels, arrows navigate the menu.
 *
 * One key may drive several actions; ArrowUp is both P2_JUMP and MENU_UP,
 * and the screen decides which one matters.
 */
export const DEFAULT_KEY_BINDINGS: Readonly<Record<string, readonly Action[]>> =
{
  a:          ['P1_LEFT'],
  d:          ['P1_RIGHT'],
  w:          ['P1_JUMP'],
  ArrowLeft:  ['P2_LEFT'],
  ArrowRight: ['P2_RIGHT'],
  ArrowUp:    ['P2_JUMP', 'MENU_UP'],
  ArrowDown:  ['MENU_DOWN'],
  p:          ['PAUSE'],
  Enter:      ['CONFIRM'],
  Escape:     ['CANCEL'],
};

/**
 * @class InputState
 * @description Centralized action-state tracker implementing InputSource.
 */
export class InputState implements InputSource
{
  /** Actions currently held. Persists until released. */
  private held        = new Set<Action>();

  /** Actions that transitioned down THIS tick. Cleared by flush(). */
  private justPressed = new Set<Action>();

  constructor(private readonly bindings: Readonly<Record<string, readonly Action[]>> = DEFAULT_KEY_BINDINGS) {}

  /**
   * @method press
   * @description Marks an action as down.  Repeated presses while already
   *              held (key-repeat) do not produce a second edge.
   */
  press(action: Action): void
  {
    if (!this.held.has(action))
    {
      this.justPressed.add(action);
    }
    this.held.add(action);
  }

  release(action: Action): void
  {
    this.held.delete(action);
  }

  /**
   * @method pressKey
   * @description Presses every action bound to `key`.  Letter keys match
   *              regardless of case.  Unbound keys are ignored.
   */
  pressKey(key: string): void
  {
    for (const action of this.actionsFor(key)) this.press(action);
  }

  releaseKey(key: string): void
  {
    for (const action of this.actionsFor(key)) this.release(action);
  }

  isHeld(action: Action): boolean
  {
    return this.held.has(action);
  }

  wasPressed(action: Action): boolean
  {
    return this.justPressed.has(action);
  }

  /**
   * @method flush
   * @description Clears the single-tick edge set.  Held actions survive.
   */
  flush(): void
  {
    this.justPressed.clear();
  }

  private actionsFor(key: string): readonly Action[]
  {
    const lookup = key.length === 1 ? key.toLowerCase() : key;
    return this.bindings[lookup] ?? [];
  }
}
