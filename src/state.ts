/**
 * @file state.ts
 * @description The screen state machine as a pure transition function.
 *
 * transition(state, action) never touches players, ball or scores. It
 * returns the next screen plus an effect tag, and the Game performs the
 * effect.
 */

import type {
  MatchState, MatchAction, MenuOption, Transition, TransitionEffect,
  MenuState, PlayingState, GameOverState, CreditsState,
} from './types.js';
import
{
  CREDITS_START_SCROLL, CREDITS_SCROLL_SPEED, CREDITS_SCROLL_FLOOR,
  TARGET_FPS,
} from './constants.js';

/** Main-menu entries in display order; MenuState.selection indexes this. */
export const MENU_OPTIONS: readonly MenuOption[] = ['SINGLE_PLAYER', 'TWO_PLAYER', 'CREDITS', 'EXIT'];

/** The screen a freshly constructed game starts on. */
export function initialState(): MenuState
{
  return { kind: 'MENU', selection: 0 };
}

function to(state: MatchState, effect: TransitionEffect = 'NONE'): Transition
{
  return { state, effect };
}

/* ═══════════════════════════════════════════════════════════════════════════
   PER-SCREEN HANDLERS
   ═══════════════════════════════════════════════════════════════════════════ */

function onMenu(state: MenuState, action: MatchAction): Transition
{
  const count = MENU_OPTIONS.length;

  switch (action.type)
  {
    case 'MENU_UP':
      return to({ kind: 'MENU', selection: (state.selection - 1 + count) % count });

    case 'MENU_DOWN':
      return to({ kind: 'MENU', selection: (state.selection + 1) % count });

    case 'CONFIRM':
    {
      const option = MENU_OPTIONS[state.selection];

      if (option === 'SINGLE_PLAYER' || option === 'TWO_PLAYER')
      {
        return to({ kind: 'PLAYING', mode: option, paused: false }, 'START_MATCH');
      }
      if (option === 'CREDITS')
      {
        return to({ kind: 'CREDITS', scroll: CREDITS_START_SCROLL });
      }
      return to(state, 'EXIT');
    }

    default:
      return to(state);
  }
}

function onPlaying(state: PlayingState, action: MatchAction): Transition
{
  switch (action.type)
  {
    case 'PAUSE':
      return to({ ...state, paused: !state.paused });

    case 'CANCEL':
      return to(initialState());

    case 'MATCH_WON':
      return to({ kind: 'GAMEOVER', mode: state.mode, winner: action.winner });

    default:
      return to(state);
  }
}

function onGameOver(state: GameOverState, action: MatchAction): Transition
{
  if (action.type === 'CONFIRM')
  {
    return to(initialState(), 'RETURN_TO_MENU');
  }
  return to(state);
}

function onCredits(state: CreditsState, action: MatchAction): Transition
{
  switch (action.type)
  {
    case 'TICK':
      return to({ kind: 'CREDITS', scroll: Math.max(CREDITS_SCROLL_FLOOR, state.scroll - CREDITS_SCROLL_SPEED) });

    case 'CONFIRM':
    case 'CANCEL':
      return to(initialState());

    default:
      return to(state);
  }
}

/* ═══════════════════════════════════════════════════════════════════════════
   TRANSITION
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function transition
 * @description (state, action) → next state + effect.  Pure.
 *
 * Actions that mean nothing on the current screen return the same state
 * object with effect NONE.
 */
export function transition(state: MatchState, action: MatchAction): Transition
{
  switch (state.kind)
  {
    case 'MENU':     return onMenu(state, action);
    case 'PLAYING':  return onPlaying(state, action);
    case 'GAMEOVER': return onGameOver(state, action);
    case 'CREDITS':  return onCredits(state, action);
  }
}

/**
 * @function formatMatchTime
 * @description Frames → "MM:SS" for the score display.  Minutes are not
 *              wrapped, so a very long match shows e.g. "123:04".
 */
export function formatMatchTime(frames: number): string
{
  const totalSeconds = Math.floor(frames / TARGET_FPS);
  const minutes      = Math.floor(totalSeconds / 60);
  const seconds      = totalSeconds % 60;

  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}
