// Public surface of the Blob Volley core

export type {
  PlayerSide, GameMode, Vec2, Rect, KinematicBody, Player, Ball, Particle,
  Action, InputSource, PlayerControls, RandomSource,
  MenuOption, MenuState, PlayingState, GameOverState, CreditsState, MatchState,
  MatchAction, TransitionEffect, Transition,
  BounceSurface, GameEvent,
  PlayerView, BallView, ParticleView, GameSnapshot,
} from './types.js';

export * from './constants.js';

export { circlesIntersect, circleIntersectsRect, normalize, reflect, clampSpeed } from './collision.js';
export {
  NET_RECT, serveX, makeBall, resetBall, updateBall, pushTrail,
  resolveNetCollision, resolvePlayerHit,
} from './physics.js';
export type { BallStepResult } from './physics.js';
export { makePlayer, courtBounds, clampToCourtHalf, applyPlayerInput, integratePlayer } from './player.js';
export { AIController, isBallComingToward } from './ai.js';
export { ParticlePool } from './particles.js';
export { mathRandom, createSeededRandom } from './random.js';
export { InputState, DEFAULT_KEY_BINDINGS } from './input.js';
export { MENU_OPTIONS, initialState, transition, formatMatchTime } from './state.js';
export { Game, createMatchContext } from './game.js';
export type { MatchContext, GameOptions, GameEventListener } from './game.js';
export { GameLoop } from './loop.js';
export type { GameLoopOptions, RenderCallback } from './loop.js';
export { parseDemoArgs, DEFAULT_TIME_LIMIT_S } from './args.js';
export type { DemoArgs, ParsedArgs } from './args.js';
