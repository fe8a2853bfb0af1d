/**
 * @file types.ts
 * @description All shared TypeScript interfaces, types, and unions for Blob Volley.
 *
 * Every other module imports from here.  Keeping types centralised means
 * there is one place to look when you want to know the shape of any object
 * in the simulation.
 */

/* ═══════════════════════════════════════════════════════════════════════════
   SIDES & MODES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef PlayerSide
 * @description Which half of the court a blob owns.  LEFT is player 1.
 */
export type PlayerSide = 'LEFT' | 'RIGHT';

/**
 * @typedef GameMode
 * @description Chosen on the main menu.
 *   - SINGLE_PLAYER  Player 2 is driven by the AIController.
 *   - TWO_PLAYER     Both blobs read from the input collaborator (hotseat).
 */
export type GameMode = 'SINGLE_PLAYER' | 'TWO_PLAYER';

/* ═══════════════════════════════════════════════════════════════════════════
   GEOMETRY
   ═══════════════════════════════════════════════════════════════════════════ */

export interface Vec2
{
  x: number;
  y: number;
}

/** Axis-aligned rectangle; (x, y) is the top-left corner. */
export interface Rect
{
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * @interface KinematicBody
 * @description Position / velocity / radius shared by blobs, ball and particles.
 *
 * Units are canvas pixels and pixels *per frame*: the simulation runs at a
 * fixed 60 ticks per second, so there is no delta-time scaling anywhere.
 * Y increases downward.
 */
export interface KinematicBody
{
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   ENTITIES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Player
 * @description One blob.  Position and velocity are mutated by the controller
 *              (or AI) and by integratePlayer(); the ball never pushes back.
 */
export interface Player extends KinematicBody
{
  side: PlayerSide;

  /** CSS color string the renderer fills the blob with. */
  color: string;

  /** Points won this match.  Reset to 0 whenever a new match starts. */
  score: number;

  /** True while resting on the ground; jumps are only accepted then. */
  onGround: boolean;
}

/**
 * @interface Ball
 * @description The volleyball.
 *
 *   - trail holds the last TRAIL_LENGTH sampled positions, newest at index 0.
 *   - rotation is an accumulating angle in degrees for the spinning sprite.
 *     It is cosmetic only: nothing in the physics reads it back.
 */
export interface Ball extends KinematicBody
{
  trail: Vec2[];
  rotation: number;
}

/**
 * @interface Particle
 * @description One slot in the impact-particle pool.  Inactive slots keep
 *              their last values but are ignored by update and snapshot.
 */
export interface Particle extends KinematicBody
{
  color: string;
  alpha: number;

  /** 1 on spawn, decays linearly to 0. */
  life: number;

  active: boolean;
}

/* ═══════════════════════════════════════════════════════════════════════════
   INPUT
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef Action
 * @description Logical actions the core understands.  The host maps whatever
 *              device it polls onto these; the core never sees key codes.
 */
export type Action =
  | 'P1_LEFT'
  | 'P1_RIGHT'
  | 'P1_JUMP'
  | 'P2_LEFT'
  | 'P2_RIGHT'
  | 'P2_JUMP'
  | 'PAUSE'
  | 'CONFIRM'
  | 'CANCEL'
  | 'MENU_UP'
  | 'MENU_DOWN';

/**
 * @interface InputSource
 * @description What the core reads once per tick.
 *   - isHeld      level-triggered (movement).
 *   - wasPressed  edge-triggered, true only on the tick the action went down.
 */
export interface InputSource
{
  isHeld(action: Action): boolean;
  wasPressed(action: Action): boolean;
}

/**
 * @interface PlayerControls
 * @description One blob's resolved input for the current tick.
 */
export interface PlayerControls
{
  left: boolean;
  right: boolean;

  /** Edge: true only on the tick the jump action was pressed. */
  jump: boolean;
}

/* ═══════════════════════════════════════════════════════════════════════════
   RANDOMNESS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface RandomSource
 * @description Bounded integer draws for the AI and particle spawner.
 *              Both bounds are inclusive; reversed bounds are swapped.
 */
export interface RandomSource
{
  nextInt(min: number, max: number): number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   MATCH STATE
   The screen the game is on is a tagged union: exactly one variant holds at
   any time, and the compiler checks every switch over `kind` is exhaustive.

     MENU ──confirm──▶ PLAYING ──win──▶ GAMEOVER ──confirm──▶ MENU
       │                  │
       │                  └──cancel──▶ MENU
       └──confirm(credits)──▶ CREDITS ──confirm/cancel──▶ MENU
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @typedef MenuOption
 * @description Main-menu entries, in display order.
 */
export type MenuOption = 'SINGLE_PLAYER' | 'TWO_PLAYER' | 'CREDITS' | 'EXIT';

export interface MenuState
{
  kind: 'MENU';

  /** Index into MENU_OPTIONS of the highlighted entry. */
  selection: number;
}

export interface PlayingState
{
  kind: 'PLAYING';
  mode: GameMode;
  paused: boolean;
}

export interface GameOverState
{
  kind: 'GAMEOVER';
  mode: GameMode;
  winner: PlayerSide;
}

export interface CreditsState
{
  kind: 'CREDITS';

  /** Y offset of the first credits line; decreases every tick. */
  scroll: number;
}

export type MatchState = MenuState | PlayingState | GameOverState | CreditsState;

/**
 * @typedef MatchAction
 * @description Everything that can drive a state transition.
 *   TICK advances time-based screens (credits scroll); MATCH_WON is raised by
 *   the scoring step, never by the input collaborator.
 */
export type MatchAction =
  | { type: 'MENU_UP' }
  | { type: 'MENU_DOWN' }
  | { type: 'CONFIRM' }
  | { type: 'CANCEL' }
  | { type: 'PAUSE' }
  | { type: 'TICK' }
  | { type: 'MATCH_WON'; winner: PlayerSide };

/**
 * @typedef TransitionEffect
 * @description Side effect the Game must perform after a transition.
 *   - START_MATCH     reset scores, match timer, players and serve the ball.
 *   - RETURN_TO_MENU  reset scores and match timer after a finished match.
 *   - EXIT            host should terminate the process.
 */
export type TransitionEffect = 'NONE' | 'START_MATCH' | 'RETURN_TO_MENU' | 'EXIT';

export interface Transition
{
  state: MatchState;
  effect: TransitionEffect;
}

/* ═══════════════════════════════════════════════════════════════════════════
   EVENTS
   Fire-and-forget notifications for the audio collaborator.
   ═══════════════════════════════════════════════════════════════════════════ */

export type BounceSurface = 'NET' | 'PLAYER';

export type GameEvent =
  | { type: 'JUMP'; side: PlayerSide }
  | { type: 'BOUNCE'; surface: BounceSurface }
  | { type: 'SCORE'; scorer: PlayerSide; score1: number; score2: number }
  | { type: 'GAME_OVER'; winner: PlayerSide }
  | { type: 'EXIT' };

/* ═══════════════════════════════════════════════════════════════════════════
   SNAPSHOT
   Read-only copy of everything the renderer needs, built once per tick.
   ═══════════════════════════════════════════════════════════════════════════ */

export interface PlayerView
{
  readonly side: PlayerSide;
  readonly x: number;
  readonly y: number;
  readonly vx: number;
  readonly vy: number;
  readonly radius: number;
  readonly color: string;
  readonly score: number;
  readonly onGround: boolean;
}

export interface BallView
{
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly rotation: number;
  readonly trail: readonly Readonly<Vec2>[];
}

export interface ParticleView
{
  readonly x: number;
  readonly y: number;
  readonly color: string;
  readonly alpha: number;
  readonly life: number;
}

export interface GameSnapshot
{
  readonly state: Readonly<MatchState>;
  readonly player1: PlayerView;
  readonly player2: PlayerView;
  readonly ball: BallView;
  readonly particles: readonly ParticleView[];
  readonly servingSide: PlayerSide;
  readonly scoreDelay: number;
  readonly matchTimer: number;
  readonly frameCount: number;
}
