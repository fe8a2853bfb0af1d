// Game — match context, tick orchestration, events and snapshots

import type {
  Ball, Player, PlayerSide, MatchState, MatchAction, GameMode,
  InputSource, PlayerControls, RandomSource, GameEvent, GameSnapshot,
} from './types.js';
import {
  GROUND_LEVEL, NET_X,
  GROUND_PARTICLE_COUNT,
  WIN_SCORE, SCORE_DELAY_FRAMES,
} from './constants.js';
import { makeBall, resetBall, updateBall } from './physics.js';
import { makePlayer, applyPlayerInput, integratePlayer } from './player.js';
import { AIController } from './ai.js';
import { ParticlePool } from './particles.js';
import { initialState, transition } from './state.js';
import { mathRandom } from './random.js';

/**
 * Everything one match owns.  Created once per Game and mutated in place by
 * each tick; nothing in here is shared with any other Game.
 */
export interface MatchContext {
  state: MatchState;
  player1: Player;
  player2: Player;
  ball: Ball;
  particles: ParticlePool;
  ai: AIController;
  servingSide: PlayerSide;

  /** Frames left before the ball is re-served; 0 while the ball is live. */
  scoreDelay: number;

  /** Frames of unpaused play in the current match. */
  matchTimer: number;

  /** Frames since construction, in every screen.  Drives trail sampling. */
  frameCount: number;
}

export type GameEventListener = (event: GameEvent) => void;

export interface GameOptions {
  /** Shared by the AI and the particle spawner.  Defaults to Math.random. */
  random?: RandomSource;

  /**
   * Called for every event, in emission order, after the tick that produced
   * them has fully run.
   */
  onEvent?: GameEventListener;
}

export function createMatchContext(random: RandomSource = mathRandom): MatchContext {
  return {
    state: initialState(),
    player1: makePlayer('LEFT'),
    player2: makePlayer('RIGHT'),
    ball: makeBall('LEFT'),
    particles: new ParticlePool(random),
    ai: new AIController(random),
    servingSide: 'LEFT',
    scoreDelay: 0,
    matchTimer: 0,
    frameCount: 0,
  };
}

function controlsFor(input: InputSource, side: PlayerSide): PlayerControls {
  if (side === 'LEFT') {
    return {
      left: input.isHeld('P1_LEFT'),
      right: input.isHeld('P1_RIGHT'),
      jump: input.wasPressed('P1_JUMP'),
    };
  }
  return {
    left: input.isHeld('P2_LEFT'),
    right: input.isHeld('P2_RIGHT'),
    jump: input.wasPressed('P2_JUMP'),
  };
}

export class Game {
  readonly context: MatchContext;

  private readonly onEvent: GameEventListener | undefined;
  private events: GameEvent[] = [];
  private exit = false;

  constructor(options: GameOptions = {}) {
    this.context = createMatchContext(options.random ?? mathRandom);
    this.onEvent = options.onEvent;
  }

  get state(): MatchState {
    return this.context.state;
  }

  /** True once the player confirmed EXIT on the menu.  The host should stop. */
  get exitRequested(): boolean {
    return this.exit;
  }

  // ─── Tick ──────────────────────────────────────────────────────────────

  /**
   * Runs one fixed-length frame: screen input handling first, then the
   * simulation if the match is PLAYING and unpaused.  Returns the events
   * emitted during this frame.
   */
  tick(input: InputSource): GameEvent[] {
    this.events = [];
    this.context.frameCount++;

    const state = this.context.state;

    switch (state.kind) {
      case 'MENU':
        if (input.wasPressed('MENU_UP')) this.dispatch({ type: 'MENU_UP' });
        if (input.wasPressed('MENU_DOWN')) this.dispatch({ type: 'MENU_DOWN' });
        if (input.wasPressed('CONFIRM')) this.dispatch({ type: 'CONFIRM' });
        break;

      case 'PLAYING':
        if (input.wasPressed('PAUSE')) this.dispatch({ type: 'PAUSE' });
        if (input.wasPressed('CANCEL')) {
          this.dispatch({ type: 'CANCEL' });
          break;
        }
        if (this.context.state.kind === 'PLAYING' && !this.context.state.paused) {
          this.step(input, this.context.state.mode);
        }
        break;

      case 'GAMEOVER':
        if (input.wasPressed('CONFIRM')) this.dispatch({ type: 'CONFIRM' });
        break;

      case 'CREDITS':
        this.dispatch({ type: 'TICK' });
        if (input.wasPressed('CONFIRM')) {
          this.dispatch({ type: 'CONFIRM' });
        } else if (input.wasPressed('CANCEL')) {
          this.dispatch({ type: 'CANCEL' });
        }
        break;
    }

    const events = this.events;
    if (this.onEvent !== undefined) {
      for (const event of events) this.onEvent(event);
    }
    return events;
  }

  // ─── State machine ─────────────────────────────────────────────────────

  private dispatch(action: MatchAction): void {
    const { state, effect } = transition(this.context.state, action);
    this.context.state = state;

    switch (effect) {
      case 'START_MATCH':
        this.startMatch();
        break;
      case 'RETURN_TO_MENU':
        this.resetScores();
        break;
      case 'EXIT':
        this.exit = true;
        this.emit({ type: 'EXIT' });
        break;
      case 'NONE':
        break;
    }
  }

  private startMatch(): void {
    const ctx = this.context;

    ctx.player1 = makePlayer('LEFT');
    ctx.player2 = makePlayer('RIGHT');
    ctx.servingSide = 'LEFT';
    ctx.scoreDelay = 0;
    ctx.matchTimer = 0;
    ctx.particles.clear();
    ctx.ai.reset();
    resetBall(ctx.ball, ctx.servingSide);
  }

  private resetScores(): void {
    this.context.player1.score = 0;
    this.context.player2.score = 0;
    this.context.matchTimer = 0;
  }

  // ─── Simulation ────────────────────────────────────────────────────────

  private step(input: InputSource, mode: GameMode): void {
    const ctx = this.context;
    const { player1, player2, ball } = ctx;

    ctx.matchTimer++;
    ctx.particles.update();

    // Controllers decide velocities; nothing has moved yet
    if (applyPlayerInput(player1, controlsFor(input, 'LEFT'))) {
      this.emit({ type: 'JUMP', side: 'LEFT' });
    }

    const p2Jumped = mode === 'TWO_PLAYER'
      ? applyPlayerInput(player2, controlsFor(input, 'RIGHT'))
      : ctx.ai.update(player2, ball);
    if (p2Jumped) this.emit({ type: 'JUMP', side: 'RIGHT' });

    integratePlayer(player1);
    integratePlayer(player2);

    if (ctx.scoreDelay > 0) {
      ctx.scoreDelay--;
      if (ctx.scoreDelay === 0) resetBall(ball, ctx.servingSide);
    }

    const result = updateBall(ball, player1, player2, ctx.frameCount, ctx.scoreDelay);

    for (const surface of result.bounces) {
      this.emit({ type: 'BOUNCE', surface });
    }

    if (result.groundContactX !== null) {
      ctx.particles.spawnBurst(result.groundContactX, GROUND_LEVEL, GROUND_PARTICLE_COUNT);
      if (ctx.scoreDelay === 0) this.awardPoint(result.groundContactX);
    }
  }

  /**
   * Score, serve side, win check and delay arming happen together here so no
   * caller ever sees a new score without its bookkeeping.
   */
  private awardPoint(contactX: number): void {
    const ctx = this.context;
    const scorer: PlayerSide = contactX < NET_X ? 'RIGHT' : 'LEFT';

    if (scorer === 'LEFT') {
      ctx.player1.score++;
    } else {
      ctx.player2.score++;
    }
    ctx.servingSide = scorer;

    const won = ctx.player1.score >= WIN_SCORE || ctx.player2.score >= WIN_SCORE;
    if (won) {
      this.dispatch({ type: 'MATCH_WON', winner: scorer });
    } else {
      ctx.scoreDelay = SCORE_DELAY_FRAMES;
    }

    this.emit({ type: 'SCORE', scorer, score1: ctx.player1.score, score2: ctx.player2.score });
    if (won) this.emit({ type: 'GAME_OVER', winner: scorer });
  }

  /** Queues an event; the listener hears it once the tick has finished. */
  private emit(event: GameEvent): void {
    this.events.push(event);
  }

  // ─── Snapshot ──────────────────────────────────────────────────────────

  /** A copy of everything the renderer draws.  Safe to keep across ticks. */
  snapshot(): GameSnapshot {
    const ctx = this.context;
    const playerView = (p: Player) => ({
      side: p.side, x: p.x, y: p.y, vx: p.vx, vy: p.vy, radius: p.radius,
      color: p.color, score: p.score, onGround: p.onGround,
    });

    return {
      state: { ...ctx.state },
      player1: playerView(ctx.player1),
      player2: playerView(ctx.player2),
      ball: {
        x: ctx.ball.x,
        y: ctx.ball.y,
        radius: ctx.ball.radius,
        rotation: ctx.ball.rotation,
        trail: ctx.ball.trail.map((point) => ({ x: point.x, y: point.y })),
      },
      particles: ctx.particles.active().map((p) => ({
        x: p.x, y: p.y, color: p.color, alpha: p.alpha, life: p.life,
      })),
      servingSide: ctx.servingSide,
      scoreDelay: ctx.scoreDelay,
      matchTimer: ctx.matchTimer,
      frameCount: ctx.frameCount,
    };
  }
}
