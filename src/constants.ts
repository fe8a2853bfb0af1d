/**
 * @file constants.ts
 * @description Single source of truth for every numeric and color tuning value in Blob Volley.
 *
 * Physics is tuned at compile time only; there is no runtime knob, so every
 * module reads these names directly.
 *
 * UNITS
 * -----
 * Unless otherwise noted:
 *   - Distances / positions / radii are in *court pixels* (px).
 *   - Velocities are in *pixels per frame*; accelerations in px/frame².
 *   - Durations / timers are in *frames* at TARGET_FPS.
 *   - Angles are in *degrees*.
 *   - Scale factors are dimensionless (1.0 = no change).
 */

/* ═══════════════════════════════════════════════════════════════════════════
   COURT
   A fixed 1024 × 768 playfield.  The ground is a horizontal line 50 px above
   the bottom edge; the net stands on it at the horizontal centre.
   ═══════════════════════════════════════════════════════════════════════════ */

export const COURT_WIDTH   = 1024;
export const COURT_HEIGHT  = 768;

/** Y of the playing surface.  Anything whose bottom reaches it is "grounded". */
export const GROUND_LEVEL  = COURT_HEIGHT - 50;

/** Horizontal centre of the net; also the dividing line for scoring. */
export const NET_X         = COURT_WIDTH / 2;
export const NET_WIDTH     = 10;
export const NET_HEIGHT    = 140;

/** Ticks per second the host is expected to drive the simulation at. */
export const TARGET_FPS    = 60;

/* ═══════════════════════════════════════════════════════════════════════════
   COLORS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Player 1 (left), blue. */
export const COLOR_P1       = '#0079f1';

/** Player 2 (right), red. */
export const COLOR_P2       = '#e62937';

/** Impact particles take the colour of the dirt they kick up. */
export const COLOR_PARTICLE = '#4c3f2f';

/* ═══════════════════════════════════════════════════════════════════════════
   PLAYERS
   ═══════════════════════════════════════════════════════════════════════════ */

export const PLAYER_RADIUS          = 50;

/** Horizontal speed while a direction is held.  Not accumulated. */
export const PLAYER_MOVE_SPEED      = 4;

/** Initial vy of a jump (negative = up). */
export const PLAYER_JUMP_FORCE      = -12;

/** Blobs fall twice as hard as the ball so jumps feel snappy. */
export const PLAYER_GRAVITY         = 0.8;

/** Terminal downward speed of a blob. */
export const PLAYER_MAX_VELOCITY_Y  = 15;

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

export const BALL_RADIUS            = 35;
export const BALL_GRAVITY           = 0.4;

/** Velocity multiplier on wall / ceiling / ground bounces (1 = elastic). */
export const BALL_BOUNCE_DAMPING    = 1.0;

/** Hard cap on ball speed after any blob hit. */
export const BALL_MAX_SPEED         = 15;

/** Height the ball is dropped from on every serve. */
export const BALL_SERVE_Y           = 100;

/** Degrees of sprite rotation per (|vx| / radius) each frame.  Cosmetic. */
export const BALL_SPIN_FACTOR       = 35;

/** Number of historical positions kept for the motion trail. */
export const TRAIL_LENGTH           = 3;

/** A trail point is sampled on every Nth frame. */
export const TRAIL_SAMPLE_INTERVAL  = 2;

/* ═══════════════════════════════════════════════════════════════════════════
   COLLISION RESPONSE
   ═══════════════════════════════════════════════════════════════════════════ */

/** vy multiplier applied when the ball clips the net post. */
export const NET_VY_DAMPING         = 0.9;

/** Speed kept after bouncing off a blob. */
export const PLAYER_HIT_RETENTION   = 0.95;

/** Fraction of the blob's vx handed to the ball on contact. */
export const PLAYER_HIT_TRANSFER_X  = 0.7;

/** Fraction of the blob's vy handed to the ball on contact. */
export const PLAYER_HIT_TRANSFER_Y  = 0.5;

/** A blob rising faster than this (vy below it) is "jumping" for spike purposes. */
export const SPIKE_VY_THRESHOLD     = -5;

/** Extra upward kick given to the ball by a jumping blob. */
export const SPIKE_BOOST            = 3;

/* ═══════════════════════════════════════════════════════════════════════════
   AI
   ═══════════════════════════════════════════════════════════════════════════ */

/** Horizontal distance inside which the AI considers jumping. */
export const AI_REACTION_DISTANCE   = 150;

/** Ball may be at most this far *below* the blob centre for a jump. */
export const AI_JUMP_THRESHOLD      = 60;

/** Ball may be at most this far *above* the blob centre for a jump. */
export const AI_JUMP_REACH          = 100;

/** Dead band around the target x where the AI stops moving. */
export const AI_POSITION_TOLERANCE  = 20;

/** Frames the AI must wait between jumps. */
export const AI_JUMP_COOLDOWN       = 30;

/** Fraction of PLAYER_MOVE_SPEED used when chasing the ball. */
export const AI_CHASE_SPEED_FACTOR  = 0.8;

/** Fraction of PLAYER_MOVE_SPEED used when idling back to the centre. */
export const AI_DRIFT_SPEED_FACTOR  = 0.6;

/** Fraction of PLAYER_JUMP_FORCE the AI jumps with. */
export const AI_JUMP_FORCE_FACTOR   = 0.9;

/**
 * A jump fires only when nextInt(0, AI_JUMP_ROLL_MAX) exceeds AI_JUMP_SKIP_ROLL,
 * i.e. 80 of 101 outcomes.  Keeps the computer beatable.
 */
export const AI_JUMP_ROLL_MAX       = 100;
export const AI_JUMP_SKIP_ROLL      = 20;

/* ═══════════════════════════════════════════════════════════════════════════
   PARTICLES
   ═══════════════════════════════════════════════════════════════════════════ */

export const MAX_PARTICLES            = 100;

/** Burst size for one ball–ground impact. */
export const GROUND_PARTICLE_COUNT    = 15;

export const PARTICLE_GRAVITY         = 0.3;

/** Life lost per frame; a particle lasts 50 frames at most. */
export const PARTICLE_LIFE_DECAY      = 0.02;

/** Particles falling this far below the ground are retired early. */
export const PARTICLE_GROUND_MARGIN   = 20;

/** Launch angle range (degrees, negative = up) and speed range (px/frame). */
export const PARTICLE_ANGLE_MIN_DEG   = -120;
export const PARTICLE_ANGLE_MAX_DEG   = -60;
export const PARTICLE_SPEED_MIN       = 2;
export const PARTICLE_SPEED_MAX       = 6;

/* ═══════════════════════════════════════════════════════════════════════════
   MATCH RULES
   ═══════════════════════════════════════════════════════════════════════════ */

/** First blob to this many points wins. */
export const WIN_SCORE             = 10;

/** Grace period after a point before the ball is re-served (2 s). */
export const SCORE_DELAY_FRAMES    = 120;

/* ═══════════════════════════════════════════════════════════════════════════
   CREDITS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Scroll offset the credits start at, just below the visible area. */
export const CREDITS_START_SCROLL  = COURT_HEIGHT;

/** Pixels the credits move up per frame. */
export const CREDITS_SCROLL_SPEED  = 2;

/** The scroll stops here so the final lines stay on screen. */
export const CREDITS_SCROLL_FLOOR  = -800;
