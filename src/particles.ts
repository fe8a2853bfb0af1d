/**
 * @file particles.ts
 * @description Fixed-capacity pool of cosmetic dirt particles kicked up when
 *              the ball hits the ground.
 *
 * The pool is allocated once; spawning claims the first inactive slot and
 * retiring a particle just clears its `active` flag.  Nothing here feeds back
 * into gameplay: a particle that is never drawn changes nothing.
 */

import type { Particle, RandomSource } from './types.js';
import
{
  GROUND_LEVEL,
  MAX_PARTICLES,
  PARTICLE_GRAVITY, PARTICLE_LIFE_DECAY, PARTICLE_GROUND_MARGIN,
  PARTICLE_ANGLE_MIN_DEG, PARTICLE_ANGLE_MAX_DEG,
  PARTICLE_SPEED_MIN, PARTICLE_SPEED_MAX,
  COLOR_PARTICLE,
} from './constants.js';
import { mathRandom } from './random.js';

function makeSlot(): Particle
{
  return {
    x: 0, y: 0, vx: 0, vy: 0, radius: 0,
    color:  COLOR_PARTICLE,
    alpha:  0,
    life:   0,
    active: false,
  };
}

/**
 * @class ParticlePool
 * @description Arena of `capacity` particle slots addressed by index.
 */
export class ParticlePool
{
  private readonly slots: Particle[];

  constructor(
    private readonly random: RandomSource = mathRandom,
    readonly capacity: number = MAX_PARTICLES,
  )
  {
    if (!Number.isInteger(capacity) || capacity <= 0)
    {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }

    this.slots = Array.from({ length: capacity }, makeSlot);
  }

  /**
   * @method spawnBurst
   * @description Launches up to `count` particles from (x, y), fanned upward.
   *
   * Each particle gets a random angle in [-120°, -60°], a random integer
   * speed, and a random horizontal mirror.  Requests beyond the number of
   * free slots are dropped.
   *
   * @returns {number} How many particles were actually spawned.
   */
  spawnBurst(x: number, y: number, count: number): number
  {
    let spawned = 0;

    for (let i = 0; i < count; i++)
    {
      const index = this.claim();
      if (index === -1) break;

      const angle = (this.random.nextInt(PARTICLE_ANGLE_MIN_DEG, PARTICLE_ANGLE_MAX_DEG) * Math.PI) / 180;
      const speed = this.random.nextInt(PARTICLE_SPEED_MIN, PARTICLE_SPEED_MAX);
      const mirror = this.random.nextInt(0, 1) === 1 ? 1 : -1;

      const p  = this.slots[index];
      p.x      = x;
      p.y      = y;
      p.vx     = Math.cos(angle) * speed * mirror;
      p.vy     = Math.sin(angle) * speed;
      p.color  = COLOR_PARTICLE;
      p.alpha  = 1;
      p.life   = 1;
      p.active = true;

      spawned++;
    }

    return spawned;
  }

  /**
   * @method update
   * @description Advances every live particle by one frame: gravity,
   *              integration, linear fade.  Retires particles whose life has
   *              run out or that fell well below the ground.
   */
  update(): void
  {
    for (const p of this.slots)
    {
      if (!p.active) continue;

      p.vy += PARTICLE_GRAVITY;
      p.x  += p.vx;
      p.y  += p.vy;

      p.life  -= PARTICLE_LIFE_DECAY;
      p.alpha  = p.life;

      if (p.life <= 0 || p.y > GROUND_LEVEL + PARTICLE_GROUND_MARGIN)
      {
        p.active = false;
      }
    }
  }

  /** Live particles, in slot order. */
  active(): Particle[]
  {
    return this.slots.filter((p) => p.active);
  }

  /** Retires every particle. */
  clear(): void
  {
    for (const p of this.slots) p.active = false;
  }

  /** Index of the first free slot, or -1 when the pool is full. */
  private claim(): number
  {
    return this.slots.findIndex((p) => !p.active);
  }
}
