/**
 * Particle records and the store that owns them
 */

import type { ParticleCategory, RGB, RandomSource, SpawnKind } from '@pulsefield/shared';
import {
  PARTICLE_CATEGORIES,
  CATEGORY_COLORS,
  CATEGORY_MASS_RANGE,
  MIXED_MASS_RANGE,
  CATEGORY_SPAWN_SCATTER,
  INITIAL_VELOCITY_SPREAD,
  SPAWN_VELOCITY_SPREAD,
  MIN_MASS,
  randomInt,
  randomCentered,
  randomPick,
} from '@pulsefield/shared';
import type { Point2D } from '@pulsefield/core/coords';
import type { SpawnConfig } from '@pulsefield/core';

// ============================================================================
// Particle
// ============================================================================

/**
 * A point mass. Category and color are fixed at creation; everything else is
 * physical state the step mutates in place.
 */
export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
  mass: number;
  /** Resting y-coordinate of this particle's own floor */
  floorY: number;
  /** Smoothed audio drive, grows toward the category's target each frame */
  bounceEnergy: number;
  /** bounceEnergy x mass, for display */
  bounceHeight: number;
  readonly category: ParticleCategory;
  readonly color: Readonly<RGB>;
}

export interface ParticleInit {
  x: number;
  y: number;
  vx?: number;
  vy?: number;
  radius: number;
  mass: number;
  floorY: number;
  category: ParticleCategory;
}

/**
 * Create a particle at rest energy. Mass is floored at MIN_MASS.
 */
export function createParticle(init: ParticleInit): Particle {
  return {
    x: init.x,
    y: init.y,
    vx: init.vx ?? 0,
    vy: init.vy ?? 0,
    radius: init.radius,
    mass: Math.max(init.mass, MIN_MASS),
    floorY: init.floorY,
    bounceEnergy: 0,
    bounceHeight: 0,
    category: init.category,
    color: { ...CATEGORY_COLORS[init.category] },
  };
}

// ============================================================================
// Particle Store
// ============================================================================

export interface StoreBounds {
  width: number;
  height: number;
}

/**
 * Owns the particle population. Order is insertion order and stays stable
 * between resets; particles are only ever removed all at once.
 */
export class ParticleStore {
  private items: Particle[] = [];
  private readonly bounds: StoreBounds;
  private readonly spawnConfig: SpawnConfig;
  private readonly random: RandomSource;

  constructor(bounds: StoreBounds, spawnConfig: SpawnConfig, random: RandomSource) {
    this.bounds = bounds;
    this.spawnConfig = spawnConfig;
    this.random = random;
  }

  get particles(): readonly Particle[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  /** Add one particle */
  add(init: ParticleInit): Particle {
    const particle = createParticle(init);
    this.items.push(particle);
    return particle;
  }

  /** Remove every particle */
  clear(): void {
    this.items = [];
  }

  /** Replace the population with a fresh initial one */
  reset(): Particle[] {
    this.clear();
    return this.populate();
  }

  /**
   * Scatter particles uniformly over the surface with small random velocities
   */
  populate(count = this.spawnConfig.particleCount): Particle[] {
    const added: Particle[] = [];
    for (let i = 0; i < count; i++) {
      added.push(
        this.add({
          x: this.random() * this.bounds.width,
          y: this.random() * this.bounds.height,
          vx: randomCentered(this.random, INITIAL_VELOCITY_SPREAD),
          vy: randomCentered(this.random, INITIAL_VELOCITY_SPREAD),
          radius: this.spawnConfig.particleRadius,
          mass: randomInt(this.random, MIXED_MASS_RANGE.min, MIXED_MASS_RANGE.max),
          floorY: this.randomFloorY(),
          category: randomPick(this.random, PARTICLE_CATEGORIES),
        })
      );
    }
    return added;
  }

  /**
   * Spawn a batch at a location: `mixed` drops random categories on the exact
   * point, a single category scatters around it.
   */
  spawn(kind: SpawnKind, at: Point2D, count?: number): Particle[] {
    if (kind === 'mixed') {
      return this.spawnMixed(at, count ?? this.spawnConfig.mixedSpawnCount);
    }
    return this.spawnCategory(kind, at, count ?? this.spawnConfig.categorySpawnCount);
  }

  private spawnMixed(at: Point2D, count: number): Particle[] {
    const added: Particle[] = [];
    for (let i = 0; i < count; i++) {
      added.push(
        this.add({
          x: at.x,
          y: at.y,
          vx: randomCentered(this.random, SPAWN_VELOCITY_SPREAD),
          vy: randomCentered(this.random, SPAWN_VELOCITY_SPREAD),
          radius: this.spawnConfig.particleRadius,
          mass: randomInt(this.random, MIXED_MASS_RANGE.min, MIXED_MASS_RANGE.max),
          floorY: this.randomFloorY(),
          category: randomPick(this.random, PARTICLE_CATEGORIES),
        })
      );
    }
    return added;
  }

  private spawnCategory(category: ParticleCategory, at: Point2D, count: number): Particle[] {
    const massRange = CATEGORY_MASS_RANGE[category];
    const added: Particle[] = [];
    for (let i = 0; i < count; i++) {
      added.push(
        this.add({
          x: at.x + randomCentered(this.random, CATEGORY_SPAWN_SCATTER),
          y: at.y + randomCentered(this.random, CATEGORY_SPAWN_SCATTER),
          vx: randomCentered(this.random, SPAWN_VELOCITY_SPREAD),
          vy: randomCentered(this.random, SPAWN_VELOCITY_SPREAD),
          radius: this.spawnConfig.particleRadius,
          mass: randomInt(this.random, massRange.min, massRange.max),
          floorY: this.randomFloorY(),
          category,
        })
      );
    }
    return added;
  }

  /** Count particles per category */
  countByCategory(): Record<ParticleCategory, number> {
    const counts: Record<ParticleCategory, number> = { bass: 0, mid: 0, treble: 0 };
    for (const particle of this.items) {
      counts[particle.category]++;
    }
    return counts;
  }

  // Floors sit in a band just above the bottom edge: height - band + [1, band]
  private randomFloorY(): number {
    const band = this.spawnConfig.floorBand;
    return this.bounds.height - band + randomInt(this.random, 1, band);
  }
}
