/**
 * Per-frame particle integration
 *
 * One `step` rebuilds the spatial index from current positions, then walks the
 * particles in store order: audio drive, gravity, drag, integration, pairwise
 * collision against indexed neighbours, and finally wall, floor and ceiling
 * reflection. Everything is mutated in place.
 */

import type { BandEnergies, TunableParameter } from '@pulsefield/shared';
import {
  CATEGORY_RESPONSE,
  FRAME_RATE_REFERENCE,
  MIN_SEPARATION,
  clamp,
  inverseMass,
  isValidNumber,
} from '@pulsefield/shared';
import { regionFromSize, squareAround } from '@pulsefield/core/coords';
import type { PhysicsConfig } from '@pulsefield/core';
import { QuadTree } from '@pulsefield/geo/spatial';
import type { Particle } from '../particles/index.js';
import type { StepStats } from '../api/index.js';

/** Band energies and beat flag that drive bounce energy */
export interface AudioDrive extends BandEnergies {
  beat: boolean;
}

export interface SurfaceBounds {
  width: number;
  height: number;
}

// ============================================================================
// Audio Drive
// ============================================================================

/**
 * Bounce energy a particle is pulled toward this frame
 */
export function bounceTarget(particle: Pick<Particle, 'category'>, audio: AudioDrive): number {
  const response = CATEGORY_RESPONSE[particle.category];
  let target = audio[particle.category] * response.bandWeight + audio.mid * response.midCrossWeight;
  if (audio.beat) target += response.beatBonus;
  return target;
}

/**
 * Move a particle's bounce energy toward the target and refresh its bounce height
 */
export function smoothBounceEnergy(particle: Particle, target: number): void {
  const s = CATEGORY_RESPONSE[particle.category].smoothing;
  particle.bounceEnergy = particle.bounceEnergy * (1 - s) + target * s;
  particle.bounceHeight = particle.bounceEnergy * particle.mass;
}

// ============================================================================
// Pair Resolution
// ============================================================================

/** What `resolvePair` did to an overlapping pair */
export interface PairImpulse {
  /** Unit vector from a to b */
  nx: number;
  ny: number;
  /** Overlap before separation */
  overlap: number;
  /** Repulsion magnitude; 0 for coincident centres */
  repulsion: number;
}

type Body = Pick<Particle, 'x' | 'y' | 'vx' | 'vy' | 'radius' | 'mass'>;

/**
 * Separate two overlapping bodies and push them apart. Each moves half the
 * overlap along the centre line, and `a` loses R/m_a while `b` gains R/m_b of
 * velocity along it, R = strength / (distance + 1). Returns null when the
 * bodies do not overlap.
 */
export function resolvePair(a: Body, b: Body, repulsionStrength: number): PairImpulse | null {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const distance = Math.sqrt(dx * dx + dy * dy);
  const minDistance = a.radius + b.radius;
  if (!(distance < minDistance)) return null;

  let nx = 1;
  let ny = 0;
  let repulsion = 0;
  if (distance > MIN_SEPARATION) {
    nx = dx / distance;
    ny = dy / distance;
    repulsion = repulsionStrength / (distance + 1);
  }

  const overlap = minDistance - distance;
  const half = overlap * 0.5;
  a.x -= nx * half;
  a.y -= ny * half;
  b.x += nx * half;
  b.y += ny * half;

  if (repulsion > 0) {
    const dvA = repulsion * inverseMass(a.mass);
    const dvB = repulsion * inverseMass(b.mass);
    a.vx -= nx * dvA;
    a.vy -= ny * dvA;
    b.vx += nx * dvB;
    b.vy += ny * dvB;
  }

  return { nx, ny, overlap, repulsion };
}

// ============================================================================
// Physics Step
// ============================================================================

export class PhysicsStep {
  readonly index: QuadTree<Particle>;
  private readonly bounds: SurfaceBounds;
  private config: PhysicsConfig;

  constructor(bounds: SurfaceBounds, config: PhysicsConfig) {
    this.bounds = { ...bounds };
    this.config = { ...config };
    this.index = new QuadTree<Particle>(regionFromSize(bounds.width, bounds.height), {
      capacity: config.nodeCapacity,
      maxDepth: config.maxDepth,
    });
  }

  get settings(): Readonly<PhysicsConfig> {
    return this.config;
  }

  /** Change a run-time adjustable parameter */
  setParameter(parameter: TunableParameter, value: number): void {
    this.config = { ...this.config, [parameter]: value };
  }

  /**
   * Advance every particle by `dt` seconds (clamped to [0, maxDt]). Without an
   * audio drive, bounce energy is left untouched.
   */
  step(dt: number, particles: readonly Particle[], audio?: AudioDrive): StepStats {
    const frameDt = isValidNumber(dt) ? clamp(dt, 0, this.config.maxDt) : 0;
    const frames = frameDt * FRAME_RATE_REFERENCE;

    this.index.clear();
    const dropped = new Set<Particle>();
    for (const particle of particles) {
      if (!this.index.insert(particle)) dropped.add(particle);
    }

    let contacts = 0;
    for (const particle of particles) {
      if (audio) this.applyAudio(particle, audio);

      particle.vy += this.config.gravity * particle.mass * frames;
      particle.vx *= this.config.drag;
      particle.vy *= this.config.drag;
      particle.x += particle.vx * frames;
      particle.y += particle.vy * frames;

      if (!dropped.has(particle)) {
        contacts += this.collide(particle);
      }

      this.constrain(particle, frames);
    }

    return {
      dt: frameDt,
      inserted: this.index.size,
      dropped: dropped.size,
      contacts,
    };
  }

  private applyAudio(particle: Particle, audio: AudioDrive): void {
    smoothBounceEnergy(particle, bounceTarget(particle, audio));

    const grounded = particle.y >= particle.floorY - particle.radius && particle.vy >= 0;
    if (grounded && particle.bounceEnergy > this.config.bounceThreshold) {
      particle.vy = -particle.bounceEnergy * this.config.bounceImpulse * particle.mass;
    }
  }

  private collide(particle: Particle): number {
    const window = squareAround(particle, particle.radius * this.config.neighborWindowScale);
    let contacts = 0;
    for (const other of this.index.query(window)) {
      if (other === particle) continue;
      if (resolvePair(particle, other, this.config.repulsionStrength)) contacts++;
    }
    return contacts;
  }

  private constrain(particle: Particle, frames: number): void {
    const { width } = this.bounds;
    const { wallDamping, floorDamping, gravity } = this.config;

    if (particle.x - particle.radius < 0) {
      particle.x = particle.radius;
      particle.vx = -particle.vx * wallDamping;
    } else if (particle.x + particle.radius > width) {
      particle.x = width - particle.radius;
      particle.vx = -particle.vx * wallDamping;
    }

    if (particle.y + particle.radius > particle.floorY) {
      particle.y = particle.floorY - particle.radius;
      particle.vy = -particle.vy * floorDamping;
      // Rebounds weaker than one frame of gravity would never leave the floor
      if (Math.abs(particle.vy) < gravity * particle.mass * frames) {
        particle.vy = 0;
      }
    }

    if (particle.y - particle.radius < 0) {
      particle.y = particle.radius;
      particle.vy = -particle.vy * wallDamping;
    }
  }
}
