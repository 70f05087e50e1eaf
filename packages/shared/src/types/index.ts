/**
 * Shared type definitions
 */

// ============================================================================
// Particle Categories
// ============================================================================

/** Audio band a particle responds to */
export type ParticleCategory = 'bass' | 'mid' | 'treble';

/** All categories, in band order (low to high) */
export const PARTICLE_CATEGORIES: readonly [ParticleCategory, ...ParticleCategory[]] = [
  'bass',
  'mid',
  'treble',
];

/** Spawn target: a single category, or a random mix of all three */
export type SpawnKind = ParticleCategory | 'mixed';

/** RGB color with channels in [0, 1] */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

// ============================================================================
// Band Energies
// ============================================================================

/** Smoothed per-band energies, each in [0, 1] */
export interface BandEnergies {
  bass: number;
  mid: number;
  treble: number;
}

// ============================================================================
// Host Collaborators
// ============================================================================

/** Uniform random source in [0, 1), Math.random-compatible */
export type RandomSource = () => number;

/** Minimal logging surface; console satisfies it */
export type Logger = Pick<Console, 'info' | 'warn'>;

/** Parameters the host may adjust at run time */
export type TunableParameter = 'gravity' | 'drag' | 'repulsionStrength';
