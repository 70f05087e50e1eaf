/**
 * Simulation and tuning constants
 */

import type { ParticleCategory, RGB } from '../types/index.js';

// ============================================================================
// Time Constants
// ============================================================================

/** Reference frame rate that velocities are expressed against (units per frame at 60 fps) */
export const FRAME_RATE_REFERENCE = 60;

/** Largest time step a single frame may integrate (s) */
export const MAX_FRAME_DT = 0.05;

// ============================================================================
// Physics Defaults
// ============================================================================

/** Gravitational acceleration per unit mass, per reference frame */
export const DEFAULT_GRAVITY = 0.1;

/** Per-frame velocity retention factor */
export const DEFAULT_DRAG = 0.98;

/** Numerator of the inverse-distance repulsion impulse */
export const DEFAULT_REPULSION_STRENGTH = 5;

/** Velocity retained when reflecting off side walls and the ceiling */
export const DEFAULT_WALL_DAMPING = 0.8;

/** Velocity retained when reflecting off a particle's floor level */
export const DEFAULT_FLOOR_DAMPING = 0.5;

/** Neighbor query window edge, in multiples of the particle radius */
export const NEIGHBOR_WINDOW_SCALE = 4;

/** Bounce energy a grounded particle needs before it is kicked upward */
export const BOUNCE_THRESHOLD = 0.5;

/** Upward velocity per unit of bounce energy and mass */
export const BOUNCE_IMPULSE_SCALE = 0.5;

/** Centre separation below which a pair is treated as coincident */
export const MIN_SEPARATION = 1e-9;

/** Mass floor used wherever a mass is inverted */
export const MIN_MASS = 1;

// ============================================================================
// Spatial Index Defaults
// ============================================================================

/** Items a quad-tree leaf holds before it subdivides */
export const DEFAULT_NODE_CAPACITY = 4;

/** Capacity the simulation uses for its per-frame index */
export const SIMULATION_NODE_CAPACITY = 8;

/** Deepest level a quad-tree node may subdivide to */
export const DEFAULT_MAX_DEPTH = 12;

// ============================================================================
// Audio Defaults
// ============================================================================

/** Amplitude samples per analysis window (and waveform length) */
export const DEFAULT_SAMPLE_POINTS = 256;

/** Bass energy a beat must exceed */
export const DEFAULT_BEAT_THRESHOLD = 0.5;

/** Minimum time between two beats (s) */
export const DEFAULT_BEAT_COOLDOWN = 0.1;

/** Bass boost applied at the peak of the synthetic swell */
export const SYNTHETIC_BASS_PEAK_BOOST = 0.3;

/** Swell oscillator value where the synthetic bass boost begins */
export const SYNTHETIC_BASS_PEAK_ONSET = 0.7;

// ============================================================================
// Category Response
// ============================================================================

/** How one particle category turns band energies into bounce energy */
export interface CategoryResponse {
  /** Weight on the category's own band */
  bandWeight: number;
  /** Weight on the mid band (bass particles only) */
  midCrossWeight: number;
  /** Added to the target on a beat frame */
  beatBonus: number;
  /** Fraction of the gap to the target closed each frame */
  smoothing: number;
}

/**
 * Empirical response table. Bass particles react hardest and fastest, with a
 * small pull from the mid band.
 */
export const CATEGORY_RESPONSE: Readonly<Record<ParticleCategory, CategoryResponse>> = {
  bass: { bandWeight: 25, midCrossWeight: 5, beatBonus: 20, smoothing: 0.2 },
  mid: { bandWeight: 10, midCrossWeight: 0, beatBonus: 7, smoothing: 0.05 },
  treble: { bandWeight: 7, midCrossWeight: 0, beatBonus: 5, smoothing: 0.05 },
};

/** Base color per category */
export const CATEGORY_COLORS: Readonly<Record<ParticleCategory, RGB>> = {
  bass: { r: 0.8, g: 0.2, b: 0.2 },
  mid: { r: 0.2, g: 0.8, b: 0.2 },
  treble: { r: 0.2, g: 0.2, b: 0.8 },
};

// ============================================================================
// Spawn Defaults
// ============================================================================

/** Collision radius every particle is created with */
export const DEFAULT_PARTICLE_RADIUS = 3;

/** Particles created at start and on reset */
export const DEFAULT_PARTICLE_COUNT = 500;

/** Height of the band above the bottom edge where floor levels fall */
export const DEFAULT_FLOOR_BAND = 50;

/** Particles added by a mixed spawn */
export const MIXED_SPAWN_COUNT = 50;

/** Particles added by a single-category spawn */
export const CATEGORY_SPAWN_COUNT = 20;

/** Edge of the square a category spawn scatters particles over */
export const CATEGORY_SPAWN_SCATTER = 40;

/** Velocity spread of the initial population (each component in ±spread/2) */
export const INITIAL_VELOCITY_SPREAD = 2;

/** Velocity spread of spawned particles */
export const SPAWN_VELOCITY_SPREAD = 5;

/** Inclusive mass range of the initial population and mixed spawns */
export const MIXED_MASS_RANGE = { min: 1, max: 4 } as const;

/** Inclusive mass range for single-category spawns; bass runs heavy, treble light */
export const CATEGORY_MASS_RANGE: Readonly<Record<ParticleCategory, { min: number; max: number }>> = {
  bass: { min: 2, max: 4 },
  mid: { min: 1, max: 3 },
  treble: { min: 1, max: 2 },
};

// ============================================================================
// Display Constants
// ============================================================================

/** Background intensity on ordinary frames */
export const BACKGROUND_INTENSITY = 0.05;

/** Background intensity on beat frames */
export const BACKGROUND_BEAT_INTENSITY = 0.15;

/** Bass particle growth per unit of bounce energy */
export const BASS_SIZE_PER_ENERGY = 0.05;

/** Red-channel gain per unit of bass energy for bass particles */
export const BASS_INTENSITY_PER_ENERGY = 0.5;

/** Extra red-channel gain for bass particles on a beat */
export const BASS_BEAT_INTENSITY = 0.5;

/** Outline color as a fraction of the fill color */
export const OUTLINE_SHADE = 0.7;
