/**
 * Simulation API - contracts between the core and its host
 */

import type { BandEnergies, ParticleCategory, RGB } from '@pulsefield/shared';
import type { Region } from '@pulsefield/core/coords';
import type { SimulationCommandInput } from '@pulsefield/core';

// ============================================================================
// Audio Types
// ============================================================================

/**
 * Playback-side audio collaborator. The core never decodes audio; it only
 * asks where the playback head is and what the amplitude was at a position.
 */
export interface AudioSource {
  /** Playback head, in samples */
  position(): number;
  /** Signed amplitude at a sample position (nominally [-1, 1]) */
  amplitudeAt(position: number): number;
}

/** Band energies and beat state after one audio update */
export interface AudioSnapshot extends BandEnergies {
  beat: boolean;
  /** Recent absolute amplitudes, for display only */
  waveform: readonly number[];
}

// ============================================================================
// Step Types
// ============================================================================

/** Counters from one physics step */
export interface StepStats {
  /** Time step actually integrated, after clamping */
  dt: number;
  /** Particles placed in the spatial index */
  inserted: number;
  /** Particles outside the index this frame, skipped by collision lookups */
  dropped: number;
  /** Overlapping pairs resolved */
  contacts: number;
}

// ============================================================================
// Render Types
// ============================================================================

/** One particle as the host should draw it */
export interface ParticleView {
  x: number;
  y: number;
  size: number;
  category: ParticleCategory;
  color: RGB;
  outline: RGB;
  floorY: number;
}

/** Everything the host needs to draw one frame */
export interface FrameView {
  /** Grey level of the background, [0, 1] */
  background: number;
  particles: ParticleView[];
  /** Band meters; null while audio response is off */
  bands: BandEnergies | null;
  beat: boolean;
  waveform: readonly number[];
  /** Index regions for the debug overlay; null while the overlay is hidden */
  regions: Region[] | null;
  audioResponsive: boolean;
  /** True when energies come from the synthetic generator */
  syntheticAudio: boolean;
  stats: StepStats;
}

// ============================================================================
// Engine Interface
// ============================================================================

/** Frame-driven simulation, as seen by a host loop */
export interface SimulationEngine {
  /** Advance by `dt` seconds */
  update(dt: number): StepStats;

  /** Describe the current frame for drawing */
  draw(): FrameView;

  /** Apply a host command (validated) */
  dispatch(command: SimulationCommandInput): void;

  /** Recreate the initial population */
  reset(): void;
}
