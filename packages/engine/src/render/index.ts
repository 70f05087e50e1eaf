/**
 * Frame description for the host renderer
 */

import type { RGB } from '@pulsefield/shared';
import {
  BACKGROUND_BEAT_INTENSITY,
  BACKGROUND_INTENSITY,
  BASS_BEAT_INTENSITY,
  BASS_INTENSITY_PER_ENERGY,
  BASS_SIZE_PER_ENERGY,
  OUTLINE_SHADE,
} from '@pulsefield/shared';
import type { Region } from '@pulsefield/core/coords';
import type { Particle } from '../particles/index.js';
import type { AudioSnapshot, FrameView, ParticleView, StepStats } from '../api/index.js';

function shade(color: RGB, factor: number): RGB {
  return { r: color.r * factor, g: color.g * factor, b: color.b * factor };
}

/**
 * Drawn size and color of one particle. Bass particles grow with their bounce
 * energy and their red channel brightens with bass energy, more so on a beat.
 */
export function particleView(particle: Particle, audio: Pick<AudioSnapshot, 'bass' | 'beat'>): ParticleView {
  const color: RGB = { ...particle.color };
  let size = particle.radius;

  if (particle.category === 'bass') {
    let intensity = 1 + audio.bass * BASS_INTENSITY_PER_ENERGY;
    if (audio.beat) intensity += BASS_BEAT_INTENSITY;
    color.r = Math.min(1, color.r * intensity);
    size = particle.radius * (1 + particle.bounceEnergy * BASS_SIZE_PER_ENERGY);
  }

  return {
    x: particle.x,
    y: particle.y,
    size,
    category: particle.category,
    color,
    outline: shade(color, OUTLINE_SHADE),
    floorY: particle.floorY,
  };
}

export interface FrameInput {
  particles: readonly Particle[];
  audio: AudioSnapshot;
  audioResponsive: boolean;
  syntheticAudio: boolean;
  /** Index regions, when the overlay is shown */
  regions: Region[] | null;
  stats: StepStats;
}

/**
 * Assemble everything the host draws for one frame
 */
export function buildFrameView(input: FrameInput): FrameView {
  const { audio, audioResponsive } = input;
  const beat = audioResponsive && audio.beat;

  return {
    background: beat ? BACKGROUND_BEAT_INTENSITY : BACKGROUND_INTENSITY,
    particles: input.particles.map((particle) => particleView(particle, { bass: audio.bass, beat })),
    bands: audioResponsive ? { bass: audio.bass, mid: audio.mid, treble: audio.treble } : null,
    beat,
    waveform: audio.waveform,
    regions: input.regions,
    audioResponsive,
    syntheticAudio: input.syntheticAudio,
    stats: { ...input.stats },
  };
}
