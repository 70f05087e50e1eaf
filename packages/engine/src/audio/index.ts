/**
 * Audio energy model
 *
 * Turns either a live amplitude source or a synthetic oscillator bank into
 * three band energies in [0, 1] plus a beat flag. This is a loudness proxy,
 * not a spectrum: the sample window is cut into thirds by position and each
 * third's mean absolute amplitude stands in for a band.
 */

import type { BandEnergies } from '@pulsefield/shared';
import {
  SYNTHETIC_BASS_PEAK_BOOST,
  SYNTHETIC_BASS_PEAK_ONSET,
  clamp01,
  isValidNumber,
  smoothstep,
} from '@pulsefield/shared';
import type { AudioConfig } from '@pulsefield/core';
import type { AudioSnapshot, AudioSource } from '../api/index.js';

// ============================================================================
// Synthetic Energies
// ============================================================================

/** Map a sine value from [-1, 1] to [0, 1] */
function unitSine(phase: number): number {
  return (Math.sin(phase) + 1) / 2;
}

/**
 * Band energies as a pure function of elapsed time. Each band is a sum of
 * phase-shifted oscillators; bass also swells by up to SYNTHETIC_BASS_PEAK_BOOST
 * near the crest of a slow 0.8 rad/s oscillator.
 */
export function syntheticBandEnergies(t: number): BandEnergies {
  let bass = unitSine(t * 2) * 0.7 + unitSine(t * 4.5) * 0.3;
  const swell = smoothstep(SYNTHETIC_BASS_PEAK_ONSET, 1, Math.sin(t * 0.8));
  bass = Math.min(1, bass * (1 + SYNTHETIC_BASS_PEAK_BOOST * swell));

  return {
    bass: clamp01(bass),
    mid: clamp01(unitSine(t * 3 + 1)),
    treble: clamp01(unitSine(t * 5 + 2)),
  };
}

/**
 * Fill a waveform buffer with the synthetic display trace for time t
 */
export function syntheticWaveform(t: number, out: number[]): void {
  for (let i = 0; i < out.length; i++) {
    const n = i + 1;
    out[i] = Math.abs(Math.sin(t * 4 + n / 20) * Math.cos(t + n / 10)) * 0.5;
  }
}

// ============================================================================
// Sampled Energies
// ============================================================================

/**
 * Read the `out.length` samples ending at the playback head into `out` (as
 * absolute amplitudes) and average each third of the window into a band.
 * Positions at or before the start of playback are skipped and read as 0.
 * Returns null when no position in the window was readable.
 */
export function sampledBandEnergies(source: AudioSource, out: number[]): BandEnergies | null {
  const points = out.length;
  const third = points / 3;
  const head = source.position();
  let bass = 0;
  let mid = 0;
  let treble = 0;
  let read = 0;

  for (let i = 0; i < points; i++) {
    const position = head - points + i;
    if (!(position > 0)) {
      out[i] = 0;
      continue;
    }

    const raw = source.amplitudeAt(position);
    const amplitude = isValidNumber(raw) ? Math.abs(raw) : 0;
    out[i] = amplitude;

    if (i < third) {
      bass += amplitude;
    } else if (i < 2 * third) {
      mid += amplitude;
    } else {
      treble += amplitude;
    }
    read++;
  }

  if (read === 0) return null;
  return {
    bass: clamp01(bass / third),
    mid: clamp01(mid / third),
    treble: clamp01(treble / third),
  };
}

// ============================================================================
// Audio Energy Model
// ============================================================================

export class AudioEnergyModel {
  private readonly config: AudioConfig;
  private energies: BandEnergies = { bass: 0, mid: 0, treble: 0 };
  private beatDetected = false;
  private beatTimer = 0;
  private elapsed = 0;
  private readonly waveform: number[];

  constructor(config: AudioConfig) {
    this.config = config;
    this.waveform = new Array<number>(config.samplePoints).fill(0);
  }

  get bass(): number {
    return this.energies.bass;
  }

  get mid(): number {
    return this.energies.mid;
  }

  get treble(): number {
    return this.energies.treble;
  }

  get beat(): boolean {
    return this.beatDetected;
  }

  /** Seconds since the last beat (or since start) */
  get sinceLastBeat(): number {
    return this.beatTimer;
  }

  /**
   * Advance by `dt` seconds. With a source the energies come from its samples;
   * without one they come from the synthetic generator at the accumulated time.
   */
  update(dt: number, source?: AudioSource): AudioSnapshot {
    const step = isValidNumber(dt) ? Math.max(dt, 0) : 0;
    this.beatTimer += step;
    this.elapsed += step;

    if (source) {
      const sampled = sampledBandEnergies(source, this.waveform);
      if (sampled) this.energies = sampled;
    } else {
      this.energies = syntheticBandEnergies(this.elapsed);
      syntheticWaveform(this.elapsed, this.waveform);
    }

    if (this.energies.bass > this.config.beatThreshold && this.beatTimer > this.config.beatCooldown) {
      this.beatDetected = true;
      this.beatTimer = 0;
    } else {
      this.beatDetected = false;
    }

    return this.snapshot();
  }

  /** Current state, detached from the model */
  snapshot(): AudioSnapshot {
    return {
      bass: this.energies.bass,
      mid: this.energies.mid,
      treble: this.energies.treble,
      beat: this.beatDetected,
      waveform: [...this.waveform],
    };
  }

  /** Clear the beat flag without touching the energies */
  silence(): void {
    this.beatDetected = false;
  }

  /** Return to the initial state */
  reset(): void {
    this.energies = { bass: 0, mid: 0, treble: 0 };
    this.beatDetected = false;
    this.beatTimer = 0;
    this.elapsed = 0;
    this.waveform.fill(0);
  }
}

// ============================================================================
// Sample Buffer Source
// ============================================================================

export interface SampleBufferOptions {
  /** Samples per second of the buffer */
  sampleRate: number;
  /** Wrap the playback head at the end (default true) */
  loop?: boolean;
  /** Amplitude multiplier (default 1) */
  volume?: number;
}

/**
 * AudioSource over decoded PCM held in memory. The host advances the playback
 * head each frame with `advance(dt)`.
 */
export class SampleBufferSource implements AudioSource {
  private readonly samples: ArrayLike<number>;
  private readonly sampleRate: number;
  private readonly loop: boolean;
  private cursor = 0;
  volume: number;

  constructor(samples: ArrayLike<number>, options: SampleBufferOptions) {
    if (!(options.sampleRate > 0)) {
      throw new RangeError(`sampleRate must be positive, got ${options.sampleRate}`);
    }
    this.samples = samples;
    this.sampleRate = options.sampleRate;
    this.loop = options.loop ?? true;
    this.volume = options.volume ?? 1;
  }

  /** Playback head in whole samples */
  position(): number {
    return Math.floor(this.cursor);
  }

  amplitudeAt(position: number): number {
    const length = this.samples.length;
    if (length === 0) return 0;

    let index = Math.floor(position);
    if (this.loop) {
      index = ((index % length) + length) % length;
    } else if (index < 0 || index >= length) {
      return 0;
    }
    return this.samples[index] * this.volume;
  }

  /** Move the playback head forward by `dt` seconds */
  advance(dt: number): void {
    if (!isValidNumber(dt) || dt <= 0) return;
    const length = this.samples.length;
    this.cursor += dt * this.sampleRate;
    if (length === 0) {
      this.cursor = 0;
    } else if (this.loop) {
      this.cursor %= length;
    } else {
      this.cursor = Math.min(this.cursor, length);
    }
  }

  /** Jump to a time in seconds */
  seek(seconds: number): void {
    this.cursor = Math.max(0, seconds * this.sampleRate);
  }

  /** True when a non-looping buffer has played to its end */
  get ended(): boolean {
    return !this.loop && this.cursor >= this.samples.length;
  }
}
