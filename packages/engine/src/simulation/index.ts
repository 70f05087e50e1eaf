/**
 * Simulation - the frame-driven core a host loop drives
 *
 * Owns the particle store, the physics step and the audio model. The host calls
 * `update(dt)` then `draw()` once per frame and forwards input as commands.
 */

import type { Logger, RandomSource, SpawnKind, TunableParameter } from '@pulsefield/shared';
import { clamp, isValidNumber } from '@pulsefield/shared';
import type {
  SetParameterCommand,
  SimulationCommand,
  SimulationCommandInput,
  SimulationConfig,
  SimulationConfigInput,
  SpawnCommand,
} from '@pulsefield/core';
import { parseSimulationCommand, parseSimulationConfig } from '@pulsefield/core';
import type { Point2D } from '@pulsefield/core/coords';
import type { AudioSource, FrameView, SimulationEngine, StepStats } from '../api/index.js';
import { ParticleStore } from '../particles/index.js';
import { PhysicsStep } from '../physics/index.js';
import { AudioEnergyModel } from '../audio/index.js';
import { buildFrameView } from '../render/index.js';

export interface SimulationOptions {
  /** Uniform random source for population and spawns (default Math.random) */
  random?: RandomSource;
  /** Playback-side amplitude source; without one the synthetic generator drives the audio */
  audioSource?: AudioSource;
  logger?: Logger;
}

const EMPTY_STATS: StepStats = { dt: 0, inserted: 0, dropped: 0, contacts: 0 };

export class Simulation implements SimulationEngine {
  readonly config: SimulationConfig;
  readonly store: ParticleStore;
  readonly physics: PhysicsStep;
  readonly audio: AudioEnergyModel;
  private readonly logger: Logger;
  private audioSource: AudioSource | undefined;
  private responsive: boolean;
  private overlay = false;
  private lastStats: StepStats = EMPTY_STATS;

  constructor(config: SimulationConfigInput, options: SimulationOptions = {}) {
    this.config = parseSimulationConfig(config);
    this.logger = options.logger ?? console;
    this.responsive = this.config.audioResponsive;

    const bounds = { width: this.config.width, height: this.config.height };
    this.store = new ParticleStore(bounds, this.config.spawn, options.random ?? Math.random);
    this.physics = new PhysicsStep(bounds, this.config.physics);
    this.audio = new AudioEnergyModel(this.config.audio);

    this.store.populate();
    this.setAudioSource(options.audioSource);
  }

  get audioResponsive(): boolean {
    return this.responsive;
  }

  get overlayVisible(): boolean {
    return this.overlay;
  }

  get particleCount(): number {
    return this.store.size;
  }

  /** Counters from the most recent update */
  get stats(): StepStats {
    return this.lastStats;
  }

  /**
   * Attach or detach the amplitude source. Detaching falls back to the
   * synthetic generator.
   */
  setAudioSource(source: AudioSource | undefined): void {
    this.audioSource = source;
    if (source) {
      this.logger.info('[Simulation] Using attached audio source');
    } else {
      this.logger.info('[Simulation] No audio source, using synthetic audio');
    }
  }

  update(dt: number): StepStats {
    const frameDt = isValidNumber(dt) ? clamp(dt, 0, this.config.physics.maxDt) : 0;
    const audio = this.responsive ? this.audio.update(frameDt, this.audioSource) : undefined;

    const stats = this.physics.step(frameDt, this.store.particles, audio);
    if (stats.dropped > 0) {
      this.logger.warn(`[Simulation] ${stats.dropped} particle(s) outside the index this frame`);
    }

    this.lastStats = stats;
    return stats;
  }

  draw(): FrameView {
    return buildFrameView({
      particles: this.store.particles,
      audio: this.audio.snapshot(),
      audioResponsive: this.responsive,
      syntheticAudio: this.audioSource === undefined,
      regions: this.overlay ? this.physics.index.regions() : null,
      stats: this.lastStats,
    });
  }

  /**
   * Validate and apply a host command. Throws ZodError on an invalid command.
   */
  dispatch(command: SimulationCommandInput): void {
    this.apply(parseSimulationCommand(command));
  }

  reset(): void {
    this.store.reset();
    this.physics.index.clear();
    this.lastStats = EMPTY_STATS;
  }

  /** Add particles at a location; returns how many were added */
  spawn(kind: SpawnKind, at: Point2D, count?: number): number {
    return this.store.spawn(kind, at, count).length;
  }

  /** Turn audio response on or off; turning it off clears the beat flag */
  setAudioResponsive(enabled: boolean): void {
    if (this.responsive === enabled) return;
    this.responsive = enabled;
    if (!enabled) this.audio.silence();
  }

  /** Adjust a physics parameter; throws ZodError when the value is out of range */
  setParameter(parameter: TunableParameter, value: number): void {
    this.dispatch({ type: 'setParameter', parameter, value });
  }

  private apply(command: SimulationCommand): void {
    switch (command.type) {
      case 'spawn':
        this.applySpawn(command);
        break;
      case 'toggleAudio':
        this.setAudioResponsive(!this.responsive);
        break;
      case 'toggleOverlay':
        this.overlay = !this.overlay;
        break;
      case 'reset':
        this.reset();
        break;
      case 'setParameter':
        this.applyParameter(command);
        break;
    }
  }

  private applySpawn(command: SpawnCommand): void {
    this.spawn(command.kind, command.at, command.count);
  }

  private applyParameter(command: SetParameterCommand): void {
    this.physics.setParameter(command.parameter, command.value);
  }
}
