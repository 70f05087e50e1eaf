/**
 * Simulation configuration and command schemas
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import {
  DEFAULT_GRAVITY,
  DEFAULT_DRAG,
  DEFAULT_REPULSION_STRENGTH,
  DEFAULT_WALL_DAMPING,
  DEFAULT_FLOOR_DAMPING,
  MAX_FRAME_DT,
  NEIGHBOR_WINDOW_SCALE,
  BOUNCE_THRESHOLD,
  BOUNCE_IMPULSE_SCALE,
  SIMULATION_NODE_CAPACITY,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SAMPLE_POINTS,
  DEFAULT_BEAT_THRESHOLD,
  DEFAULT_BEAT_COOLDOWN,
  DEFAULT_PARTICLE_COUNT,
  DEFAULT_PARTICLE_RADIUS,
  DEFAULT_FLOOR_BAND,
  MIXED_SPAWN_COUNT,
  CATEGORY_SPAWN_COUNT,
} from '@pulsefield/shared';
import type { TunableParameter } from '@pulsefield/shared';

// ============================================================================
// Base Schemas
// ============================================================================

/** 2D Point schema */
export const Point2DSchema = z.object({
  x: z.number(),
  y: z.number(),
});

// ============================================================================
// Physics Configuration
// ============================================================================

/** Integrator, collision and index settings */
export const PhysicsConfigSchema = z.object({
  gravity: z.number().min(0).default(DEFAULT_GRAVITY),
  drag: z.number().gt(0).max(1).default(DEFAULT_DRAG),
  repulsionStrength: z.number().min(0).default(DEFAULT_REPULSION_STRENGTH),
  wallDamping: z.number().min(0).max(1).default(DEFAULT_WALL_DAMPING),
  floorDamping: z.number().min(0).max(1).default(DEFAULT_FLOOR_DAMPING),
  maxDt: z.number().positive().default(MAX_FRAME_DT),
  neighborWindowScale: z.number().positive().default(NEIGHBOR_WINDOW_SCALE),
  bounceThreshold: z.number().min(0).default(BOUNCE_THRESHOLD),
  bounceImpulse: z.number().min(0).default(BOUNCE_IMPULSE_SCALE),

  // Spatial index
  nodeCapacity: z.number().int().positive().default(SIMULATION_NODE_CAPACITY),
  maxDepth: z.number().int().min(0).max(32).default(DEFAULT_MAX_DEPTH),
});

// ============================================================================
// Audio Configuration
// ============================================================================

/** Band energy and beat detection settings */
export const AudioConfigSchema = z.object({
  samplePoints: z.number().int().min(3).default(DEFAULT_SAMPLE_POINTS),
  beatThreshold: z.number().min(0).max(1).default(DEFAULT_BEAT_THRESHOLD),
  beatCooldown: z.number().min(0).default(DEFAULT_BEAT_COOLDOWN),
});

// ============================================================================
// Spawn Configuration
// ============================================================================

/** Population and spawn settings */
export const SpawnConfigSchema = z.object({
  particleCount: z.number().int().min(0).default(DEFAULT_PARTICLE_COUNT),
  particleRadius: z.number().positive().default(DEFAULT_PARTICLE_RADIUS),
  floorBand: z.number().int().positive().default(DEFAULT_FLOOR_BAND),
  mixedSpawnCount: z.number().int().positive().default(MIXED_SPAWN_COUNT),
  categorySpawnCount: z.number().int().positive().default(CATEGORY_SPAWN_COUNT),
});

// ============================================================================
// Complete Simulation Configuration
// ============================================================================

/** Simulation configuration schema */
export const SimulationConfigSchema = z
  .object({
    width: z.number().positive(),
    height: z.number().positive(),
    audioResponsive: z.boolean().default(true),
    physics: PhysicsConfigSchema.default({}),
    audio: AudioConfigSchema.default({}),
    spawn: SpawnConfigSchema.default({}),
  })
  .refine((config) => config.spawn.floorBand <= config.height, {
    message: 'floorBand must fit inside the simulation height',
    path: ['spawn', 'floorBand'],
  });

// ============================================================================
// Commands
// ============================================================================

/** Accepted range for each run-time adjustable parameter */
export const TUNABLE_RANGES: Readonly<Record<TunableParameter, { min: number; max: number }>> = {
  gravity: { min: 0, max: 2 },
  drag: { min: 0.5, max: 1 },
  repulsionStrength: { min: 0, max: 50 },
};

export const SpawnCommandSchema = z.object({
  type: z.literal('spawn'),
  kind: z.enum(['bass', 'mid', 'treble', 'mixed']).default('mixed'),
  count: z.number().int().positive().max(1000).optional(),
  at: Point2DSchema,
});

export const ToggleAudioCommandSchema = z.object({
  type: z.literal('toggleAudio'),
});

export const ToggleOverlayCommandSchema = z.object({
  type: z.literal('toggleOverlay'),
});

export const ResetCommandSchema = z.object({
  type: z.literal('reset'),
});

export const SetParameterCommandSchema = z.object({
  type: z.literal('setParameter'),
  parameter: z.enum(['gravity', 'drag', 'repulsionStrength']),
  value: z.number(),
});

/** Host command union */
export const SimulationCommandSchema = z
  .discriminatedUnion('type', [
    SpawnCommandSchema,
    ToggleAudioCommandSchema,
    ToggleOverlayCommandSchema,
    ResetCommandSchema,
    SetParameterCommandSchema,
  ])
  .superRefine((command, ctx) => {
    if (command.type !== 'setParameter') return;
    const range = TUNABLE_RANGES[command.parameter];
    if (command.value < range.min || command.value > range.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: `${command.parameter} must be within [${range.min}, ${range.max}]`,
      });
    }
  });

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type PhysicsConfig = z.infer<typeof PhysicsConfigSchema>;
export type AudioConfig = z.infer<typeof AudioConfigSchema>;
export type SpawnConfig = z.infer<typeof SpawnConfigSchema>;
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SpawnCommand = z.infer<typeof SpawnCommandSchema>;
export type SetParameterCommand = z.infer<typeof SetParameterCommandSchema>;
export type SimulationCommand = z.infer<typeof SimulationCommandSchema>;
export type SimulationCommandInput = z.input<typeof SimulationCommandSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a configuration object against the schema
 */
export function validateSimulationConfig(
  data: unknown
): { success: true; data: SimulationConfig } | { success: false; errors: z.ZodError } {
  const result = SimulationConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Parse and validate a configuration, throwing on error
 */
export function parseSimulationConfig(data: unknown): SimulationConfig {
  return SimulationConfigSchema.parse(data);
}

/**
 * Parse and validate a host command, throwing on error
 */
export function parseSimulationCommand(data: unknown): SimulationCommand {
  return SimulationCommandSchema.parse(data);
}

/**
 * Default configuration for a surface of the given size
 */
export function getDefaultSimulationConfig(width: number, height: number): SimulationConfig {
  return parseSimulationConfig({ width, height });
}

/**
 * Merge a partial override into a configuration and re-validate the result
 */
export function mergeSimulationConfig(
  defaults: SimulationConfig,
  override?: Partial<SimulationConfigInput>
): SimulationConfig {
  if (!override) return defaults;

  return parseSimulationConfig({
    width: override.width ?? defaults.width,
    height: override.height ?? defaults.height,
    audioResponsive: override.audioResponsive ?? defaults.audioResponsive,
    physics: { ...defaults.physics, ...override.physics },
    audio: { ...defaults.audio, ...override.audio },
    spawn: { ...defaults.spawn, ...override.spawn },
  });
}
