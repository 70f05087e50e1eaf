/**
 * Shared utility functions
 */

import { MIN_MASS } from '../constants/index.js';
import type { RandomSource } from '../types/index.js';

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Clamp a value to [0, 1]
 */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Hermite smoothstep between two edges, 0 below and 1 above
 */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp01((x - edge0) / (edge1 - edge0));
  return t * t * (3 - 2 * t);
}

/**
 * Inverse of a mass, with the mass floored at MIN_MASS
 */
export function inverseMass(mass: number): number {
  return 1 / Math.max(mass, MIN_MASS);
}

// ============================================================================
// Random Utilities
// ============================================================================

/**
 * Seeded uniform generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Random value centred on zero, in [-spread/2, spread/2)
 */
export function randomCentered(random: RandomSource, spread: number): number {
  return (random() - 0.5) * spread;
}

/**
 * Pick one element of a non-empty list
 */
export function randomPick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index] ?? items[0];
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Check if a value is a valid finite number
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
