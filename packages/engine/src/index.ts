/**
 * @pulsefield/engine
 * Audio-reactive particle simulation driven by a per-frame quad-tree
 */

export * from './api/index.js';
export * from './particles/index.js';
export * from './audio/index.js';
export * from './physics/index.js';
export * from './render/index.js';
export * from './simulation/index.js';
