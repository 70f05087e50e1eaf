/**
 * @pulsefield/geo
 * Spatial structures over @pulsefield/core regions
 */

export * from './spatial/index.js';
