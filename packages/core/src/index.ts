/**
 * @pulsefield/core
 * Region geometry and configuration schemas
 */

export * from './schema/index.js';
export * from './coords/index.js';
