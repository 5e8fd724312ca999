/**
 * Resolution exports barrel file.
 */
export * from './types.js';
export * from './engine.js';
export * from './overlay-config.js';
export * from './cache.js';
