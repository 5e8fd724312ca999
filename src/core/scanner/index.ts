/**
 * Scanner exports barrel file.
 */
export * from './types.js';
export * from './manifest.js';
export * from './directory-scanner.js';
