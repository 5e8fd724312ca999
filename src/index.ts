/**
 * overlayconf - partition order and overlay policy resolution.
 * Main library exports barrel file.
 */

// Partitions
export * from './core/partitions/index.js';

// Package discovery
export * from './core/scanner/index.js';

// Policy
export * from './core/policy/index.js';

// Resolution
export * from './core/resolution/index.js';

// Settings
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
