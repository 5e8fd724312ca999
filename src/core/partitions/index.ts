/**
 * Partition exports barrel file.
 */
export * from './types.js';
export * from './model.js';
export * from './order-validator.js';
