/**
 * Shared domain types and utilities
 */

export * from './types.js';
export * from './errors.js';
export * from './enums.js';
export * from './batches.js';
export * from './ports.js';
export * from './report.js';
