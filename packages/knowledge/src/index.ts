/**
 * Filesystem document discovery and text extraction
 */

export * from './types.js';
export * from './formats.js';
export * from './source.js';
