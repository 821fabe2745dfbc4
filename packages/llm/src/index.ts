export * from './types.js';
export * from './client.js';
export * from './prompts.js';
export * from './parser.js';
export * from './provider.js';
