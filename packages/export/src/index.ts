export * from './styles.js';
export * from './excel.js';
export * from './sink.js';
export * from './boundary.js';
