export * from './journal.js';
export * from './drafts.js';
export * from './recommendations.js';
export * from './document-stage.js';
export * from './analyze.js';
export * from './analytics.js';
export * from './report.js';
