export * from './result.js';
export * from './events.js';
export * from './pipeline.js';
export * from './finance.js';
export * from './call.js';
