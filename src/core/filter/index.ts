export * from './levels.js';
export * from './types.js';
export * from './pipeline.js';
