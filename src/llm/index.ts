/**
 * LLM module exports.
 */
export * from './types.js';
export * from './providers/index.js';
