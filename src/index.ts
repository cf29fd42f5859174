/**
 * content-safety-kit library exports.
 */

// Configuration
export * from './core/config/index.js';

// Service clients
export * from './core/safety/index.js';

// Content filter
export * from './core/filter/index.js';

// Scanning and reports
export * from './core/report/index.js';

// LLM review
export * from './llm/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
