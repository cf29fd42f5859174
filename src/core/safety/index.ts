export * from './types.js';
export * from './transport.js';
export * from './client.js';
export * from './blocklist-client.js';
export * from './factory.js';
