/**
 * HTTP API exports.
 */

export * from './types.js';
export * from './routes.js';
export * from './handlers/index.js';
