/**
 * rdf-snippets — Rule-driven HTML snippets for RDF graphs.
 *
 * This is the main entry point for the library.
 */

// Graph model, CURIEs and the JSON-LD reader
export * from './graph/index.js';

// Snippet engine
export * from './snippet/index.js';

// Configuration
export * from './config/loader.js';
export * from './config/types.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
