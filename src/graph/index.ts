/**
 * Graph module exports.
 */

export * from './types.js';
export * from './terms.js';
export * from './TripleGraph.js';
export * from './Prefixes.js';
export * from './JsonLdGraphReader.js';
