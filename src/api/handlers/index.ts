/**
 * Handler exports for the API layer.
 */

export * from './SnippetHandlers.js';
