/**
 * Snippet engine exports.
 */

export * from './types.js';
export * from './markup.js';
export * from './RuleRegistry.js';
export * from './RuleSpecLoader.js';
export * from './PropertyClassifier.js';
export * from './ValueFormatter.js';
export * from './SnippetResolver.js';
export * from './SnippetRenderer.js';
export * from './describe.js';
export * from './formatters/index.js';
