/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers with no rendering logic.
 */

import type { FastifyInstance } from 'fastify';
import type { SnippetHandlers } from './handlers/SnippetHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  snippetHandlers: SnippetHandlers;
  snippetCount: () => number;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { snippetHandlers, snippetCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        snippets: { loaded: snippetCount() },
      },
    };
  });

  // ============================================================================
  // Snippet Routes
  // ============================================================================

  // List rule sets
  fastify.get('/snippets', snippetHandlers.listSnippets);

  // Rule set for a type IRI
  fastify.get('/snippets/resolve', snippetHandlers.resolveSnippet);

  // Rule sets of one definition
  fastify.get('/snippets/:id', snippetHandlers.getSnippet);

  // Render a JSON-LD document
  fastify.post('/render', snippetHandlers.render);
}
