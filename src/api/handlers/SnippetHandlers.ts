/**
 * SnippetHandlers — HTTP handlers for rule listing and rendering.
 *
 * These handlers are thin wrappers: documents are read into a graph and
 * handed to the SnippetRenderer with the request's logger.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { GraphReadError, readJsonLd } from '../../graph/JsonLdGraphReader.js';
import type { RuleRegistry } from '../../snippet/RuleRegistry.js';
import type { SnippetRenderer } from '../../snippet/SnippetRenderer.js';
import { describeRuleSet, type RuleSetSummary } from '../../snippet/describe.js';
import type {
  ApiError,
  ListSnippetsResponse,
  RenderResponse,
  ResolveSnippetQuery,
  SnippetParams,
} from '../types.js';

const renderRequestSchema = z.object({
  document: z.union([z.record(z.string(), z.unknown()), z.array(z.unknown())]),
  root: z.string().min(1).optional(),
});

/**
 * Create snippet handlers bound to a registry and renderer.
 */
export function createSnippetHandlers(registry: RuleRegistry, renderer: SnippetRenderer) {
  return {
    /**
     * GET /snippets
     * List all rule sets in registration order.
     */
    async listSnippets(
      _request: FastifyRequest,
      _reply: FastifyReply
    ): Promise<ListSnippetsResponse> {
      const snippets = registry.getAll().map(describeRuleSet);
      return {
        snippets,
        total: snippets.length,
      };
    },

    /**
     * GET /snippets/:id
     * The rule sets compiled from one definition. A match-key label
     * (type IRI or pattern source) is accepted as well.
     */
    async getSnippet(
      request: FastifyRequest<{ Params: SnippetParams }>,
      reply: FastifyReply
    ): Promise<ListSnippetsResponse | ApiError> {
      const { id } = request.params;

      const byId = registry.getById(id);
      const byLabel = registry.get(id);
      const ruleSets = byId.length > 0 ? byId : byLabel !== undefined ? [byLabel] : [];

      if (ruleSets.length === 0) {
        reply.status(404);
        return {
          error: 'NOT_FOUND',
          message: `Snippet rule set not found: ${id}`,
        };
      }

      const snippets = ruleSets.map(describeRuleSet);
      return {
        snippets,
        total: snippets.length,
      };
    },

    /**
     * GET /snippets/resolve?type=IRI
     * The rule set a resource of the given type would be rendered with.
     */
    async resolveSnippet(
      request: FastifyRequest<{ Querystring: ResolveSnippetQuery }>,
      reply: FastifyReply
    ): Promise<RuleSetSummary | ApiError> {
      const { type } = request.query;

      if (!type) {
        reply.status(400);
        return {
          error: 'BAD_REQUEST',
          message: 'type is required',
        };
      }

      const ruleSet = registry.resolve([type]);
      if (!ruleSet) {
        reply.status(404);
        return {
          error: 'NOT_FOUND',
          message: `No snippet rule set matches type: ${type}`,
        };
      }

      return describeRuleSet(ruleSet);
    },

    /**
     * POST /render
     * Render a JSON-LD document into a snippet.
     */
    async render(
      request: FastifyRequest,
      reply: FastifyReply
    ): Promise<RenderResponse | ApiError> {
      const parsed = renderRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return {
          error: 'BAD_REQUEST',
          message: 'document must be a JSON-LD object or array',
          details: parsed.error.issues,
        };
      }

      const { document, root } = parsed.data;

      try {
        const graph = readJsonLd(document);
        const result = renderer.render(graph, {
          ...(root !== undefined ? { root } : {}),
          logger: request.log,
        });

        return {
          snippet: result.fragment !== '' ? result.fragment : null,
          statistics: {
            count: graph.size,
            templates: result.matchedRuleTypes,
          },
        };
      } catch (err) {
        if (err instanceof GraphReadError) {
          reply.status(400);
          return {
            error: 'READ_ERROR',
            message: err.message,
          };
        }
        const message = err instanceof Error ? err.message : String(err);
        reply.status(500);
        return {
          error: 'INTERNAL_ERROR',
          message: `Render failed: ${message}`,
        };
      }
    },
  };
}

export type SnippetHandlers = ReturnType<typeof createSnippetHandlers>;
