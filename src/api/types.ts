/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * Rendering logic lives in the snippet engine, never here.
 */

import type { LogLevel } from '../config/types.js';
import type { RuleSetSummary } from '../snippet/describe.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Snippet Endpoints
// ============================================================================

/**
 * Response for listing rule sets.
 */
export interface ListSnippetsResponse {
  snippets: RuleSetSummary[];
  total: number;
}

/**
 * Path parameters for fetching one rule set definition.
 */
export interface SnippetParams {
  /** Definition id, or a match-key label */
  id: string;
}

/**
 * Query for resolving the rule set of a resource type.
 */
export interface ResolveSnippetQuery {
  /** Type IRI */
  type?: string;
}

/**
 * Response for rendering a document.
 */
export interface RenderResponse {
  /** Rendered snippet markup, or null when the document holds no statements */
  snippet: string | null;
  statistics: {
    /** Number of statements read from the document */
    count: number;
    /** Match-key labels of the rule sets used */
    templates: string[];
  };
}

// ============================================================================
// Health
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    snippets?: { loaded: number };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server options. Anything set here overrides config.yaml.
 */
export interface ServerOptions {
  /** HTTP port */
  port?: number;
  /** HTTP host */
  host?: string;
  /** Directory of *.snippet.yaml files, relative to the base path */
  snippetsDir?: string;
  /** Enable CORS */
  cors?: boolean;
  /** Log level */
  logLevel?: LogLevel;
}
