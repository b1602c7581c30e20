/**
 * Types for the snippet rendering engine.
 *
 * Rule sets are data: they come from *.snippet.yaml files (or are defined
 * in code with the same shape) and are compiled once into immutable
 * RuleSet objects. The engine interprets them; it holds no type-specific
 * logic of its own.
 */

import type { GraphAccessor, ResourceTerm, Term } from '../graph/types.js';
import type { PrefixMap } from '../graph/Prefixes.js';

// ============================================================================
// Rule sets
// ============================================================================

/**
 * How a rule set binds to resource types.
 */
export type MatchKey =
  | { kind: 'exact'; type: string }
  | { kind: 'pattern'; pattern: RegExp };

/**
 * How a multi-valued property is rendered.
 * - `join`: every value, comma-separated
 * - `first`: only the first value in source order
 * - `list`: every value as an ordered list
 */
export type MultiValuePolicy = 'join' | 'first' | 'list';

/**
 * When a formatter strategy is consulted relative to recursion into
 * referenced resources.
 * - `override`: before recursion (composite values such as ratings)
 * - `media`: after recursion, before the generic literal/link branches
 */
export type FormatterStage = 'override' | 'media';

/**
 * Everything a formatter strategy may look at.
 */
export interface FormatterContext {
  /** Property IRI being rendered */
  property: string;
  /** The property as a CURIE, for `property` / `rel` attributes */
  curie: string;
  graph: GraphAccessor;
  prefixes: PrefixMap;
}

/**
 * A formatter strategy bound to validated options.
 */
export interface BoundFormatter {
  readonly name: string;
  readonly stage: FormatterStage;
  /**
   * Render one value. Returns undefined to decline the value, in which
   * case the generic branches handle it.
   */
  format(value: Term, ctx: FormatterContext): string | undefined;
}

/**
 * Per-property presentation settings within a rule set.
 */
export interface PropertyRule {
  formatter?: BoundFormatter;
  multi: MultiValuePolicy;
  /** Label shown before the entry in the snippet body */
  label?: string;
  /** Classes used by the `list` policy */
  listClass: string;
  itemClass: string;
}

/**
 * A compiled, immutable presentation rule set.
 */
export interface RuleSet {
  /** Identifier from the rule file (several rule sets may share one) */
  readonly id: string;
  readonly matchKey: MatchKey;
  /** Lower number wins when several rule sets match; default 99 */
  readonly priority: number;
  readonly titleProps: readonly string[];
  readonly photoProps: readonly string[];
  readonly bodyProps: readonly string[];
  readonly descriptionProps: readonly string[];
  readonly nestedProps: readonly string[];
  readonly properties: ReadonlyMap<string, PropertyRule>;
  /** File the rule set was loaded from, if any */
  readonly source?: string;
}

export const DEFAULT_PRIORITY = 99;

// ============================================================================
// Classification
// ============================================================================

/**
 * A populated property within a role.
 */
export interface RoleEntry {
  property: string;
  values: Term[];
}

/**
 * A resource's properties bucketed into display roles.
 */
export interface ClassifiedRoles {
  title?: RoleEntry;
  photo?: RoleEntry;
  description?: RoleEntry;
  body: RoleEntry[];
  nested: RoleEntry[];
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Sink for anomalies found while rendering. Compatible with pino loggers
 * (and so with Fastify's `request.log`).
 */
export interface RenderLogger {
  warn(obj: Record<string, unknown>, msg: string): void;
}

/**
 * Resources already entered during one top-level render.
 */
export type VisitedSet = Set<string>;

/**
 * The half of the resolver the value formatter recurses into.
 */
export interface EmbeddedRenderer {
  renderEmbedded(resource: ResourceTerm, visited: VisitedSet): string | undefined;
}

/**
 * Options for rendering a graph.
 */
export interface RenderOptions {
  /** Resource to render instead of the detected roots */
  root?: string;
  /** Extra CURIE prefixes, merged over the renderer's own */
  prefixes?: Record<string, string>;
  logger?: RenderLogger;
}

/**
 * Result of rendering a graph.
 */
export interface SnippetResult {
  /** Rendered markup; empty when nothing could be rendered */
  fragment: string;
  /** Match-key labels of the rule sets used, in order of first use */
  matchedRuleTypes: string[];
}
