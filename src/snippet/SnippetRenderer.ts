/**
 * SnippetRenderer — Entry point for rendering a graph into a snippet.
 *
 * Picks the root resources of the graph, renders each through the
 * SnippetResolver with its own visited set, and reports which rule sets
 * were used.
 */

import { createPrefixMap, type PrefixMap } from '../graph/Prefixes.js';
import { resource as toResource } from '../graph/terms.js';
import type { GraphAccessor, ResourceTerm } from '../graph/types.js';
import type { RuleRegistry } from './RuleRegistry.js';
import { SnippetResolver } from './SnippetResolver.js';
import type { RenderLogger, RenderOptions, SnippetResult } from './types.js';

/**
 * Default logger for library callers: warnings go to the console.
 */
export const consoleLogger: RenderLogger = {
  warn(obj, msg) {
    console.warn(msg, obj);
  },
};

/**
 * Resources to render: subjects no other subject references, in source
 * order, or the first subject when every subject is referenced.
 */
export function findRoots(graph: GraphAccessor): ResourceTerm[] {
  const subjects = graph.subjects();
  const roots = subjects.filter(subject => !graph.isReferenced(subject));
  if (roots.length > 0) return roots;
  const [first] = subjects;
  return first !== undefined ? [first] : [];
}

/**
 * Roots that have a rule set. When none has one, the first subject in
 * source order that does; when no subject has one, the first root for the
 * fallback.
 */
function selectRoots(graph: GraphAccessor, resolver: SnippetResolver): ResourceTerm[] {
  const roots = findRoots(graph);
  const matched = roots.filter(root => resolver.ruleSetFor(root) !== undefined);
  if (matched.length > 0) return matched;

  const primary = graph.subjects().find(subject => resolver.ruleSetFor(subject) !== undefined);
  if (primary !== undefined) return [primary];

  const [first] = roots;
  return first !== undefined ? [first] : [];
}

export interface SnippetRendererOptions {
  /** Extra CURIE prefixes, merged over the defaults */
  prefixes?: Record<string, string>;
  logger?: RenderLogger;
}

export class SnippetRenderer {
  private readonly prefixes: PrefixMap;
  private readonly logger: RenderLogger;

  constructor(
    private readonly registry: RuleRegistry,
    options: SnippetRendererOptions = {}
  ) {
    this.prefixes = createPrefixMap(options.prefixes);
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Render a graph. Never throws for missing rules, cycles or failing
   * formatters.
   */
  render(graph: GraphAccessor | null | undefined, options: RenderOptions = {}): SnippetResult {
    if (!graph || graph.size === 0) {
      return { fragment: '', matchedRuleTypes: [] };
    }

    const resolver = new SnippetResolver({
      graph,
      registry: this.registry,
      prefixes: options.prefixes !== undefined ? this.prefixes.extend(options.prefixes) : this.prefixes,
      logger: options.logger ?? this.logger,
    });

    const fragments: string[] = [];

    if (options.root !== undefined) {
      const fragment = resolver.render(toResource(options.root), new Set());
      if (fragment !== undefined) fragments.push(fragment);
    } else {
      for (const root of selectRoots(graph, resolver)) {
        const fragment = resolver.render(root, new Set());
        if (fragment !== undefined) fragments.push(fragment);
      }
    }

    return {
      fragment: fragments.join(''),
      matchedRuleTypes: resolver.matchedRuleTypes(),
    };
  }
}

export function createSnippetRenderer(registry: RuleRegistry, options?: SnippetRendererOptions): SnippetRenderer {
  return new SnippetRenderer(registry, options);
}

/**
 * Render a graph with a registry in one call.
 */
export function renderGraph(
  graph: GraphAccessor | null | undefined,
  registry: RuleRegistry,
  options: RenderOptions = {}
): SnippetResult {
  return new SnippetRenderer(registry).render(graph, options);
}
