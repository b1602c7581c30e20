/**
 * SnippetResolver — Renders one resource through its rule set.
 *
 * Each resource passes through: resolve rule set → (no rule: fallback) →
 * classify → format roles → assemble. Referenced resources are rendered
 * recursively through `renderEmbedded`; the visited set shared by one
 * top-level render guarantees every resource is entered at most once, so
 * cyclic graphs terminate.
 */

import type { GraphAccessor, ResourceTerm } from '../graph/types.js';
import { resourceKey } from '../graph/terms.js';
import { element, escapeHtml } from './markup.js';
import { classify } from './PropertyClassifier.js';
import { matchKeyLabel, type RuleRegistry } from './RuleRegistry.js';
import type { ClassifiedRoles, EmbeddedRenderer, RoleEntry, RuleSet, VisitedSet } from './types.js';
import { ValueFormatter, type FormatEnvironment } from './ValueFormatter.js';

/**
 * Inputs for resolving snippets within one render call.
 */
export interface ResolverEnvironment extends FormatEnvironment {
  registry: RuleRegistry;
}

export class SnippetResolver implements EmbeddedRenderer {
  private readonly formatter: ValueFormatter;
  /** Match-key labels of the rule sets used so far, in order of first use */
  private readonly used: Set<string> = new Set();

  constructor(private readonly env: ResolverEnvironment) {
    this.formatter = new ValueFormatter(env, this);
  }

  private get graph(): GraphAccessor {
    return this.env.graph;
  }

  /**
   * Rule set for a resource, from its declared types.
   */
  ruleSetFor(resource: ResourceTerm): RuleSet | undefined {
    return this.env.registry.resolve(this.graph.typesOf(resource));
  }

  /**
   * Match-key labels of every rule set that produced output.
   */
  matchedRuleTypes(): string[] {
    return [...this.used];
  }

  private typeofAttribute(resource: ResourceTerm): string | undefined {
    const types = this.graph.typesOf(resource);
    return types.length > 0 ? types.map(type => this.env.prefixes.toCurie(type)).join(' ') : undefined;
  }

  private formatFirst(entry: RoleEntry, ruleSet: RuleSet, visited: VisitedSet): string {
    const [value] = entry.values;
    return value !== undefined ? this.formatter.formatSingle(entry.property, value, ruleSet, visited) : '';
  }

  /**
   * Photo, title, body and description sections in their fixed order.
   */
  private assembleRoles(roles: ClassifiedRoles, ruleSet: RuleSet, visited: VisitedSet): string {
    const parts: string[] = [];

    if (roles.photo) {
      parts.push(element('div', { class: 'snippet-photo' }, this.formatFirst(roles.photo, ruleSet, visited)));
    }
    if (roles.title) {
      parts.push(element('div', { class: 'snippet-title' }, this.formatFirst(roles.title, ruleSet, visited)));
    }
    if (roles.body.length > 0) {
      const entries = roles.body.map((entry) => {
        const html = this.formatter.formatEntry(entry, ruleSet, visited) ?? '';
        const label = ruleSet.properties.get(entry.property)?.label;
        return element('div', {}, label !== undefined ? `${escapeHtml(label)}: ${html}` : html);
      });
      parts.push(element('div', { class: 'snippet-body' }, entries.join('')));
    }
    if (roles.description) {
      parts.push(element('div', { class: 'snippet-description' }, this.formatFirst(roles.description, ruleSet, visited)));
    }

    return parts.join('');
  }

  private fallback(resource: ResourceTerm): string | undefined {
    const id = resourceKey(resource);
    let inner: string;

    if (resource.termType === 'NamedNode') {
      inner = element('a', { href: resource.value }, escapeHtml(this.env.prefixes.toCurie(resource.value)));
    } else if (this.graph.propertiesOf(resource).length > 0) {
      inner = escapeHtml(id);
    } else {
      return undefined;
    }

    return element('div', {
      class: 'snippet snippet-fallback',
      resource: id,
      typeof: this.typeofAttribute(resource),
    }, inner);
  }

  /**
   * Record a rule set as used before rendering through it, so that rule
   * sets appear in the order they were entered.
   *
   * @returns A function that withdraws the record if nothing was rendered
   */
  private markUsed(ruleSet: RuleSet): () => void {
    const label = matchKeyLabel(ruleSet.matchKey);
    if (this.used.has(label)) return () => undefined;
    this.used.add(label);
    return () => this.used.delete(label);
  }

  /**
   * Render a resource as a top-level snippet.
   *
   * @returns undefined only for a blank node with no rule set and no properties
   */
  render(resource: ResourceTerm, visited: VisitedSet): string | undefined {
    visited.add(resourceKey(resource));

    const ruleSet = this.ruleSetFor(resource);
    if (!ruleSet) {
      return this.fallback(resource);
    }

    const withdraw = this.markUsed(ruleSet);
    const inner = this.assembleRoles(classify(this.graph, resource, ruleSet), ruleSet, visited);
    if (inner === '') {
      withdraw();
      return this.fallback(resource);
    }

    return element('div', {
      class: 'snippet',
      resource: resourceKey(resource),
      typeof: this.typeofAttribute(resource),
    }, inner);
  }

  /**
   * Render a referenced resource inside its parent's snippet.
   *
   * @returns undefined when the resource was already visited, has no rule
   *   set, or renders nothing
   */
  renderEmbedded(resource: ResourceTerm, visited: VisitedSet): string | undefined {
    const id = resourceKey(resource);
    if (visited.has(id)) return undefined;

    const ruleSet = this.ruleSetFor(resource);
    if (!ruleSet) return undefined;

    visited.add(id);
    const withdraw = this.markUsed(ruleSet);

    const roles = classify(this.graph, resource, ruleSet);
    const inner = ruleSet.nestedProps.length > 0
      ? roles.nested
        .map(entry => this.formatter.formatEntry(entry, ruleSet, visited))
        .filter((html): html is string => html !== undefined)
        .join(' ')
      : this.assembleRoles(roles, ruleSet, visited);

    if (inner === '') {
      withdraw();
      return undefined;
    }

    return element('span', {
      class: 'snippet-nested',
      resource: id,
      typeof: this.typeofAttribute(resource),
    }, inner);
  }
}
