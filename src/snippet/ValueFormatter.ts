/**
 * ValueFormatter — Renders property values to markup.
 *
 * Dispatch order for a single value (first branch that produces output wins):
 * 1. the property's `override` formatter (composite values such as ratings)
 * 2. for a reference, its embedded snippet from the resolver
 * 3. the property's `media` formatter (images, links, affixed text)
 * 4. XML / HTML literal, passed through unescaped
 * 5. plain literal, escaped
 * 6. reference link
 *
 * A formatter that throws is reported to the logger and the value falls
 * through to branches 4-6; one bad rule never blanks a snippet.
 */

import type { PrefixMap } from '../graph/Prefixes.js';
import type { GraphAccessor, Term } from '../graph/types.js';
import { RDF_HTML, RDF_XML_LITERAL } from '../graph/types.js';
import { resourceKey } from '../graph/terms.js';
import { element, escapeHtml } from './markup.js';
import type {
  BoundFormatter,
  EmbeddedRenderer,
  FormatterContext,
  RenderLogger,
  RoleEntry,
  RuleSet,
  VisitedSet,
} from './types.js';

const STRUCTURED_DATATYPES = new Set([RDF_XML_LITERAL, RDF_HTML]);

type FormatterOutcome =
  | { kind: 'output'; html: string }
  | { kind: 'declined' }
  | { kind: 'failed' };

/**
 * Read-only inputs shared by every value rendered in one render call.
 */
export interface FormatEnvironment {
  graph: GraphAccessor;
  prefixes: PrefixMap;
  logger: RenderLogger;
}

export class ValueFormatter {
  constructor(
    private readonly env: FormatEnvironment,
    private readonly resolver: EmbeddedRenderer
  ) {}

  private context(property: string): FormatterContext {
    return {
      property,
      curie: this.env.prefixes.toCurie(property),
      graph: this.env.graph,
      prefixes: this.env.prefixes,
    };
  }

  private runFormatter(
    formatter: BoundFormatter,
    value: Term,
    ctx: FormatterContext,
    ruleSet: RuleSet
  ): FormatterOutcome {
    try {
      const html = formatter.format(value, ctx);
      return html !== undefined && html.trim() !== '' ? { kind: 'output', html } : { kind: 'declined' };
    } catch (err) {
      this.env.logger.warn(
        { err, ruleSet: ruleSet.id, property: ctx.property, formatter: formatter.name },
        'Snippet formatter failed; using generic rendering'
      );
      return { kind: 'failed' };
    }
  }

  /**
   * Render a single value of a property.
   */
  formatSingle(property: string, value: Term, ruleSet: RuleSet, visited: VisitedSet): string {
    const ctx = this.context(property);
    const formatter = ruleSet.properties.get(property)?.formatter;

    if (formatter?.stage === 'override') {
      const outcome = this.runFormatter(formatter, value, ctx, ruleSet);
      if (outcome.kind === 'output') return outcome.html;
      if (outcome.kind === 'failed') return this.formatGeneric(value, ctx);
    }

    if (value.termType !== 'Literal') {
      const embedded = this.resolver.renderEmbedded(value, visited);
      if (embedded !== undefined) {
        return element('span', { rel: ctx.curie }, embedded);
      }
    }

    if (formatter?.stage === 'media') {
      const outcome = this.runFormatter(formatter, value, ctx, ruleSet);
      if (outcome.kind === 'output') return outcome.html;
    }

    return this.formatGeneric(value, ctx);
  }

  /**
   * Render all values of a property according to its multi-value policy.
   *
   * @returns undefined when there are no values
   */
  formatMulti(property: string, values: readonly Term[], ruleSet: RuleSet, visited: VisitedSet): string | undefined {
    const [first] = values;
    if (first === undefined) return undefined;

    const rule = ruleSet.properties.get(property);
    const policy = rule?.multi ?? 'join';

    if (policy === 'first') {
      return this.formatSingle(property, first, ruleSet, visited);
    }

    const rendered = values.map(value => this.formatSingle(property, value, ruleSet, visited));

    if (policy === 'list') {
      const items = rendered.map(html => element('li', { class: rule?.itemClass }, html)).join('');
      return element('ol', { class: rule?.listClass }, items);
    }

    return rendered.join(', ');
  }

  /**
   * Render a classified role entry.
   */
  formatEntry(entry: RoleEntry, ruleSet: RuleSet, visited: VisitedSet): string | undefined {
    return this.formatMulti(entry.property, entry.values, ruleSet, visited);
  }

  /**
   * Branches 4-6: structured literal, plain literal, reference link.
   */
  private formatGeneric(value: Term, ctx: FormatterContext): string {
    const { prefixes } = this.env;

    if (value.termType === 'Literal') {
      const attrs = {
        property: ctx.curie,
        lang: value.language,
        datatype: value.datatype !== undefined ? prefixes.toCurie(value.datatype) : undefined,
      };
      if (value.datatype !== undefined && STRUCTURED_DATATYPES.has(value.datatype)) {
        return element('div', attrs, value.value);
      }
      return element('span', attrs, escapeHtml(value.value));
    }

    if (value.termType === 'BlankNode') {
      const id = resourceKey(value);
      return element('span', { rel: ctx.curie, resource: id }, escapeHtml(id));
    }

    return element('a', { rel: ctx.curie, href: value.value }, escapeHtml(prefixes.toCurie(value.value)));
  }
}
