import { z } from 'zod';
import type { GraphAccessor, ResourceTerm, Term } from '../../graph/types.js';
import { element, escapeHtml } from '../markup.js';
import { defineFormatter, FormatterError } from './types.js';

/**
 * Namespace of a property IRI: everything up to the last `/` or `#`.
 * Rating sub-properties are looked up in the same vocabulary.
 */
function namespaceOf(iri: string): string {
  const cut = Math.max(iri.lastIndexOf('/'), iri.lastIndexOf('#'));
  return cut >= 0 ? iri.slice(0, cut + 1) : iri;
}

function firstLiteral(graph: GraphAccessor, subject: ResourceTerm, property: string): string | undefined {
  for (const value of graph.valuesOf(subject, property)) {
    if (value.termType === 'Literal') return value.value.trim();
  }
  return undefined;
}

function requireNumber(text: string, what: string): string {
  if (text === '' || !Number.isFinite(Number(text))) {
    throw new FormatterError('rating', `${what} "${text}" is not a number`);
  }
  return text;
}

interface RatingParts {
  value: string;
  best?: string;
  count?: string;
}

/**
 * Read a rating either from a referenced Rating/AggregateRating resource
 * or from a literal of the form `4.5` or `4.5/5`.
 */
function readRating(value: Term, property: string, graph: GraphAccessor): RatingParts | undefined {
  if (value.termType === 'Literal') {
    const [rating = '', best] = value.value.split('/').map(part => part.trim());
    return {
      value: requireNumber(rating, 'rating'),
      ...(best !== undefined ? { best: requireNumber(best, 'best rating') } : {}),
    };
  }

  const ns = namespaceOf(property);
  const rating = firstLiteral(graph, value, `${ns}ratingValue`) ?? firstLiteral(graph, value, `${ns}average`);
  if (rating === undefined) return undefined;

  const best = firstLiteral(graph, value, `${ns}bestRating`) ?? firstLiteral(graph, value, `${ns}best`);
  const count = firstLiteral(graph, value, `${ns}ratingCount`)
    ?? firstLiteral(graph, value, `${ns}reviewCount`)
    ?? firstLiteral(graph, value, `${ns}count`);

  return {
    value: requireNumber(rating, 'rating'),
    ...(best !== undefined ? { best: requireNumber(best, 'best rating') } : {}),
    ...(count !== undefined ? { count: requireNumber(count, 'rating count') } : {}),
  };
}

/**
 * Renders Rating / AggregateRating values as "Rated 4.5 out of 5 (12 ratings)".
 */
export const ratingFormatter = defineFormatter({
  name: 'rating',
  stage: 'override',
  options: z.object({
    best: z.number().positive().default(5),
  }).strict(),
  format(value, options, ctx) {
    const parts = readRating(value, ctx.property, ctx.graph);
    if (!parts) return undefined;

    let text = `Rated ${parts.value} out of ${parts.best ?? String(options.best)}`;
    if (parts.count !== undefined) {
      text += ` (${parts.count} ratings)`;
    }

    const attrs = value.termType === 'Literal'
      ? { class: 'rating', property: ctx.curie }
      : { class: 'rating', rel: ctx.curie };
    return element('span', attrs, escapeHtml(text));
  },
});
