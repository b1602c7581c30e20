/**
 * Term constructors and helpers.
 */

import type { BlankNode, Literal, NamedNode, ResourceTerm, Term } from './types.js';

export function namedNode(value: string): NamedNode {
  return { termType: 'NamedNode', value };
}

/**
 * Create a blank node. A leading `_:` is stripped.
 */
export function blankNode(value: string): BlankNode {
  return { termType: 'BlankNode', value: value.startsWith('_:') ? value.slice(2) : value };
}

export function literal(
  value: string,
  options: { language?: string; datatype?: string } = {}
): Literal {
  return {
    termType: 'Literal',
    value,
    ...(options.language !== undefined ? { language: options.language } : {}),
    ...(options.datatype !== undefined ? { datatype: options.datatype } : {}),
  };
}

/**
 * Parse a subject/object identifier: `_:x` is a blank node, anything else an IRI.
 */
export function resource(id: string): ResourceTerm {
  return id.startsWith('_:') ? blankNode(id) : namedNode(id);
}

export function isResource(term: Term): term is ResourceTerm {
  return term.termType !== 'Literal';
}

/**
 * Stable string key for a resource (`_:label` for blank nodes).
 */
export function resourceKey(term: ResourceTerm): string {
  return term.termType === 'BlankNode' ? `_:${term.value}` : term.value;
}

/**
 * Stable string key for any term, used for de-duplicating statements.
 */
export function termKey(term: Term): string {
  if (term.termType === 'Literal') {
    return `"${term.value}"@${term.language ?? ''}^^${term.datatype ?? ''}`;
  }
  return resourceKey(term);
}
