/**
 * Tests for the formatter strategies.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createPrefixMap } from '../../graph/Prefixes.js';
import { createTripleGraph, type TripleGraph } from '../../graph/TripleGraph.js';
import { blankNode, literal, namedNode } from '../../graph/terms.js';
import { XSD } from '../../graph/types.js';
import type { FormatterContext } from '../types.js';
import { affixFormatter } from './affixFormatter.js';
import { createFormatterRegistry } from './FormatterRegistry.js';
import { imageFormatter } from './imageFormatter.js';
import { linkFormatter } from './linkFormatter.js';
import { ratingFormatter } from './ratingFormatter.js';
import { FormatterError } from './types.js';

const S = 'http://schema.org/';
const prefixes = createPrefixMap();

function context(property: string, graph: TripleGraph = createTripleGraph()): FormatterContext {
  return { property, curie: prefixes.toCurie(property), graph, prefixes };
}

describe('FormatterRegistry', () => {
  it('lists the built-in formatters', () => {
    expect(createFormatterRegistry().list()).toEqual([
      { name: 'image', stage: 'media' },
      { name: 'rating', stage: 'override' },
      { name: 'affix', stage: 'media' },
      { name: 'link', stage: 'media' },
    ]);
  });

  it('looks formatters up by name', () => {
    const registry = createFormatterRegistry();

    expect(registry.get('rating')).toBe(ratingFormatter);
    expect(registry.has('missing')).toBe(false);
  });
});

describe('image formatter', () => {
  it('renders an image IRI', () => {
    const html = imageFormatter.bind(undefined).format(namedNode('http://example.org/cover.jpg'), context(`${S}image`));

    expect(html).toBe('<span rel="schema:image"><img src="http://example.org/cover.jpg" alt=""></span>');
  });

  it('escapes the source and alt text', () => {
    const html = imageFormatter.bind({ alt: 'A "cover"' })
      .format(literal('http://example.org/a.jpg?x=1&y=2'), context(`${S}image`));

    expect(html).toBe('<span rel="schema:image"><img src="http://example.org/a.jpg?x=1&amp;y=2" alt="A &quot;cover&quot;"></span>');
  });

  it('declines blank nodes', () => {
    expect(imageFormatter.bind({}).format(blankNode('b0'), context(`${S}image`))).toBeUndefined();
  });

  it('rejects unknown options', () => {
    expect(() => imageFormatter.bind({ width: 10 })).toThrow(z.ZodError);
  });
});

describe('affix formatter', () => {
  const formatter = affixFormatter.bind({ prefix: ' - Played ', suffix: ' times' });

  it('wraps a literal in the prefix and suffix', () => {
    const html = formatter.format(literal('12', { datatype: `${XSD}integer` }), context(`${S}playCount`));

    expect(html).toBe('<span property="schema:playCount" datatype="xsd:integer"> - Played 12 times</span>');
  });

  it('keeps the language tag', () => {
    const html = formatter.format(literal('douze', { language: 'fr' }), context(`${S}playCount`));

    expect(html).toBe('<span property="schema:playCount" lang="fr"> - Played douze times</span>');
  });

  it('declines references', () => {
    expect(formatter.format(namedNode('http://example.org/x'), context(`${S}playCount`))).toBeUndefined();
  });
});

describe('link formatter', () => {
  it('links IRIs with rel', () => {
    const html = linkFormatter.bind({}).format(namedNode('http://example.org/'), context(`${S}url`));

    expect(html).toBe('<a rel="schema:url" href="http://example.org/">http://example.org/</a>');
  });

  it('links literals with property and custom text', () => {
    const html = linkFormatter.bind({ text: 'Website' }).format(literal('http://example.org/'), context(`${S}url`));

    expect(html).toBe('<a property="schema:url" href="http://example.org/">Website</a>');
  });

  it('declines blank nodes', () => {
    expect(linkFormatter.bind({}).format(blankNode('b0'), context(`${S}url`))).toBeUndefined();
  });
});

describe('rating formatter', () => {
  const formatter = ratingFormatter.bind({});

  it('reads a referenced aggregate rating', () => {
    const rating = blankNode('b1');
    const graph = createTripleGraph([
      { subject: rating, predicate: `${S}ratingValue`, object: literal('4') },
      { subject: rating, predicate: `${S}bestRating`, object: literal('10') },
      { subject: rating, predicate: `${S}ratingCount`, object: literal('7') },
    ]);

    expect(formatter.format(rating, context(`${S}aggregateRating`, graph)))
      .toBe('<span class="rating" rel="schema:aggregateRating">Rated 4 out of 10 (7 ratings)</span>');
  });

  it('falls back to reviewCount and the default best rating', () => {
    const rating = blankNode('b1');
    const graph = createTripleGraph([
      { subject: rating, predicate: `${S}ratingValue`, object: literal('3.5') },
      { subject: rating, predicate: `${S}reviewCount`, object: literal('2') },
    ]);

    expect(formatter.format(rating, context(`${S}aggregateRating`, graph)))
      .toBe('<span class="rating" rel="schema:aggregateRating">Rated 3.5 out of 5 (2 ratings)</span>');
  });

  it('uses the configured best rating', () => {
    expect(ratingFormatter.bind({ best: 10 }).format(literal('8'), context(`${S}reviewRating`)))
      .toBe('<span class="rating" property="schema:reviewRating">Rated 8 out of 10</span>');
  });

  it('parses "value/best" literals', () => {
    expect(formatter.format(literal('4 / 7'), context(`${S}reviewRating`)))
      .toBe('<span class="rating" property="schema:reviewRating">Rated 4 out of 7</span>');
  });

  it('declines references without a rating value', () => {
    const graph = createTripleGraph([
      { subject: blankNode('b1'), predicate: `${S}name`, object: literal('Not a rating') },
    ]);

    expect(formatter.format(blankNode('b1'), context(`${S}aggregateRating`, graph))).toBeUndefined();
  });

  it('throws for non-numeric ratings', () => {
    expect(() => formatter.format(literal('great'), context(`${S}reviewRating`))).toThrow(FormatterError);
    expect(() => formatter.format(literal('great'), context(`${S}reviewRating`)))
      .toThrow('rating: rating "great" is not a number');
  });

  it('rejects a non-positive best rating', () => {
    expect(() => ratingFormatter.bind({ best: 0 })).toThrow(z.ZodError);
  });
});
