/**
 * Tests for the JSON-LD reader.
 */

import { describe, it, expect } from 'vitest';
import { GraphReadError, readJsonLd } from './JsonLdGraphReader.js';
import { blankNode, literal, namedNode } from './terms.js';
import { RDF_TYPE, XSD } from './types.js';

const S = 'http://schema.org/';

describe('readJsonLd', () => {
  it('reads a schema.org document with the context URL as vocabulary', () => {
    const graph = readJsonLd({
      '@context': 'https://schema.org',
      '@id': 'http://example.org/album',
      '@type': 'MusicAlbum',
      name: 'Test Album',
    });

    const album = namedNode('http://example.org/album');
    expect(graph.typesOf(album)).toEqual([`${S}MusicAlbum`]);
    expect(graph.valuesOf(album, `${S}name`)).toEqual([literal('Test Album')]);
  });

  it('turns embedded nodes into blank nodes in document order', () => {
    const graph = readJsonLd({
      '@context': { '@vocab': S },
      '@type': 'MusicAlbum',
      byArtist: { '@type': 'MusicGroup', name: 'Band' },
      tracks: [
        { '@type': 'MusicRecording', name: 'One' },
        { '@type': 'MusicRecording', name: 'Two' },
      ],
    });

    expect(graph.subjects()).toEqual([blankNode('b0'), blankNode('b1'), blankNode('b2'), blankNode('b3')]);
    expect(graph.valuesOf(blankNode('b0'), `${S}tracks`)).toEqual([blankNode('b2'), blankNode('b3')]);
    expect(graph.valuesOf(blankNode('b3'), `${S}name`)).toEqual([literal('Two')]);
  });

  it('reads @graph, node references and prefixes', () => {
    const graph = readJsonLd({
      '@context': { schema: S, ex: 'http://example.org/' },
      '@graph': [
        { '@id': 'ex:a', '@type': 'schema:Thing', 'schema:knows': { '@id': 'ex:b' } },
        { '@id': 'ex:b', 'schema:name': 'B' },
      ],
    });

    const a = namedNode('http://example.org/a');
    expect(graph.valuesOf(a, `${S}knows`)).toEqual([namedNode('http://example.org/b')]);
    expect(graph.isReferenced(namedNode('http://example.org/b'))).toBe(true);
    expect(graph.valuesOf(a, RDF_TYPE)).toEqual([namedNode(`${S}Thing`)]);
  });

  it('reads value objects and native values', () => {
    const graph = readJsonLd({
      '@context': { '@vocab': S },
      '@id': 'http://example.org/x',
      name: { '@value': 'Nom', '@language': 'fr' },
      playCount: 12,
      duration: 1.5,
      isFamilyFriendly: true,
      description: { '@value': '<b>x</b>', '@type': 'http://www.w3.org/1999/02/22-rdf-syntax-ns#HTML' },
    });

    const x = namedNode('http://example.org/x');
    expect(graph.valuesOf(x, `${S}name`)).toEqual([literal('Nom', { language: 'fr' })]);
    expect(graph.valuesOf(x, `${S}playCount`)).toEqual([literal('12', { datatype: `${XSD}integer` })]);
    expect(graph.valuesOf(x, `${S}duration`)).toEqual([literal('1.5', { datatype: `${XSD}double` })]);
    expect(graph.valuesOf(x, `${S}isFamilyFriendly`)).toEqual([literal('true', { datatype: `${XSD}boolean` })]);
    expect(graph.valuesOf(x, `${S}description`)).toEqual([
      literal('<b>x</b>', { datatype: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#HTML' }),
    ]);
  });

  it('types integers too large for plain notation as doubles', () => {
    const graph = readJsonLd({
      '@context': { '@vocab': S },
      '@id': 'http://example.org/x',
      playCount: 1e21,
    });

    expect(graph.valuesOf(namedNode('http://example.org/x'), `${S}playCount`)).toEqual([
      literal('1e+21', { datatype: `${XSD}double` }),
    ]);
  });

  it('keeps document blank-node ids apart from generated ones', () => {
    const graph = readJsonLd({
      '@context': 'https://schema.org',
      '@type': 'MusicAlbum',
      name: 'Album',
      byArtist: { '@type': 'MusicGroup', name: 'Band' },
      tracks: { '@id': '_:b0', '@type': 'MusicRecording', name: 'Song' },
    });

    expect(graph.subjects()).toEqual([blankNode('b0'), blankNode('b1'), blankNode('b2')]);
    expect(graph.valuesOf(blankNode('b0'), `${S}name`)).toEqual([literal('Album')]);
    expect(graph.valuesOf(blankNode('b0'), `${S}tracks`)).toEqual([blankNode('b2')]);
    expect(graph.valuesOf(blankNode('b2'), `${S}name`)).toEqual([literal('Song')]);
  });

  it('maps every use of a document blank-node id to the same node', () => {
    const graph = readJsonLd({
      '@context': { '@vocab': S },
      '@graph': [
        { '@id': '_:x', name: 'X' },
        { '@id': 'http://example.org/y', knows: { '@id': '_:x' } },
      ],
    });

    expect(graph.subjects()).toEqual([blankNode('b0'), namedNode('http://example.org/y')]);
    expect(graph.valuesOf(namedNode('http://example.org/y'), `${S}knows`)).toEqual([blankNode('b0')]);
  });

  it('coerces terms typed @id to references', () => {
    const graph = readJsonLd({
      '@context': { image: { '@id': `${S}image`, '@type': '@id' } },
      '@id': 'http://example.org/x',
      image: 'http://example.org/cover.jpg',
    });

    expect(graph.valuesOf(namedNode('http://example.org/x'), `${S}image`)).toEqual([
      namedNode('http://example.org/cover.jpg'),
    ]);
  });

  it('keeps @list items in order', () => {
    const graph = readJsonLd({
      '@context': { '@vocab': S },
      '@id': 'http://example.org/x',
      keywords: { '@list': ['c', 'a', 'b'] },
    });

    expect(graph.valuesOf(namedNode('http://example.org/x'), `${S}keywords`).map(v => v.value)).toEqual(['c', 'a', 'b']);
  });

  it('ignores terms that cannot be expanded', () => {
    const graph = readJsonLd({ '@id': 'http://example.org/x', name: 'dropped' });

    expect(graph.size).toBe(0);
  });

  it('reads an empty document as an empty graph', () => {
    expect(readJsonLd({}).size).toBe(0);
    expect(readJsonLd([]).size).toBe(0);
  });

  it('rejects remote contexts', () => {
    expect(() => readJsonLd({ '@context': 'http://example.org/context.jsonld' })).toThrow(GraphReadError);
  });

  it('rejects non-object documents with the offending path', () => {
    expect(() => readJsonLd([{}, 'text'])).toThrow('Expected a JSON-LD node object (at /1)');
  });
});
