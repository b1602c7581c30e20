/**
 * Tests for CURIE shortening.
 */

import { describe, it, expect } from 'vitest';
import { createPrefixMap, PrefixMap } from './Prefixes.js';

describe('PrefixMap', () => {
  const prefixes = createPrefixMap();

  it('shortens IRIs under known namespaces', () => {
    expect(prefixes.toCurie('http://schema.org/name')).toBe('schema:name');
    expect(prefixes.toCurie('http://ogp.me/ns#title')).toBe('og:title');
  });

  it('leaves unknown IRIs unchanged', () => {
    expect(prefixes.toCurie('http://example.org/thing')).toBe('http://example.org/thing');
  });

  it('leaves IRIs whose local part is not a simple name unchanged', () => {
    expect(prefixes.toCurie('http://schema.org/a/b')).toBe('http://schema.org/a/b');
    expect(prefixes.toCurie('http://schema.org/')).toBe('http://schema.org/');
  });

  it('prefers the longest matching namespace', () => {
    const map = new PrefixMap({
      ex: 'http://example.org/',
      exv: 'http://example.org/vocab/',
    });

    expect(map.toCurie('http://example.org/vocab/term')).toBe('exv:term');
    expect(map.toCurie('http://example.org/term')).toBe('ex:term');
  });

  it('extends without modifying the original', () => {
    const extended = prefixes.extend({ ex: 'http://example.org/' });

    expect(extended.toCurie('http://example.org/thing')).toBe('ex:thing');
    expect(prefixes.toCurie('http://example.org/thing')).toBe('http://example.org/thing');
  });
});
