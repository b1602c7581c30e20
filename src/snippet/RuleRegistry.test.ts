/**
 * Tests for rule set resolution.
 */

import { describe, it, expect } from 'vitest';
import { createRuleRegistry, matchKeyLabel, SnippetConfigError } from './RuleRegistry.js';
import { compileRuleSets, type RuleSetDefinition } from './RuleSpecLoader.js';
import type { RuleSet } from './types.js';

const S = 'http://schema.org/';

function ruleSet(definition: RuleSetDefinition): RuleSet {
  const [compiled] = compileRuleSets(definition);
  if (!compiled) throw new Error('definition compiled to nothing');
  return compiled;
}

describe('RuleRegistry', () => {
  it('returns undefined when nothing matches', () => {
    const registry = createRuleRegistry([ruleSet({ id: 'album', match: [{ type: `${S}MusicAlbum` }] })]);

    expect(registry.resolve([`${S}Person`])).toBeUndefined();
    expect(registry.resolve([])).toBeUndefined();
  });

  it('matches exact types and patterns', () => {
    const registry = createRuleRegistry([
      ruleSet({ id: 'album', match: [{ type: `${S}MusicAlbum` }] }),
      ruleSet({ id: 'og', match: [{ pattern: 'http://types\\.ogp\\.me/ns#' }] }),
    ]);

    expect(registry.resolve([`${S}MusicAlbum`])?.id).toBe('album');
    expect(registry.resolve(['http://types.ogp.me/ns#video'])?.id).toBe('og');
  });

  it('picks the lowest priority number among candidates', () => {
    const registry = createRuleRegistry([
      ruleSet({ id: 'generic', match: [{ pattern: '^http://schema\\.org/' }], priority: 5 }),
      ruleSet({ id: 'album', match: [{ type: `${S}MusicAlbum` }], priority: 1 }),
    ]);

    expect(registry.resolve([`${S}MusicAlbum`])?.id).toBe('album');
    expect(registry.resolve([`${S}Person`])?.id).toBe('generic');
  });

  it('considers every declared type', () => {
    const registry = createRuleRegistry([
      ruleSet({ id: 'person', match: [{ type: `${S}Person` }], priority: 10 }),
      ruleSet({ id: 'album', match: [{ type: `${S}MusicAlbum` }], priority: 1 }),
    ]);

    expect(registry.resolve([`${S}Person`, `${S}MusicAlbum`])?.id).toBe('album');
  });

  it('breaks priority ties by registration order', () => {
    const first = ruleSet({ id: 'first', match: [{ type: `${S}Person` }], priority: 5 });
    const second = ruleSet({ id: 'second', match: [{ type: `${S}MusicGroup` }], priority: 5 });

    expect(createRuleRegistry([first, second]).resolve([`${S}MusicGroup`, `${S}Person`])?.id).toBe('first');
    expect(createRuleRegistry([second, first]).resolve([`${S}MusicGroup`, `${S}Person`])?.id).toBe('second');
  });

  it('uses the default priority of 99', () => {
    const generic = ruleSet({ id: 'generic', match: [{ pattern: 'schema' }] });
    const specific = ruleSet({ id: 'specific', match: [{ type: `${S}Person` }], priority: 99 });

    expect(generic.priority).toBe(99);
    expect(createRuleRegistry([generic, specific]).resolve([`${S}Person`])?.id).toBe('generic');
  });

  it('replaces a rule set registered under the same key in its original slot', () => {
    const registry = createRuleRegistry([
      ruleSet({ id: 'old', match: [{ type: `${S}Person` }], priority: 5 }),
      ruleSet({ id: 'group', match: [{ type: `${S}MusicGroup` }], priority: 5 }),
      ruleSet({ id: 'new', match: [{ type: `${S}Person` }], priority: 5 }),
    ]);

    expect(registry.size).toBe(2);
    expect(registry.getAll().map(r => r.id)).toEqual(['new', 'group']);
    expect(registry.resolve([`${S}MusicGroup`, `${S}Person`])?.id).toBe('new');
  });

  it('looks rule sets up by match-key label', () => {
    const registry = createRuleRegistry([
      ruleSet({ id: 'album', match: [{ type: `${S}MusicAlbum` }] }),
      ruleSet({ id: 'og', match: [{ pattern: 'ogp' }] }),
    ]);

    expect(registry.get(`${S}MusicAlbum`)?.id).toBe('album');
    expect(registry.get('ogp')?.id).toBe('og');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('looks rule sets up by definition id', () => {
    const registry = createRuleRegistry([
      ...compileRuleSets({ id: 'music', match: [{ type: `${S}MusicAlbum` }, { type: `${S}MusicPlaylist` }] }),
      ruleSet({ id: 'person', match: [{ type: `${S}Person` }] }),
    ]);

    expect(registry.getById('music').map(set => matchKeyLabel(set.matchKey))).toEqual([
      `${S}MusicAlbum`,
      `${S}MusicPlaylist`,
    ]);
    expect(registry.getById('missing')).toEqual([]);
  });

  it('labels match keys by type IRI or pattern source', () => {
    expect(matchKeyLabel({ kind: 'exact', type: `${S}Person` })).toBe(`${S}Person`);
    expect(matchKeyLabel({ kind: 'pattern', pattern: /^http:\/\/ogp/ })).toBe('^http:\\/\\/ogp');
  });
});

describe('SnippetConfigError', () => {
  it('names the rule set and source', () => {
    const error = new SnippetConfigError('Bad thing', 'album', 'music.snippet.yaml');

    expect(error.message).toBe('Bad thing (rule set "album" in music.snippet.yaml)');
    expect(error.name).toBe('SnippetConfigError');
  });
});
