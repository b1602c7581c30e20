/**
 * RuleRegistry — Immutable lookup from resource types to rule sets.
 *
 * Built once at startup from an ordered list of rule sets and passed
 * explicitly into every render. Resolution rules:
 * - a rule set is a candidate when its match key matches any declared type
 *   (exact IRI equality, or a pattern tested against the IRI)
 * - the candidate with the lowest priority number wins
 * - ties go to the rule set registered first
 *
 * Registering a second rule set under an identical match key replaces the
 * first one in its original slot.
 */

import type { MatchKey, RuleSet } from './types.js';

/**
 * Error raised for invalid snippet configuration. Always raised while the
 * registry is being built, never during rendering.
 */
export class SnippetConfigError extends Error {
  constructor(
    message: string,
    public readonly ruleSetId?: string,
    public readonly source?: string
  ) {
    const where = [
      ruleSetId !== undefined ? `rule set "${ruleSetId}"` : undefined,
      source !== undefined ? `in ${source}` : undefined,
    ].filter((part): part is string => part !== undefined);
    super(where.length > 0 ? `${message} (${where.join(' ')})` : message);
    this.name = 'SnippetConfigError';
  }
}

/**
 * Human-readable form of a match key: the type IRI or the pattern source.
 */
export function matchKeyLabel(key: MatchKey): string {
  return key.kind === 'exact' ? key.type : key.pattern.source;
}

/**
 * Test a match key against a type IRI.
 */
export function matchesType(key: MatchKey, type: string): boolean {
  return key.kind === 'exact' ? key.type === type : key.pattern.test(type);
}

function registryKey(key: MatchKey): string {
  return `${key.kind}:${matchKeyLabel(key)}`;
}

export class RuleRegistry {
  private readonly entries: Map<string, RuleSet> = new Map();

  constructor(ruleSets: Iterable<RuleSet> = []) {
    for (const ruleSet of ruleSets) {
      this.entries.set(registryKey(ruleSet.matchKey), ruleSet);
    }
  }

  /**
   * Pick the rule set for a resource with the given declared types.
   */
  resolve(types: Iterable<string>): RuleSet | undefined {
    const typeList = [...types];
    if (typeList.length === 0) return undefined;

    let best: RuleSet | undefined;
    for (const ruleSet of this.entries.values()) {
      if (!typeList.some(type => matchesType(ruleSet.matchKey, type))) continue;
      if (best === undefined || ruleSet.priority < best.priority) {
        best = ruleSet;
      }
    }
    return best;
  }

  /**
   * Get a rule set by match-key label. Exact keys are checked before patterns.
   */
  get(label: string): RuleSet | undefined {
    return this.entries.get(`exact:${label}`) ?? this.entries.get(`pattern:${label}`);
  }

  /**
   * Rule sets compiled from the definition with the given id, one per match entry.
   */
  getById(id: string): RuleSet[] {
    return this.getAll().filter(ruleSet => ruleSet.id === id);
  }

  /**
   * All rule sets in registration order.
   */
  getAll(): RuleSet[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Build a registry from rule sets in load order.
 */
export function createRuleRegistry(ruleSets: Iterable<RuleSet> = []): RuleRegistry {
  return new RuleRegistry(ruleSets);
}
