/**
 * Plain-data views of compiled rule sets, for listings and the HTTP API.
 */

import { matchKeyLabel } from './RuleRegistry.js';
import type { RuleSet } from './types.js';

export interface PropertyRuleSummary {
  property: string;
  formatter?: string;
  multi: string;
  label?: string;
}

export interface RuleSetSummary {
  id: string;
  match: { kind: 'exact' | 'pattern'; value: string };
  priority: number;
  roles: {
    title: readonly string[];
    photo: readonly string[];
    body: readonly string[];
    description: readonly string[];
    nested: readonly string[];
  };
  properties: PropertyRuleSummary[];
  source?: string;
}

export function describeRuleSet(ruleSet: RuleSet): RuleSetSummary {
  const properties: PropertyRuleSummary[] = [];
  for (const [property, rule] of ruleSet.properties) {
    properties.push({
      property,
      ...(rule.formatter !== undefined ? { formatter: rule.formatter.name } : {}),
      multi: rule.multi,
      ...(rule.label !== undefined ? { label: rule.label } : {}),
    });
  }

  return {
    id: ruleSet.id,
    match: { kind: ruleSet.matchKey.kind, value: matchKeyLabel(ruleSet.matchKey) },
    priority: ruleSet.priority,
    roles: {
      title: ruleSet.titleProps,
      photo: ruleSet.photoProps,
      body: ruleSet.bodyProps,
      description: ruleSet.descriptionProps,
      nested: ruleSet.nestedProps,
    },
    properties,
    ...(ruleSet.source !== undefined ? { source: ruleSet.source } : {}),
  };
}
