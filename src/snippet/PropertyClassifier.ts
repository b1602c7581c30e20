/**
 * PropertyClassifier — Buckets a resource's properties into display roles.
 *
 * Single roles (title, photo, description) take the first listed property
 * that has values. Multi roles (body, nested) take every listed property
 * that has values, in the rule set's order. A property listed under several
 * roles is evaluated for each of them.
 */

import type { GraphAccessor, ResourceTerm } from '../graph/types.js';
import type { ClassifiedRoles, RoleEntry, RuleSet } from './types.js';

function firstPopulated(
  graph: GraphAccessor,
  resource: ResourceTerm,
  properties: readonly string[]
): RoleEntry | undefined {
  for (const property of properties) {
    const values = graph.valuesOf(resource, property);
    if (values.length > 0) {
      return { property, values };
    }
  }
  return undefined;
}

function allPopulated(
  graph: GraphAccessor,
  resource: ResourceTerm,
  properties: readonly string[]
): RoleEntry[] {
  const entries: RoleEntry[] = [];
  for (const property of properties) {
    const values = graph.valuesOf(resource, property);
    if (values.length > 0) {
      entries.push({ property, values });
    }
  }
  return entries;
}

export function classify(graph: GraphAccessor, resource: ResourceTerm, ruleSet: RuleSet): ClassifiedRoles {
  const title = firstPopulated(graph, resource, ruleSet.titleProps);
  const photo = firstPopulated(graph, resource, ruleSet.photoProps);
  const description = firstPopulated(graph, resource, ruleSet.descriptionProps);

  return {
    ...(title !== undefined ? { title } : {}),
    ...(photo !== undefined ? { photo } : {}),
    ...(description !== undefined ? { description } : {}),
    body: allPopulated(graph, resource, ruleSet.bodyProps),
    nested: allPopulated(graph, resource, ruleSet.nestedProps),
  };
}

