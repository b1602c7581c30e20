/**
 * TripleGraph — In-memory graph implementing GraphAccessor.
 *
 * Statements are indexed by subject and predicate on insertion.
 * Insertion order is preserved everywhere; duplicate statements keep
 * their first position.
 */

import type { GraphAccessor, ResourceTerm, Term, Triple } from './types.js';
import { RDF_TYPE } from './types.js';
import { isResource, resourceKey, termKey } from './terms.js';

interface SubjectEntry {
  term: ResourceTerm;
  properties: Map<string, Term[]>;
}

export class TripleGraph implements GraphAccessor {
  private readonly bySubject: Map<string, SubjectEntry> = new Map();
  private readonly statementKeys: Set<string> = new Set();
  /** Resource key → keys of the subjects that reference it */
  private readonly referrers: Map<string, Set<string>> = new Map();

  constructor(triples: Iterable<Triple> = []) {
    for (const triple of triples) {
      this.add(triple);
    }
  }

  /**
   * Add a statement. Returns false when it was already present.
   */
  add(triple: Triple): boolean {
    const subjectKey = resourceKey(triple.subject);
    const key = `${subjectKey} ${triple.predicate} ${termKey(triple.object)}`;
    if (this.statementKeys.has(key)) {
      return false;
    }
    this.statementKeys.add(key);

    let entry = this.bySubject.get(subjectKey);
    if (!entry) {
      entry = { term: triple.subject, properties: new Map() };
      this.bySubject.set(subjectKey, entry);
    }

    const values = entry.properties.get(triple.predicate);
    if (values) {
      values.push(triple.object);
    } else {
      entry.properties.set(triple.predicate, [triple.object]);
    }

    if (isResource(triple.object)) {
      const objectKey = resourceKey(triple.object);
      const refs = this.referrers.get(objectKey);
      if (refs) {
        refs.add(subjectKey);
      } else {
        this.referrers.set(objectKey, new Set([subjectKey]));
      }
    }

    return true;
  }

  get size(): number {
    return this.statementKeys.size;
  }

  subjects(): ResourceTerm[] {
    return [...this.bySubject.values()].map(entry => entry.term);
  }

  typesOf(resource: ResourceTerm): string[] {
    const types: string[] = [];
    for (const value of this.valuesOf(resource, RDF_TYPE)) {
      if (value.termType === 'NamedNode' && !types.includes(value.value)) {
        types.push(value.value);
      }
    }
    return types;
  }

  valuesOf(resource: ResourceTerm, property: string): Term[] {
    const values = this.bySubject.get(resourceKey(resource))?.properties.get(property);
    return values ? [...values] : [];
  }

  propertiesOf(resource: ResourceTerm): string[] {
    const entry = this.bySubject.get(resourceKey(resource));
    return entry ? [...entry.properties.keys()] : [];
  }

  isReferenced(resource: ResourceTerm): boolean {
    const key = resourceKey(resource);
    const refs = this.referrers.get(key);
    if (!refs) return false;
    for (const subjectKey of refs) {
      if (subjectKey !== key) return true;
    }
    return false;
  }

  /**
   * All statements in insertion order, grouped by subject.
   */
  *triples(): IterableIterator<Triple> {
    for (const entry of this.bySubject.values()) {
      for (const [predicate, objects] of entry.properties) {
        for (const object of objects) {
          yield { subject: entry.term, predicate, object };
        }
      }
    }
  }
}

/**
 * Create a graph from a list of statements.
 */
export function createTripleGraph(triples: Iterable<Triple> = []): TripleGraph {
  return new TripleGraph(triples);
}
