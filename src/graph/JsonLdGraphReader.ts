/**
 * JsonLdGraphReader — Reads JSON-LD node objects into a TripleGraph.
 *
 * This is the input reader used by the HTTP surface. It covers the
 * subset of JSON-LD that structured-data markup uses in practice:
 * - inline `@context` objects (prefixes, term definitions, `@vocab`)
 * - the schema.org context URL, treated as `@vocab`
 * - `@graph`, `@id`, `@type`, value objects, `@list` / `@set`
 * - embedded node objects, which become blank nodes in document order
 *
 * Remote contexts are never fetched.
 */

import { TripleGraph } from './TripleGraph.js';
import { blankNode, literal, namedNode } from './terms.js';
import type { ResourceTerm, Term } from './types.js';
import { RDF_TYPE, XSD } from './types.js';

/**
 * Error raised for input the reader cannot interpret.
 */
export class GraphReadError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'GraphReadError';
  }
}

interface TermDefinition {
  id: string;
  /** `@id` for IRI coercion, otherwise a datatype IRI */
  type?: string;
}

interface ActiveContext {
  vocab?: string;
  terms: Map<string, TermDefinition>;
}

type JsonObject = Record<string, unknown>;

const SCHEMA_ORG_CONTEXT = /^https?:\/\/schema\.org\/?$/;
const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+.-]*:/;

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Reader state for a single document.
 */
class JsonLdReader {
  readonly graph = new TripleGraph();
  private blankCounter = 0;
  /** Document blank-node ids mapped to generated labels */
  private readonly blankLabels = new Map<string, string>();

  read(input: unknown): void {
    const empty: ActiveContext = { terms: new Map() };
    if (Array.isArray(input)) {
      input.forEach((item, index) => this.readTopLevel(item, empty, `/${index}`));
    } else {
      this.readTopLevel(input, empty, '');
    }
  }

  private readTopLevel(input: unknown, ctx: ActiveContext, path: string): void {
    if (!isObject(input)) {
      throw new GraphReadError('Expected a JSON-LD node object', path || '/');
    }

    const active = this.applyContext(ctx, input['@context'], `${path}/@context`);
    const graph = input['@graph'];
    if (graph !== undefined) {
      toArray(graph).forEach((node, index) => {
        if (!isObject(node)) {
          throw new GraphReadError('Expected a node object in @graph', `${path}/@graph/${index}`);
        }
        const childCtx = this.applyContext(active, node['@context'], `${path}/@graph/${index}/@context`);
        this.emitNode(node, this.subjectOf(node, childCtx), childCtx, `${path}/@graph/${index}`);
      });
    }

    const hasProperties = Object.keys(input).some(key => !key.startsWith('@') || key === '@type');
    if (graph === undefined || hasProperties) {
      this.emitNode(input, this.subjectOf(input, active), active, path);
    }
  }

  private subjectOf(node: JsonObject, ctx: ActiveContext): ResourceTerm {
    const id = node['@id'];
    if (typeof id === 'string') {
      return this.identify(id, ctx);
    }
    return blankNode(this.nextBlankLabel());
  }

  private nextBlankLabel(): string {
    return `b${this.blankCounter++}`;
  }

  /**
   * Resolve an `@id` value. Blank-node ids from the document are relabelled
   * so they never collide with labels generated for anonymous nodes.
   */
  private identify(id: string, ctx: ActiveContext): ResourceTerm {
    const iri = this.expandIri(id, ctx, false) ?? id;
    if (!iri.startsWith('_:')) {
      return namedNode(iri);
    }
    let label = this.blankLabels.get(iri);
    if (label === undefined) {
      label = this.nextBlankLabel();
      this.blankLabels.set(iri, label);
    }
    return blankNode(label);
  }

  private emitNode(node: JsonObject, subject: ResourceTerm, ctx: ActiveContext, path: string): void {
    for (const type of toArray(node['@type'] ?? [])) {
      if (typeof type !== 'string') {
        throw new GraphReadError('@type must be a string', `${path}/@type`);
      }
      const iri = this.expandIri(type, ctx, true);
      if (iri !== undefined) {
        this.graph.add({ subject, predicate: RDF_TYPE, object: namedNode(iri) });
      }
    }

    for (const [key, raw] of Object.entries(node)) {
      if (key.startsWith('@')) continue;
      const predicate = this.expandIri(key, ctx, true);
      if (predicate === undefined || predicate.startsWith('_:')) continue;
      const definition = ctx.terms.get(key);
      this.readValues(subject, predicate, raw, ctx, definition, `${path}/${key}`);
    }
  }

  private readValues(
    subject: ResourceTerm,
    predicate: string,
    raw: unknown,
    ctx: ActiveContext,
    definition: TermDefinition | undefined,
    path: string
  ): void {
    if (raw === null || raw === undefined) return;

    if (Array.isArray(raw)) {
      raw.forEach((item, index) => this.readValues(subject, predicate, item, ctx, definition, `${path}/${index}`));
      return;
    }

    if (isObject(raw) && !('@value' in raw)) {
      const container = raw['@list'] ?? raw['@set'];
      if (container !== undefined) {
        this.readValues(subject, predicate, container, ctx, definition, path);
        return;
      }

      const keys = Object.keys(raw);
      if (keys.length === 1 && typeof raw['@id'] === 'string') {
        const target = this.identify(raw['@id'], ctx);
        this.graph.add({ subject, predicate, object: target });
        return;
      }

      const childCtx = this.applyContext(ctx, raw['@context'], `${path}/@context`);
      const child = this.subjectOf(raw, childCtx);
      this.graph.add({ subject, predicate, object: child });
      this.emitNode(raw, child, childCtx, path);
      return;
    }

    this.graph.add({ subject, predicate, object: this.readScalar(raw, ctx, definition, path) });
  }

  private readScalar(
    raw: unknown,
    ctx: ActiveContext,
    definition: TermDefinition | undefined,
    path: string
  ): Term {
    if (isObject(raw)) {
      const value = raw['@value'];
      if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        throw new GraphReadError('@value must be a string, number or boolean', `${path}/@value`);
      }
      const language = raw['@language'];
      const type = raw['@type'];
      if (language !== undefined && typeof language !== 'string') {
        throw new GraphReadError('@language must be a string', `${path}/@language`);
      }
      if (type !== undefined && typeof type !== 'string') {
        throw new GraphReadError('@type must be a string', `${path}/@type`);
      }
      if (typeof value !== 'string') {
        return this.readScalar(value, ctx, undefined, path);
      }
      const datatype = type !== undefined ? this.expandIri(type, ctx, true) : undefined;
      return literal(value, {
        ...(language !== undefined ? { language } : {}),
        ...(datatype !== undefined ? { datatype } : {}),
      });
    }

    if (typeof raw === 'string') {
      if (definition?.type === '@id') {
        return this.identify(raw, ctx);
      }
      return definition?.type !== undefined ? literal(raw, { datatype: definition.type }) : literal(raw);
    }
    if (typeof raw === 'number') {
      // String() switches to exponent notation from 1e21, which is no xsd:integer lexical form
      const integer = Number.isInteger(raw) && Math.abs(raw) < 1e21;
      return literal(String(raw), { datatype: `${XSD}${integer ? 'integer' : 'double'}` });
    }
    if (typeof raw === 'boolean') {
      return literal(String(raw), { datatype: `${XSD}boolean` });
    }

    throw new GraphReadError(`Unsupported value of type ${typeof raw}`, path);
  }

  /**
   * Expand a term, compact IRI or IRI.
   *
   * @param vocab - Whether the value is vocabulary-relative (property or type)
   * @returns The expanded IRI, or undefined when it cannot be expanded
   */
  private expandIri(value: string, ctx: ActiveContext, vocab: boolean): string | undefined {
    if (value.startsWith('@')) return undefined;
    if (value.startsWith('_:')) return value;

    if (vocab) {
      const definition = ctx.terms.get(value);
      if (definition) return definition.id;
    }

    const colon = value.indexOf(':');
    if (colon > 0) {
      const prefix = value.slice(0, colon);
      const suffix = value.slice(colon + 1);
      if (suffix.startsWith('//')) return value;
      const prefixDefinition = ctx.terms.get(prefix);
      if (prefixDefinition) return prefixDefinition.id + suffix;
      if (ABSOLUTE_IRI.test(value)) return value;
    }

    if (vocab) {
      return ctx.vocab !== undefined ? ctx.vocab + value : undefined;
    }
    return value;
  }

  private applyContext(ctx: ActiveContext, raw: unknown, path: string): ActiveContext {
    if (raw === undefined) return ctx;
    if (raw === null) return { terms: new Map() };

    if (Array.isArray(raw)) {
      return raw.reduce<ActiveContext>(
        (acc, item, index) => this.applyContext(acc, item, `${path}/${index}`),
        ctx
      );
    }

    if (typeof raw === 'string') {
      if (SCHEMA_ORG_CONTEXT.test(raw)) {
        return { vocab: 'http://schema.org/', terms: new Map(ctx.terms) };
      }
      throw new GraphReadError(`Remote context not supported: ${raw}`, path);
    }

    if (!isObject(raw)) {
      throw new GraphReadError('@context must be an object, string or array', path);
    }

    const next: ActiveContext = {
      ...(ctx.vocab !== undefined ? { vocab: ctx.vocab } : {}),
      terms: new Map(ctx.terms),
    };

    for (const [key, value] of Object.entries(raw)) {
      if (key === '@vocab') {
        if (value === null) {
          delete next.vocab;
        } else if (typeof value === 'string') {
          next.vocab = this.expandIri(value, next, false) ?? value;
        } else {
          throw new GraphReadError('@vocab must be a string', `${path}/@vocab`);
        }
        continue;
      }
      if (key.startsWith('@')) continue;

      if (value === null) {
        next.terms.delete(key);
      } else if (typeof value === 'string') {
        const id = this.expandIri(value, next, true);
        if (id !== undefined) next.terms.set(key, { id });
      } else if (isObject(value) && typeof value['@id'] === 'string') {
        const id = this.expandIri(value['@id'], next, true);
        if (id === undefined) continue;
        const type = value['@type'];
        if (typeof type === 'string') {
          const coerced = type === '@id' || type === '@vocab' ? '@id' : this.expandIri(type, next, true);
          next.terms.set(key, coerced !== undefined ? { id, type: coerced } : { id });
        } else {
          next.terms.set(key, { id });
        }
      } else {
        throw new GraphReadError(`Invalid term definition for "${key}"`, `${path}/${key}`);
      }
    }

    return next;
  }
}

/**
 * Read a JSON-LD document (object or array of node objects) into a graph.
 *
 * @throws GraphReadError when the document is not interpretable
 */
export function readJsonLd(input: unknown): TripleGraph {
  const reader = new JsonLdReader();
  reader.read(input);
  return reader.graph;
}
