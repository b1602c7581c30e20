/**
 * Types for the read-only RDF graph view consumed by the snippet engine.
 *
 * The graph is produced by an external reader (RDFa, Microdata, JSON-LD).
 * The engine never mutates it.
 */

/**
 * An IRI-identified resource.
 */
export interface NamedNode {
  termType: 'NamedNode';
  value: string;
}

/**
 * A blank node. `value` is the label without the `_:` prefix.
 */
export interface BlankNode {
  termType: 'BlankNode';
  value: string;
}

/**
 * A literal value with optional language tag and datatype IRI.
 */
export interface Literal {
  termType: 'Literal';
  value: string;
  language?: string;
  datatype?: string;
}

/**
 * Anything that can be the subject of a statement.
 */
export type ResourceTerm = NamedNode | BlankNode;

/**
 * Anything that can be the object of a statement.
 */
export type Term = ResourceTerm | Literal;

/**
 * A single statement.
 */
export interface Triple {
  subject: ResourceTerm;
  /** Predicate IRI */
  predicate: string;
  object: Term;
}

/**
 * Read-only view over a parsed graph.
 */
export interface GraphAccessor {
  /** Number of distinct statements */
  readonly size: number;
  /** Subjects in order of first appearance */
  subjects(): ResourceTerm[];
  /** Declared `rdf:type` IRIs, in source order, without duplicates */
  typesOf(resource: ResourceTerm): string[];
  /** Values of a property, in source order */
  valuesOf(resource: ResourceTerm, property: string): Term[];
  /** Predicates used with this subject, in order of first appearance */
  propertiesOf(resource: ResourceTerm): string[];
  /** Whether a different subject points at this resource */
  isReferenced(resource: ResourceTerm): boolean;
}

export const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';
export const RDF_XML_LITERAL = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#XMLLiteral';
export const RDF_HTML = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#HTML';
export const XSD = 'http://www.w3.org/2001/XMLSchema#';
