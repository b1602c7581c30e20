/**
 * Prefixes — CURIE shortening and expansion for rendered markup.
 *
 * Snippets carry RDFa-style `property`, `rel`, `typeof` and `datatype`
 * attributes; these are emitted as CURIEs whenever a known prefix covers
 * the IRI.
 */

/**
 * Default prefixes for the vocabularies snippets are usually written in.
 */
export const DEFAULT_PREFIXES: Record<string, string> = {
  schema: 'http://schema.org/',
  og: 'http://ogp.me/ns#',
  v: 'http://rdf.data-vocabulary.org/#',
  gr: 'http://purl.org/goodrelations/v1#',
  content: 'http://purl.org/rss/1.0/modules/content/',
  rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
  rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
  xsd: 'http://www.w3.org/2001/XMLSchema#',
  dc: 'http://purl.org/dc/elements/1.1/',
  dcterms: 'http://purl.org/dc/terms/',
  foaf: 'http://xmlns.com/foaf/0.1/',
  owl: 'http://www.w3.org/2002/07/owl#',
};

/** Characters allowed in the local part of an emitted CURIE */
const LOCAL_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

/**
 * Ordered prefix map. Longer namespaces win when several match an IRI.
 */
export class PrefixMap {
  private readonly byNamespace: Array<[prefix: string, namespace: string]>;
  private readonly byPrefix: Map<string, string>;

  constructor(prefixes: Record<string, string> = DEFAULT_PREFIXES) {
    this.byPrefix = new Map(Object.entries(prefixes));
    this.byNamespace = [...this.byPrefix.entries()].sort((a, b) => b[1].length - a[1].length);
  }

  /**
   * Shorten an IRI to `prefix:local`, or return it unchanged.
   */
  toCurie(iri: string): string {
    for (const [prefix, namespace] of this.byNamespace) {
      if (iri.startsWith(namespace)) {
        const local = iri.slice(namespace.length);
        if (LOCAL_NAME.test(local)) {
          return `${prefix}:${local}`;
        }
      }
    }
    return iri;
  }

  /**
   * Prefix map with additional entries (overriding same-named prefixes).
   */
  extend(prefixes: Record<string, string>): PrefixMap {
    return new PrefixMap({ ...Object.fromEntries(this.byPrefix), ...prefixes });
  }
}

export function createPrefixMap(extra: Record<string, string> = {}): PrefixMap {
  return new PrefixMap({ ...DEFAULT_PREFIXES, ...extra });
}
