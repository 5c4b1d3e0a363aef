/**
 * Conversion between model ids, compact IRIs and RDF terms.
 *
 * Model ids come in four shapes:
 * - local id (`Person`), resolved against the base namespace
 * - compact IRI (`schema:name`), resolved against a known prefix
 * - absolute IRI (`https://…`, `urn:…`), used as-is
 * - blank node id (`_:label`)
 *
 * The mapping is deterministic: same configuration, same output.
 */

import { DataFactory } from 'n3';
import type { BlankNode, NamedNode } from 'n3';
import { DEFAULT_PREFIXES } from '../core/vocabulary.js';
import { InvalidDefinitionError } from '../core/errors.js';
import type { NamespaceConfig } from './types.js';

const { namedNode, blankNode } = DataFactory;

export const DEFAULT_BASE_URI = 'http://example.com/';
export const DEFAULT_BASE_PREFIX = 'base';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const PREFIX_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Check if a string is an absolute IRI (`scheme://…` or `urn:…`).
 */
export function isAbsoluteIri(value: string): boolean {
  return SCHEME_PATTERN.test(value) || value.startsWith('urn:');
}

/**
 * Check if a string is a blank node id.
 */
export function isBlankId(value: string): boolean {
  return value.startsWith('_:');
}

/**
 * Split `prefix:local` into its parts; undefined when there is no colon.
 */
export function splitCompact(value: string): { prefix: string; local: string } | undefined {
  const colon = value.indexOf(':');
  if (colon <= 0) {
    return undefined;
  }
  return { prefix: value.slice(0, colon), local: value.slice(colon + 1) };
}

/**
 * Local part of an id: text after the last `:`, `/` or `#`.
 */
export function localName(id: string): string {
  const cut = Math.max(id.lastIndexOf(':'), id.lastIndexOf('/'), id.lastIndexOf('#'));
  return cut >= 0 ? id.slice(cut + 1) : id;
}

export class IriMapper {
  readonly baseUri: string;
  readonly basePrefix: string;
  readonly vocab: string | undefined;
  private readonly prefixes: Map<string, string>;

  constructor(config: Partial<NamespaceConfig> = {}) {
    const baseUri = config.baseUri ?? DEFAULT_BASE_URI;
    const basePrefix = config.basePrefix ?? DEFAULT_BASE_PREFIX;
    if (!isAbsoluteIri(baseUri)) {
      throw new InvalidDefinitionError(`base URI must be absolute, got '${baseUri}'`, 'namespace.baseUri');
    }
    if (!PREFIX_PATTERN.test(basePrefix)) {
      throw new InvalidDefinitionError(`invalid prefix '${basePrefix}'`, 'namespace.prefix');
    }

    this.baseUri = baseUri;
    this.basePrefix = basePrefix;
    this.vocab = config.vocab;

    // Base first, then defaults, then custom; the base binding is never overridden
    this.prefixes = new Map([[basePrefix, baseUri]]);
    for (const [prefix, uri] of Object.entries({ ...DEFAULT_PREFIXES, ...config.prefixes })) {
      if (prefix !== basePrefix) {
        this.prefixes.set(prefix, uri);
      }
    }
  }

  /**
   * A mapper with extra prefix bindings layered on top; new bindings win.
   * Binding the base prefix moves the base namespace; `vocab`, when
   * given, replaces the vocabulary.
   */
  withPrefixes(extra: Record<string, string>, vocab?: string): IriMapper {
    const merged: Record<string, string> = {};
    for (const [prefix, uri] of this.prefixes) {
      if (prefix !== this.basePrefix) {
        merged[prefix] = uri;
      }
    }
    for (const [prefix, uri] of Object.entries(extra)) {
      if (prefix !== this.basePrefix) {
        merged[prefix] = uri;
      }
    }
    return new IriMapper({
      baseUri: extra[this.basePrefix] ?? this.baseUri,
      basePrefix: this.basePrefix,
      vocab: vocab ?? this.vocab,
      prefixes: merged,
    });
  }

  /**
   * All known prefixes in binding order.
   */
  getPrefixes(): Array<[string, string]> {
    return [...this.prefixes];
  }

  hasPrefix(prefix: string): boolean {
    return this.prefixes.has(prefix);
  }

  /**
   * Whether an id can be turned into an IRI.
   * An id with an unknown prefix (`mystery:Thing`) cannot.
   */
  isResolvable(id: string): boolean {
    if (id.length === 0) {
      return false;
    }
    if (isBlankId(id) || isAbsoluteIri(id)) {
      return true;
    }
    const parts = splitCompact(id);
    return parts === undefined || this.prefixes.has(parts.prefix);
  }

  /**
   * Expand an id to an absolute IRI. Blank ids are returned unchanged;
   * an unknown prefix is read as an IRI scheme, as JSON-LD does.
   */
  expand(id: string): string {
    if (isBlankId(id) || isAbsoluteIri(id)) {
      return id;
    }
    const parts = splitCompact(id);
    if (parts === undefined) {
      return `${this.baseUri}${id}`;
    }
    const namespace = this.prefixes.get(parts.prefix);
    return namespace === undefined ? id : `${namespace}${parts.local}`;
  }

  /**
   * Expand a JSON-LD term (a key or @type value); bare terms use @vocab.
   */
  expandTerm(term: string): string {
    if (this.vocab !== undefined && !term.includes(':')) {
      return `${this.vocab}${term}`;
    }
    return this.expand(term);
  }

  /**
   * RDF term for an id.
   */
  toTerm(id: string): NamedNode | BlankNode {
    return isBlankId(id) ? blankNode(id.slice(2)) : namedNode(this.expand(id));
  }

  /**
   * Model id for an IRI: local id inside the base namespace,
   * compact IRI under another known prefix, otherwise the IRI itself.
   */
  toId(iri: string): string {
    if (isBlankId(iri)) {
      return iri;
    }
    if (iri.startsWith(this.baseUri)) {
      const local = iri.slice(this.baseUri.length);
      if (local.length > 0 && !local.includes(':')) {
        return local;
      }
    }
    const compact = this.compact(iri, false);
    return compact.prefix !== undefined ? compact.value : iri;
  }

  /**
   * Compact an IRI against the longest matching namespace.
   * Returns the prefix used, if any, so callers can track context usage.
   */
  compact(iri: string, includeBase = true): { value: string; prefix?: string } {
    if (isBlankId(iri)) {
      return { value: iri };
    }
    let best: { prefix: string; namespace: string } | undefined;
    for (const [prefix, namespace] of this.prefixes) {
      if (!includeBase && prefix === this.basePrefix) {
        continue;
      }
      if (iri.startsWith(namespace) && iri.length > namespace.length) {
        if (best === undefined || namespace.length > best.namespace.length) {
          best = { prefix, namespace };
        }
      }
    }
    if (best === undefined) {
      return { value: iri };
    }
    const local = iri.slice(best.namespace.length);
    // `p://x` would read back as an absolute IRI
    if (local.startsWith('//')) {
      return { value: iri };
    }
    return { value: `${best.prefix}:${local}`, prefix: best.prefix };
  }
}
