/**
 * Build and read @context objects.
 *
 * Exported documents carry only the prefixes their nodes use. Imported
 * contexts are reduced to prefix bindings, term aliases and `@id`
 * coercions; remote (string) contexts are not fetched.
 */

import { MalformedDocumentError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { isAbsoluteIri, type IriMapper } from './IriMapper.js';
import type { JsonLdContext } from './types.js';

const log = createLogger('context');

/**
 * Build a @context holding only the used prefixes: the base prefix
 * first, then the mapper's binding order.
 */
export function buildContext(iris: IriMapper, usedPrefixes: ReadonlySet<string>): JsonLdContext {
  const context: JsonLdContext = {};
  if (usedPrefixes.has(iris.basePrefix)) {
    context[iris.basePrefix] = iris.baseUri;
  }
  for (const [prefix, uri] of iris.getPrefixes()) {
    if (prefix !== iris.basePrefix && usedPrefixes.has(prefix)) {
      context[prefix] = uri;
    }
  }
  return context;
}

/**
 * A term defined by an imported context.
 */
export interface ContextTermInfo {
  /** IRI or compact IRI the term stands for, when aliased */
  iri?: string;
  /** Values are node ids (`"@type": "@id"`) */
  isReference: boolean;
}

export interface ParsedContext {
  prefixes: Record<string, string>;
  terms: Map<string, ContextTermInfo>;
  vocab?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function endsWithDelimiter(iri: string): boolean {
  return /[/#:]$/.test(iri);
}

/**
 * Read an inline @context (object, or array of objects and remote URLs).
 */
export function parseContext(raw: unknown): ParsedContext {
  const parsed: ParsedContext = { prefixes: {}, terms: new Map() };
  const parts = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];

  for (const part of parts) {
    if (typeof part === 'string') {
      log.debug({ context: part }, 'Skipping remote context');
      continue;
    }
    if (!isRecord(part)) {
      throw new MalformedDocumentError('@context must be an object, a URL or an array of them');
    }
    for (const [key, value] of Object.entries(part)) {
      if (key === '@vocab' && typeof value === 'string') {
        parsed.vocab = value;
      } else if (key.startsWith('@')) {
        continue;
      } else if (typeof value === 'string') {
        if (isAbsoluteIri(value) && endsWithDelimiter(value)) {
          parsed.prefixes[key] = value;
        } else {
          parsed.terms.set(key, { iri: value, isReference: false });
        }
      } else if (isRecord(value)) {
        const id = value['@id'];
        parsed.terms.set(key, {
          ...(typeof id === 'string' ? { iri: id } : {}),
          isReference: value['@type'] === '@id',
        });
      } else if (value !== null) {
        throw new MalformedDocumentError(`invalid definition for context term '${key}'`);
      }
    }
  }
  return parsed;
}
