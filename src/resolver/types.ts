/**
 * Types for instance extraction and resolution.
 */

import type { MetadataEntry, UnresolvedReference } from '../model/index.js';

/**
 * One field read from an instance, in declared order.
 */
export interface ExtractedField {
  name: string;
  value: unknown;
  /** Value holds nested instances or ids rather than literals */
  isReference: boolean;
  /** Class of nested instances, when the front-end knows it */
  targetClass?: string | undefined;
}

/**
 * Narrow capability the resolver needs from a modeling front-end.
 */
export interface InstanceExtractor {
  /** Class id of an instance; `hint` comes from the referencing field */
  classOf(instance: object, hint?: string): string;
  /** Deterministic identity, or undefined when none can be derived */
  identityOf(instance: object, classId: string): string | undefined;
  fieldsOf(instance: object, classId: string): ExtractedField[];
}

/**
 * How an instance without an id field is keyed.
 * - field: only the id field; missing → IdentityMissingError
 * - content: SHA-256 of the class and literal fields
 */
export type IdentityStrategy = 'field' | 'content';

export interface ExtractorOptions {
  /** Field naming the class (default "type") */
  typeField?: string;
  /** Field holding the identity (default "id") */
  idField?: string;
  identity?: IdentityStrategy;
}

export interface ResolverOptions {
  extractor?: InstanceExtractor;
  /** Class check; an unknown class raises NotFoundError */
  isKnownClass?: (classId: string) => boolean;
}

export interface ResolveResult {
  /** One entry per identity, in first-sight order */
  entries: MetadataEntry[];
  unresolvedReferences: UnresolvedReference[];
}
