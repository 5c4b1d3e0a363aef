/**
 * Types for JSON-LD export/import and graph building.
 */

import type { Quad } from 'n3';
import type {
  MetadataEntry,
  Restriction,
  TypeDefinition,
  TypeProperty,
  UnresolvedReference,
} from '../model/index.js';
import type { IriMapper } from './IriMapper.js';

/**
 * Namespace configuration for id ↔ IRI mapping.
 */
export interface NamespaceConfig {
  /** Base namespace for local ids (e.g., "http://example.com/") */
  baseUri: string;
  /** Prefix bound to the base namespace in @context */
  basePrefix: string;
  /** Default vocabulary namespace for bare terms on import */
  vocab?: string | undefined;
  /** Additional prefix mappings */
  prefixes?: Record<string, string> | undefined;
}

/**
 * JSON-LD context definition.
 */
export interface JsonLdContext {
  /** Vocabulary prefix mappings */
  [key: string]: string | ContextTerm;
}

/**
 * Extended context term definition.
 */
export interface ContextTerm {
  /** IRI for the term */
  '@id'?: string;
  /** Type coercion ("@id" marks references) */
  '@type'?: string;
  /** Container type */
  '@container'?: '@list' | '@set' | '@language' | '@index';
}

/**
 * A typed value object.
 */
export interface JsonLdValueObject {
  '@value': string | number | boolean;
  '@type'?: string;
}

/**
 * A reference to another node.
 */
export interface JsonLdNodeReference {
  '@id': string;
}

export type JsonLdValue = string | number | boolean | JsonLdValueObject | JsonLdNodeReference;

/**
 * One node of @graph.
 */
export interface JsonLdNode {
  '@id': string;
  '@type'?: string | string[];
  [predicate: string]: JsonLdValue | JsonLdValue[] | undefined;
}

/**
 * A flattened JSON-LD document.
 */
export interface JsonLdDocument {
  '@context': JsonLdContext;
  '@graph': JsonLdNode[];
}

/**
 * Options shared by export and import.
 */
export interface CodecOptions {
  /** Id mapping; defaults to the base namespace http://example.com/ */
  iris?: IriMapper;
}

/**
 * Result of importing a document.
 */
export interface ImportResult {
  /** Types with their attached properties and restrictions */
  types: TypeDefinition[];
  /** Properties not attached to any imported type */
  properties: TypeProperty[];
  /** Restrictions not linked from any imported type */
  restrictions: Restriction[];
  entries: MetadataEntry[];
  /** Prefixes declared by the document's @context */
  prefixes: Record<string, string>;
  /** The caller's mapper layered with the document's prefixes */
  iris: IriMapper;
  unresolvedReferences: UnresolvedReference[];
}

/**
 * Inputs to the graph builder.
 */
export interface GraphInput {
  types?: readonly TypeDefinition[];
  properties?: readonly TypeProperty[];
  restrictions?: readonly Restriction[];
  entries?: readonly MetadataEntry[];
}

export interface GraphBuildOptions extends CodecOptions {
  /** Reject entries whose local class id is not among the types */
  requireKnownClasses?: boolean;
}

/**
 * An entry whose local class id names no known type.
 */
export interface UnknownClassReference {
  entryId: string;
  classId: string;
}

export interface GraphBuildResult {
  triples: Quad[];
  unresolvedReferences: UnresolvedReference[];
  unknownClasses: UnknownClassReference[];
}
