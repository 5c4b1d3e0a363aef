/**
 * Types for type templates and the schema registry.
 *
 * A template is the structural description of a type, as declared by the
 * caller or derived from a model schema. Templates are resolved into
 * TypeDefinitions once every referenced id is known.
 */

import type { LiteralKind } from '../model/index.js';

/**
 * Reference to another type by id.
 */
export interface TypeRef {
  ref: string;
}

/**
 * Semantic type of a field: a literal kind or a type reference.
 */
export type SemanticType = LiteralKind | TypeRef;

/**
 * One field of a type template.
 */
export interface TemplateField {
  /** Field name; also the property id */
  readonly name: string;
  readonly semanticType: SemanticType;
  readonly required: boolean;
  readonly isList: boolean;
  /** Equivalent property IRIs */
  readonly ontology: readonly string[];
  readonly label?: string | undefined;
  readonly comment?: string | undefined;
}

/**
 * Structural description of a type.
 */
export interface TypeTemplate {
  readonly id: string;
  readonly label?: string | undefined;
  readonly comment?: string | undefined;
  /** Equivalent class IRIs */
  readonly ontology: readonly string[];
  /** Parent type ids */
  readonly subClassOf: readonly string[];
  readonly fields: readonly TemplateField[];
}

/**
 * What `register` does with an id that is already registered.
 * - overwrite: last write wins, the id keeps its first registration slot
 * - reject: throw DuplicateTypeError
 */
export type DuplicatePolicy = 'overwrite' | 'reject';

export interface RegistryOptions {
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Type dependency graph node.
 */
export interface TypeDependencyNode {
  /** Type id */
  id: string;
  /** Local type ids this one references (fields and parents) */
  dependsOn: Set<string>;
  /** Type ids that reference this one */
  dependedBy: Set<string>;
}

/**
 * Type dependency graph.
 */
export type TypeDependencyGraph = Map<string, TypeDependencyNode>;

/**
 * Result of checking reference resolution across the registry.
 */
export interface ResolutionResult {
  /** Whether every local reference points at a registered type */
  resolved: boolean;
  /** Unresolved references as "from -> to" */
  unresolved: string[];
  /** Reference cycles, each closed (first id repeated last); legal */
  cycles: string[][];
}
