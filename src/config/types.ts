/**
 * Configuration types for crate-graph.
 *
 * These types define the structure of crate-graph.yaml and provide
 * type-safe access to build session settings.
 */

import type { LogLevel } from '../core/logger.js';
import type { DuplicatePolicy } from '../schema/types.js';

/**
 * Top-level configuration.
 */
export interface CrateGraphConfig {
  namespace: NamespaceSettings;
  jsonld: JsonLdSettings;
  registry: RegistrySettings;
  graph: GraphSettings;
  logLevel: LogLevel;
}

/**
 * Base namespace for local ids.
 */
export interface NamespaceSettings {
  /** Base URI (e.g. "http://example.com/") */
  baseUri: string;
  /** Prefix bound to the base URI in @context */
  prefix: string;
}

export interface JsonLdSettings {
  /** Extra prefixes, layered over the defaults */
  prefixes: Record<string, string>;
  /** Vocabulary for bare terms on import */
  vocab?: string;
}

export interface RegistrySettings {
  duplicatePolicy: DuplicatePolicy;
}

export interface GraphSettings {
  /** Reject entries whose local class is not a known type */
  requireKnownClasses: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CrateGraphConfig = {
  namespace: {
    baseUri: 'http://example.com/',
    prefix: 'base',
  },
  jsonld: {
    prefixes: {},
  },
  registry: {
    duplicatePolicy: 'overwrite',
  },
  graph: {
    requireKnownClasses: false,
  },
  logLevel: 'info',
};
