/**
 * One explicit build context per crate.
 *
 * Bundles a schema registry, directly added schema entities, an instance
 * resolver and the id mapping used for export. Sessions share nothing,
 * so two crates can be built side by side.
 */

import type { Quad } from 'n3';
import type { z } from 'zod';
import type { CrateGraphConfig } from '../config/types.js';
import { DuplicateTypeError, NotFoundError } from '../core/errors.js';
import { createLogger, setLogLevel } from '../core/logger.js';
import { GraphBuilder } from '../jsonld/GraphBuilder.js';
import { IriMapper, isAbsoluteIri } from '../jsonld/IriMapper.js';
import { toDocument } from '../jsonld/JsonLdGenerator.js';
import { fromDocument } from '../jsonld/JsonLdParser.js';
import { toNTriples } from '../jsonld/NTriplesWriter.js';
import type { GraphBuildResult, JsonLdDocument } from '../jsonld/types.js';
import type { MetadataEntry, Restriction, TypeDefinition, TypeProperty } from '../model/index.js';
import { createPlainObjectExtractor, createTemplateExtractor } from '../resolver/extractors.js';
import { InstanceResolver } from '../resolver/InstanceResolver.js';
import type { ExtractorOptions, InstanceExtractor } from '../resolver/types.js';
import { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { TypeTemplateInput } from '../schema/TemplateBuilder.js';
import type { DuplicatePolicy, TypeTemplate } from '../schema/types.js';
import { parseEntry, typeToZodSchema } from '../schema/ZodExporter.js';
import type { ZodModelCatalog } from '../schema/ZodIntrospector.js';
import type { CardinalityReport } from '../validation/types.js';
import { validateCardinality } from '../validation/CardinalityValidator.js';

const log = createLogger('session');

/**
 * Session options.
 */
export interface BuildSessionOptions {
  /** Id mapping for export (default: base namespace http://example.com/) */
  iris?: IriMapper;
  /** Applies to registered templates and directly added types */
  duplicatePolicy?: DuplicatePolicy;
  /**
   * How instances are read: plain objects (default), registered
   * templates, or a custom extractor.
   */
  extractor?: 'plain' | 'template' | InstanceExtractor;
  extractorOptions?: ExtractorOptions;
  /** Instances and entries must use a known local class */
  requireKnownClasses?: boolean;
}

function isLocalClassId(id: string): boolean {
  return !id.includes(':') && !isAbsoluteIri(id);
}

export class BuildSession {
  readonly iris: IriMapper;
  readonly registry: SchemaRegistry;
  private readonly resolver: InstanceResolver;
  private readonly requireKnownClasses: boolean;
  private readonly types: Map<string, TypeDefinition> = new Map();
  private readonly properties: TypeProperty[] = [];
  private readonly restrictions: Restriction[] = [];

  constructor(options: BuildSessionOptions = {}) {
    this.iris = options.iris ?? new IriMapper();
    this.registry = new SchemaRegistry({ duplicatePolicy: options.duplicatePolicy ?? 'overwrite' });
    this.requireKnownClasses = options.requireKnownClasses ?? false;

    let extractor: InstanceExtractor;
    if (options.extractor === 'template') {
      extractor = createTemplateExtractor(this.registry, options.extractorOptions);
    } else if (options.extractor === undefined || options.extractor === 'plain') {
      extractor = createPlainObjectExtractor(options.extractorOptions);
    } else {
      extractor = options.extractor;
    }

    this.resolver = new InstanceResolver({
      extractor,
      isKnownClass: this.requireKnownClasses ? (classId) => this.isKnownClass(classId) : undefined,
    });
  }

  /**
   * Import a document into a fresh session whose id mapping carries the
   * document's prefixes.
   */
  static fromDocument(doc: unknown, options: BuildSessionOptions = {}): BuildSession {
    const imported = fromDocument(doc, { iris: options.iris ?? new IriMapper() });
    const session = new BuildSession({ ...options, iris: imported.iris });

    imported.types.forEach((type) => session.addType(type));
    imported.properties.forEach((property) => session.addProperty(property));
    imported.restrictions.forEach((restriction) => session.addRestriction(restriction));
    imported.entries.forEach((entry) => session.addEntry(entry));
    return session;
  }

  /**
   * Validate and register a type template.
   */
  register(input: TypeTemplateInput): TypeTemplate {
    return this.registry.define(input);
  }

  /**
   * Register every model a catalog declares.
   */
  registerModels(catalog: ZodModelCatalog): TypeTemplate[] {
    return catalog.registerAll(this.registry);
  }

  /**
   * Add a finished type. It takes precedence over a registered template
   * with the same id.
   */
  addType(type: TypeDefinition): this {
    if (this.types.has(type.id) && this.registry.duplicatePolicy === 'reject') {
      throw new DuplicateTypeError(type.id);
    }
    this.types.set(type.id, type);
    return this;
  }

  addProperty(property: TypeProperty): this {
    this.properties.push(property);
    return this;
  }

  addRestriction(restriction: Restriction): this {
    this.restrictions.push(restriction);
    return this;
  }

  /**
   * Add an instance and everything it references.
   *
   * @returns The instance's entry id
   */
  addInstance(instance: object, classId?: string): string {
    return this.resolver.add(instance, classId);
  }

  addEntry(entry: MetadataEntry): this {
    this.resolver.addEntry(entry);
    return this;
  }

  /**
   * Registered templates resolved in registration order, then directly
   * added types.
   */
  getTypes(): TypeDefinition[] {
    const byId = new Map<string, TypeDefinition>();
    for (const type of this.registry.resolveTypes(this.types.keys())) {
      byId.set(type.id, type);
    }
    for (const type of this.types.values()) {
      byId.set(type.id, type);
    }
    return [...byId.values()];
  }

  getType(id: string): TypeDefinition | undefined {
    return this.getTypes().find((type) => type.id === id);
  }

  getEntries(): MetadataEntry[] {
    return this.resolver.resolve().entries;
  }

  getEntry(id: string): MetadataEntry | undefined {
    return this.getEntries().find((entry) => entry.id === id);
  }

  getEntriesByClass(classId: string): MetadataEntry[] {
    return this.getEntries().filter((entry) => entry.classId === classId);
  }

  /**
   * Properties attached to types, then standalone ones; first id wins.
   */
  getProperties(): TypeProperty[] {
    const byId = new Map<string, TypeProperty>();
    for (const property of [...this.getTypes().flatMap((t) => t.properties), ...this.properties]) {
      if (!byId.has(property.id)) {
        byId.set(property.id, property);
      }
    }
    return [...byId.values()];
  }

  getProperty(id: string): TypeProperty | undefined {
    return this.getProperties().find((property) => property.id === id);
  }

  /**
   * Restrictions linked from types, then standalone ones; first id wins.
   */
  getRestrictions(): Restriction[] {
    const byId = new Map<string, Restriction>();
    for (const restriction of [...this.getTypes().flatMap((t) => t.restrictions), ...this.restrictions]) {
      if (!byId.has(restriction.id)) {
        byId.set(restriction.id, restriction);
      }
    }
    return [...byId.values()];
  }

  getRestriction(id: string): Restriction | undefined {
    return this.getRestrictions().find((restriction) => restriction.id === id);
  }

  /**
   * Zod object schema for a known type.
   */
  schemaFor(typeId: string): z.ZodObject<z.ZodRawShape> {
    const type = this.getType(typeId);
    if (type === undefined) {
      throw new NotFoundError('type', typeId);
    }
    return typeToZodSchema(type);
  }

  /**
   * Read an entry through a schema, by default the one derived from its
   * class. Undefined when no entry has the id.
   */
  getEntryAs(id: string): Record<string, unknown> | undefined;
  getEntryAs<T extends z.ZodTypeAny>(id: string, schema: T): z.infer<T> | undefined;
  getEntryAs(id: string, schema?: z.ZodTypeAny): unknown {
    const entry = this.getEntry(id);
    if (entry === undefined) {
      return undefined;
    }
    return parseEntry(entry, schema ?? this.schemaFor(entry.classId));
  }

  build(): GraphBuildResult {
    const result = new GraphBuilder({ iris: this.iris, requireKnownClasses: this.requireKnownClasses })
      .addAll({
        types: this.getTypes(),
        properties: this.properties,
        restrictions: this.restrictions,
        entries: this.getEntries(),
      })
      .build();
    log.debug({ triples: result.triples.length }, 'Session built');
    return result;
  }

  triples(): Quad[] {
    return this.build().triples;
  }

  toDocument(): JsonLdDocument {
    return toDocument(this.triples(), { iris: this.iris });
  }

  toNTriples(): string {
    return toNTriples(this.triples());
  }

  /**
   * Cardinality report over the session's entries.
   */
  validate(): CardinalityReport {
    return validateCardinality(this.getEntries(), this.getTypes());
  }

  private isKnownClass(classId: string): boolean {
    return !isLocalClassId(classId) || this.types.has(classId) || this.registry.has(classId);
  }
}

/**
 * Create a session from loaded configuration.
 */
export function createSessionFromConfig(
  config: CrateGraphConfig,
  options: Omit<BuildSessionOptions, 'iris' | 'duplicatePolicy' | 'requireKnownClasses'> = {}
): BuildSession {
  setLogLevel(config.logLevel);
  const iris = new IriMapper({
    baseUri: config.namespace.baseUri,
    basePrefix: config.namespace.prefix,
    vocab: config.jsonld.vocab,
    prefixes: config.jsonld.prefixes,
  });
  return new BuildSession({
    ...options,
    iris,
    duplicatePolicy: config.registry.duplicatePolicy,
    requireKnownClasses: config.graph.requireKnownClasses,
  });
}
