/**
 * Merge schema and instance triples into one graph.
 *
 * Emission order is deterministic:
 * 1. class triples of each type (registration order)
 * 2. property triples (type-attached first, then standalone)
 * 3. restriction triples (type-attached first, then standalone)
 * 4. entry triples (creation order, declared-field order)
 *
 * Duplicate triples are dropped, so a property shared by several types
 * appears once.
 */

import type { Quad, Term } from 'n3';
import { InvalidDefinitionError, NotFoundError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { sameRestriction } from '../model/index.js';
import type { MetadataEntry, Restriction, TypeDefinition, TypeProperty } from '../model/index.js';
import { findUnresolvedReferences } from '../validation/ReferenceChecker.js';
import { IriMapper, isAbsoluteIri } from './IriMapper.js';
import type { GraphBuildOptions, GraphBuildResult, GraphInput, UnknownClassReference } from './types.js';

const log = createLogger('graph-builder');

function termKey(term: Term): string {
  if (term.termType === 'Literal') {
    return `"${term.value}"^^<${term.datatype.value}>@${term.language}`;
  }
  return `${term.termType}:${term.value}`;
}

/**
 * Insertion-ordered set of triples.
 */
class TripleSet {
  private readonly keys = new Set<string>();
  readonly triples: Quad[] = [];

  addAll(triples: Iterable<Quad>): void {
    for (const triple of triples) {
      const key = `${termKey(triple.subject)} ${termKey(triple.predicate)} ${termKey(triple.object)}`;
      if (!this.keys.has(key)) {
        this.keys.add(key);
        this.triples.push(triple);
      }
    }
  }
}

/**
 * Collects types, properties, restrictions and entries
 * and emits their merged triples.
 */
export class GraphBuilder {
  private readonly iris: IriMapper;
  private readonly requireKnownClasses: boolean;
  private readonly types: TypeDefinition[] = [];
  private readonly properties: TypeProperty[] = [];
  private readonly restrictions: Restriction[] = [];
  private readonly entries: MetadataEntry[] = [];

  constructor(options: GraphBuildOptions = {}) {
    this.iris = options.iris ?? new IriMapper();
    this.requireKnownClasses = options.requireKnownClasses ?? false;
  }

  addType(type: TypeDefinition): this {
    this.types.push(type);
    return this;
  }

  /**
   * Add a property not owned by any type.
   */
  addProperty(property: TypeProperty): this {
    this.properties.push(property);
    return this;
  }

  /**
   * Add a restriction not linked from any type.
   */
  addRestriction(restriction: Restriction): this {
    this.restrictions.push(restriction);
    return this;
  }

  addEntry(entry: MetadataEntry): this {
    this.entries.push(entry);
    return this;
  }

  addAll(input: GraphInput): this {
    input.types?.forEach((t) => this.addType(t));
    input.properties?.forEach((p) => this.addProperty(p));
    input.restrictions?.forEach((r) => this.addRestriction(r));
    input.entries?.forEach((e) => this.addEntry(e));
    return this;
  }

  /**
   * Emit the merged graph and report dangling entry references
   * and entries of unknown local classes.
   */
  build(): GraphBuildResult {
    const unknownClasses = this.findUnknownClasses();
    const [firstUnknown] = unknownClasses;
    if (firstUnknown && this.requireKnownClasses) {
      throw new NotFoundError('type', firstUnknown.classId, `class of entry '${firstUnknown.entryId}'`);
    }
    if (unknownClasses.length > 0) {
      log.warn({ count: unknownClasses.length }, 'Graph has entries of unknown classes');
    }
    this.checkRestrictionIds();

    const graph = new TripleSet();
    for (const type of this.types) {
      graph.addAll(type.classTriples(this.iris));
    }
    for (const type of this.types) {
      for (const property of type.properties) {
        graph.addAll(property.toTriples(this.iris));
      }
    }
    for (const property of this.properties) {
      graph.addAll(property.toTriples(this.iris));
    }
    for (const type of this.types) {
      for (const restriction of type.restrictions) {
        graph.addAll(restriction.toTriples(this.iris));
      }
    }
    for (const restriction of this.restrictions) {
      graph.addAll(restriction.toTriples(this.iris));
    }
    for (const entry of this.entries) {
      graph.addAll(entry.toTriples(this.iris));
    }

    const schemaIds = [
      ...this.types.map((t) => t.id),
      ...this.types.flatMap((t) => t.properties.map((p) => p.id)),
      ...this.properties.map((p) => p.id),
    ];
    const unresolvedReferences = findUnresolvedReferences(this.entries, schemaIds);
    if (unresolvedReferences.length > 0) {
      log.warn({ count: unresolvedReferences.length }, 'Graph has unresolved entry references');
    }
    log.debug(
      { types: this.types.length, entries: this.entries.length, triples: graph.triples.length },
      'Built graph'
    );

    return { triples: graph.triples, unresolvedReferences, unknownClasses };
  }

  private findUnknownClasses(): UnknownClassReference[] {
    const known = new Set(this.types.map((t) => t.id));
    const unknown: UnknownClassReference[] = [];
    for (const entry of this.entries) {
      const local = !entry.isOpaque && !entry.classId.includes(':') && !isAbsoluteIri(entry.classId);
      if (local && !known.has(entry.classId)) {
        unknown.push({ entryId: entry.id, classId: entry.classId });
      }
    }
    return unknown;
  }

  /**
   * Two different restrictions under one id would merge into one node.
   */
  private checkRestrictionIds(): void {
    const byId = new Map<string, Restriction>();
    const all = [...this.types.flatMap((t) => t.restrictions), ...this.restrictions];
    for (const restriction of all) {
      const seen = byId.get(restriction.id);
      if (seen === undefined) {
        byId.set(restriction.id, restriction);
      } else if (!sameRestriction(seen, restriction)) {
        throw new InvalidDefinitionError(
          `id shared by different restrictions on '${seen.propertyId}' and '${restriction.propertyId}'`,
          restriction.id
        );
      }
    }
  }
}

/**
 * Build the merged triple list in one call.
 */
export function buildGraph(
  types: readonly TypeDefinition[],
  properties: readonly TypeProperty[],
  restrictions: readonly Restriction[],
  entries: readonly MetadataEntry[],
  options: GraphBuildOptions = {}
): Quad[] {
  return new GraphBuilder(options).addAll({ types, properties, restrictions, entries }).build().triples;
}
