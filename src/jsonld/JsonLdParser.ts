/**
 * Rebuild the schema/instance model from a flattened
 * JSON-LD document.
 *
 * Nodes are classified by @type:
 * - owl:Class, rdfs:Class → TypeDefinition
 * - rdf:Property, owl:ObjectProperty, owl:DatatypeProperty → TypeProperty
 * - owl:Restriction → Restriction
 * - any other resolvable type → MetadataEntry
 * - no type, or an unknown prefix → opaque MetadataEntry ("unknown")
 *
 * Properties attach to a type through the restrictions it links with
 * rdfs:subClassOf, then through rdfs:domain. Anything not attached is
 * returned standalone.
 */

import { z } from 'zod';
import { MalformedDocumentError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { OWL, RDF, RDFS, SCHEMA } from '../core/vocabulary.js';
import {
  LiteralType,
  MetadataEntry,
  Restriction,
  TypeDefinition,
  TypeProperty,
  UNKNOWN_CLASS_ID,
  isTypedLiteral,
  literalFromLexical,
  type EntryReference,
  type LiteralValue,
  type PropertyValue,
} from '../model/index.js';
import { findUnresolvedReferences } from '../validation/ReferenceChecker.js';
import { parseContext, type ParsedContext } from './ContextBuilder.js';
import { IriMapper } from './IriMapper.js';
import type { CodecOptions, ImportResult } from './types.js';

const log = createLogger('jsonld-parser');

const TYPE_IRIS = new Set<string>([OWL.Class, RDFS.Class]);
const PROPERTY_IRIS = new Set<string>([RDF.Property, OWL.ObjectProperty, OWL.DatatypeProperty]);

const documentSchema = z
  .object({
    '@context': z.unknown().optional(),
    '@graph': z.array(z.unknown()).optional(),
  })
  .passthrough();

type RawNode = Record<string, unknown>;

/**
 * One parsed node value: a literal or a node id.
 */
type NodeValue = { kind: 'literal'; value: LiteralValue } | { kind: 'ref'; id: string };

interface ParsedNode {
  index: number;
  id: string;
  rawTypes: string[];
  /** Expanded type IRIs; undefined where a type is unresolvable */
  typeIris: Array<string | undefined>;
  /** Predicate IRI → values, in document order */
  values: Map<string, NodeValue[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One parser per document; holds the document's id mapping.
 */
export class JsonLdParser {
  private readonly baseIris: IriMapper;
  private iris: IriMapper;
  private context: ParsedContext = { prefixes: {}, terms: new Map() };

  constructor(options: CodecOptions = {}) {
    this.baseIris = options.iris ?? new IriMapper();
    this.iris = this.baseIris;
  }

  parse(doc: unknown): ImportResult {
    const envelope = documentSchema.safeParse(doc);
    if (!envelope.success) {
      throw new MalformedDocumentError('document must be a JSON object');
    }

    this.context = parseContext(envelope.data['@context']);
    this.iris = this.baseIris.withPrefixes(this.context.prefixes, this.context.vocab);

    let rawNodes: unknown[];
    if (envelope.data['@graph'] !== undefined) {
      rawNodes = envelope.data['@graph'];
    } else if ('@id' in envelope.data) {
      // @-keys other than @id/@type are skipped per node
      rawNodes = [envelope.data];
    } else {
      throw new MalformedDocumentError('document has neither @graph nor a top-level node');
    }

    const nodes = rawNodes.map((raw, index) => this.parseNode(raw, index));
    const result = this.assemble(nodes);

    log.debug(
      {
        types: result.types.length,
        properties: result.properties.length,
        restrictions: result.restrictions.length,
        entries: result.entries.length,
      },
      'Imported document'
    );
    return result;
  }

  private parseNode(raw: unknown, index: number): ParsedNode {
    if (!isRecord(raw)) {
      throw new MalformedDocumentError('node must be an object', index);
    }
    const node: RawNode = raw;

    const rawId = node['@id'];
    if (typeof rawId !== 'string' || rawId.length === 0) {
      throw new MalformedDocumentError('node has no @id', index);
    }

    const rawType = node['@type'];
    let rawTypes: string[];
    if (rawType === undefined) {
      rawTypes = [];
    } else if (typeof rawType === 'string') {
      rawTypes = [rawType];
    } else if (Array.isArray(rawType) && rawType.every((t): t is string => typeof t === 'string')) {
      rawTypes = rawType;
    } else {
      throw new MalformedDocumentError('@type must be a string or a list of strings', index);
    }

    const values = new Map<string, NodeValue[]>();
    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith('@')) {
        continue;
      }
      const term = this.context.terms.get(key);
      const predicate = this.iris.expandTerm(term?.iri ?? key);
      const items = Array.isArray(value) ? value : [value];
      const parsed = values.get(predicate) ?? [];
      for (const item of items) {
        const nodeValue = this.parseValue(item, term?.isReference ?? false, key, index);
        if (nodeValue !== undefined) {
          parsed.push(nodeValue);
        }
      }
      if (parsed.length > 0) {
        values.set(predicate, parsed);
      }
    }

    return {
      index,
      id: this.idOf(this.iris.expand(rawId)),
      rawTypes,
      typeIris: rawTypes.map((t) => (this.iris.isResolvable(t) ? this.iris.expandTerm(t) : undefined)),
      values,
    };
  }

  private parseValue(
    value: unknown,
    isReference: boolean,
    key: string,
    index: number
  ): NodeValue | undefined {
    if (value === null) {
      return undefined;
    }
    if (typeof value === 'string') {
      return isReference
        ? { kind: 'ref', id: this.idOf(this.iris.expand(value)) }
        : { kind: 'literal', value };
    }
    if (typeof value === 'number') {
      return { kind: 'literal', value: this.numberLiteral(value) };
    }
    if (typeof value === 'boolean') {
      return { kind: 'literal', value };
    }
    if (!isRecord(value)) {
      throw new MalformedDocumentError(`unsupported value for '${key}'`, index);
    }

    const id = value['@id'];
    if (typeof id === 'string') {
      if (Object.keys(value).length > 1) {
        throw new MalformedDocumentError(`embedded node in '${key}'; flatten the document first`, index);
      }
      return { kind: 'ref', id: this.idOf(this.iris.expand(id)) };
    }

    const raw = value['@value'];
    if (raw === undefined) {
      throw new MalformedDocumentError(`value object in '${key}' has neither @id nor @value`, index);
    }
    if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
      throw new MalformedDocumentError(`@value in '${key}' must be a scalar`, index);
    }
    const datatype = value['@type'];
    if (typeof datatype !== 'string') {
      if (value['@language'] !== undefined) {
        log.debug({ key }, 'Dropping language tag');
      }
      return { kind: 'literal', value: typeof raw === 'number' ? this.numberLiteral(raw) : raw };
    }
    const datatypeId = this.idOf(this.iris.expandTerm(datatype));
    return { kind: 'literal', value: literalFromLexical(String(raw), datatypeId) };
  }

  private numberLiteral(value: number): LiteralValue {
    return Number.isSafeInteger(value) ? value : literalFromLexical(String(value), LiteralType.float);
  }

  private assemble(nodes: ParsedNode[]): ImportResult {
    const typeNodes: ParsedNode[] = [];
    const propertyNodes: ParsedNode[] = [];
    const restrictionNodes: ParsedNode[] = [];
    const entryNodes: ParsedNode[] = [];

    for (const node of nodes) {
      if (node.typeIris.some((t) => t !== undefined && TYPE_IRIS.has(t))) {
        typeNodes.push(node);
      } else if (node.typeIris.some((t) => t !== undefined && PROPERTY_IRIS.has(t))) {
        propertyNodes.push(node);
      } else if (node.typeIris.includes(OWL.Restriction)) {
        restrictionNodes.push(node);
      } else {
        entryNodes.push(node);
      }
    }

    const restrictions = new Map<string, Restriction>();
    for (const node of restrictionNodes) {
      restrictions.set(node.id, this.toRestriction(node));
    }
    const properties = new Map<string, TypeProperty>();
    for (const node of propertyNodes) {
      properties.set(node.id, this.toProperty(node));
    }

    const attachedProperties = new Set<string>();
    const linkedRestrictions = new Set<string>();
    const types = typeNodes.map((node) =>
      this.toType(node, restrictions, properties, attachedProperties, linkedRestrictions)
    );
    const entries = entryNodes.map((node) => this.toEntry(node));

    const knownIds = [...types.map((t) => t.id), ...properties.keys(), ...restrictions.keys()];
    return {
      types,
      properties: [...properties.values()].filter((p) => !attachedProperties.has(p.id)),
      restrictions: [...restrictions.values()].filter((r) => !linkedRestrictions.has(r.id)),
      entries,
      prefixes: { ...this.context.prefixes },
      iris: this.iris,
      unresolvedReferences: findUnresolvedReferences(entries, knownIds),
    };
  }

  private toType(
    node: ParsedNode,
    restrictions: ReadonlyMap<string, Restriction>,
    properties: ReadonlyMap<string, TypeProperty>,
    attachedProperties: Set<string>,
    linkedRestrictions: Set<string>
  ): TypeDefinition {
    const parents: string[] = [];
    const own: Restriction[] = [];
    for (const target of this.refs(node, RDFS.subClassOf)) {
      const restriction = restrictions.get(target);
      if (restriction) {
        own.push(restriction);
        linkedRestrictions.add(restriction.id);
      } else {
        parents.push(target);
      }
    }

    const attached: TypeProperty[] = [];
    const addProperty = (id: string): void => {
      const property = properties.get(id);
      if (!property || attached.some((p) => p.id === id)) {
        return;
      }
      const required = own.some((r) => r.propertyId === id && r.isRequired);
      attached.push(property.required === required ? property : property.with({ required }));
      attachedProperties.add(id);
    };
    for (const restriction of own) {
      addProperty(restriction.propertyId);
    }
    for (const property of properties.values()) {
      if (property.domainIncludes.includes(node.id)) {
        addProperty(property.id);
      }
    }

    return new TypeDefinition({
      id: node.id,
      label: this.text(node, RDFS.label),
      comment: this.text(node, RDFS.comment),
      ontologicalAnnotations: this.refs(node, OWL.equivalentClass),
      subClassOf: parents,
      properties: attached,
      restrictions: own,
      normalize: false,
    });
  }

  private toProperty(node: ParsedNode): TypeProperty {
    return new TypeProperty({
      id: node.id,
      label: this.text(node, RDFS.label),
      comment: this.text(node, RDFS.comment),
      domainIncludes: [...this.refs(node, RDFS.domain), ...this.refs(node, SCHEMA.domainIncludes)],
      rangeIncludes: [...this.refs(node, RDFS.range), ...this.refs(node, SCHEMA.rangeIncludes)],
      ontologicalAnnotations: this.refs(node, OWL.equivalentProperty),
    });
  }

  private toRestriction(node: ParsedNode): Restriction {
    const [propertyId] = this.refs(node, OWL.onProperty);
    if (propertyId === undefined) {
      throw new MalformedDocumentError('restriction has no owl:onProperty', node.index);
    }
    return new Restriction({
      id: node.id,
      propertyId,
      minCardinality: this.cardinality(node, OWL.minCardinality) ?? 0,
      maxCardinality: this.cardinality(node, OWL.maxCardinality),
    });
  }

  private toEntry(node: ParsedNode): MetadataEntry {
    const [firstIri, ...otherIris] = node.typeIris;
    const [firstRaw, ...otherRaws] = node.rawTypes;

    // A field may hold literals and node references side by side
    const properties: Record<string, PropertyValue> = {};
    const references: Record<string, EntryReference> = {};
    for (const [predicate, values] of node.values) {
      const name = this.idOf(predicate);
      const literals = values.flatMap((v) => (v.kind === 'literal' ? [v.value] : []));
      const ids = values.flatMap((v) => (v.kind === 'ref' ? [v.id] : []));
      if (literals.length > 0) {
        properties[name] = literals.length === 1 && literals[0] !== undefined ? literals[0] : literals;
      }
      if (ids.length > 0) {
        references[name] = ids.length === 1 && ids[0] !== undefined ? ids[0] : ids;
      }
    }

    const opaque = firstIri === undefined;
    return new MetadataEntry({
      id: node.id,
      classId: opaque ? UNKNOWN_CLASS_ID : this.idOf(firstIri),
      additionalTypes: otherRaws.map((raw, i) => {
        const iri = otherIris[i];
        return iri === undefined ? raw : this.idOf(iri);
      }),
      properties,
      references,
      sourceType: opaque ? firstRaw : undefined,
    });
  }

  /**
   * Ids are compacted with the caller's mapper only, so prefixes known
   * just to this document never leak into the model.
   */
  private idOf(iri: string): string {
    return this.baseIris.toId(iri);
  }

  private refs(node: ParsedNode, predicate: string): string[] {
    return (node.values.get(predicate) ?? []).flatMap((v) => {
      if (v.kind === 'ref') {
        return [v.id];
      }
      // Schema predicates take plain strings as ids
      return typeof v.value === 'string' ? [this.idOf(this.iris.expand(v.value))] : [];
    });
  }

  private text(node: ParsedNode, predicate: string): string | undefined {
    for (const value of node.values.get(predicate) ?? []) {
      if (value.kind === 'literal' && typeof value.value === 'string') {
        return value.value;
      }
    }
    return undefined;
  }

  private cardinality(node: ParsedNode, predicate: string): number | undefined {
    const [value] = node.values.get(predicate) ?? [];
    if (value === undefined) {
      return undefined;
    }
    if (value.kind === 'literal') {
      const raw = value.value;
      let lexical: string | undefined;
      if (typeof raw === 'number') {
        lexical = String(raw);
      } else if (typeof raw === 'string') {
        lexical = raw;
      } else if (isTypedLiteral(raw)) {
        lexical = raw.value;
      }
      if (lexical !== undefined && /^\d+$/.test(lexical)) {
        return Number(lexical);
      }
    }
    throw new MalformedDocumentError(`invalid cardinality on restriction '${node.id}'`, node.index);
  }
}

/**
 * Parse a JSON-LD document into types, properties, restrictions and entries.
 */
export function fromDocument(doc: unknown, options: CodecOptions = {}): ImportResult {
  return new JsonLdParser(options).parse(doc);
}
