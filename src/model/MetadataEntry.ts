/**
 * A flattened instance: literal properties plus
 * references to other entries by id.
 */

import { DataFactory, type Quad } from 'n3';
import { InvalidDefinitionError } from '../core/errors.js';
import { RDF } from '../core/vocabulary.js';
import type { IriMapper } from '../jsonld/IriMapper.js';
import {
  datatypeOf,
  isLiteralValue,
  lexicalForm,
  normalizeLiteral,
  toValueList,
  type PropertyValue,
} from './LiteralValue.js';
import { UNKNOWN_CLASS_ID, type EntryReference } from './types.js';

const { namedNode, literal, quad } = DataFactory;

export interface MetadataEntryInit {
  id: string;
  classId: string;
  /** Further rdf:type ids beyond classId */
  additionalTypes?: readonly string[];
  properties?: Record<string, PropertyValue>;
  references?: Record<string, EntryReference>;
  /** Raw @type of an opaque entry */
  sourceType?: string | undefined;
}

export class MetadataEntry {
  readonly id: string;
  readonly classId: string;
  readonly additionalTypes: readonly string[];
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly references: Readonly<Record<string, EntryReference>>;
  readonly sourceType: string | undefined;

  constructor(init: MetadataEntryInit) {
    if (init.id.trim().length === 0) {
      throw new InvalidDefinitionError('entry id must not be empty');
    }
    if (init.classId.trim().length === 0) {
      throw new InvalidDefinitionError('entry class id must not be empty', init.id);
    }
    const properties: Record<string, PropertyValue> = {};
    for (const [name, value] of Object.entries(init.properties ?? {})) {
      properties[name] = isLiteralValue(value) ? normalizeLiteral(value) : value.map(normalizeLiteral);
    }
    this.id = init.id;
    this.classId = init.classId;
    this.additionalTypes = Object.freeze([...(init.additionalTypes ?? [])]);
    this.properties = Object.freeze(properties);
    this.references = Object.freeze({ ...init.references });
    this.sourceType = init.sourceType;
  }

  /**
   * Whether the entry's class could not be resolved.
   */
  get isOpaque(): boolean {
    return this.classId === UNKNOWN_CLASS_ID;
  }

  referenceList(field: string): readonly string[] {
    const value = this.references[field];
    if (value === undefined) {
      return [];
    }
    return typeof value === 'string' ? [value] : value;
  }

  /**
   * All referenced ids in field order.
   */
  referencedIds(): string[] {
    return Object.keys(this.references).flatMap((field) => this.referenceList(field));
  }

  /**
   * Number of values a field holds, literals and references together.
   */
  valueCount(field: string): number {
    const value = this.properties[field];
    const literals = value === undefined ? 0 : toValueList(value).length;
    return literals + this.referenceList(field).length;
  }

  toTriples(iris: IriMapper): Quad[] {
    const subject = iris.toTerm(this.id);
    const triples: Quad[] = [];

    if (!this.isOpaque) {
      triples.push(quad(subject, namedNode(RDF.type), iris.toTerm(this.classId)));
    } else if (this.sourceType !== undefined) {
      triples.push(quad(subject, namedNode(RDF.type), namedNode(this.sourceType)));
    }
    for (const type of this.additionalTypes) {
      triples.push(quad(subject, namedNode(RDF.type), iris.toTerm(type)));
    }

    for (const [name, value] of Object.entries(this.properties)) {
      const predicate = namedNode(iris.expand(name));
      for (const item of toValueList(value)) {
        const datatype = namedNode(iris.expand(datatypeOf(item)));
        triples.push(quad(subject, predicate, literal(lexicalForm(item), datatype)));
      }
    }
    for (const name of Object.keys(this.references)) {
      const predicate = namedNode(iris.expand(name));
      for (const target of this.referenceList(name)) {
        triples.push(quad(subject, predicate, iris.toTerm(target)));
      }
    }
    return triples;
  }
}
