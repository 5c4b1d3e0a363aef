/**
 * A schema class with its properties and restrictions.
 *
 * Construction normalizes the definition:
 * - each property's domainIncludes contains this type
 * - each property has at least one restriction (derived from `required`)
 * - restrictions follow property order, extra ones last
 */

import { DataFactory, type Quad } from 'n3';
import { InvalidDefinitionError } from '../core/errors.js';
import { OWL, RDF, RDFS } from '../core/vocabulary.js';
import type { IriMapper } from '../jsonld/IriMapper.js';
import { Restriction, restrictionIdFor } from './Restriction.js';
import type { TypeProperty } from './TypeProperty.js';

const { namedNode, literal, quad } = DataFactory;

export interface TypeDefinitionInit {
  id: string;
  label?: string | undefined;
  comment?: string | undefined;
  /** Equivalent class IRIs */
  ontologicalAnnotations?: readonly string[];
  /** Parent type ids */
  subClassOf?: readonly string[];
  properties?: readonly TypeProperty[];
  restrictions?: readonly Restriction[];
  /**
   * Apply the normalization rules above (default true). Import turns
   * it off so a document's triples are kept exactly.
   */
  normalize?: boolean;
}

export class TypeDefinition {
  readonly id: string;
  readonly label: string | undefined;
  readonly comment: string | undefined;
  readonly ontologicalAnnotations: readonly string[];
  readonly subClassOf: readonly string[];
  readonly properties: readonly TypeProperty[];
  readonly restrictions: readonly Restriction[];

  constructor(init: TypeDefinitionInit) {
    if (init.id.trim().length === 0) {
      throw new InvalidDefinitionError('type id must not be empty');
    }
    this.id = init.id;
    this.label = init.label;
    this.comment = init.comment;
    this.ontologicalAnnotations = Object.freeze([...new Set(init.ontologicalAnnotations ?? [])]);
    this.subClassOf = Object.freeze([...new Set(init.subClassOf ?? [])]);

    const explicit = init.restrictions ?? [];
    if (init.normalize === false) {
      const ids = (init.properties ?? []).map((p) => p.id);
      const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
      if (duplicate !== undefined) {
        throw new InvalidDefinitionError(`duplicate property '${duplicate}'`, this.id);
      }
      this.properties = Object.freeze([...(init.properties ?? [])]);
      this.restrictions = Object.freeze([...explicit]);
      return;
    }

    const seen = new Set<string>();
    const properties: TypeProperty[] = [];
    const restrictions: Restriction[] = [];

    for (const original of init.properties ?? []) {
      if (seen.has(original.id)) {
        throw new InvalidDefinitionError(`duplicate property '${original.id}'`, this.id);
      }
      seen.add(original.id);

      const own = explicit.filter((r) => r.propertyId === original.id);
      let property = original;
      if (!property.domainIncludes.includes(this.id)) {
        property = property.with({ domainIncludes: [...property.domainIncludes, this.id] });
      }
      if (own.length === 0) {
        own.push(
          new Restriction({
            id: restrictionIdFor(this.id, property.id),
            propertyId: property.id,
            minCardinality: property.required ? 1 : 0,
          })
        );
      } else if (own.some((r) => r.isRequired)) {
        if (!property.required) {
          property = property.with({ required: true });
        }
      } else if (property.required) {
        throw new InvalidDefinitionError(
          `required property '${property.id}' is restricted with minCardinality 0`,
          this.id
        );
      }

      properties.push(property);
      restrictions.push(...own);
    }

    restrictions.push(...explicit.filter((r) => !seen.has(r.propertyId)));

    this.properties = Object.freeze(properties);
    this.restrictions = Object.freeze(restrictions);
  }

  getProperty(id: string): TypeProperty | undefined {
    return this.properties.find((p) => p.id === id);
  }

  restrictionsFor(propertyId: string): Restriction[] {
    return this.restrictions.filter((r) => r.propertyId === propertyId);
  }

  /**
   * Triples describing the class itself, without its property and
   * restriction nodes.
   */
  classTriples(iris: IriMapper): Quad[] {
    const subject = iris.toTerm(this.id);
    const triples: Quad[] = [quad(subject, namedNode(RDF.type), namedNode(OWL.Class))];

    if (this.label !== undefined) {
      triples.push(quad(subject, namedNode(RDFS.label), literal(this.label)));
    }
    if (this.comment !== undefined) {
      triples.push(quad(subject, namedNode(RDFS.comment), literal(this.comment)));
    }
    for (const annotation of this.ontologicalAnnotations) {
      triples.push(quad(subject, namedNode(OWL.equivalentClass), iris.toTerm(annotation)));
    }
    for (const parent of this.subClassOf) {
      triples.push(quad(subject, namedNode(RDFS.subClassOf), iris.toTerm(parent)));
    }
    for (const restriction of this.restrictions) {
      triples.push(quad(subject, namedNode(RDFS.subClassOf), iris.toTerm(restriction.id)));
    }
    return triples;
  }

  toTriples(iris: IriMapper): Quad[] {
    return [
      ...this.classTriples(iris),
      ...this.properties.flatMap((p) => p.toTriples(iris)),
      ...this.restrictions.flatMap((r) => r.toTriples(iris)),
    ];
  }
}
