/**
 * Cardinality constraint on one property.
 *
 * Serialized as an owl:Restriction node; the owning type links to it
 * through rdfs:subClassOf.
 */

import { createHash } from 'node:crypto';
import { DataFactory, type Quad } from 'n3';
import { InvalidDefinitionError } from '../core/errors.js';
import { OWL, RDF, XSD } from '../core/vocabulary.js';
import { localName, type IriMapper } from '../jsonld/IriMapper.js';

const { namedNode, literal, quad } = DataFactory;

export interface RestrictionInit {
  /** Blank node id (`_:label`) or IRI id */
  id: string;
  propertyId: string;
  minCardinality?: number;
  /** Undefined means unbounded */
  maxCardinality?: number | undefined;
}

const PLAIN_ID = /^[A-Za-z0-9-]+$/;

/**
 * Deterministic blank node id for the restriction of a type's property.
 *
 * Plain local ids give `_:Type_prop_restriction`. Any other pair keeps a
 * readable label and gets a hash of both full ids appended, so distinct
 * pairs never share an id.
 */
export function restrictionIdFor(typeId: string, propertyId: string): string {
  const label = `${localName(typeId)}_${localName(propertyId)}_restriction`.replace(/[^A-Za-z0-9_-]/g, '_');
  if (PLAIN_ID.test(typeId) && PLAIN_ID.test(propertyId)) {
    return `_:${label}`;
  }
  const digest = createHash('sha256').update(JSON.stringify([typeId, propertyId])).digest('hex');
  return `_:${label}_${digest.slice(0, 12)}`;
}

/**
 * Whether two restrictions state the same constraint.
 */
export function sameRestriction(a: Restriction, b: Restriction): boolean {
  return (
    a.propertyId === b.propertyId &&
    a.minCardinality === b.minCardinality &&
    a.maxCardinality === b.maxCardinality
  );
}

function checkBound(value: number, name: string, id: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidDefinitionError(`${name} must be a non-negative integer, got ${value}`, id);
  }
}

export class Restriction {
  readonly id: string;
  readonly propertyId: string;
  readonly minCardinality: number;
  readonly maxCardinality: number | undefined;

  constructor(init: RestrictionInit) {
    if (init.id.trim().length === 0) {
      throw new InvalidDefinitionError('restriction id must not be empty');
    }
    if (init.propertyId.trim().length === 0) {
      throw new InvalidDefinitionError('restriction has no property', init.id);
    }
    const min = init.minCardinality ?? 0;
    checkBound(min, 'minCardinality', init.id);
    if (init.maxCardinality !== undefined) {
      checkBound(init.maxCardinality, 'maxCardinality', init.id);
      if (init.maxCardinality < min) {
        throw new InvalidDefinitionError(
          `maxCardinality ${init.maxCardinality} is below minCardinality ${min}`,
          init.id
        );
      }
    }

    this.id = init.id;
    this.propertyId = init.propertyId;
    this.minCardinality = min;
    this.maxCardinality = init.maxCardinality;
  }

  get isRequired(): boolean {
    return this.minCardinality >= 1;
  }

  /**
   * Whether a value count satisfies the bounds.
   */
  accepts(count: number): boolean {
    return count >= this.minCardinality && (this.maxCardinality === undefined || count <= this.maxCardinality);
  }

  toTriples(iris: IriMapper): Quad[] {
    const subject = iris.toTerm(this.id);
    const triples: Quad[] = [
      quad(subject, namedNode(RDF.type), namedNode(OWL.Restriction)),
      quad(subject, namedNode(OWL.onProperty), iris.toTerm(this.propertyId)),
      quad(
        subject,
        namedNode(OWL.minCardinality),
        literal(String(this.minCardinality), namedNode(XSD.integer))
      ),
    ];
    if (this.maxCardinality !== undefined) {
      triples.push(
        quad(
          subject,
          namedNode(OWL.maxCardinality),
          literal(String(this.maxCardinality), namedNode(XSD.integer))
        )
      );
    }
    return triples;
  }
}
