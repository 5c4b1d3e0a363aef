/**
 * A named attribute with domain and range.
 */

import { DataFactory, type Quad } from 'n3';
import { InvalidDefinitionError } from '../core/errors.js';
import { OWL, RDF, RDFS } from '../core/vocabulary.js';
import type { IriMapper } from '../jsonld/IriMapper.js';

const { namedNode, literal, quad } = DataFactory;

export interface TypePropertyInit {
  id: string;
  label?: string | undefined;
  comment?: string | undefined;
  /** Type ids this property applies to */
  domainIncludes?: readonly string[];
  /** Datatype ids (`xsd:string`) or Type ids */
  rangeIncludes?: readonly string[];
  /** Equivalent property IRIs */
  ontologicalAnnotations?: readonly string[];
  required?: boolean;
}

function uniqueList(values: readonly string[] | undefined): readonly string[] {
  return Object.freeze([...new Set(values ?? [])]);
}

export class TypeProperty {
  readonly id: string;
  readonly label: string | undefined;
  readonly comment: string | undefined;
  readonly domainIncludes: readonly string[];
  readonly rangeIncludes: readonly string[];
  readonly ontologicalAnnotations: readonly string[];
  readonly required: boolean;

  constructor(init: TypePropertyInit) {
    if (init.id.trim().length === 0) {
      throw new InvalidDefinitionError('property id must not be empty');
    }
    this.id = init.id;
    this.label = init.label;
    this.comment = init.comment;
    this.domainIncludes = uniqueList(init.domainIncludes);
    this.rangeIncludes = uniqueList(init.rangeIncludes);
    this.ontologicalAnnotations = uniqueList(init.ontologicalAnnotations);
    this.required = init.required ?? false;
  }

  /**
   * Copy with some fields replaced.
   */
  with(changes: Partial<TypePropertyInit>): TypeProperty {
    return new TypeProperty({
      id: this.id,
      label: this.label,
      comment: this.comment,
      domainIncludes: this.domainIncludes,
      rangeIncludes: this.rangeIncludes,
      ontologicalAnnotations: this.ontologicalAnnotations,
      required: this.required,
      ...changes,
    });
  }

  toTriples(iris: IriMapper): Quad[] {
    const subject = iris.toTerm(this.id);
    const triples: Quad[] = [quad(subject, namedNode(RDF.type), namedNode(RDF.Property))];

    if (this.label !== undefined) {
      triples.push(quad(subject, namedNode(RDFS.label), literal(this.label)));
    }
    if (this.comment !== undefined) {
      triples.push(quad(subject, namedNode(RDFS.comment), literal(this.comment)));
    }
    for (const domain of this.domainIncludes) {
      triples.push(quad(subject, namedNode(RDFS.domain), iris.toTerm(domain)));
    }
    for (const range of this.rangeIncludes) {
      triples.push(quad(subject, namedNode(RDFS.range), iris.toTerm(range)));
    }
    for (const annotation of this.ontologicalAnnotations) {
      triples.push(quad(subject, namedNode(OWL.equivalentProperty), iris.toTerm(annotation)));
    }
    return triples;
  }
}
