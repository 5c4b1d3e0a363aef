/**
 * Vocabulary IRIs used by the schema and instance triples.
 */

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const SCHEMA_NS = 'https://schema.org/';

export const RDF = {
  type: `${RDF_NS}type`,
  Property: `${RDF_NS}Property`,
} as const;

export const RDFS = {
  Class: `${RDFS_NS}Class`,
  label: `${RDFS_NS}label`,
  comment: `${RDFS_NS}comment`,
  subClassOf: `${RDFS_NS}subClassOf`,
  domain: `${RDFS_NS}domain`,
  range: `${RDFS_NS}range`,
} as const;

export const OWL = {
  Class: `${OWL_NS}Class`,
  Restriction: `${OWL_NS}Restriction`,
  ObjectProperty: `${OWL_NS}ObjectProperty`,
  DatatypeProperty: `${OWL_NS}DatatypeProperty`,
  onProperty: `${OWL_NS}onProperty`,
  minCardinality: `${OWL_NS}minCardinality`,
  maxCardinality: `${OWL_NS}maxCardinality`,
  equivalentClass: `${OWL_NS}equivalentClass`,
  equivalentProperty: `${OWL_NS}equivalentProperty`,
} as const;

export const XSD = {
  string: `${XSD_NS}string`,
  integer: `${XSD_NS}integer`,
  double: `${XSD_NS}double`,
  boolean: `${XSD_NS}boolean`,
  dateTime: `${XSD_NS}dateTime`,
} as const;

/**
 * schema.org spellings of domain/range, accepted on import.
 */
export const SCHEMA = {
  domainIncludes: `${SCHEMA_NS}domainIncludes`,
  rangeIncludes: `${SCHEMA_NS}rangeIncludes`,
} as const;

/**
 * Default prefixes for common vocabularies.
 */
export const DEFAULT_PREFIXES: Readonly<Record<string, string>> = {
  schema: SCHEMA_NS,
  rdf: RDF_NS,
  rdfs: RDFS_NS,
  xsd: XSD_NS,
  dc: 'http://purl.org/dc/elements/1.1/',
  dcterms: 'http://purl.org/dc/terms/',
  foaf: 'http://xmlns.com/foaf/0.1/',
  owl: OWL_NS,
};
