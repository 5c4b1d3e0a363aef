/**
 * Export → import → export fidelity.
 */

import { describe, it, expect } from 'vitest';
import { OWL_NS, RDFS_NS, RDF_NS, SCHEMA_NS, XSD_NS } from '../core/vocabulary.js';
import { MetadataEntry } from '../model/index.js';
import { createSchemaRegistry } from '../schema/SchemaRegistry.js';
import { buildGraph } from './GraphBuilder.js';
import { toDocument } from './JsonLdGenerator.js';
import { fromDocument } from './JsonLdParser.js';
import { canonicalNTriples } from './NTriplesWriter.js';
import type { ImportResult, JsonLdDocument } from './types.js';

function personModel() {
  const registry = createSchemaRegistry();
  registry.define({
    id: 'Person',
    label: 'Person',
    ontology: ['schema:Person'],
    fields: [
      { name: 'name', semanticType: 'string', required: true },
      { name: 'knows', semanticType: { ref: 'Person' }, isList: true },
    ],
  });
  const types = registry.resolveTypes();
  const entries = [
    new MetadataEntry({ id: 'sarah', classId: 'Person', properties: { name: 'Sarah' }, references: { knows: 'marcus' } }),
    new MetadataEntry({ id: 'marcus', classId: 'Person', properties: { name: 'Marcus' }, references: { knows: 'sarah' } }),
  ];
  return { types, entries };
}

function exportModel(model: Pick<ImportResult, 'types' | 'properties' | 'restrictions' | 'entries'>): JsonLdDocument {
  return toDocument(buildGraph(model.types, model.properties, model.restrictions, model.entries));
}

describe('JSON-LD round trip', () => {
  const { types, entries } = personModel();
  const exported = exportModel({ types, properties: [], restrictions: [], entries });

  it('exports the schema and instances as a flattened document', () => {
    expect(exported).toEqual({
      '@context': {
        base: 'http://example.com/',
        schema: SCHEMA_NS,
        rdf: RDF_NS,
        rdfs: RDFS_NS,
        xsd: XSD_NS,
        owl: OWL_NS,
      },
      '@graph': [
        {
          '@id': 'base:Person',
          '@type': 'owl:Class',
          'rdfs:label': 'Person',
          'owl:equivalentClass': { '@id': 'schema:Person' },
          'rdfs:subClassOf': [{ '@id': '_:Person_name_restriction' }, { '@id': '_:Person_knows_restriction' }],
        },
        {
          '@id': 'base:name',
          '@type': 'rdf:Property',
          'rdfs:domain': { '@id': 'base:Person' },
          'rdfs:range': { '@id': 'xsd:string' },
        },
        {
          '@id': 'base:knows',
          '@type': 'rdf:Property',
          'rdfs:domain': { '@id': 'base:Person' },
          'rdfs:range': { '@id': 'base:Person' },
        },
        {
          '@id': '_:Person_name_restriction',
          '@type': 'owl:Restriction',
          'owl:onProperty': { '@id': 'base:name' },
          'owl:minCardinality': 1,
          'owl:maxCardinality': 1,
        },
        {
          '@id': '_:Person_knows_restriction',
          '@type': 'owl:Restriction',
          'owl:onProperty': { '@id': 'base:knows' },
          'owl:minCardinality': 0,
        },
        { '@id': 'base:sarah', '@type': 'base:Person', 'base:name': 'Sarah', 'base:knows': { '@id': 'base:marcus' } },
        { '@id': 'base:marcus', '@type': 'base:Person', 'base:name': 'Marcus', 'base:knows': { '@id': 'base:sarah' } },
      ],
    });
  });

  it('imports back to the same model', () => {
    const imported = fromDocument(exported);
    const [person] = imported.types;

    expect(imported.types.map((t) => t.id)).toEqual(['Person']);
    expect(person?.label).toBe('Person');
    expect(person?.ontologicalAnnotations).toEqual(['schema:Person']);
    expect(person?.properties.map((p) => [p.id, p.required, p.domainIncludes, p.rangeIncludes])).toEqual([
      ['name', true, ['Person'], ['xsd:string']],
      ['knows', false, ['Person'], ['Person']],
    ]);
    expect(person?.restrictions.map((r) => [r.id, r.propertyId, r.minCardinality, r.maxCardinality])).toEqual([
      ['_:Person_name_restriction', 'name', 1, 1],
      ['_:Person_knows_restriction', 'knows', 0, undefined],
    ]);
    expect(imported.properties).toEqual([]);
    expect(imported.restrictions).toEqual([]);
    expect(imported.entries.map((e) => [e.id, e.classId, { ...e.properties }, { ...e.references }])).toEqual([
      ['sarah', 'Person', { name: 'Sarah' }, { knows: 'marcus' }],
      ['marcus', 'Person', { name: 'Marcus' }, { knows: 'sarah' }],
    ]);
    expect(imported.unresolvedReferences).toEqual([]);
  });

  it('re-exports byte-identically', () => {
    const again = exportModel(fromDocument(exported));

    expect(JSON.stringify(again)).toBe(JSON.stringify(exported));
  });

  it('keeps the graph isomorphic', () => {
    const original = buildGraph(types, [], [], entries);
    const imported = fromDocument(exported);
    const rebuilt = buildGraph(imported.types, imported.properties, imported.restrictions, imported.entries);

    expect(canonicalNTriples(rebuilt)).toBe(canonicalNTriples(original));
  });

  it('carries opaque nodes through unchanged', () => {
    const doc = {
      '@context': { base: 'http://example.com/' },
      '@graph': [{ '@id': 'base:thing1', '@type': 'mystery:Thing', 'base:name': 'X' }],
    };
    const first = exportModel(fromDocument(doc));

    expect(first).toEqual(doc);
    expect(JSON.stringify(exportModel(fromDocument(first)))).toBe(JSON.stringify(first));
  });

  describe('documents with their own prefixes', () => {
    const doc = {
      '@context': { base: 'http://example.com/', ex: 'http://ex.org/', schema: 'http://schema.org/' },
      '@graph': [{ '@id': 'base:w1', '@type': 'ex:Widget', 'ex:size': 3, 'schema:name': 'Gear' }],
    };

    it('keeps ids under unknown prefixes absolute', () => {
      const imported = fromDocument(doc);

      expect(imported.entries.map((e) => [e.id, e.classId, { ...e.properties }])).toEqual([
        ['w1', 'http://ex.org/Widget', { 'http://ex.org/size': 3, 'http://schema.org/name': 'Gear' }],
      ]);
    });

    it('stays isomorphic through the default mapping', () => {
      const first = fromDocument(doc);
      const second = fromDocument(exportModel(first));

      expect(second.entries.map((e) => e.classId)).toEqual(['http://ex.org/Widget']);
      expect(canonicalNTriples(buildGraph(second.types, second.properties, second.restrictions, second.entries))).toBe(
        '<http://example.com/w1> <http://ex.org/size> "3"^^<http://www.w3.org/2001/XMLSchema#integer> .\n' +
          '<http://example.com/w1> <http://schema.org/name> "Gear" .\n' +
          '<http://example.com/w1> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://ex.org/Widget> .\n'
      );
    });

    it('re-exports the same document through the returned mapping', () => {
      const imported = fromDocument(doc);
      const { iris } = imported;

      expect(toDocument(buildGraph([], [], [], imported.entries, { iris }), { iris })).toEqual(doc);
    });
  });

  it('keeps non-canonical literals lossless', () => {
    const doc = {
      '@context': { base: 'http://example.com/', xsd: XSD_NS },
      '@graph': [
        {
          '@id': 'base:m1',
          '@type': 'base:Measurement',
          'base:value': { '@value': '2.0', '@type': 'xsd:double' },
          'base:count': { '@value': '007', '@type': 'xsd:integer' },
        },
      ],
    };

    expect(exportModel(fromDocument(doc))).toEqual(doc);
  });
});
