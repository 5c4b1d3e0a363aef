/**
 * Tests for BuildSession
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseConfig } from '../config/loader.js';
import { DuplicateTypeError, InvalidDefinitionError, NotFoundError } from '../core/errors.js';
import { MetadataEntry, Restriction, TypeDefinition, TypeProperty } from '../model/index.js';
import { BuildSession, createSessionFromConfig } from './BuildSession.js';

function personSession(session = new BuildSession()): BuildSession {
  session.register({
    id: 'Person',
    label: 'Person',
    ontology: ['schema:Person'],
    fields: [
      { name: 'name', semanticType: 'string', required: true },
      { name: 'knows', semanticType: { ref: 'Person' }, isList: true },
    ],
  });
  return session;
}

function addCouple(session: BuildSession): void {
  const sarah: Record<string, unknown> = { type: 'Person', id: 'sarah', name: 'Sarah' };
  const marcus: Record<string, unknown> = { type: 'Person', id: 'marcus', name: 'Marcus', knows: sarah };
  sarah['knows'] = marcus;
  session.addInstance(sarah);
}

describe('BuildSession', () => {
  it('exports registered types followed by instances', () => {
    const session = personSession();
    addCouple(session);

    const doc = session.toDocument();
    expect(doc['@graph'].map((node) => node['@id'])).toEqual([
      'base:Person',
      'base:name',
      'base:knows',
      '_:Person_name_restriction',
      '_:Person_knows_restriction',
      'base:sarah',
      'base:marcus',
    ]);
    expect(doc['@graph'][5]).toEqual({
      '@id': 'base:sarah',
      '@type': 'base:Person',
      'base:name': 'Sarah',
      'base:knows': { '@id': 'base:marcus' },
    });
    expect(session.build().unresolvedReferences).toEqual([]);
  });

  it('writes N-Triples for the same graph', () => {
    const session = new BuildSession();
    session.addInstance({ type: 'Dataset', id: 'ds1', title: 'Soil' });

    expect(session.toNTriples()).toBe(
      '<http://example.com/ds1> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://example.com/Dataset> .\n' +
        '<http://example.com/ds1> <http://example.com/title> "Soil" .\n'
    );
  });

  it('validates cardinality over the session entries', () => {
    const session = personSession();
    addCouple(session);
    session.addInstance({ type: 'Person', id: 'ghost' });

    const report = session.validate();
    expect(report.checkedEntries).toBe(3);
    expect(report.violations.map((v) => v.message)).toEqual([
      "ghost: 'name' has 0 value(s), expected exactly 1",
    ]);
  });

  it('lets a directly added type replace a registered template', () => {
    const session = personSession();
    session.addType(new TypeDefinition({ id: 'Person', label: 'Human' }));

    expect(session.getTypes().map((t) => [t.id, t.label])).toEqual([['Person', 'Human']]);
  });

  it('rejects duplicates under the reject policy', () => {
    const session = personSession(new BuildSession({ duplicatePolicy: 'reject' }));
    session.addType(new TypeDefinition({ id: 'Place' }));

    expect(() => personSession(session)).toThrow(DuplicateTypeError);
    expect(() => session.addType(new TypeDefinition({ id: 'Place' }))).toThrow("Type 'Place' is already registered");
  });

  it('overwrites duplicates by default', () => {
    const session = personSession();
    session.register({ id: 'Person', label: 'Someone' });

    expect(session.getTypes().map((t) => [t.id, t.label, t.properties.length])).toEqual([['Person', 'Someone', 0]]);
  });

  describe('known classes', () => {
    it('rejects instances of unknown local classes', () => {
      const session = personSession(new BuildSession({ requireKnownClasses: true }));

      expect(() => session.addInstance({ type: 'Robot', id: 'r1' })).toThrow(NotFoundError);
      expect(session.addInstance({ type: 'Person', id: 'ada', name: 'Ada' })).toBe('ada');
      expect(session.addInstance({ type: 'schema:Thing', id: 't1' })).toBe('t1');
    });

    it('reports unknown local classes without rejecting them by default', () => {
      const session = personSession();
      session.addInstance({ type: 'Persn', id: 'x', name: 'X' });

      expect(session.build().unknownClasses).toEqual([{ entryId: 'x', classId: 'Persn' }]);
    });

    it('rejects seeded entries of unknown classes at build time', () => {
      const session = personSession(new BuildSession({ requireKnownClasses: true }));
      session.addEntry(new MetadataEntry({ id: 'r2', classId: 'Robot' }));

      expect(() => session.build()).toThrow("Unknown type 'Robot': class of entry 'r2'");
    });
  });

  it('reads instances through registered templates', () => {
    const session = personSession(new BuildSession({ extractor: 'template' }));
    session.addInstance({ id: 'a', name: 'A', knows: ['b'] }, 'Person');

    expect(session.getEntries().map((e) => [e.id, { ...e.references }])).toEqual([['a', { knows: ['b'] }]]);
    expect(session.build().unresolvedReferences).toEqual([{ entryId: 'a', field: 'knows', target: 'b' }]);
  });

  describe('lookups', () => {
    const session = personSession();
    addCouple(session);
    session.addProperty(new TypeProperty({ id: 'nickname' }));
    session.addRestriction(new Restriction({ id: '_:loose', propertyId: 'nickname' }));

    it('finds types and entries by id', () => {
      expect(session.getType('Person')?.label).toBe('Person');
      expect(session.getType('Robot')).toBeUndefined();
      expect(session.getEntry('marcus')?.properties).toEqual({ name: 'Marcus' });
      expect(session.getEntry('nobody')).toBeUndefined();
    });

    it('lists entries of one class', () => {
      expect(session.getEntriesByClass('Person').map((e) => e.id)).toEqual(['sarah', 'marcus']);
      expect(session.getEntriesByClass('Robot')).toEqual([]);
    });

    it('finds type-attached and standalone properties', () => {
      expect(session.getProperties().map((p) => p.id)).toEqual(['name', 'knows', 'nickname']);
      expect(session.getProperty('knows')?.rangeIncludes).toEqual(['Person']);
      expect(session.getProperty('age')).toBeUndefined();
    });

    it('finds linked and standalone restrictions', () => {
      expect(session.getRestrictions().map((r) => r.id)).toEqual([
        '_:Person_name_restriction',
        '_:Person_knows_restriction',
        '_:loose',
      ]);
      expect(session.getRestriction('_:loose')?.propertyId).toBe('nickname');
    });
  });

  describe('getEntryAs', () => {
    it('reads an entry through the schema of its class', () => {
      const session = personSession();
      addCouple(session);

      expect(session.getEntryAs('sarah')).toEqual({ id: 'sarah', name: 'Sarah', knows: ['marcus'] });
      expect(session.getEntryAs('nobody')).toBeUndefined();
    });

    it('reads an entry through a given schema', () => {
      const session = personSession();
      addCouple(session);

      const person = session.getEntryAs('marcus', z.object({ name: z.string() }));
      expect(person?.name).toBe('Marcus');
      expect(person).toEqual({ name: 'Marcus' });
    });

    it('fails for entries that do not fit or have no known class', () => {
      const session = personSession();
      session.addInstance({ type: 'Person', id: 'ghost' });
      session.addInstance({ type: 'Robot', id: 'r1' });

      expect(() => session.getEntryAs('ghost')).toThrow(InvalidDefinitionError);
      expect(() => session.getEntryAs('ghost')).toThrow(
        "ghost: entry does not match the schema at 'name': Required"
      );
      expect(() => session.getEntryAs('r1')).toThrow("Unknown type 'Robot'");
    });
  });

  it('keeps two sessions apart', () => {
    const first = personSession();
    const second = new BuildSession();
    addCouple(first);

    expect(second.getTypes()).toEqual([]);
    expect(second.getEntries()).toEqual([]);
    expect(second.toDocument()).toEqual({ '@context': {}, '@graph': [] });
  });

  describe('fromDocument', () => {
    it('re-exports an imported document with its prefixes', () => {
      const doc = {
        '@context': { base: 'http://example.com/', ex: 'https://ex.org/' },
        '@graph': [{ '@id': 'base:w1', '@type': 'ex:Widget', 'ex:size': 3 }],
      };
      const session = BuildSession.fromDocument(doc);

      expect(session.getEntries().map((e) => [e.id, e.classId, { ...e.properties }])).toEqual([
        ['w1', 'https://ex.org/Widget', { 'https://ex.org/size': 3 }],
      ]);
      expect(session.toDocument()).toEqual(doc);
    });

    it('round-trips a built session', () => {
      const session = personSession();
      addCouple(session);
      const exported = session.toDocument();

      const reimported = BuildSession.fromDocument(exported);
      expect(JSON.stringify(reimported.toDocument())).toBe(JSON.stringify(exported));
      expect(reimported.validate().valid).toBe(true);
    });
  });

  describe('createSessionFromConfig', () => {
    it('maps ids into the configured namespace', () => {
      const config = parseConfig(['namespace:', '  baseUri: https://data.example.org/', '  prefix: ex'].join('\n'));
      const session = createSessionFromConfig(config);
      session.addInstance({ type: 'Dataset', id: 'ds1', title: 'Soil' });

      expect(session.toDocument()).toEqual({
        '@context': { ex: 'https://data.example.org/' },
        '@graph': [{ '@id': 'ex:ds1', '@type': 'ex:Dataset', 'ex:title': 'Soil' }],
      });
    });

    it('applies the configured duplicate policy and class check', () => {
      const config = parseConfig(['registry:', '  duplicatePolicy: reject', 'graph:', '  requireKnownClasses: true'].join('\n'));
      const session = personSession(createSessionFromConfig(config));

      expect(() => personSession(session)).toThrow(DuplicateTypeError);
      expect(() => session.addInstance({ type: 'Robot', id: 'r1' })).toThrow(NotFoundError);
    });
  });
});
