/**
 * Tests for type templates.
 */

import { describe, it, expect } from 'vitest';
import { InvalidDefinitionError } from '../core/errors.js';
import { defineType, rangeOf, templateToType } from './TemplateBuilder.js';

describe('defineType', () => {
  it('fills in defaults', () => {
    const template = defineType({ id: 'Person', fields: [{ name: 'name', semanticType: 'string' }] });

    expect(template.ontology).toEqual([]);
    expect(template.subClassOf).toEqual([]);
    expect(template.fields).toEqual([
      { name: 'name', semanticType: 'string', required: false, isList: false, ontology: [] },
    ]);
  });

  it('returns a frozen template', () => {
    const template = defineType({ id: 'Person', fields: [{ name: 'name', semanticType: 'string' }] });

    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template.fields)).toBe(true);
    expect(Object.isFrozen(template.fields[0])).toBe(true);
  });

  it('names the offending path', () => {
    expect(() =>
      defineType({ id: 'Person', fields: [{ name: 'full name', semanticType: 'string' }] })
    ).toThrow('fields.0.name: must not contain whitespace');
  });

  it('rejects duplicate field names', () => {
    expect(() =>
      defineType({
        id: 'Person',
        fields: [
          { name: 'name', semanticType: 'string' },
          { name: 'name', semanticType: 'integer' },
        ],
      })
    ).toThrow("fields.1.name: duplicate field 'name'");
  });

  it('rejects an empty type reference', () => {
    let caught: unknown;
    try {
      defineType({ id: 'Person', fields: [{ name: 'name', semanticType: { ref: '' } }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidDefinitionError);
    expect(caught instanceof InvalidDefinitionError ? caught.path : undefined).toBe('fields.0.semanticType.ref');
  });
});

describe('templateToType', () => {
  const template = defineType({
    id: 'Person',
    label: 'Person',
    ontology: ['schema:Person'],
    fields: [
      { name: 'name', semanticType: 'string', required: true, ontology: ['schema:name'] },
      { name: 'emails', semanticType: 'string', isList: true },
      { name: 'employer', semanticType: { ref: 'Organization' } },
      { name: 'born', semanticType: 'datetime' },
    ],
  });

  it('creates one property per field', () => {
    const type = templateToType(template);

    expect(type.properties.map((p) => [p.id, p.rangeIncludes, p.domainIncludes, p.required])).toEqual([
      ['name', ['xsd:string'], ['Person'], true],
      ['emails', ['xsd:string'], ['Person'], false],
      ['employer', ['Organization'], ['Person'], false],
      ['born', ['xsd:dateTime'], ['Person'], false],
    ]);
    expect(type.getProperty('name')?.ontologicalAnnotations).toEqual(['schema:name']);
    expect(type.ontologicalAnnotations).toEqual(['schema:Person']);
  });

  it('creates one restriction per field', () => {
    const type = templateToType(template);

    expect(type.restrictions.map((r) => [r.id, r.minCardinality, r.maxCardinality])).toEqual([
      ['_:Person_name_restriction', 1, 1],
      ['_:Person_emails_restriction', 0, undefined],
      ['_:Person_employer_restriction', 0, 1],
      ['_:Person_born_restriction', 0, 1],
    ]);
  });

  it('maps semantic types to ranges', () => {
    expect(template.fields.map(rangeOf)).toEqual(['xsd:string', 'xsd:string', 'Organization', 'xsd:dateTime']);
  });
});
