/**
 * Tests for zod schemas derived from type definitions.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { InvalidDefinitionError } from '../core/errors.js';
import { MetadataEntry, Restriction, TypeDefinition, TypeProperty } from '../model/index.js';
import { defineType, templateToType } from './TemplateBuilder.js';
import { cardinalityOf, entryToRecord, parseEntry, typeToZodSchema } from './ZodExporter.js';

const sample = templateToType(
  defineType({
    id: 'Sample',
    fields: [
      { name: 'label', semanticType: 'string', required: true },
      { name: 'counts', semanticType: 'integer', isList: true },
      { name: 'mass', semanticType: 'float' },
      { name: 'ok', semanticType: 'boolean' },
      { name: 'taken', semanticType: 'datetime' },
      { name: 'source', semanticType: { ref: 'Site' } },
    ],
  })
);

const member = new TypeProperty({ id: 'member', rangeIncludes: ['xsd:date'] });
const trio = new TypeDefinition({
  id: 'Trio',
  properties: [member],
  restrictions: [new Restriction({ id: '_:trio', propertyId: 'member', minCardinality: 1, maxCardinality: 3 })],
});

describe('typeToZodSchema', () => {
  const schema = typeToZodSchema(sample);

  it('has an id plus one field per property', () => {
    expect(Object.keys(schema.shape)).toEqual(['id', 'label', 'counts', 'mass', 'ok', 'taken', 'source']);
  });

  it('accepts values of each range', () => {
    const value = {
      id: 's1',
      label: 'A',
      counts: [1, 2],
      mass: 1.5,
      ok: true,
      taken: new Date(0),
      source: 'site1',
    };

    expect(schema.parse(value)).toEqual(value);
  });

  it('wraps a single value of a list field', () => {
    expect(schema.parse({ id: 's1', label: 'A', counts: 3 })).toEqual({ id: 's1', label: 'A', counts: [3] });
  });

  it('takes bigint for integers', () => {
    expect(schema.safeParse({ id: 's1', label: 'A', counts: [12345678901234567890n] }).success).toBe(true);
    expect(schema.safeParse({ id: 's1', label: 'A', counts: [1.5] }).success).toBe(false);
  });

  it('enforces required and single-valued fields', () => {
    expect(schema.safeParse({ id: 's1' }).success).toBe(false);
    expect(schema.safeParse({ id: 's1', label: 'A', mass: [1] }).success).toBe(false);
  });

  it('applies restriction bounds to lists', () => {
    const trioSchema = typeToZodSchema(trio);
    const day = { value: '2024-01-02', datatype: 'xsd:date' };

    expect(cardinalityOf(trio, member)).toEqual({ min: 1, max: 3 });
    expect(trioSchema.parse({ id: 't', member: day })).toEqual({ id: 't', member: [day] });
    expect(trioSchema.safeParse({ id: 't', member: [day, day, day, day] }).success).toBe(false);
    expect(trioSchema.safeParse({ id: 't' }).success).toBe(false);
  });
});

describe('parseEntry', () => {
  it('lists literals before references in a mixed field', () => {
    const entry = new MetadataEntry({
      id: 'post1',
      classId: 'Post',
      properties: { author: 'Anon' },
      references: { author: ['bob'], about: 'topic1' },
    });

    expect(entryToRecord(entry)).toEqual({ id: 'post1', author: ['Anon', 'bob'], about: 'topic1' });
  });

  it('reads an entry through a derived schema', () => {
    const entry = new MetadataEntry({
      id: 's1',
      classId: 'Sample',
      properties: { label: 'A', counts: 4, extra: 'dropped' },
      references: { source: 'site1' },
    });

    expect(parseEntry(entry, typeToZodSchema(sample))).toEqual({ id: 's1', label: 'A', counts: [4], source: 'site1' });
  });

  it('names the first failing field', () => {
    const entry = new MetadataEntry({ id: 's2', classId: 'Sample' });

    expect(() => parseEntry(entry, z.object({ label: z.string() }))).toThrow(InvalidDefinitionError);
    expect(() => parseEntry(entry, z.object({ label: z.string() }))).toThrow(
      "s2: entry does not match the schema at 'label': Required"
    );
  });
});
