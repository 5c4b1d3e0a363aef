/**
 * Derive zod object schemas from type definitions, the reverse of
 * ZodIntrospector, and read entries back through them.
 *
 * Field mapping by range:
 * - xsd:string → string; xsd:integer → integer number or bigint
 * - xsd:double → number; xsd:boolean → boolean; xsd:dateTime → Date
 * - any other xsd datatype → TypedLiteral `{ value, datatype }`
 * - a type id or vocabulary term → string (the referenced id)
 *
 * Cardinality comes from the property's restrictions: no upper bound,
 * or one above 1, gives an array; a lower bound of 0 makes the field
 * optional.
 */

import { z } from 'zod';
import { InvalidDefinitionError } from '../core/errors.js';
import type { MetadataEntry, TypeDefinition, TypeProperty } from '../model/index.js';

const XSD_PREFIX = 'xsd:';

const typedLiteralSchema = z.object({ value: z.string(), datatype: z.string() });

function rangeSchema(range: string): z.ZodTypeAny {
  switch (range) {
    case 'xsd:string':
      return z.string();
    case 'xsd:integer':
      return z.union([z.number().int(), z.bigint()]);
    case 'xsd:double':
      return z.number();
    case 'xsd:boolean':
      return z.boolean();
    case 'xsd:dateTime':
      return z.date();
    default:
      return range.startsWith(XSD_PREFIX) ? typedLiteralSchema : z.string();
  }
}

function valueSchema(property: TypeProperty): z.ZodTypeAny {
  const [first, second, ...rest] = property.rangeIncludes.map(rangeSchema);
  if (first === undefined) {
    return z.unknown();
  }
  return second === undefined ? first : z.union([first, second, ...rest]);
}

/**
 * Cardinality bounds of a property on a type; several restrictions
 * narrow each other.
 */
export function cardinalityOf(type: TypeDefinition, property: TypeProperty): { min: number; max?: number } {
  const restrictions = type.restrictionsFor(property.id);
  let min = property.required ? 1 : 0;
  let max: number | undefined;
  for (const restriction of restrictions) {
    min = Math.max(min, restriction.minCardinality);
    if (restriction.maxCardinality !== undefined) {
      max = max === undefined ? restriction.maxCardinality : Math.min(max, restriction.maxCardinality);
    }
  }
  return max === undefined ? { min } : { min, max };
}

function fieldSchema(type: TypeDefinition, property: TypeProperty): z.ZodTypeAny {
  const item = valueSchema(property);
  const { min, max } = cardinalityOf(type, property);

  let field: z.ZodTypeAny;
  if (max !== undefined && max <= 1) {
    field = item;
  } else {
    let list = z.array(item);
    if (min > 0) {
      list = list.min(min);
    }
    if (max !== undefined) {
      list = list.max(max);
    }
    // Entries store a single value unwrapped
    field = z.preprocess((value) => (value === undefined || Array.isArray(value) ? value : [value]), list);
  }
  return min === 0 ? field.optional() : field;
}

/**
 * Zod object schema for a type: `id` plus one field per property.
 */
export function typeToZodSchema(type: TypeDefinition): z.ZodObject<z.ZodRawShape> {
  const shape: z.ZodRawShape = { id: z.string() };
  for (const property of type.properties) {
    shape[property.id] = fieldSchema(type, property);
  }
  return z.object(shape);
}

/**
 * Plain record of an entry: its id, literal fields and reference ids.
 * A field holding both kinds lists literals first.
 */
export function entryToRecord(entry: MetadataEntry): Record<string, unknown> {
  const record: Record<string, unknown> = { id: entry.id };
  for (const [name, value] of Object.entries(entry.properties)) {
    record[name] = value;
  }
  for (const [name, value] of Object.entries(entry.references)) {
    const literal = record[name];
    if (literal === undefined) {
      record[name] = value;
    } else {
      const literals: unknown[] = Array.isArray(literal) ? literal : [literal];
      record[name] = [...literals, ...entry.referenceList(name)];
    }
  }
  return record;
}

/**
 * Parse an entry through a schema.
 *
 * @throws InvalidDefinitionError naming the first failing field
 */
export function parseEntry<T extends z.ZodTypeAny>(entry: MetadataEntry, schema: T): z.infer<T> {
  const result = schema.safeParse(entryToRecord(entry));
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue?.path.join('.') ?? '';
    throw new InvalidDefinitionError(
      `entry does not match the schema${field ? ` at '${field}'` : ''}: ${issue?.message ?? 'invalid'}`,
      entry.id
    );
  }
  return result.data;
}
