/**
 * Explicit type registration from a structural
 * field description, and conversion of templates to TypeDefinitions.
 */

import { z } from 'zod';
import { InvalidDefinitionError } from '../core/errors.js';
import {
  LiteralType,
  Restriction,
  TypeDefinition,
  TypeProperty,
  restrictionIdFor,
} from '../model/index.js';
import type { SemanticType, TemplateField, TypeTemplate } from './types.js';

const literalKindSchema = z.enum(['string', 'integer', 'float', 'boolean', 'datetime']);

const semanticTypeSchema = z.union([
  literalKindSchema,
  z.object({ ref: z.string().min(1) }).strict(),
]);

const fieldSchema = z
  .object({
    name: z.string().min(1).regex(/^\S+$/, 'must not contain whitespace'),
    semanticType: semanticTypeSchema,
    required: z.boolean().default(false),
    isList: z.boolean().default(false),
    ontology: z.array(z.string().min(1)).default([]),
    label: z.string().optional(),
    comment: z.string().optional(),
  })
  .strict();

const templateSchema = z
  .object({
    id: z.string().min(1).regex(/^\S+$/, 'must not contain whitespace'),
    label: z.string().optional(),
    comment: z.string().optional(),
    ontology: z.array(z.string().min(1)).default([]),
    subClassOf: z.array(z.string().min(1)).default([]),
    fields: z.array(fieldSchema).default([]),
  })
  .strict()
  .superRefine((template, ctx) => {
    const seen = new Set<string>();
    template.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field '${field.name}'`,
          path: ['fields', index, 'name'],
        });
      }
      seen.add(field.name);
    });
  });

/**
 * Input accepted by defineType; flags and lists are optional.
 */
export type TypeTemplateInput = z.input<typeof templateSchema>;

export type TemplateFieldInput = z.input<typeof fieldSchema>;

/**
 * Validate a structural description and return a frozen template.
 *
 * @throws InvalidDefinitionError naming the offending path
 */
export function defineType(input: TypeTemplateInput): TypeTemplate {
  const parsed = templateSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidDefinitionError(
      issue?.message ?? 'invalid type template',
      issue && issue.path.length > 0 ? issue.path.join('.') : undefined
    );
  }
  const { fields, ontology, subClassOf, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    ontology: Object.freeze(ontology),
    subClassOf: Object.freeze(subClassOf),
    fields: Object.freeze(
      fields.map((field): TemplateField =>
        Object.freeze({ ...field, ontology: Object.freeze(field.ontology) })
      )
    ),
  });
}

/**
 * Whether a semantic type references another type.
 */
export function isTypeRef(semanticType: SemanticType): semanticType is { ref: string } {
  return typeof semanticType === 'object';
}

/**
 * Range id of a field: the XSD datatype or the referenced type id.
 */
export function rangeOf(field: TemplateField): string {
  return isTypeRef(field.semanticType) ? field.semanticType.ref : LiteralType[field.semanticType];
}

/**
 * Build the TypeDefinition for a template: one property and one
 * restriction per field (min = required ? 1 : 0, max = isList ? none : 1).
 */
export function templateToType(template: TypeTemplate): TypeDefinition {
  const properties: TypeProperty[] = [];
  const restrictions: Restriction[] = [];

  for (const field of template.fields) {
    properties.push(
      new TypeProperty({
        id: field.name,
        label: field.label,
        comment: field.comment,
        domainIncludes: [template.id],
        rangeIncludes: [rangeOf(field)],
        ontologicalAnnotations: field.ontology,
        required: field.required,
      })
    );
    restrictions.push(
      new Restriction({
        id: restrictionIdFor(template.id, field.name),
        propertyId: field.name,
        minCardinality: field.required ? 1 : 0,
        maxCardinality: field.isList ? undefined : 1,
      })
    );
  }

  return new TypeDefinition({
    id: template.id,
    label: template.label,
    comment: template.comment,
    ontologicalAnnotations: template.ontology,
    subClassOf: template.subClassOf,
    properties,
    restrictions,
  });
}
