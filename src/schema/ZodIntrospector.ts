/**
 * Derive type templates from zod object schemas.
 *
 * Declaration and description are separate phases, so a schema may
 * reference a model (through z.lazy) that is declared after it.
 *
 * Mapping:
 * - z.string(), z.enum(), string literals → string
 * - z.number().int(), z.bigint() → integer; z.number() → float
 * - z.boolean() → boolean; z.date() → datetime
 * - a declared z.object() → reference to that model
 * - z.array(x) → list of x
 * - optional / nullable / default → not required
 */

import { z } from 'zod';
import { InvalidDefinitionError, NotFoundError } from '../core/errors.js';
import type { LiteralKind } from '../model/index.js';
import { defineType } from './TemplateBuilder.js';
import type { SchemaRegistry } from './SchemaRegistry.js';
import type { SemanticType, TypeTemplate } from './types.js';

/**
 * Schema-level metadata for a declared model.
 */
export interface ModelMeta {
  label?: string;
  comment?: string;
  /** Equivalent class IRIs */
  ontology?: string[];
  /** Parent type ids */
  subClassOf?: string[];
  /** Equivalent property IRIs per field */
  fieldOntology?: Record<string, string | string[]>;
}

interface DeclaredModel {
  id: string;
  schema: z.AnyZodObject;
  meta: ModelMeta;
}

interface FieldShape {
  semanticType: SemanticType;
  required: boolean;
  isList: boolean;
  comment: string | undefined;
}

function literalKindOf(value: unknown): LiteralKind | undefined {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    default:
      return undefined;
  }
}

/**
 * Collects zod object schemas under type ids.
 */
export class ZodModelCatalog {
  private readonly models: Map<string, DeclaredModel> = new Map();
  private readonly idBySchema: Map<z.ZodTypeAny, string> = new Map();

  /**
   * Declare a model (phase one).
   */
  declare(id: string, schema: z.AnyZodObject, meta: ModelMeta = {}): this {
    if (this.models.has(id)) {
      throw new InvalidDefinitionError(`model '${id}' is already declared`);
    }
    this.models.set(id, { id, schema, meta });
    this.idBySchema.set(schema, id);
    return this;
  }

  has(id: string): boolean {
    return this.models.has(id);
  }

  /**
   * Template for one declared model (phase two).
   */
  describe(id: string): TypeTemplate {
    const model = this.models.get(id);
    if (model === undefined) {
      throw new NotFoundError('type', id, 'model is not declared');
    }

    const fields = Object.entries(model.schema.shape).map(([name, fieldSchema]) => {
      if (!(fieldSchema instanceof z.ZodType)) {
        throw new InvalidDefinitionError('field is not a zod schema', `${id}.${name}`);
      }
      const shape = this.describeField(fieldSchema, `${id}.${name}`);
      const ontology = model.meta.fieldOntology?.[name];
      return {
        name,
        semanticType: shape.semanticType,
        required: shape.required,
        isList: shape.isList,
        ontology: ontology === undefined ? [] : Array.isArray(ontology) ? ontology : [ontology],
        comment: shape.comment,
      };
    });

    return defineType({
      id,
      label: model.meta.label,
      comment: model.meta.comment ?? model.schema.description,
      ontology: model.meta.ontology ?? [],
      subClassOf: model.meta.subClassOf ?? [],
      fields,
    });
  }

  /**
   * Templates for every declared model, in declaration order.
   */
  describeAll(): TypeTemplate[] {
    return [...this.models.keys()].map((id) => this.describe(id));
  }

  /**
   * Register every declared model's template.
   */
  registerAll(registry: SchemaRegistry): TypeTemplate[] {
    return this.describeAll().map((template) => registry.register(template));
  }

  private describeField(schema: z.ZodTypeAny, path: string): FieldShape {
    let current: z.ZodTypeAny = schema;
    let required = true;
    let isList = false;
    let comment = schema.description;

    for (;;) {
      comment ??= current.description;
      if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
        required = false;
        current = current.unwrap();
      } else if (current instanceof z.ZodDefault) {
        required = false;
        current = current.removeDefault();
      } else if (current instanceof z.ZodEffects) {
        current = current.innerType();
      } else if (current instanceof z.ZodLazy) {
        current = current.schema;
      } else if (current instanceof z.ZodArray) {
        if (isList) {
          throw new InvalidDefinitionError('nested lists are not supported', path);
        }
        isList = true;
        // A plain array may be empty; only a minimum length makes it required
        const minLength: { value: number } | null = current._def.minLength;
        required = required && minLength !== null && minLength.value > 0;
        current = current.element;
      } else {
        break;
      }
    }

    return { semanticType: this.semanticTypeOf(current, path), required, isList, comment };
  }

  private semanticTypeOf(schema: z.ZodTypeAny, path: string): SemanticType {
    const declared = this.idBySchema.get(schema);
    if (declared !== undefined) {
      return { ref: declared };
    }
    if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) {
      return 'string';
    }
    if (schema instanceof z.ZodNumber) {
      return schema.isInt ? 'integer' : 'float';
    }
    if (schema instanceof z.ZodBigInt) {
      return 'integer';
    }
    if (schema instanceof z.ZodBoolean) {
      return 'boolean';
    }
    if (schema instanceof z.ZodDate) {
      return 'datetime';
    }
    if (schema instanceof z.ZodLiteral) {
      const kind = literalKindOf(schema.value);
      if (kind !== undefined) {
        return kind;
      }
    }
    if (schema instanceof z.ZodObject) {
      throw new InvalidDefinitionError('nested object is not a declared model', path);
    }
    throw new InvalidDefinitionError(`unsupported schema type ${schema.constructor.name}`, path);
  }
}
