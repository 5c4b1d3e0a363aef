/**
 * Instance extractors for plain objects and registered templates.
 */

import { createHash } from 'node:crypto';
import { InvalidDefinitionError } from '../core/errors.js';
import { localName } from '../jsonld/IriMapper.js';
import { isLiteralValue, lexicalForm, type LiteralValue } from '../model/index.js';
import { isTypeRef } from '../schema/TemplateBuilder.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { ExtractedField, ExtractorOptions, InstanceExtractor } from './types.js';

/**
 * Whether a value is a nested instance rather than a literal.
 */
export function isInstance(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLiteralValue(value);
}

function readField(instance: object, name: string): unknown {
  const value: unknown = Reflect.get(instance, name);
  return value;
}

function literalsOf(value: unknown): LiteralValue[] | undefined {
  if (isLiteralValue(value)) {
    return [value];
  }
  if (Array.isArray(value) && value.every(isLiteralValue)) {
    return value;
  }
  return undefined;
}

/**
 * Shared class and identity rules for both extractors.
 */
class IdentityRules {
  readonly typeField: string;
  readonly idField: string;
  private readonly strategy: 'field' | 'content';

  constructor(options: ExtractorOptions) {
    this.typeField = options.typeField ?? 'type';
    this.idField = options.idField ?? 'id';
    this.strategy = options.identity ?? 'field';
  }

  classOf(instance: object, hint?: string): string {
    const declared = readField(instance, this.typeField);
    if (typeof declared === 'string' && declared.length > 0) {
      return declared;
    }
    if (hint !== undefined) {
      return hint;
    }
    const ctorName = instance.constructor?.name;
    if (ctorName !== undefined && ctorName !== '' && ctorName !== 'Object') {
      return ctorName;
    }
    throw new InvalidDefinitionError(`instance has no '${this.typeField}' field and no class hint`);
  }

  identityOf(instance: object, classId: string, literalFields: ExtractedField[]): string | undefined {
    const id = readField(instance, this.idField);
    if ((typeof id === 'string' && id.length > 0) || (typeof id === 'number' && Number.isFinite(id))) {
      return String(id);
    }
    if (this.strategy !== 'content') {
      return undefined;
    }

    const content = literalFields
      .map((field): [string, string[]] => [field.name, (literalsOf(field.value) ?? []).map(lexicalForm)])
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const digest = createHash('sha256').update(JSON.stringify([classId, content])).digest('hex');
    return `${localName(classId)}-${digest.slice(0, 16)}`;
  }
}

/**
 * Extractor for plain objects: fields in key order, nested objects and
 * arrays holding objects are references.
 */
export function createPlainObjectExtractor(options: ExtractorOptions = {}): InstanceExtractor {
  const rules = new IdentityRules(options);

  const fieldsOf = (instance: object): ExtractedField[] =>
    Object.keys(instance)
      .filter((name) => name !== rules.typeField && name !== rules.idField)
      .map((name) => {
        const value = readField(instance, name);
        const isReference = Array.isArray(value) ? value.some(isInstance) : isInstance(value);
        return { name, value, isReference };
      });

  return {
    classOf: (instance, hint) => rules.classOf(instance, hint),
    identityOf: (instance, classId) =>
      rules.identityOf(instance, classId, fieldsOf(instance).filter((f) => !f.isReference)),
    fieldsOf,
  };
}

/**
 * Extractor driven by registered templates: only declared fields, in
 * declared order; reference fields name their target class.
 */
export function createTemplateExtractor(
  registry: SchemaRegistry,
  options: ExtractorOptions = {}
): InstanceExtractor {
  const rules = new IdentityRules(options);

  const fieldsOf = (instance: object, classId: string): ExtractedField[] =>
    registry.get(classId).fields.map((field) => ({
      name: field.name,
      value: readField(instance, field.name),
      isReference: isTypeRef(field.semanticType),
      targetClass: isTypeRef(field.semanticType) ? field.semanticType.ref : undefined,
    }));

  return {
    classOf: (instance, hint) => rules.classOf(instance, hint),
    identityOf: (instance, classId) =>
      rules.identityOf(instance, classId, fieldsOf(instance, classId).filter((f) => !f.isReference)),
    fieldsOf,
  };
}
