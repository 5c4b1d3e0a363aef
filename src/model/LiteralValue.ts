/**
 * Literal values carried by metadata entries.
 *
 * JS values map onto XSD datatypes; anything else travels as a
 * TypedLiteral so imported literals survive unchanged.
 */

import { InvalidDefinitionError } from '../core/errors.js';

/**
 * A literal with an explicit datatype id (e.g. `xsd:date`).
 */
export interface TypedLiteral {
  readonly value: string;
  readonly datatype: string;
}

/** Integers beyond the safe range travel as bigint */
export type LiteralValue = string | number | bigint | boolean | Date | TypedLiteral;

export type PropertyValue = LiteralValue | readonly LiteralValue[];

/**
 * Semantic kinds a field can declare.
 */
export type LiteralKind = 'string' | 'integer' | 'float' | 'boolean' | 'datetime';

/**
 * Datatype ids per kind.
 */
export const LiteralType: Readonly<Record<LiteralKind, string>> = {
  string: 'xsd:string',
  integer: 'xsd:integer',
  float: 'xsd:double',
  boolean: 'xsd:boolean',
  datetime: 'xsd:dateTime',
};

export function isTypedLiteral(value: unknown): value is TypedLiteral {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    'value' in value &&
    'datatype' in value &&
    typeof value.value === 'string' &&
    typeof value.datatype === 'string'
  );
}

export function isLiteralValue(value: unknown): value is LiteralValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    isTypedLiteral(value)
  );
}

/**
 * Canonical in-memory form: `-0` becomes `0` and a bigint in the safe
 * range becomes a number, matching what parsing the literal gives back.
 */
export function normalizeLiteral(value: LiteralValue): LiteralValue {
  if (typeof value === 'number') {
    return Object.is(value, -0) ? 0 : value;
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value;
  }
  return value;
}

/**
 * Normalize a property value to a list.
 */
export function toValueList(value: PropertyValue): readonly LiteralValue[] {
  return isLiteralValue(value) ? [value] : value;
}

/**
 * Datatype id of a literal.
 */
export function datatypeOf(value: LiteralValue): string {
  if (typeof value === 'string') {
    return LiteralType.string;
  }
  if (typeof value === 'boolean') {
    return LiteralType.boolean;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? LiteralType.integer : LiteralType.float;
  }
  if (typeof value === 'bigint') {
    return LiteralType.integer;
  }
  if (value instanceof Date) {
    return LiteralType.datetime;
  }
  return value.datatype;
}

/**
 * Lexical form of a literal.
 */
export function lexicalForm(value: LiteralValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      return 'NaN';
    }
    if (value === Infinity) {
      return 'INF';
    }
    if (value === -Infinity) {
      return '-INF';
    }
    return String(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidDefinitionError('invalid Date value');
    }
    return value.toISOString();
  }
  return value.value;
}

/**
 * Rebuild a literal from its lexical form and datatype id.
 *
 * Only forms that print back identically become JS values; `2.0`
 * as xsd:double, for instance, stays a TypedLiteral.
 */
export function literalFromLexical(lexical: string, datatype: string): LiteralValue {
  switch (datatype) {
    case LiteralType.string:
      return lexical;
    case LiteralType.boolean:
      if (lexical === 'true' || lexical === 'false') {
        return lexical === 'true';
      }
      break;
    case LiteralType.integer: {
      if (/^-?[1-9]\d*$|^0$/.test(lexical)) {
        const parsed = Number(lexical);
        return Number.isSafeInteger(parsed) ? parsed : BigInt(lexical);
      }
      break;
    }
    case LiteralType.float: {
      const parsed = lexical === 'INF' ? Infinity : lexical === '-INF' ? -Infinity : Number(lexical);
      if (!Number.isSafeInteger(parsed) && lexicalForm(parsed) === lexical) {
        return parsed;
      }
      break;
    }
    case LiteralType.datetime: {
      const parsed = new Date(lexical);
      if (!Number.isNaN(parsed.getTime()) && parsed.toISOString() === lexical) {
        return parsed;
      }
      break;
    }
  }
  return { value: lexical, datatype };
}

/**
 * Structural equality for literals (Dates by time, TypedLiterals by fields).
 */
export function literalEquals(a: LiteralValue, b: LiteralValue): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (isTypedLiteral(a) || isTypedLiteral(b)) {
    return (
      isTypedLiteral(a) && isTypedLiteral(b) && a.value === b.value && a.datatype === b.datatype
    );
  }
  return Object.is(a, b);
}
