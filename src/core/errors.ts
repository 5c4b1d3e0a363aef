/**
 * Error taxonomy for crate-graph.
 *
 * Structural errors (NotFound, IdentityMissing, MalformedDocument) abort the
 * current build or import. Cardinality and unresolved-reference findings are
 * reported as data; their error classes are only raised by the explicit
 * assert helpers in the validation module.
 */

export type CrateGraphErrorCode =
  | 'NOT_FOUND'
  | 'IDENTITY_MISSING'
  | 'CARDINALITY_VIOLATION'
  | 'MALFORMED_DOCUMENT'
  | 'UNRESOLVED_REFERENCE'
  | 'DUPLICATE_TYPE'
  | 'INVALID_DEFINITION';

/**
 * Base class for every error raised by the library.
 */
export class CrateGraphError extends Error {
  readonly code: CrateGraphErrorCode;

  constructor(code: CrateGraphErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'CrateGraphError';
  }
}

export type NotFoundKind = 'type' | 'property' | 'restriction' | 'entry';

/**
 * An unknown Type/Property id was referenced.
 */
export class NotFoundError extends CrateGraphError {
  constructor(
    public readonly kind: NotFoundKind,
    public readonly id: string,
    detail?: string
  ) {
    super('NOT_FOUND', `Unknown ${kind} '${id}'${detail ? `: ${detail}` : ''}`);
    this.name = 'NotFoundError';
  }
}

/**
 * An object under extraction has no deterministic identity.
 */
export class IdentityMissingError extends CrateGraphError {
  constructor(
    public readonly classId: string,
    public readonly path: string
  ) {
    super(
      'IDENTITY_MISSING',
      `Cannot derive identity for ${classId} instance at '${path || '<root>'}'`
    );
    this.name = 'IdentityMissingError';
  }
}

/**
 * Raised by assertCardinality when a validation report holds violations.
 */
export class CardinalityViolationError extends CrateGraphError {
  constructor(
    message: string,
    public readonly violationCount: number
  ) {
    super('CARDINALITY_VIOLATION', message);
    this.name = 'CardinalityViolationError';
  }
}

/**
 * The JSON-LD document being imported does not have the required shape.
 */
export class MalformedDocumentError extends CrateGraphError {
  constructor(
    message: string,
    public readonly nodeIndex?: number
  ) {
    super(
      'MALFORMED_DOCUMENT',
      nodeIndex !== undefined ? `@graph[${nodeIndex}]: ${message}` : message
    );
    this.name = 'MalformedDocumentError';
  }
}

/**
 * Raised by assertNoUnresolvedReferences for dangling entry references.
 */
export class UnresolvedReferenceError extends CrateGraphError {
  constructor(
    message: string,
    public readonly targets: string[]
  ) {
    super('UNRESOLVED_REFERENCE', message);
    this.name = 'UnresolvedReferenceError';
  }
}

/**
 * A type id was registered twice while the registry rejects duplicates.
 */
export class DuplicateTypeError extends CrateGraphError {
  constructor(public readonly id: string) {
    super('DUPLICATE_TYPE', `Type '${id}' is already registered`);
    this.name = 'DuplicateTypeError';
  }
}

/**
 * A schema definition or literal value is internally inconsistent.
 */
export class InvalidDefinitionError extends CrateGraphError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super('INVALID_DEFINITION', path ? `${path}: ${message}` : message);
    this.name = 'InvalidDefinitionError';
  }
}

/**
 * Type guard for library errors, optionally narrowed to one code.
 */
export function isCrateGraphError(
  err: unknown,
  code?: CrateGraphErrorCode
): err is CrateGraphError {
  return err instanceof CrateGraphError && (code === undefined || err.code === code);
}
