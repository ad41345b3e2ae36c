/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

/**
 * Base class for every error raised by the query kit. Subclasses are tag classes so callers
 * can branch on `instanceof` or on the `kind` discriminator.
 */
export class EdrError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed capability document (collections, collection detail or instances)
export class SchemaError extends EdrError {
  path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.path = path;
  }
}

export type QueryValidationErrorKind =
  | 'UnsupportedQueryKind'
  | 'GeometryKindMismatch'
  | 'ExtentConflict'
  | 'TemporalOutOfRange'
  | 'VerticalLevelNotSupported'
  | 'DimensionValueInvalid'
  | 'UnknownParameter'
  | 'UnsupportedOutputFormat'
  | 'UnsupportedCRS';

/**
 * Raised when query inputs do not satisfy the capabilities of the targeted collection.
 * `field` names the offending input, e.g. `parameters` or `dimensions.member`.
 */
export abstract class QueryValidationError extends EdrError {
  abstract readonly kind: QueryValidationErrorKind;

  field: string;

  constructor(message: string, field: string) {
    super(message);
    this.field = field;
  }
}

export class UnsupportedQueryKindError extends QueryValidationError {
  readonly kind = 'UnsupportedQueryKind';
}

export class GeometryKindMismatchError extends QueryValidationError {
  readonly kind = 'GeometryKindMismatch';
}

export class ExtentConflictError extends QueryValidationError {
  readonly kind = 'ExtentConflict';
}

export class TemporalOutOfRangeError extends QueryValidationError {
  readonly kind = 'TemporalOutOfRange';
}

export class VerticalLevelNotSupportedError extends QueryValidationError {
  readonly kind = 'VerticalLevelNotSupported';
}

export class DimensionValueInvalidError extends QueryValidationError {
  readonly kind = 'DimensionValueInvalid';
}

export class UnknownParameterError extends QueryValidationError {
  readonly kind = 'UnknownParameter';
}

export class UnsupportedOutputFormatError extends QueryValidationError {
  readonly kind = 'UnsupportedOutputFormat';
}

export class UnsupportedCrsError extends QueryValidationError {
  readonly kind = 'UnsupportedCRS';
}

export type DecodeErrorKind =
  | 'MalformedJSON'
  | 'MalformedCoverage'
  | 'UnsupportedDomainType'
  | 'UnsupportedDomainAxisCombination'
  | 'UnsupportedRangeEncoding'
  | 'RangeShapeMismatch';

// Raised when a CoverageJSON document or one of its coverages cannot be decoded
export class DecodeError extends EdrError {
  kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string) {
    super(message);
    this.kind = kind;
  }
}

export type MalformedWktReason = 'keyword' | 'parentheses' | 'token' | 'arity' | 'vertices';

// Structural WKT problem, with the character offset where parsing stopped
export class MalformedWktError extends EdrError {
  reason: MalformedWktReason;

  position: number;

  constructor(reason: MalformedWktReason, message: string, position: number) {
    super(`${message} (at position ${position})`);
    this.reason = reason;
    this.position = position;
  }
}

// Stored saved query that cannot be read back
export class SavedQueryError extends EdrError {}

// Failure reported by the transport collaborator, propagated without inspection
export class TransportError extends EdrError {
  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) this.cause = cause;
  }
}

export class HttpError extends EdrError {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

// Non-success HTTP status returned by an EDR service
export class ServiceResponseError extends HttpError {
  url: string;

  constructor(code: number, url: string, message = `EDR service responded with HTTP ${code}`) {
    super(code, message);
    this.url = url;
  }
}

/**
 * Returns a stable error code for presentation layers, e.g. `edr.TemporalOutOfRange` for
 * query validation errors or `edr.SchemaError` for other query kit errors.
 *
 * @param error - The error to classify
 * @returns the error code
 */
export function getCodeForError(error: Error): string {
  if (error instanceof QueryValidationError || error instanceof DecodeError) {
    return `edr.${error.kind}`;
  }
  if (error instanceof EdrError) {
    return `edr.${error.name}`;
  }
  return 'edr.UnknownError';
}
