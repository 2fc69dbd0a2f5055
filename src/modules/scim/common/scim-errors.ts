import { HttpException, HttpStatus } from '@nestjs/common';

import { SCIM_ERROR_SCHEMA, SCIM_ERROR_TYPE, type ScimErrorType } from './scim-constants';

/**
 * Error taxonomy of the engine.
 *
 *   syntax: malformed JSON, non-object document, ambiguous attribute names
 *   schema: `schemas` / extension mismatch, attribute unknown to every declared schema
 *   field: missing required attribute, multiple primaries, non-canonical value,
 *                   cross-field inconsistency, read-only attribute supplied on create
 *   typeMismatch: JSON value shape does not match the attribute type
 */
export type ScimErrorKind = 'syntax' | 'schema' | 'field' | 'typeMismatch';

/** The rule that produced an error; stable for programmatic matching. */
export type ScimRule =
  | 'invalidJson'
  | 'notAnObject'
  | 'duplicateAttribute'
  | 'missingSchemas'
  | 'missingBaseSchema'
  | 'unknownSchema'
  | 'undeclaredExtension'
  | 'missingExtension'
  | 'unknownAttribute'
  | 'requiredAttribute'
  | 'multiplePrimary'
  | 'canonicalValue'
  | 'crossField'
  | 'readOnlyAttribute'
  | 'invalidType';

export abstract class ScimError extends Error {
  abstract readonly kind: ScimErrorKind;

  constructor(
    /** Which check failed. */
    readonly rule: ScimRule,
    /** Attribute path, e.g. `emails[1].type` or the extension URN. Undefined for document-level failures. */
    readonly path: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  /** RFC 7644 §3.12 scimType keyword for this failure. */
  get scimType(): ScimErrorType {
    if (this.rule === 'readOnlyAttribute') return SCIM_ERROR_TYPE.MUTABILITY;
    if (this.kind === 'syntax' || this.kind === 'schema') return SCIM_ERROR_TYPE.INVALID_SYNTAX;
    return SCIM_ERROR_TYPE.INVALID_VALUE;
  }
}

export class ScimSyntaxError extends ScimError {
  readonly kind = 'syntax' as const;
}

export class ScimSchemaError extends ScimError {
  readonly kind = 'schema' as const;
}

export class ScimFieldError extends ScimError {
  readonly kind = 'field' as const;
}

export class ScimTypeMismatchError extends ScimError {
  readonly kind = 'typeMismatch' as const;
}

const ERROR_CLASSES = {
  syntax: ScimSyntaxError,
  schema: ScimSchemaError,
  field: ScimFieldError,
  typeMismatch: ScimTypeMismatchError,
} as const;

/** Same failure re-rooted under a containing path, e.g. `Resources[2]`. */
export function withPathPrefix(error: ScimError, prefix: string): ScimError {
  const ErrorClass = ERROR_CLASSES[error.kind];
  const path = error.path === undefined ? prefix : `${prefix}.${error.path}`;
  return new ErrorClass(error.rule, path, error.message);
}

/**
 * Outcome of every validate / encode / decode call. Failures are values, never thrown.
 */
export type ScimResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ScimError };

export const OK: ScimResult<void> = { ok: true, value: undefined };

export function ok<T>(value: T): ScimResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ScimError): ScimResult<T> {
  return { ok: false, error };
}

/** SCIM Error message body (RFC 7644 §3.12). `status` is always a string. */
export interface ScimErrorBody {
  schemas: string[];
  status: string;
  scimType?: ScimErrorType;
  detail: string;
}

export function toScimErrorBody(error: ScimError, status: number = HttpStatus.BAD_REQUEST): ScimErrorBody {
  return {
    schemas: [SCIM_ERROR_SCHEMA],
    status: String(status),
    scimType: error.scimType,
    detail: error.message,
  };
}

/**
 * Build an HttpException whose response already is a SCIM Error body, so an
 * exception filter can forward it unchanged.
 */
export function createScimError(params: { status: number; scimType?: ScimErrorType; detail: string }): HttpException {
  const body: ScimErrorBody = {
    schemas: [SCIM_ERROR_SCHEMA],
    status: String(params.status),
    detail: params.detail,
  };
  if (params.scimType) {
    body.scimType = params.scimType;
  }
  return new HttpException(body, params.status);
}

/** Map an engine failure to a 400 HttpException for callers sitting behind NestJS controllers. */
export function toHttpException(error: ScimError): HttpException {
  return createScimError({
    status: HttpStatus.BAD_REQUEST,
    scimType: error.scimType,
    detail: error.message,
  });
}

/** Value of a successful result; throws the 400 HttpException of a failed one. */
export function unwrapOrThrow<T>(result: ScimResult<T>): T {
  if (!result.ok) throw toHttpException(result.error);
  return result.value;
}
