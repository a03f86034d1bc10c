import type { JsonObject } from '../models/types.js';

export type OscQueryErrorCode =
  | 'NOT_FOUND'
  | 'BAD_REQUEST'
  | 'UNSUPPORTED_PARAM'
  | 'ACCESS'
  | 'TYPE_MISMATCH'
  | 'CONFLICT'
  | 'VALIDATION';

/**
 * Base class for every error the namespace core reports to a transport.
 * Transports switch on `code` and answer with `httpStatus` (or its WebSocket equivalent).
 */
export abstract class OscQueryError extends Error {
  abstract readonly code: OscQueryErrorCode;
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): JsonObject {
    const body: JsonObject = { CODE: this.code, MESSAGE: this.message };
    if (this.path !== undefined) body.PATH = this.path;
    return body;
  }
}

export class NotFoundError extends OscQueryError {
  readonly code = 'NOT_FOUND';
  readonly httpStatus = 404;

  constructor(path: string) {
    super(`No node at ${path}`, path);
  }
}

export class BadRequestError extends OscQueryError {
  readonly code = 'BAD_REQUEST';
  readonly httpStatus = 400;
}

export class UnsupportedParamError extends OscQueryError {
  readonly code = 'UNSUPPORTED_PARAM';
  // OSCQuery answers "attribute not present" with No Content
  readonly httpStatus = 204;

  constructor(
    public readonly param: string,
    path: string
  ) {
    super(`${param} is not available on ${path}`, path);
  }
}

export class AccessError extends OscQueryError {
  readonly code = 'ACCESS';
  readonly httpStatus = 403;
}

export class TypeMismatchError extends OscQueryError {
  readonly code = 'TYPE_MISMATCH';
  readonly httpStatus = 400;
}

export class ConflictError extends OscQueryError {
  readonly code = 'CONFLICT';
  readonly httpStatus = 409;
}

export class ValidationError extends OscQueryError {
  readonly code = 'VALIDATION';
  readonly httpStatus = 400;
}

/** Raised at startup when the environment or a namespace file is unusable. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}
