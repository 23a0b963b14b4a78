/**
 * Error types shared by the server, storage and config layers
 */

import type { ZodError } from 'zod';

export type ErrorLocation = 'body' | 'query' | 'path';

export interface ErrorDetail {
  loc: Array<string | number>;
  msg: string;
}

/** Base class for errors that map to an HTTP status */
export class HttpError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly detail?: ErrorDetail[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export function toErrorDetails(error: ZodError, prefix: Array<string | number>): ErrorDetail[] {
  return error.issues.map(issue => ({
    loc: [...prefix, ...issue.path],
    msg: issue.message,
  }));
}

/**
 * Client sent a value that fails validation. Raised before any store call.
 */
export class RequestValidationError extends HttpError {
  constructor(detail: ErrorDetail[]) {
    super('Invalid request', 422, detail);
  }

  static fromZod(error: ZodError, location: ErrorLocation): RequestValidationError {
    return new RequestValidationError(toErrorDetails(error, [location]));
  }
}

/**
 * A record returned by the store does not match the item schema
 */
export class RecordValidationError extends HttpError {
  constructor(detail: ErrorDetail[]) {
    super('Stored record failed validation', 500, detail);
  }
}

/**
 * The remote store rejected a query or could not be reached
 */
export class StoreError extends Error {
  constructor(
    message: string,
    readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/**
 * Required configuration is missing or malformed
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
