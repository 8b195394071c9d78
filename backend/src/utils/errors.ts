/**
 * Application error classes
 *
 * Every error raised on purpose carries an HTTP status so the error handler
 * can answer without inspecting messages.
 */

import { HTTP_STATUS } from '../constants/http.constants';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(HTTP_STATUS.BAD_REQUEST, message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource?: string) {
    super(HTTP_STATUS.NOT_FOUND, resource ? `${resource} not found` : 'Resource not found');
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service unavailable') {
    super(HTTP_STATUS.SERVICE_UNAVAILABLE, message);
  }
}

export class NotImplementedError extends AppError {
  constructor(message = 'Not implemented') {
    super(HTTP_STATUS.NOT_IMPLEMENTED, message);
  }
}

export type DeckLoadErrorReason =
  | 'PackageNotFound'
  | 'UnpackFailed'
  | 'CollectionFileMissing'
  | 'MetadataUnreadable'
  | 'DatabaseUnreadable';

/**
 * Raised at the ingestion boundary when a package cannot be turned into a
 * collection. There is no partial result: callers either get a full
 * collection or this error.
 */
export class DeckLoadError extends AppError {
  constructor(
    public readonly reason: DeckLoadErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(
      reason === 'PackageNotFound' ? HTTP_STATUS.NOT_FOUND : HTTP_STATUS.UNPROCESSABLE_ENTITY,
      message
    );
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
