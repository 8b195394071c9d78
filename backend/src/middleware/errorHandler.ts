/**
 * Error Handling Middleware
 *
 * Maps AppError subclasses to their status codes; anything else is a 500
 * whose message is only shown in development.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError, DeckLoadError } from '../utils/errors';
import { NODE_ENV } from '../config/env';
import { HTTP_STATUS } from '../constants/http.constants';
import { logger, serializeError } from '../utils/logger';

const log = logger.child('http');

function statusOf(err: Error): number {
  if (err instanceof AppError) return err.statusCode;
  // body-parser and other http-errors style errors
  const code = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
  return typeof code === 'number' && code >= 400 && code < 600 ? code : HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): Response {
  const status = statusOf(err);
  const isDevelopment = NODE_ENV === 'development';
  const meta = {
    error: serializeError(err),
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  };

  if (status >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
    log.error('Unhandled request error', meta);
  } else {
    log.warn('Request failed', { ...meta, status });
  }

  const exposeMessage = status < HTTP_STATUS.INTERNAL_SERVER_ERROR || (err instanceof AppError && err.isOperational) || isDevelopment;

  return res.status(status).json({
    success: false,
    error: exposeMessage ? err.message : 'An internal error occurred',
    ...(err instanceof DeckLoadError && { reason: err.reason }),
    requestId: req.requestId,
    ...(isDevelopment && {
      stack: err.stack,
      path: req.path,
    }),
  });
}

/**
 * Async error wrapper
 * Catches async errors and passes them to error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
