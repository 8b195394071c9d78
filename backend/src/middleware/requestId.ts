/**
 * Request ID Middleware
 *
 * Reuses a short incoming X-Request-ID, otherwise assigns a UUID, and echoes
 * it on the response.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { HTTP_HEADERS, REQUEST_ID_MAX_LENGTH } from '../constants/http.constants';

export function resolveRequestId(incoming: string | string[] | undefined): string {
  const candidate = typeof incoming === 'string' ? incoming.trim() : '';
  return candidate && candidate.length <= REQUEST_ID_MAX_LENGTH ? candidate : uuidv4();
}

export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = resolveRequestId(req.headers[HTTP_HEADERS.REQUEST_ID.toLowerCase()]);
  req.requestId = requestId;
  res.setHeader(HTTP_HEADERS.REQUEST_ID, requestId);
  next();
}
