/**
 * Request Validation Middleware
 *
 * Validates request bodies and route parameters with Zod
 * schemas. Failures answer 400 with one entry per issue.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';

type RequestPart = 'body' | 'params';

const FAILURE_MESSAGES: Record<RequestPart, string> = {
  body: 'Validation failed',
  params: 'Invalid route parameters',
};

function sendIssues(res: Response, part: RequestPart, error: z.ZodError): void {
  const validationError = new ValidationError(FAILURE_MESSAGES[part]);
  res.status(validationError.statusCode).json({
    success: false,
    error: validationError.message,
    details: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

function validate(part: RequestPart, schema: z.ZodType, apply: (req: Request, value: unknown) => void) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[part]);
    if (!result.success) {
      sendIssues(res, part, result.error);
      return;
    }
    apply(req, result.data);
    next();
  };
}

/**
 * Validate request body against Zod schema; the parsed value replaces `req.body`.
 */
export function validateRequest(schema: z.ZodType) {
  return validate('body', schema, (req, value) => {
    req.body = value;
  });
}

/**
 * Validate request parameters. Handlers read typed values with
 * `schema.parse(req.params)`.
 */
export function validateParams(schema: z.ZodType) {
  return validate('params', schema, () => undefined);
}
