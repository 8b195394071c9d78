/**
 * Tests for error handler middleware
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { errorHandler, asyncHandler } from '@/middleware/errorHandler';
import {
  AppError,
  DeckLoadError,
  NotFoundError,
  ServiceUnavailableError,
  ValidationError,
} from '@/utils/errors';

// Mock env
vi.mock('@/config/env', () => ({
  NODE_ENV: 'test',
  LOG_LEVEL: 'error',
}));

describe('errorHandler', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    mockRequest = {
      path: '/api/test',
      method: 'GET',
      requestId: 'test-request-id',
    };
    mockResponse = {
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
    };
    mockNext = vi.fn();
  });

  it('should handle AppError with correct status code', () => {
    const error = new ValidationError('Invalid input');

    errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(400);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Invalid input',
      requestId: 'test-request-id',
    });
  });

  it('should handle NotFoundError', () => {
    const error = new NotFoundError('Card');

    errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(404);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Card not found',
      requestId: 'test-request-id',
    });
  });

  it('should expose operational 5xx messages', () => {
    errorHandler(
      new ServiceUnavailableError('No deck package loaded'),
      mockRequest as Request,
      mockResponse as Response,
      mockNext
    );

    expect(mockResponse.status).toHaveBeenCalledWith(503);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'No deck package loaded',
      requestId: 'test-request-id',
    });
  });

  it('should include the reason of a DeckLoadError', () => {
    errorHandler(
      new DeckLoadError('CollectionFileMissing', 'Package has no collection database'),
      mockRequest as Request,
      mockResponse as Response,
      mockNext
    );

    expect(mockResponse.status).toHaveBeenCalledWith(422);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Package has no collection database',
      reason: 'CollectionFileMissing',
      requestId: 'test-request-id',
    });
  });

  it('should hide non-operational error messages', () => {
    errorHandler(new AppError(500, 'db exploded', false), mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'An internal error occurred',
      requestId: 'test-request-id',
    });
  });

  it('should treat unknown errors as 500', () => {
    errorHandler(new Error('boom'), mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'An internal error occurred',
      requestId: 'test-request-id',
    });
  });

  it('should use the status of http-errors style errors', () => {
    const error = Object.assign(new Error('request entity too large'), { status: 413 });

    errorHandler(error, mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(413);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'request entity too large',
      requestId: 'test-request-id',
    });
  });

  it('should respect a custom AppError status', () => {
    errorHandler(new AppError(409, 'Conflict'), mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(409);
  });
});

describe('asyncHandler', () => {
  it('should pass rejections to next', async () => {
    const error = new Error('async failure');
    const next = vi.fn();
    const handler = asyncHandler(async () => {
      throw error;
    });

    handler({} as Request, {} as Response, next);
    await vi.waitFor(() => expect(next).toHaveBeenCalledWith(error));
  });

  it('should not call next when the handler succeeds', async () => {
    const next = vi.fn();
    const handler = asyncHandler(async (_req, res) => res.json({ ok: true }));
    const res = { json: vi.fn() };

    handler({} as Request, res as unknown as Response, next);
    await vi.waitFor(() => expect(res.json).toHaveBeenCalledWith({ ok: true }));
    expect(next).not.toHaveBeenCalled();
  });
});
