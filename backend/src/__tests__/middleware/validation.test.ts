/**
 * Tests for validation middleware
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { validateRequest, validateParams } from '../../middleware/validation';
import { DeckCardParamsSchema } from '../../schemas/deck.schemas';
import { SwitchPackageSchema } from '../../schemas/package.schemas';
import { SetRatingSchema } from '../../schemas/rating.schemas';

let mockResponse: Partial<Response>;
let mockNext: NextFunction;

beforeEach(() => {
  mockResponse = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  };
  mockNext = vi.fn();
});

describe('validateRequest', () => {
  it('should replace the body with the parsed value', () => {
    const mockRequest: Partial<Request> = { body: { deckId: 1 } };

    validateRequest(SetRatingSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.body).toEqual({ deckId: 1, rating: '' });
    expect(mockNext).toHaveBeenCalled();
    expect(mockResponse.status).not.toHaveBeenCalled();
  });

  it('should trim a package filename', () => {
    const mockRequest: Partial<Request> = { body: { filename: '  deck.apkg ' } };

    validateRequest(SwitchPackageSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.body).toEqual({ filename: 'deck.apkg' });
    expect(mockNext).toHaveBeenCalled();
  });

  it('should reject an unknown rating label', () => {
    const mockRequest: Partial<Request> = { body: { deckId: 1, rating: 'excellent' } };

    validateRequest(SetRatingSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(400);
    expect(mockResponse.json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: false,
        error: 'Validation failed',
        details: [expect.objectContaining({ path: 'rating' })],
      })
    );
    expect(mockNext).not.toHaveBeenCalled();
  });

  it('should report the failing field with its message', () => {
    const mockRequest: Partial<Request> = { body: { filename: 'deck.zip' } };

    validateRequest(SwitchPackageSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Validation failed',
      details: [{ path: 'filename', message: 'Filename must end in .apkg' }],
    });
  });

  it('should reject a fractional deck id', () => {
    const mockRequest: Partial<Request> = { body: { deckId: 1.5, rating: 'favorite' } };

    validateRequest(SetRatingSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Validation failed',
      details: [{ path: 'deckId', message: 'Deck ID must be an integer' }],
    });
  });
});

describe('validateParams', () => {
  it('should accept numeric deck and card ids', () => {
    const mockRequest: Partial<Request> = { params: { deckId: '1', cardId: '-1700000000000' } };

    validateParams(DeckCardParamsSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockNext).toHaveBeenCalled();
    expect(mockRequest.params).toEqual({ deckId: '1', cardId: '-1700000000000' });
  });

  it('should reject non-numeric ids', () => {
    const mockRequest: Partial<Request> = { params: { deckId: 'abc', cardId: '2' } };

    validateParams(DeckCardParamsSchema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockResponse.status).toHaveBeenCalledWith(400);
    expect(mockResponse.json).toHaveBeenCalledWith({
      success: false,
      error: 'Invalid route parameters',
      details: [{ path: 'deckId', message: 'Deck ID must be an integer' }],
    });
    expect(mockNext).not.toHaveBeenCalled();
  });
});
