/**
 * Tests for custom error classes
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  DeckLoadError,
  NotFoundError,
  NotImplementedError,
  ServiceUnavailableError,
  ValidationError,
} from '../../utils/errors';

describe('AppError', () => {
  it('should create error with status code and message', () => {
    const error = new AppError(400, 'Test error');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Test error');
    expect(error.isOperational).toBe(true);
  });

  it('should allow custom isOperational flag', () => {
    const error = new AppError(500, 'Test error', false);
    expect(error.isOperational).toBe(false);
  });

  it('should be instance of Error', () => {
    const error = new AppError(400, 'Test error');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
  });

  it('should carry the subclass name', () => {
    expect(new NotFoundError().name).toBe('NotFoundError');
  });
});

describe('ValidationError', () => {
  it('should have status code 400', () => {
    const error = new ValidationError('Invalid input');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Invalid input');
    expect(error).toBeInstanceOf(AppError);
  });
});

describe('NotFoundError', () => {
  it('should have status code 404', () => {
    const error = new NotFoundError();
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Resource not found');
  });

  it('should allow custom resource name', () => {
    const error = new NotFoundError('Deck');
    expect(error.message).toBe('Deck not found');
  });
});

describe('ServiceUnavailableError', () => {
  it('should have status code 503', () => {
    const error = new ServiceUnavailableError('No deck package loaded');
    expect(error.statusCode).toBe(503);
    expect(error.message).toBe('No deck package loaded');
  });
});

describe('NotImplementedError', () => {
  it('should have status code 501', () => {
    const error = new NotImplementedError();
    expect(error.statusCode).toBe(501);
    expect(error.message).toBe('Not implemented');
  });
});

describe('DeckLoadError', () => {
  it('should map a missing package to 404', () => {
    const error = new DeckLoadError('PackageNotFound', 'Package not found: deck.apkg');
    expect(error.statusCode).toBe(404);
    expect(error.reason).toBe('PackageNotFound');
  });

  it.each(['UnpackFailed', 'CollectionFileMissing', 'MetadataUnreadable', 'DatabaseUnreadable'] as const)(
    'should map %s to 422',
    (reason) => {
      expect(new DeckLoadError(reason, 'bad package').statusCode).toBe(422);
    }
  );

  it('should keep the underlying cause', () => {
    const cause = new Error('zip is truncated');
    const error = new DeckLoadError('UnpackFailed', 'Could not unpack', { cause });
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(AppError);
  });
});
