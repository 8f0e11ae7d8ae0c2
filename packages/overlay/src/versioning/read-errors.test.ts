import { describe, it, expect, vi } from 'vitest';
import { ErrorCode, StorageError, createLogger, recordNotFound, writeFailed } from '@palimpsest/core';
import { sanitizeReadError } from './read-errors.js';

describe('sanitizeReadError', () => {
  const logger = createLogger('read-errors-test');

  it('should replace storage messages with one naming the collection', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const raw = new StorageError('Database operation failed: no such column: secret', ErrorCode.DATABASE_ERROR);

    const result = sanitizeReadError('pages', raw, logger);

    expect(result).toBeInstanceOf(StorageError);
    expect(result).toMatchObject({
      message: 'Read failed on pages',
      code: ErrorCode.DATABASE_ERROR,
      details: { collection: 'pages', operation: 'read' },
    });
    expect(error).toHaveBeenCalledWith('Read from pages failed', raw);
    error.mockRestore();
  });

  it('should keep the busy code so callers can retry', () => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const busy = new StorageError('Database is busy. Please retry the operation.', ErrorCode.DATABASE_BUSY);

    expect(sanitizeReadError('pages', busy, logger)).toHaveProperty('code', ErrorCode.DATABASE_BUSY);
    vi.restoreAllMocks();
  });

  it('should pass domain errors through unchanged', () => {
    const notFound = recordNotFound('pages', 3);
    const rolledBack = writeFailed('create', 'pages');

    expect(sanitizeReadError('pages', notFound, logger)).toBe(notFound);
    expect(sanitizeReadError('pages', rolledBack, logger)).toBe(rolledBack);
  });
});
