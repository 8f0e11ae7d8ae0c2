import { describe, it, expect } from 'vitest';
import {
  recordNotFound,
  unknownCollection,
  invalidInput,
  invalidId,
  identityFieldRejected,
  invalidAttribute,
  concurrentModification,
  accessDenied,
  readOnlyCollection,
  writeFailed,
  contextUnavailable,
} from './factories.js';
import { NotFoundError, ValidationError, ConflictError, AccessError, StorageError } from './error.js';
import { ErrorCode } from './codes.js';

describe('not found factories', () => {
  it('recordNotFound names the collection and logical id', () => {
    const error = recordNotFound('pages', 5);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Record not found: pages[5]');
    expect(error.details).toEqual({ collection: 'pages', logicalId: 5 });
  });

  it('unknownCollection uses its own code', () => {
    const error = unknownCollection('widgets');
    expect(error.code).toBe(ErrorCode.UNKNOWN_COLLECTION);
    expect(error.message).toBe('Unknown collection: widgets');
  });
});

describe('validation factories', () => {
  it('invalidInput truncates long values', () => {
    const error = invalidInput('limit', 'x'.repeat(80), 'positive integer');
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe(`Invalid limit: ${'x'.repeat(47)}...`);
  });

  it('invalidId reports the expected format', () => {
    const error = invalidId('logicalId', -1);
    expect(error.code).toBe(ErrorCode.INVALID_ID);
    expect(error.message).toBe('Invalid logicalId: -1');
    expect(error.details.expected).toBe('positive integer');
  });

  it('identityFieldRejected lists every field', () => {
    const error = identityFieldRejected('pages', ['id', 'origin_id']);
    expect(error.code).toBe(ErrorCode.IDENTITY_FIELD_REJECTED);
    expect(error.message).toBe('Identity fields cannot be set on pages: id, origin_id');
    expect(error.details.field).toBe('id');
  });

  it('invalidAttribute keeps value and expectation', () => {
    const error = invalidAttribute('pages', 'title', 42, 'string');
    expect(error.message).toBe('Invalid value for pages.title: 42');
    expect(error.details).toEqual({ collection: 'pages', field: 'title', value: 42, expected: 'string' });
  });
});

describe('conflict factories', () => {
  it('concurrentModification carries both timestamps', () => {
    const error = concurrentModification('pages', 5, '2025-01-01T00:00:00.000Z', '2025-01-02T00:00:00.000Z');
    expect(error).toBeInstanceOf(ConflictError);
    expect(error.code).toBe(ErrorCode.CONCURRENT_MODIFICATION);
    expect(error.details.expected).toBe('2025-01-01T00:00:00.000Z');
    expect(error.details.actual).toBe('2025-01-02T00:00:00.000Z');
  });
});

describe('access factories', () => {
  it('accessDenied includes the reason', () => {
    const error = accessDenied('agent-1', 'be_users', 'collection is restricted');
    expect(error).toBeInstanceOf(AccessError);
    expect(error.message).toBe('Access denied for agent-1 on be_users: collection is restricted');
  });

  it('readOnlyCollection has its own code', () => {
    expect(readOnlyCollection('agent-1', 'sys_log').code).toBe(ErrorCode.READ_ONLY_COLLECTION);
  });
});

describe('storage factories', () => {
  it('writeFailed hides the storage message', () => {
    const cause = new Error('SQLITE_CONSTRAINT: NOT NULL constraint failed: pages.title');
    const error = writeFailed('update', 'pages', cause);
    expect(error).toBeInstanceOf(StorageError);
    expect(error.code).toBe(ErrorCode.WRITE_FAILED);
    expect(error.message).toBe('Write failed: update on pages was rolled back');
    expect(error.cause).toBe(cause);
  });

  it('contextUnavailable names the principal', () => {
    const error = contextUnavailable('agent-1', 'database is read-only');
    expect(error.code).toBe(ErrorCode.CONTEXT_UNAVAILABLE);
    expect(error.message).toBe('No draft context available for agent-1: database is read-only');
  });
});
