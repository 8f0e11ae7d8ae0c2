/**
 * Tests for Storage Error Mapping
 */

import { describe, it, expect } from 'vitest';
import {
  SqliteResultCode,
  sqliteCodeOf,
  isBusyError,
  isConstraintViolation,
  isUniqueViolation,
  isForeignKeyViolation,
  isReadonlyError,
  isCorruptionError,
  mapStorageError,
  connectionError,
  migrationError,
} from './errors.js';
import {
  StorageError,
  ConflictError,
  ConstraintError,
  NotFoundError,
  ErrorCode,
} from '@palimpsest/core';

function sqliteError(message: string, code: string | number): Error {
  return Object.assign(new Error(message), { code });
}

describe('sqliteCodeOf', () => {
  it('should read string and numeric codes', () => {
    expect(sqliteCodeOf(sqliteError('x', 'SQLITE_BUSY'))).toBe('SQLITE_BUSY');
    expect(sqliteCodeOf(sqliteError('x', 5))).toBe(5);
    expect(sqliteCodeOf(new Error('x'))).toBeUndefined();
  });
});

describe('isBusyError', () => {
  it('should detect busy and locked codes', () => {
    expect(isBusyError(sqliteError('busy', SqliteResultCode.BUSY))).toBe(true);
    expect(isBusyError(sqliteError('locked', 'SQLITE_LOCKED'))).toBe(true);
    expect(isBusyError(sqliteError('busy', 'SQLITE_BUSY_SNAPSHOT'))).toBe(true);
  });

  it('should detect busy error by message', () => {
    expect(isBusyError(new Error('database is locked'))).toBe(true);
  });

  it('should return false for other values', () => {
    expect(isBusyError(new Error('some other error'))).toBe(false);
    expect(isBusyError('string')).toBe(false);
    expect(isBusyError(null)).toBe(false);
  });
});

describe('constraint detection', () => {
  it('should detect constraint codes and messages', () => {
    expect(isConstraintViolation(sqliteError('x', 'SQLITE_CONSTRAINT_CHECK'))).toBe(true);
    expect(isConstraintViolation(new Error('NOT NULL constraint failed: pages.title'))).toBe(true);
    expect(isConstraintViolation(new Error('no such table: pages'))).toBe(false);
  });

  it('should tell unique from foreign key violations', () => {
    const unique = new Error('UNIQUE constraint failed: draft_contexts.owner_principal');
    const foreign = new Error('FOREIGN KEY constraint failed');
    expect(isUniqueViolation(unique)).toBe(true);
    expect(isForeignKeyViolation(unique)).toBe(false);
    expect(isForeignKeyViolation(foreign)).toBe(true);
  });
});

describe('isReadonlyError', () => {
  it('should detect extended readonly codes', () => {
    expect(isReadonlyError(sqliteError('x', 'SQLITE_READONLY'))).toBe(true);
    expect(isReadonlyError(sqliteError('x', 'SQLITE_READONLY_DBMOVED'))).toBe(true);
    expect(isReadonlyError(sqliteError('x', 8))).toBe(true);
    expect(isReadonlyError(sqliteError('x', 1032))).toBe(true);
  });

  it('should detect the driver message', () => {
    expect(isReadonlyError(new Error('attempt to write a readonly database'))).toBe(true);
    expect(isReadonlyError(new Error('disk I/O error'))).toBe(false);
  });
});

describe('isCorruptionError', () => {
  it('should detect corruption', () => {
    expect(isCorruptionError(sqliteError('x', 'SQLITE_NOTADB'))).toBe(true);
    expect(isCorruptionError(new Error('database disk image is malformed'))).toBe(true);
    expect(isCorruptionError(new Error('no such column'))).toBe(false);
  });
});

describe('mapStorageError', () => {
  it('should return taxonomy errors unchanged', () => {
    const original = new NotFoundError('Record not found');
    expect(mapStorageError(original)).toBe(original);
  });

  it('should map unique violations to conflicts', () => {
    const cause = sqliteError(
      'UNIQUE constraint failed: draft_contexts.owner_principal',
      'SQLITE_CONSTRAINT_UNIQUE'
    );
    const mapped = mapStorageError(cause, { operation: 'insert' });
    expect(mapped).toBeInstanceOf(ConflictError);
    expect(mapped.code).toBe(ErrorCode.ALREADY_EXISTS);
    expect(mapped.message).toBe('Row already exists (duplicate owner_principal)');
    expect(mapped.details).toEqual({
      table: 'draft_contexts',
      column: 'owner_principal',
      operation: 'insert',
    });
    expect(mapped.cause).toBe(cause);
  });

  it('should map foreign key violations', () => {
    const mapped = mapStorageError(new Error('FOREIGN KEY constraint failed'));
    expect(mapped).toBeInstanceOf(ConstraintError);
    expect(mapped.code).toBe(ErrorCode.HAS_DEPENDENTS);
  });

  it('should map busy and readonly errors', () => {
    expect(mapStorageError(sqliteError('database is locked', 'SQLITE_BUSY')).code).toBe(
      ErrorCode.DATABASE_BUSY
    );
    expect(
      mapStorageError(sqliteError('attempt to write a readonly database', 'SQLITE_READONLY')).code
    ).toBe(ErrorCode.DATABASE_READONLY);
  });

  it('should wrap everything else', () => {
    const mapped = mapStorageError(sqliteError('no such column: foo', 'SQLITE_ERROR'), {
      operation: 'query',
      table: 'pages',
    });
    expect(mapped).toBeInstanceOf(StorageError);
    expect(mapped.message).toBe('Database operation failed: no such column: foo');
    expect(mapped.details).toEqual({ sqliteCode: 'SQLITE_ERROR', operation: 'query', table: 'pages' });
  });

  it('should handle non-Error values', () => {
    const mapped = mapStorageError('boom');
    expect(mapped.message).toBe('Storage operation failed: boom');
    expect(mapped.code).toBe(ErrorCode.DATABASE_ERROR);
  });
});

describe('helpers', () => {
  it('connectionError should flag read-only failures', () => {
    const error = connectionError('/data/app.db', sqliteError('attempt to write a readonly database', 'SQLITE_READONLY'));
    expect(error.code).toBe(ErrorCode.DATABASE_READONLY);
    expect(error.message).toBe('Failed to open database at /data/app.db: attempt to write a readonly database');
  });

  it('migrationError should use the migration code', () => {
    const error = migrationError(3, new Error('syntax error'));
    expect(error.code).toBe(ErrorCode.MIGRATION_FAILED);
    expect(error.message).toBe('Failed to apply migration version 3: syntax error');
    expect(error.details).toEqual({ version: 3, operation: 'migrate' });
  });
});
