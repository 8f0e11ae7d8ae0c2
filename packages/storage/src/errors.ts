/**
 * Storage Error Mapping
 *
 * Maps SQLite failures to the shared error taxonomy. better-sqlite3 reports
 * string codes (`SQLITE_CONSTRAINT_UNIQUE`); numeric result codes are
 * accepted too.
 */

import {
  StorageError,
  ConflictError,
  ConstraintError,
  ErrorCode,
  isPalimpsestError,
  type PalimpsestError,
} from '@palimpsest/core';

// ============================================================================
// SQLite Result Codes
// ============================================================================

/**
 * Primary SQLite result codes this module distinguishes
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  ERROR: 1,
  BUSY: 5,
  LOCKED: 6,
  /** Attempt to write a readonly database */
  READONLY: 8,
  IOERR: 10,
  CORRUPT: 11,
  FULL: 13,
  CANTOPEN: 14,
  CONSTRAINT: 19,
  /** File opened that is not a database file */
  NOTADB: 26,
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

const CONSTRAINT_PATTERNS = {
  UNIQUE: /UNIQUE constraint failed/i,
  PRIMARY_KEY: /PRIMARY KEY constraint failed/i,
  FOREIGN_KEY: /FOREIGN KEY constraint failed/i,
  NOT_NULL: /NOT NULL constraint failed/i,
  CHECK: /CHECK constraint failed/i,
} as const;

/**
 * Extract table and column from constraint error message
 */
function parseConstraintError(message: string): { table?: string; column?: string } {
  // "UNIQUE constraint failed: tablename.columnname"
  const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
  if (match) {
    return { table: match[1], column: match[2] };
  }
  return {};
}

/**
 * Reads the `code` property SQLite drivers attach to their errors
 */
export function sqliteCodeOf(error: Error): number | string | undefined {
  if (!('code' in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === 'number' || typeof code === 'string' ? code : undefined;
}

/**
 * Matches a numeric result code, or a string code whose primary part is
 * `name` (`SQLITE_READONLY_DBMOVED` matches `READONLY`)
 */
function hasResultCode(error: Error, numeric: SqliteResultCode, name: string): boolean {
  const code = sqliteCodeOf(error);
  if (typeof code === 'number') {
    // Extended result codes keep the primary code in the low byte
    return (code & 0xff) === numeric;
  }
  if (typeof code === 'string') {
    return code === `SQLITE_${name}` || code.startsWith(`SQLITE_${name}_`);
  }
  return false;
}

// ============================================================================
// Error Detection
// ============================================================================

export function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    hasResultCode(error, SqliteResultCode.BUSY, 'BUSY') ||
    hasResultCode(error, SqliteResultCode.LOCKED, 'LOCKED') ||
    /database is locked/i.test(error.message)
  );
}

export function isConstraintViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (hasResultCode(error, SqliteResultCode.CONSTRAINT, 'CONSTRAINT')) {
    return true;
  }
  return Object.values(CONSTRAINT_PATTERNS).some((pattern) => pattern.test(error.message));
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    CONSTRAINT_PATTERNS.UNIQUE.test(error.message) ||
    CONSTRAINT_PATTERNS.PRIMARY_KEY.test(error.message)
  );
}

export function isForeignKeyViolation(error: unknown): boolean {
  return error instanceof Error && CONSTRAINT_PATTERNS.FOREIGN_KEY.test(error.message);
}

/**
 * Check if an error means the database cannot be written at all
 */
export function isReadonlyError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    hasResultCode(error, SqliteResultCode.READONLY, 'READONLY') ||
    /readonly database|read-only/i.test(error.message)
  );
}

export function isCorruptionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    hasResultCode(error, SqliteResultCode.CORRUPT, 'CORRUPT') ||
    hasResultCode(error, SqliteResultCode.NOTADB, 'NOTADB') ||
    /malformed|not a database/i.test(error.message)
  );
}

// ============================================================================
// Error Conversion
// ============================================================================

export interface StorageErrorContext {
  operation?: string;
  table?: string;
}

/**
 * Convert a SQLite error to the matching error class.
 *
 * Errors that already belong to the taxonomy are returned unchanged, so a
 * domain error thrown inside a transaction reaches the caller as it was.
 */
export function mapStorageError(
  error: unknown,
  context: StorageErrorContext = {}
): PalimpsestError {
  if (isPalimpsestError(error)) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new StorageError(
      `Storage operation failed: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { operation: context.operation }
    );
  }

  const message = error.message;

  if (isUniqueViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConflictError(
      `Row already exists${column ? ` (duplicate ${column})` : ''}`,
      ErrorCode.ALREADY_EXISTS,
      { table: table ?? context.table, column, operation: context.operation },
      error
    );
  }

  if (isForeignKeyViolation(error)) {
    return new ConstraintError(
      'Referenced row does not exist or still has dependents',
      ErrorCode.HAS_DEPENDENTS,
      { table: context.table, operation: context.operation },
      error
    );
  }

  if (isConstraintViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConstraintError(
      `Database constraint violation: ${message}`,
      ErrorCode.HAS_DEPENDENTS,
      { table: table ?? context.table, column, operation: context.operation },
      error
    );
  }

  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      { operation: context.operation, retryable: true },
      error
    );
  }

  if (isReadonlyError(error)) {
    return new StorageError(
      'Database is read-only',
      ErrorCode.DATABASE_READONLY,
      { operation: context.operation },
      error
    );
  }

  if (isCorruptionError(error)) {
    return new StorageError(
      'Database is corrupted or not a valid database file',
      ErrorCode.DATABASE_ERROR,
      { operation: context.operation, corrupted: true },
      error
    );
  }

  return new StorageError(
    `Database operation failed: ${message}`,
    ErrorCode.DATABASE_ERROR,
    { sqliteCode: sqliteCodeOf(error), operation: context.operation, table: context.table },
    error
  );
}

// ============================================================================
// Error Helper Functions
// ============================================================================

export function connectionError(path: string, error: unknown): StorageError {
  if (!(error instanceof Error)) {
    return new StorageError(
      `Failed to open database at ${path}: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { path }
    );
  }

  return new StorageError(
    `Failed to open database at ${path}: ${error.message}`,
    isReadonlyError(error) ? ErrorCode.DATABASE_READONLY : ErrorCode.DATABASE_ERROR,
    { path },
    error
  );
}

export function migrationError(version: number, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return new StorageError(
    `Failed to apply migration version ${version}: ${cause?.message ?? String(error)}`,
    ErrorCode.MIGRATION_FAILED,
    { version, operation: 'migrate' },
    cause
  );
}
