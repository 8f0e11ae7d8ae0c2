import {
  ErrorCode,
  ErrorHttpStatus,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  AccessErrorCode,
  StorageErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** Attribute that caused the error */
  field?: string;
  /** The invalid value */
  value?: unknown;
  /** Expected format or value */
  expected?: unknown;
  /** Actual value received */
  actual?: unknown;
  /** Collection the operation targeted */
  collection?: string;
  /** Logical id of the record */
  logicalId?: number;
  /** Draft context the operation ran in */
  draftContextId?: number;
  /** Acting principal */
  principal?: string;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all record access errors.
 * Carries a machine-readable code, details and an HTTP status.
 */
export class PalimpsestError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;
  /** HTTP status code for transport layers */
  readonly httpStatus: number;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'PalimpsestError';
    this.code = code;
    this.details = details;
    this.httpStatus = ErrorHttpStatus[code];
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PalimpsestError);
    }
  }

  /**
   * Returns a JSON representation of the error. The cause is left out so
   * raw storage messages never reach callers.
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
    httpStatus: number;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      httpStatus: this.httpStatus,
    };
  }
}

/**
 * Error for input validation failures
 */
export class ValidationError extends PalimpsestError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for records, collections or draft contexts that cannot be found
 */
export class NotFoundError extends PalimpsestError {
  constructor(
    message: string,
    code: NotFoundErrorCode = ErrorCode.NOT_FOUND,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for state conflicts (unique index hits, lost updates)
 */
export class ConflictError extends PalimpsestError {
  constructor(
    message: string,
    code: ConflictErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Error for relational constraint violations
 */
export class ConstraintError extends PalimpsestError {
  constructor(
    message: string,
    code: ConstraintErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConstraintError';
  }
}

/**
 * Error for operations the access gate refused
 */
export class AccessError extends PalimpsestError {
  constructor(
    message: string,
    code: AccessErrorCode = ErrorCode.ACCESS_DENIED,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'AccessError';
  }
}

/**
 * Error for storage/database operations
 */
export class StorageError extends PalimpsestError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.DATABASE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

export function isPalimpsestError(error: unknown): error is PalimpsestError {
  return error instanceof PalimpsestError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

export function isAccessError(error: unknown): error is AccessError {
  return error instanceof AccessError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is PalimpsestError {
  return isPalimpsestError(error) && error.code === code;
}
