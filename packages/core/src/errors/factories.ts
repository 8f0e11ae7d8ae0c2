import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  AccessError,
  StorageError,
  type ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for a logical record without an effective version
 */
export function recordNotFound(
  collection: string,
  logicalId: number,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(
    `Record not found: ${collection}[${logicalId}]`,
    ErrorCode.NOT_FOUND,
    { collection, logicalId, ...details }
  );
}

/**
 * Creates a NotFoundError for a collection missing from the schema catalog
 */
export function unknownCollection(collection: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(
    `Unknown collection: ${collection}`,
    ErrorCode.UNKNOWN_COLLECTION,
    { collection, ...details }
  );
}

export function draftContextNotFound(draftContextId: number): NotFoundError {
  return new NotFoundError(
    `Draft context not found: ${draftContextId}`,
    ErrorCode.DRAFT_CONTEXT_NOT_FOUND,
    { draftContextId }
  );
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_INPUT,
    { field, value, expected, ...details }
  );
}

/**
 * Creates a ValidationError for an id that is not a positive integer
 */
export function invalidId(field: string, value: unknown, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_ID,
    { field, value, expected: 'positive integer', ...details }
  );
}

export function missingRequiredField(
  collection: string,
  field: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Missing required attribute: ${collection}.${field}`,
    ErrorCode.MISSING_REQUIRED_FIELD,
    { collection, field, ...details }
  );
}

/**
 * Creates a ValidationError for caller input naming identity or
 * version-control fields
 */
export function identityFieldRejected(
  collection: string,
  fields: string[],
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Identity fields cannot be set on ${collection}: ${fields.join(', ')}`,
    ErrorCode.IDENTITY_FIELD_REJECTED,
    { collection, field: fields[0], fields, ...details }
  );
}

export function unknownAttribute(
  collection: string,
  fields: string[],
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Unknown attributes for ${collection}: ${fields.join(', ')}`,
    ErrorCode.UNKNOWN_ATTRIBUTE,
    { collection, field: fields[0], fields, ...details }
  );
}

/**
 * Creates a ValidationError for an attribute value that fails its
 * declared type or constraints
 */
export function invalidAttribute(
  collection: string,
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid value for ${collection}.${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_ATTRIBUTE,
    { collection, field, value, expected, ...details }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for concurrent modification (optimistic locking failure)
 */
export function concurrentModification(
  collection: string,
  logicalId: number,
  expectedUpdatedAt: string,
  actualUpdatedAt: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Record was modified by another writer: ${collection}[${logicalId}]. Expected updatedAt: ${expectedUpdatedAt}, actual: ${actualUpdatedAt}`,
    ErrorCode.CONCURRENT_MODIFICATION,
    { collection, logicalId, expected: expectedUpdatedAt, actual: actualUpdatedAt, ...details }
  );
}

// =============================================================================
// Constraint Factories
// =============================================================================

/**
 * Creates a ConstraintError for an embedded child that could not be
 * linked to its parent
 */
export function invalidParent(
  collection: string,
  parentId: number,
  reason: string,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Invalid parent ${collection}[${parentId}]: ${reason}`,
    ErrorCode.INVALID_PARENT,
    { collection, logicalId: parentId, ...details }
  );
}

// =============================================================================
// Access Factories
// =============================================================================

export function accessDenied(
  principal: string,
  collection: string,
  reason: string,
  details: ErrorDetails = {}
): AccessError {
  return new AccessError(
    `Access denied for ${principal} on ${collection}: ${reason}`,
    ErrorCode.ACCESS_DENIED,
    { principal, collection, reason, ...details }
  );
}

export function readOnlyCollection(
  principal: string,
  collection: string,
  details: ErrorDetails = {}
): AccessError {
  return new AccessError(
    `Collection ${collection} is read-only`,
    ErrorCode.READ_ONLY_COLLECTION,
    { principal, collection, ...details }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for database operations
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Database error: ${message}`,
    ErrorCode.DATABASE_ERROR,
    details,
    cause
  );
}

/**
 * Creates a StorageError for a routed write that was rolled back.
 * The message names the operation only; the storage message stays in `cause`.
 */
export function writeFailed(
  operation: string,
  collection: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Write failed: ${operation} on ${collection} was rolled back`,
    ErrorCode.WRITE_FAILED,
    { operation, collection, ...details },
    cause
  );
}

export function contextUnavailable(
  principal: string,
  reason: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `No draft context available for ${principal}: ${reason}`,
    ErrorCode.CONTEXT_UNAVAILABLE,
    { principal, reason, ...details },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : String(JSON.stringify(value));
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
