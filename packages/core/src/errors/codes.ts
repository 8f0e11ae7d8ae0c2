/**
 * Error codes for the record access layer.
 * Grouped by category; each category maps onto one error class.
 */

/**
 * Validation error codes - caller input rejected before storage is touched
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Logical or physical id is not a positive integer */
  INVALID_ID: 'INVALID_ID',
  /** Required attribute missing on create */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Caller tried to set an identity or version-control field */
  IDENTITY_FIELD_REJECTED: 'IDENTITY_FIELD_REJECTED',
  /** Attribute is not declared for the collection */
  UNKNOWN_ATTRIBUTE: 'UNKNOWN_ATTRIBUTE',
  /** Attribute value fails its declared type or constraints */
  INVALID_ATTRIBUTE: 'INVALID_ATTRIBUTE',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes
 */
export const NotFoundErrorCode = {
  /** Logical record has no effective version in the draft context */
  NOT_FOUND: 'NOT_FOUND',
  /** Collection is not registered in the schema catalog */
  UNKNOWN_COLLECTION: 'UNKNOWN_COLLECTION',
  /** Draft context id does not exist */
  DRAFT_CONTEXT_NOT_FOUND: 'DRAFT_CONTEXT_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes
 */
export const ConflictErrorCode = {
  /** Row violating a unique index */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  /** Record was modified since the caller last read it (optimistic locking failure) */
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Constraint error codes - relational rules
 */
export const ConstraintErrorCode = {
  /** Row still referenced by other rows */
  HAS_DEPENDENTS: 'HAS_DEPENDENTS',
  /** Embedded child cannot be linked to its parent */
  INVALID_PARENT: 'INVALID_PARENT',
} as const;

export type ConstraintErrorCode = typeof ConstraintErrorCode[keyof typeof ConstraintErrorCode];

/**
 * Access error codes - decisions of the access gate
 */
export const AccessErrorCode = {
  /** Principal may not perform the operation */
  ACCESS_DENIED: 'ACCESS_DENIED',
  /** Collection only allows reads */
  READ_ONLY_COLLECTION: 'READ_ONLY_COLLECTION',
} as const;

export type AccessErrorCode = typeof AccessErrorCode[keyof typeof AccessErrorCode];

/**
 * Storage error codes - database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Database was opened read-only or the file is not writable */
  DATABASE_READONLY: 'DATABASE_READONLY',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
  /** Routed write failed and was rolled back */
  WRITE_FAILED: 'WRITE_FAILED',
  /** No draft context could be selected or created */
  CONTEXT_UNAVAILABLE: 'CONTEXT_UNAVAILABLE',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...ConstraintErrorCode,
  ...AccessErrorCode,
  ...StorageErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Maps error codes to HTTP status codes for transport layers
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ID]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.IDENTITY_FIELD_REJECTED]: 400,
  [ErrorCode.UNKNOWN_ATTRIBUTE]: 400,
  [ErrorCode.INVALID_ATTRIBUTE]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNKNOWN_COLLECTION]: 404,
  [ErrorCode.DRAFT_CONTEXT_NOT_FOUND]: 404,

  // Conflict errors -> 409
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,

  // Constraint errors
  [ErrorCode.HAS_DEPENDENTS]: 409,
  [ErrorCode.INVALID_PARENT]: 400,

  // Access errors -> 403
  [ErrorCode.ACCESS_DENIED]: 403,
  [ErrorCode.READ_ONLY_COLLECTION]: 403,

  // Storage errors -> 500/503
  [ErrorCode.DATABASE_ERROR]: 500,
  [ErrorCode.DATABASE_BUSY]: 503,
  [ErrorCode.DATABASE_READONLY]: 503,
  [ErrorCode.MIGRATION_FAILED]: 500,
  [ErrorCode.WRITE_FAILED]: 500,
  [ErrorCode.CONTEXT_UNAVAILABLE]: 503,
};
