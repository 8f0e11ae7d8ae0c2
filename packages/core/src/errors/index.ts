/**
 * Error handling module
 *
 * Structured errors with codes, messages and details shared by the
 * storage and overlay layers.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  AccessErrorCode,
  StorageErrorCode,
  ErrorHttpStatus,
} from './codes.js';

// Error classes
export {
  PalimpsestError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  AccessError,
  StorageError,
  isPalimpsestError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isAccessError,
  isStorageError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  recordNotFound,
  unknownCollection,
  draftContextNotFound,
  // Validation
  invalidInput,
  invalidId,
  missingRequiredField,
  identityFieldRejected,
  unknownAttribute,
  invalidAttribute,
  // Conflict
  concurrentModification,
  // Constraint
  invalidParent,
  // Access
  accessDenied,
  readOnlyCollection,
  // Storage
  databaseError,
  writeFailed,
  contextUnavailable,
} from './factories.js';
