import { ErrorCode, StorageError, isStorageError, type Logger } from '@palimpsest/core';

/**
 * Replaces storage failures raised while reading with a message that names
 * only the collection. The original error is kept as the cause and logged.
 */
export function sanitizeReadError(collection: string, error: unknown, logger: Logger): unknown {
  if (!isStorageError(error) || error.code === ErrorCode.CONTEXT_UNAVAILABLE || error.code === ErrorCode.WRITE_FAILED) {
    return error;
  }
  logger.error(`Read from ${collection} failed`, error);
  const code = error.code === ErrorCode.DATABASE_BUSY ? ErrorCode.DATABASE_BUSY : ErrorCode.DATABASE_ERROR;
  return new StorageError(`Read failed on ${collection}`, code, { collection, operation: 'read' }, error);
}
