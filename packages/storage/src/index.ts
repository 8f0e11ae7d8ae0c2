/**
 * @palimpsest/storage
 *
 * SQLite storage layer: backend interface, better-sqlite3 implementation,
 * error mapping and migrations.
 */

// Type definitions
export type {
  Row,
  SqlValue,
  MutationResult,
  IsolationLevel,
  TransactionOptions,
  Transaction,
  SqlitePragmas,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

// Backend interface
export type { StorageBackend, StorageStats, StorageFactory } from './backend.js';

// Node.js backend
export { NodeStorageBackend, createNodeStorage } from './node-backend.js';

// Error mapping
export {
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
  type StorageErrorContext,
} from './errors.js';

// Schema management
export {
  CURRENT_SCHEMA_VERSION,
  MIGRATIONS,
  EXPECTED_TABLES,
  initializeSchema,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  isValidIdentifier,
  quoteIdentifier,
  tableExists,
  validateSchema,
  getTableColumns,
  getTableIndexes,
  type ColumnInfo,
} from './schema.js';
