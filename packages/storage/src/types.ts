/**
 * Storage Type Definitions
 *
 * Result, transaction, configuration and migration types of the storage
 * abstraction.
 */

// ============================================================================
// Query Result Types
// ============================================================================

/**
 * A single row result from a query
 */
export type Row = Record<string, unknown>;

/**
 * Value SQLite accepts as a bound parameter
 */
export type SqlValue = string | number | bigint | Buffer | null;

/**
 * Result of a mutation (INSERT, UPDATE, DELETE)
 */
export interface MutationResult {
  /** Number of rows affected by the mutation */
  changes: number;
  /** Last inserted row ID (for auto-increment tables) */
  lastInsertRowid: number | bigint;
}

// ============================================================================
// Transaction Interface
// ============================================================================

export type IsolationLevel = 'deferred' | 'immediate' | 'exclusive';

export interface TransactionOptions {
  /** Isolation level for the outermost transaction; ignored when nested */
  isolation?: IsolationLevel;
}

/**
 * Statement execution inside a transaction
 */
export interface Transaction {
  /** Nesting depth; 1 for the outermost transaction */
  readonly depth: number;
  exec(sql: string): void;
  query<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T[];
  queryOne<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T | undefined;
  run(sql: string, params?: readonly SqlValue[]): MutationResult;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * SQLite pragma settings for database configuration
 */
export interface SqlitePragmas {
  /** Journal mode (default: WAL); not applied to read-only connections */
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  foreign_keys?: boolean;
  /** Busy timeout in milliseconds */
  busy_timeout?: number;
  /** Cache size in pages (negative = KB) */
  cache_size?: number;
  temp_store?: 'default' | 'file' | 'memory';
}

/**
 * Configuration for storage backend initialization
 */
export interface StorageConfig {
  /** Path to the database file (or :memory: for in-memory) */
  path: string;
  pragmas?: SqlitePragmas;
  /** Create database if it doesn't exist (default: true) */
  create?: boolean;
  /** Open in read-only mode (default: false) */
  readonly?: boolean;
}

export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'normal',
  foreign_keys: true,
  busy_timeout: 5000,
  cache_size: -2000, // 2MB
  temp_store: 'memory',
};

// ============================================================================
// Schema Migration Types
// ============================================================================

export interface Migration {
  version: number;
  description: string;
  /** SQL to apply the migration */
  up: string;
  /** SQL to roll the migration back */
  down?: string;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions that were applied */
  applied: number[];
  success: boolean;
}
