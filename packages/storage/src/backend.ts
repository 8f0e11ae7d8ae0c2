/**
 * Storage Backend Interface
 *
 * Synchronous SQL access used by the overlay. The async surface lives one
 * layer up; everything here runs inside the caller's call stack so a whole
 * routed write fits in one transaction.
 */

import type {
  Row,
  SqlValue,
  MutationResult,
  Transaction,
  TransactionOptions,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

// ============================================================================
// Storage Backend Interface
// ============================================================================

export interface StorageBackend {
  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  readonly isOpen: boolean;
  readonly path: string;
  /** True when the connection was opened read-only */
  readonly readonly: boolean;
  close(): void;

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  /** Execute one or more statements without parameters */
  exec(sql: string): void;
  query<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T[];
  queryOne<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T | undefined;
  run(sql: string, params?: readonly SqlValue[]): MutationResult;

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  /**
   * Runs `fn` in a transaction. A call made while another transaction is
   * open becomes a savepoint: its failure rolls back only its own work
   * before the error propagates.
   */
  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T;
  readonly inTransaction: boolean;

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number;
  setSchemaVersion(version: number): void;
  migrate(migrations: readonly Migration[]): MigrationResult;

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  checkIntegrity(): boolean;
  getStats(): StorageStats;
}

// ============================================================================
// Storage Statistics
// ============================================================================

export interface StorageStats {
  /** Database file size in bytes (0 for in-memory) */
  fileSize: number;
  tableCount: number;
  indexCount: number;
  schemaVersion: number;
  walMode: boolean;
  readonly: boolean;
}

export type StorageFactory = (config: StorageConfig) => StorageBackend;
