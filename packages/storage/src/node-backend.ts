/**
 * Node.js SQLite Backend Implementation
 *
 * Implements the StorageBackend interface using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { statSync } from 'node:fs';
import type { StorageBackend, StorageStats, StorageFactory } from './backend.js';
import type {
  Row,
  SqlValue,
  MutationResult,
  Transaction,
  TransactionOptions,
  IsolationLevel,
  StorageConfig,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { connectionError, mapStorageError, migrationError } from './errors.js';

// ============================================================================
// Transaction Implementation
// ============================================================================

/**
 * Transaction context handed to transaction callbacks
 */
class NodeTransaction implements Transaction {
  constructor(
    private readonly backend: NodeStorageBackend,
    readonly depth: number
  ) {}

  exec(sql: string): void {
    this.backend.exec(sql);
  }

  query<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T[] {
    return this.backend.query<T>(sql, params);
  }

  queryOne<T extends Row = Row>(sql: string, params?: readonly SqlValue[]): T | undefined {
    return this.backend.queryOne<T>(sql, params);
  }

  run(sql: string, params?: readonly SqlValue[]): MutationResult {
    return this.backend.run(sql, params);
  }
}

// ============================================================================
// Node.js Storage Backend
// ============================================================================

/**
 * SQLite storage backend using better-sqlite3
 */
export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private readonly _path: string;
  private readonly _readonly: boolean;
  private depth = 0;

  constructor(config: StorageConfig) {
    this._path = config.path;
    this._readonly = config.readonly ?? false;

    try {
      this.db = new Database(config.path, {
        readonly: this._readonly,
        fileMustExist: config.create === false || this._readonly,
      });
      this.applyPragmas(this.db, config.pragmas);
    } catch (error) {
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(db: DatabaseType, pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    // Changing the journal mode writes to the file header
    if (!this._readonly) {
      db.pragma(`journal_mode = ${settings.journal_mode}`);
    }
    db.pragma(`synchronous = ${settings.synchronous}`);
    db.pragma(`foreign_keys = ${settings.foreign_keys ? 'ON' : 'OFF'}`);
    db.pragma(`busy_timeout = ${settings.busy_timeout}`);
    db.pragma(`cache_size = ${settings.cache_size}`);
    const tempStoreValue = settings.temp_store === 'memory' ? 2 : settings.temp_store === 'file' ? 1 : 0;
    db.pragma(`temp_store = ${tempStoreValue}`);
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this._path;
  }

  get readonly(): boolean {
    return this._readonly;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw mapStorageError(new Error('Database is closed'), { operation: 'open' });
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  exec(sql: string): void {
    try {
      this.ensureOpen().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): T[] {
    try {
      return this.ensureOpen().prepare<SqlValue[], T>(sql).all(...params);
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params: readonly SqlValue[] = []): T | undefined {
    try {
      return this.ensureOpen().prepare<SqlValue[], T>(sql).get(...params);
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params: readonly SqlValue[] = []): MutationResult {
    try {
      const result = this.ensureOpen().prepare<SqlValue[]>(sql).run(...params);
      return {
        changes: result.changes,
        lastInsertRowid: result.lastInsertRowid,
      };
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T {
    const db = this.ensureOpen();

    if (this.depth > 0) {
      return this.savepoint(db, fn);
    }

    this.depth = 1;
    try {
      db.exec(this.getBeginSql(options?.isolation ?? 'deferred'));
      const result = fn(new NodeTransaction(this, 1));
      db.exec('COMMIT');
      return result;
    } catch (error) {
      if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth = 0;
    }
  }

  private savepoint<T>(db: DatabaseType, fn: (tx: Transaction) => T): T {
    const depth = this.depth + 1;
    const name = `sp_${depth}`;

    db.exec(`SAVEPOINT ${name}`);
    this.depth = depth;
    try {
      const result = fn(new NodeTransaction(this, depth));
      db.exec(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
      db.exec(`RELEASE SAVEPOINT ${name}`);
      throw mapStorageError(error, { operation: 'savepoint' });
    } finally {
      this.depth = depth - 1;
    }
  }

  private getBeginSql(isolation: IsolationLevel): string {
    switch (isolation) {
      case 'immediate':
        return 'BEGIN IMMEDIATE';
      case 'exclusive':
        return 'BEGIN EXCLUSIVE';
      case 'deferred':
        return 'BEGIN DEFERRED';
    }
  }

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number {
    const version = this.ensureOpen().pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  setSchemaVersion(version: number): void {
    if (!Number.isInteger(version) || version < 0) {
      throw migrationError(version, new Error('Schema version must be a non-negative integer'));
    }
    this.ensureOpen().pragma(`user_version = ${version}`);
  }

  migrate(migrations: readonly Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter((m) => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return { fromVersion, toVersion: fromVersion, applied: [], success: true };
    }

    const applied: number[] = [];
    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getSchemaVersion(),
      applied,
      success: true,
    };
  }

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  checkIntegrity(): boolean {
    try {
      return this.ensureOpen().pragma('integrity_check', { simple: true }) === 'ok';
    } catch (error) {
      throw mapStorageError(error, { operation: 'checkIntegrity' });
    }
  }

  getStats(): StorageStats {
    const db = this.ensureOpen();

    let fileSize = 0;
    if (this._path !== ':memory:') {
      try {
        fileSize = statSync(this._path).size;
      } catch (error) {
        throw mapStorageError(error, { operation: 'getStats' });
      }
    }

    const countOf = (type: 'table' | 'index'): number => {
      const row = db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM sqlite_master WHERE type = ?')
        .get(type);
      return row?.count ?? 0;
    };

    const journalMode = db.pragma('journal_mode', { simple: true });

    return {
      fileSize,
      tableCount: countOf('table'),
      indexCount: countOf('index'),
      schemaVersion: this.getSchemaVersion(),
      walMode: typeof journalMode === 'string' && journalMode.toLowerCase() === 'wal',
      readonly: this._readonly,
    };
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export const createNodeStorage: StorageFactory = (config: StorageConfig): StorageBackend => {
  return new NodeStorageBackend(config);
};
