/**
 * Schema Management
 *
 * Migrations for the tables the overlay owns. Collection tables are not
 * migrated here; they follow the schema catalog and are created on demand.
 */

import { invalidInput } from '@palimpsest/core';
import type { StorageBackend } from './backend.js';
import type { Migration, MigrationResult } from './types.js';

// ============================================================================
// Migrations
// ============================================================================

export const CURRENT_SCHEMA_VERSION = 2;

/**
 * Migration 1: draft contexts
 *
 * At most one non-frozen context per principal; the partial unique index is
 * what makes concurrent context creation converge on a single row.
 */
const migration001: Migration = {
  version: 1,
  description: 'Draft contexts with one open context per principal',
  up: `
CREATE TABLE draft_contexts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner_principal TEXT NOT NULL,
    title TEXT NOT NULL,
    created_at TEXT NOT NULL,
    is_frozen INTEGER NOT NULL DEFAULT 0,
    CHECK (is_frozen IN (0, 1)),
    CHECK (length(owner_principal) > 0)
);

CREATE UNIQUE INDEX idx_draft_contexts_open_owner
    ON draft_contexts(owner_principal) WHERE is_frozen = 0;
`,
  down: `
DROP INDEX IF EXISTS idx_draft_contexts_open_owner;
DROP TABLE IF EXISTS draft_contexts;
`,
};

/**
 * Migration 2: registry of collection tables created from the catalog
 */
const migration002: Migration = {
  version: 2,
  description: 'Collection table registry',
  up: `
CREATE TABLE collection_tables (
    name TEXT PRIMARY KEY,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);
`,
  down: `
DROP TABLE IF EXISTS collection_tables;
`,
};

export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

// ============================================================================
// Schema Functions
// ============================================================================

/**
 * Applies all pending migrations
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate(MIGRATIONS);
}

export function isSchemaUpToDate(backend: StorageBackend): boolean {
  return backend.getSchemaVersion() === CURRENT_SCHEMA_VERSION;
}

export function getPendingMigrations(backend: StorageBackend): Migration[] {
  const currentVersion = backend.getSchemaVersion();
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

/**
 * Runs the down scripts newest first and resets the version.
 * Drops data; meant for tests.
 */
export function resetSchema(backend: StorageBackend): void {
  for (const migration of [...MIGRATIONS].reverse()) {
    if (migration.down) {
      backend.exec(migration.down);
    }
  }
  backend.setSchemaVersion(0);
}

// ============================================================================
// Identifiers
// ============================================================================

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !name.toLowerCase().startsWith('sqlite_');
}

/**
 * Quotes a table or column name for interpolation into SQL.
 * Names must be plain identifiers; anything else is rejected.
 */
export function quoteIdentifier(name: string): string {
  if (!isValidIdentifier(name)) {
    throw invalidInput('identifier', name, 'letters, digits and underscores, not starting with a digit');
  }
  return `"${name}"`;
}

// ============================================================================
// Introspection
// ============================================================================

export const EXPECTED_TABLES = ['draft_contexts', 'collection_tables'] as const;

export function tableExists(backend: StorageBackend, tableName: string): boolean {
  const row = backend.queryOne<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
    [tableName]
  );
  return row !== undefined;
}

/**
 * Checks that every table the migrations create exists
 */
export function validateSchema(backend: StorageBackend): {
  valid: boolean;
  missingTables: string[];
} {
  const missingTables = EXPECTED_TABLES.filter((t) => !tableExists(backend, t));
  return {
    valid: missingTables.length === 0,
    missingTables,
  };
}

export interface ColumnInfo {
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}

export function getTableColumns(backend: StorageBackend, tableName: string): ColumnInfo[] {
  const rows = backend.query<{
    name: string;
    type: string;
    notnull: number;
    pk: number;
  }>(`PRAGMA table_info(${quoteIdentifier(tableName)})`);

  return rows.map((r) => ({
    name: r.name,
    type: r.type,
    notnull: r.notnull === 1,
    pk: r.pk > 0,
  }));
}

export function getTableIndexes(backend: StorageBackend, tableName: string): string[] {
  const rows = backend.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    [tableName]
  );
  return rows.map((r) => r.name);
}
