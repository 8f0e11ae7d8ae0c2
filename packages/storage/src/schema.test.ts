import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode, hasErrorCode } from '@palimpsest/core';
import { NodeStorageBackend } from './node-backend.js';
import {
  CURRENT_SCHEMA_VERSION,
  initializeSchema,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  quoteIdentifier,
  isValidIdentifier,
  tableExists,
  validateSchema,
  getTableColumns,
  getTableIndexes,
} from './schema.js';

describe('schema', () => {
  let backend: NodeStorageBackend;

  beforeEach(() => {
    backend = new NodeStorageBackend({ path: ':memory:' });
  });

  afterEach(() => {
    backend.close();
  });

  it('should migrate an empty database to the current version', () => {
    expect(getPendingMigrations(backend)).toHaveLength(CURRENT_SCHEMA_VERSION);
    const result = initializeSchema(backend);
    expect(result.applied).toEqual([1, 2]);
    expect(isSchemaUpToDate(backend)).toBe(true);
    expect(validateSchema(backend)).toEqual({ valid: true, missingTables: [] });
  });

  it('should create the draft context table with its open-owner index', () => {
    initializeSchema(backend);
    expect(getTableColumns(backend, 'draft_contexts').map((c) => c.name)).toEqual([
      'id',
      'owner_principal',
      'title',
      'created_at',
      'is_frozen',
    ]);
    expect(getTableIndexes(backend, 'draft_contexts')).toEqual(['idx_draft_contexts_open_owner']);
  });

  it('should allow one open context per owner but any number of frozen ones', () => {
    initializeSchema(backend);
    const insert = (owner: string, frozen: number) =>
      backend.run(
        'INSERT INTO draft_contexts (owner_principal, title, created_at, is_frozen) VALUES (?, ?, ?, ?)',
        [owner, 't', '2025-01-01T00:00:00.000Z', frozen]
      );

    insert('agent-1', 1);
    insert('agent-1', 1);
    insert('agent-1', 0);
    let caught: unknown;
    try {
      insert('agent-1', 0);
    } catch (error) {
      caught = error;
    }
    expect(hasErrorCode(caught, ErrorCode.ALREADY_EXISTS)).toBe(true);
    insert('agent-2', 0);
  });

  it('should drop everything on reset', () => {
    initializeSchema(backend);
    resetSchema(backend);
    expect(backend.getSchemaVersion()).toBe(0);
    expect(tableExists(backend, 'draft_contexts')).toBe(false);
    expect(validateSchema(backend).missingTables).toEqual(['draft_contexts', 'collection_tables']);
  });

  describe('identifiers', () => {
    it('should quote plain identifiers', () => {
      expect(quoteIdentifier('tt_content')).toBe('"tt_content"');
    });

    it('should reject anything else', () => {
      expect(isValidIdentifier('pages; DROP TABLE x')).toBe(false);
      expect(isValidIdentifier('1pages')).toBe(false);
      expect(isValidIdentifier('sqlite_master')).toBe(false);
      expect(() => quoteIdentifier('a"b')).toThrow('Invalid identifier');
    });
  });
});
