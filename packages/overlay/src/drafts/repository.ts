/**
 * Draft Context Repository
 *
 * Row access for the draft_contexts table.
 */

import type { DraftContext, DraftContextId } from '@palimpsest/core';
import type { StorageBackend } from '@palimpsest/storage';

interface DraftContextRow {
  [key: string]: unknown;
  id: number;
  owner_principal: string;
  title: string;
  created_at: string;
  is_frozen: number;
}

function toDraftContext(row: DraftContextRow): DraftContext {
  return {
    id: row.id,
    ownerPrincipal: row.owner_principal,
    title: row.title,
    createdAt: row.created_at,
    isFrozen: row.is_frozen === 1,
  };
}

export class DraftContextRepository {
  constructor(protected readonly backend: StorageBackend) {}

  /**
   * Most recently created non-frozen context of a principal
   */
  findOpen(principal: string): DraftContext | undefined {
    const row = this.backend.queryOne<DraftContextRow>(
      `SELECT * FROM draft_contexts
       WHERE owner_principal = ? AND is_frozen = 0
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [principal]
    );
    return row ? toDraftContext(row) : undefined;
  }

  /**
   * Inserts an open context. A second open context for the same principal
   * violates the partial unique index and fails with ALREADY_EXISTS.
   */
  insert(principal: string, title: string, createdAt: string): DraftContext {
    const result = this.backend.run(
      'INSERT INTO draft_contexts (owner_principal, title, created_at, is_frozen) VALUES (?, ?, ?, 0)',
      [principal, title, createdAt]
    );
    return {
      id: Number(result.lastInsertRowid),
      ownerPrincipal: principal,
      title,
      createdAt,
      isFrozen: false,
    };
  }

  getById(id: DraftContextId): DraftContext | undefined {
    const row = this.backend.queryOne<DraftContextRow>('SELECT * FROM draft_contexts WHERE id = ?', [id]);
    return row ? toDraftContext(row) : undefined;
  }

  listByOwner(principal: string): DraftContext[] {
    return this.backend
      .query<DraftContextRow>('SELECT * FROM draft_contexts WHERE owner_principal = ? ORDER BY id', [principal])
      .map(toDraftContext);
  }

  /**
   * Returns false when the context does not exist
   */
  freeze(id: DraftContextId): boolean {
    return this.backend.run('UPDATE draft_contexts SET is_frozen = 1 WHERE id = ?', [id]).changes === 1;
  }
}
