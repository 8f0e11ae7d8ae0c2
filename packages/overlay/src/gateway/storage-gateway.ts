/**
 * Storage Gateway
 *
 * Row-level access to collection tables. Knows nothing about overlays:
 * callers pass the version-control columns explicitly and get physical
 * versions back.
 */

import {
  SystemColumn,
  SYSTEM_COLUMNS,
  findAttribute,
  storedAttributes,
  unknownAttribute,
  type Attributes,
  type CollectionSchema,
  type DraftContextId,
  type PhysicalId,
  type PhysicalVersion,
  type VersionState,
} from '@palimpsest/core';
import { quoteIdentifier, type Row, type SqlValue, type StorageBackend } from '@palimpsest/storage';
import type { SchemaCatalog } from '../catalog/index.js';
import { compileOrderBy, compilePredicate, type OrderBy, type Predicate } from './predicate.js';
import {
  decodeAttribute,
  encodeAttribute,
  readIntegerColumn,
  readStateColumn,
  readTextColumn,
} from './codec.js';

// ============================================================================
// Types
// ============================================================================

export interface SelectOptions {
  orderBy?: readonly OrderBy[];
  limit?: number;
  offset?: number;
}

export interface VersionInsert {
  originId: PhysicalId;
  draftContextId: DraftContextId;
  state: VersionState;
  attributes: Attributes;
}

export interface VersionUpdate {
  state?: VersionState;
  attributes?: Attributes;
}

export interface StorageGateway {
  select(collection: string, predicate?: Predicate, options?: SelectOptions): PhysicalVersion[];
  /** Returns the physical id of the new row */
  insert(collection: string, version: VersionInsert): PhysicalId;
  /** Returns the number of rows changed (0 or 1) */
  update(collection: string, physicalId: PhysicalId, patch: VersionUpdate): number;
  delete(collection: string, physicalId: PhysicalId): number;
  /** Nested calls become savepoints of the outer transaction */
  runInTransaction<T>(fn: () => T): T;
}

export interface SqliteStorageGatewayOptions {
  /** Clock used for updated_at; defaults to the system clock */
  now?: () => Date;
}

// ============================================================================
// SqliteStorageGateway
// ============================================================================

export class SqliteStorageGateway implements StorageGateway {
  private readonly now: () => Date;
  private readonly columns = new Map<string, ReadonlySet<string>>();
  private lastTimestamp = 0;

  constructor(
    private readonly backend: StorageBackend,
    private readonly catalog: SchemaCatalog,
    options: SqliteStorageGatewayOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  select(collection: string, predicate?: Predicate, options: SelectOptions = {}): PhysicalVersion[] {
    const schema = this.catalog.require(collection);
    const columns = this.columnsOf(schema);
    const params: SqlValue[] = [];

    let sql = `SELECT * FROM ${quoteIdentifier(schema.name)}`;
    if (predicate) {
      const where = compilePredicate(predicate, columns, schema.name);
      sql += ` WHERE ${where.sql}`;
      params.push(...where.params);
    }
    sql += compileOrderBy(options.orderBy ?? [{ column: SystemColumn.ID, direction: 'asc' }], columns);
    if (options.limit !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      params.push(options.limit, options.offset ?? 0);
    }

    return this.backend.query(sql, params).map((row) => this.toVersion(schema, row));
  }

  insert(collection: string, version: VersionInsert): PhysicalId {
    const schema = this.catalog.require(collection);
    const names: string[] = [
      SystemColumn.ORIGIN_ID,
      SystemColumn.DRAFT_CONTEXT_ID,
      SystemColumn.VERSION_STATE,
      SystemColumn.UPDATED_AT,
    ];
    const values: SqlValue[] = [version.originId, version.draftContextId, version.state, this.timestamp()];

    for (const [name, value] of this.encode(schema, version.attributes)) {
      names.push(name);
      values.push(value);
    }

    const result = this.backend.run(
      `INSERT INTO ${quoteIdentifier(schema.name)} (${names.map(quoteIdentifier).join(', ')}) VALUES (${names.map(() => '?').join(', ')})`,
      values
    );
    return Number(result.lastInsertRowid);
  }

  update(collection: string, physicalId: PhysicalId, patch: VersionUpdate): number {
    const schema = this.catalog.require(collection);
    const assignments: string[] = [`${SystemColumn.UPDATED_AT} = ?`];
    const values: SqlValue[] = [this.timestamp()];

    if (patch.state !== undefined) {
      assignments.push(`${SystemColumn.VERSION_STATE} = ?`);
      values.push(patch.state);
    }
    for (const [name, value] of this.encode(schema, patch.attributes ?? {})) {
      assignments.push(`${quoteIdentifier(name)} = ?`);
      values.push(value);
    }

    const result = this.backend.run(
      `UPDATE ${quoteIdentifier(schema.name)} SET ${assignments.join(', ')} WHERE ${SystemColumn.ID} = ?`,
      [...values, physicalId]
    );
    return result.changes;
  }

  delete(collection: string, physicalId: PhysicalId): number {
    const schema = this.catalog.require(collection);
    return this.backend.run(`DELETE FROM ${quoteIdentifier(schema.name)} WHERE ${SystemColumn.ID} = ?`, [
      physicalId,
    ]).changes;
  }

  runInTransaction<T>(fn: () => T): T {
    return this.backend.transaction(() => fn());
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private columnsOf(schema: CollectionSchema): ReadonlySet<string> {
    let columns = this.columns.get(schema.name);
    if (!columns) {
      columns = new Set([...SYSTEM_COLUMNS, ...storedAttributes(schema).map((a) => a.name)]);
      this.columns.set(schema.name, columns);
    }
    return columns;
  }

  private encode(schema: CollectionSchema, attributes: Attributes): [string, SqlValue][] {
    const entries: [string, SqlValue][] = [];
    const unknown: string[] = [];
    for (const [name, value] of Object.entries(attributes)) {
      const definition = findAttribute(schema, name);
      if (!definition || !this.columnsOf(schema).has(name) || SYSTEM_COLUMNS.includes(name)) {
        unknown.push(name);
        continue;
      }
      entries.push([name, encodeAttribute(definition, value)]);
    }
    if (unknown.length > 0) {
      throw unknownAttribute(schema.name, unknown);
    }
    return entries;
  }

  private toVersion(schema: CollectionSchema, row: Row): PhysicalVersion {
    const attributes: Attributes = {};
    for (const definition of storedAttributes(schema)) {
      attributes[definition.name] = decodeAttribute(definition, row[definition.name]);
    }
    return {
      physicalId: readIntegerColumn(row, SystemColumn.ID),
      collection: schema.name,
      originId: readIntegerColumn(row, SystemColumn.ORIGIN_ID),
      draftContextId: readIntegerColumn(row, SystemColumn.DRAFT_CONTEXT_ID),
      state: readStateColumn(row, SystemColumn.VERSION_STATE),
      updatedAt: readTextColumn(row, SystemColumn.UPDATED_AT),
      attributes,
    };
  }

  /**
   * ISO timestamp for updated_at. Timestamps handed out by one gateway are
   * strictly increasing, so two writes in the same millisecond still differ.
   */
  private timestamp(): string {
    const next = Math.max(this.now().getTime(), this.lastTimestamp + 1);
    this.lastTimestamp = next;
    return new Date(next).toISOString();
  }
}
