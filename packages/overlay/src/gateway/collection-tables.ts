/**
 * Collection Tables
 *
 * One table per catalog collection: the version-control system columns
 * followed by one column per stored attribute. Attributes added to the
 * catalog later are added as columns; columns are never dropped.
 */

import {
  AttributeType,
  VERSION_STATES,
  VersionState,
  createLogger,
  storedAttributes,
  type AttributeDefinition,
  type CollectionSchema,
} from '@palimpsest/core';
import {
  quoteIdentifier,
  tableExists,
  getTableColumns,
  type StorageBackend,
} from '@palimpsest/storage';
import type { SchemaCatalog } from '../catalog/index.js';

const logger = createLogger('collection-tables');

export interface CollectionTableResult {
  /** Tables created by this call */
  created: string[];
  /** Columns added to existing tables, as `table.column` */
  addedColumns: string[];
}

export function columnTypeOf(attribute: AttributeDefinition): 'TEXT' | 'INTEGER' | 'REAL' {
  switch (attribute.type) {
    case AttributeType.INTEGER:
    case AttributeType.BOOLEAN:
      return 'INTEGER';
    case AttributeType.NUMBER:
      return 'REAL';
    case AttributeType.STRING:
    case AttributeType.TEXT:
    case AttributeType.DATETIME:
    case AttributeType.JSON:
    case AttributeType.EMBEDDED:
      return 'TEXT';
  }
}

function createTableSql(schema: CollectionSchema): string {
  const table = quoteIdentifier(schema.name);
  const states = VERSION_STATES.map((state) => `'${state}'`).join(', ');
  const attributeColumns = storedAttributes(schema).map(
    (attribute) => `    ${quoteIdentifier(attribute.name)} ${columnTypeOf(attribute)},`
  );

  return `
CREATE TABLE ${table} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    origin_id INTEGER NOT NULL DEFAULT 0,
    draft_context_id INTEGER NOT NULL DEFAULT 0,
    version_state TEXT NOT NULL DEFAULT '${VersionState.LIVE}',
    updated_at TEXT NOT NULL,
${attributeColumns.join('\n')}
    CHECK (version_state IN (${states})),
    CHECK ((version_state = '${VersionState.LIVE}') = (draft_context_id = 0)),
    CHECK ((origin_id = 0) = (version_state IN ('${VersionState.LIVE}', '${VersionState.NEW}')))
);

CREATE UNIQUE INDEX ${quoteIdentifier(`idx_${schema.name}_origin_context`)}
    ON ${table}(origin_id, draft_context_id) WHERE origin_id > 0;
CREATE INDEX ${quoteIdentifier(`idx_${schema.name}_context_state`)}
    ON ${table}(draft_context_id, version_state);
`;
}

/**
 * Creates the table of one collection, or adds the columns it lacks
 */
export function ensureCollectionTable(
  backend: StorageBackend,
  schema: CollectionSchema,
  now: string = new Date().toISOString()
): CollectionTableResult {
  const result: CollectionTableResult = { created: [], addedColumns: [] };

  backend.transaction(() => {
    if (!tableExists(backend, schema.name)) {
      backend.exec(createTableSql(schema));
      backend.run('INSERT INTO collection_tables (name, created_at, updated_at) VALUES (?, ?, ?)', [
        schema.name,
        now,
        now,
      ]);
      result.created.push(schema.name);
      return;
    }

    const existing = new Set(getTableColumns(backend, schema.name).map((c) => c.name));
    for (const attribute of storedAttributes(schema)) {
      if (existing.has(attribute.name)) {
        continue;
      }
      backend.exec(
        `ALTER TABLE ${quoteIdentifier(schema.name)} ADD COLUMN ${quoteIdentifier(attribute.name)} ${columnTypeOf(attribute)}`
      );
      result.addedColumns.push(`${schema.name}.${attribute.name}`);
    }
    if (result.addedColumns.length > 0) {
      backend.run(
        `INSERT INTO collection_tables (name, created_at, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET updated_at = excluded.updated_at`,
        [schema.name, now, now]
      );
    }
  });

  return result;
}

/**
 * Brings the table of every catalog collection up to date in one transaction
 */
export function ensureCollectionTables(
  backend: StorageBackend,
  catalog: SchemaCatalog,
  now: string = new Date().toISOString()
): CollectionTableResult {
  const result: CollectionTableResult = { created: [], addedColumns: [] };

  backend.transaction(() => {
    for (const schema of catalog.list()) {
      const tableResult = ensureCollectionTable(backend, schema, now);
      result.created.push(...tableResult.created);
      result.addedColumns.push(...tableResult.addedColumns);
    }
  });

  if (result.created.length > 0) {
    logger.info(`Created collection tables: ${result.created.join(', ')}`);
  }
  if (result.addedColumns.length > 0) {
    logger.info(`Added columns: ${result.addedColumns.join(', ')}`);
  }
  return result;
}
