/**
 * Overlay Reader
 *
 * Runs overlay queries and reduces their rows to one effective version per
 * logical id.
 */

import {
  createLogger,
  logicalIdOf,
  type AttributeValue,
  type Attributes,
  type CollectionSchema,
  type DraftContextId,
  type EmbeddedTarget,
  type LogicalId,
  type PhysicalVersion,
} from '@palimpsest/core';
import type { SchemaCatalog } from '../catalog/index.js';
import type { StorageGateway } from '../gateway/index.js';
import type { QueryFilterBuilder } from './query-filter-builder.js';
import { sanitizeReadError } from './read-errors.js';

const logger = createLogger('overlay-reader');

export interface ListFilter {
  /** Only records whose container field equals this value */
  container?: AttributeValue;
  /** Include records whose hidden field is set */
  includeHidden?: boolean;
  /** Only records whose attributes equal every value given */
  where?: Attributes;
}

/**
 * Keeps the first row per logical id; the overlay order puts draft rows first
 */
export function dedupeByLogicalId(rows: readonly PhysicalVersion[]): PhysicalVersion[] {
  const seen = new Set<LogicalId>();
  const result: PhysicalVersion[] = [];
  for (const row of rows) {
    const logicalId = logicalIdOf(row);
    if (!seen.has(logicalId)) {
      seen.add(logicalId);
      result.push(row);
    }
  }
  return result;
}

/**
 * Equality for attribute filters; absent values compare as null and JSON
 * values by their serialized form
 */
export function attributeEquals(left: AttributeValue | undefined, right: AttributeValue): boolean {
  const value = left ?? null;
  if (typeof value === 'object' && value !== null && typeof right === 'object' && right !== null) {
    return JSON.stringify(value) === JSON.stringify(right);
  }
  return value === right;
}

function isTruthy(value: AttributeValue | undefined): boolean {
  return value === true || (typeof value === 'number' && value !== 0);
}

function compareValues(a: AttributeValue | undefined, b: AttributeValue | undefined): number {
  const left = a ?? null;
  const right = b ?? null;
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return -1;
  }
  if (right === null) {
    return 1;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return String(left).localeCompare(String(right));
}

export class OverlayReader {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly builder: QueryFilterBuilder,
    private readonly catalog: SchemaCatalog
  ) {}

  effectiveVersions(collection: string, draftContextId: DraftContextId, logicalId?: LogicalId): PhysicalVersion[] {
    const query = this.builder.buildPredicate(collection, draftContextId, logicalId);
    try {
      const rows = this.gateway.select(collection, query.predicate, { orderBy: query.orderBy });
      return dedupeByLogicalId(rows);
    } catch (error) {
      throw sanitizeReadError(collection, error, logger);
    }
  }

  effectiveVersion(
    collection: string,
    draftContextId: DraftContextId,
    logicalId: LogicalId
  ): PhysicalVersion | undefined {
    return this.effectiveVersions(collection, draftContextId, logicalId)[0];
  }

  /**
   * Effective versions after container, hidden and attribute filtering, in
   * the collection's sort order
   */
  list(collection: string, draftContextId: DraftContextId, filter: ListFilter = {}): PhysicalVersion[] {
    const schema = this.catalog.require(collection);
    let versions = this.effectiveVersions(collection, draftContextId);

    const { containerField, hiddenField } = schema;
    if (filter.container !== undefined && containerField !== undefined) {
      versions = versions.filter((v) => v.attributes[containerField] === filter.container);
    }
    if (!filter.includeHidden && hiddenField !== undefined) {
      versions = versions.filter((v) => !isTruthy(v.attributes[hiddenField]));
    }
    const where = Object.entries(filter.where ?? {});
    if (where.length > 0) {
      versions = versions.filter((v) => where.every(([name, value]) => attributeEquals(v.attributes[name], value)));
    }
    return this.sort(schema, versions);
  }

  /**
   * Effective child versions linked to a parent through an embedded attribute
   */
  children(target: EmbeddedTarget, parentId: LogicalId, draftContextId: DraftContextId): PhysicalVersion[] {
    const schema = this.catalog.require(target.collection);
    const linked = this.effectiveVersions(target.collection, draftContextId).filter(
      (v) => v.attributes[target.foreignField] === parentId
    );
    return this.sort(schema, linked);
  }

  private sort(schema: CollectionSchema, versions: PhysicalVersion[]): PhysicalVersion[] {
    const { sortingField } = schema;
    return [...versions].sort((a, b) => {
      const bySorting =
        sortingField !== undefined ? compareValues(a.attributes[sortingField], b.attributes[sortingField]) : 0;
      return bySorting !== 0 ? bySorting : logicalIdOf(a) - logicalIdOf(b);
    });
  }
}
