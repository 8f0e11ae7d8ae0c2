/**
 * Collection Schema Types
 *
 * A collection is one table of the content repository. Its schema tells the
 * overlay which attributes exist, how to validate them and which fields carry
 * structural meaning (container, sorting, hidden flag, embedded children).
 */

import type { AttributeValue } from './attributes.js';

// ============================================================================
// Attribute Types
// ============================================================================

export const AttributeType = {
  /** Short string, usually with a maxLength */
  STRING: 'string',
  /** Long text */
  TEXT: 'text',
  INTEGER: 'integer',
  NUMBER: 'number',
  /** Stored as 0/1 */
  BOOLEAN: 'boolean',
  /** Stored as serialized JSON text */
  JSON: 'json',
  /** ISO 8601 timestamp string */
  DATETIME: 'datetime',
  /** Virtual attribute: rows of another collection linked back by a foreign field */
  EMBEDDED: 'embedded',
} as const;

export type AttributeType = (typeof AttributeType)[keyof typeof AttributeType];

export const ATTRIBUTE_TYPES: readonly AttributeType[] = Object.values(AttributeType);

// ============================================================================
// Definitions
// ============================================================================

/**
 * Target of an embedded attribute
 */
export interface EmbeddedTarget {
  /** Child collection */
  readonly collection: string;
  /** Attribute of the child collection holding the parent's logical id */
  readonly foreignField: string;
}

export interface AttributeDefinition {
  readonly name: string;
  readonly type: AttributeType;
  readonly required?: boolean;
  readonly maxLength?: number;
  readonly allowedValues?: readonly (string | number)[];
  readonly default?: AttributeValue;
  /** Only for `embedded` attributes */
  readonly embedded?: EmbeddedTarget;
}

export interface CollectionSchema {
  readonly name: string;
  readonly attributes: readonly AttributeDefinition[];
  /** Fields callers may never set, on top of the system columns */
  readonly identityFields: readonly string[];
  /** Link to the embedding parent; written only by the dependent-link reconciler */
  readonly parentLinkField?: string;
  /** Field naming the container (page, folder) the record sits in */
  readonly containerField?: string;
  /** Field used to order read results */
  readonly sortingField?: string;
  /** Truthy values hide the record from reads unless hidden records are requested */
  readonly hiddenField?: string;
}

// ============================================================================
// System Columns
// ============================================================================

/**
 * Version-control columns present on every collection table
 */
export const SystemColumn = {
  ID: 'id',
  ORIGIN_ID: 'origin_id',
  DRAFT_CONTEXT_ID: 'draft_context_id',
  VERSION_STATE: 'version_state',
  UPDATED_AT: 'updated_at',
} as const;

export type SystemColumn = (typeof SystemColumn)[keyof typeof SystemColumn];

export const SYSTEM_COLUMNS: readonly string[] = Object.values(SystemColumn);

// ============================================================================
// Helpers
// ============================================================================

export function findAttribute(
  schema: CollectionSchema,
  name: string
): AttributeDefinition | undefined {
  return schema.attributes.find((attribute) => attribute.name === name);
}

/**
 * Attributes backed by a column (everything except embedded ones)
 */
export function storedAttributes(schema: CollectionSchema): AttributeDefinition[] {
  return schema.attributes.filter((attribute) => attribute.type !== AttributeType.EMBEDDED);
}

export function embeddedAttributes(schema: CollectionSchema): AttributeDefinition[] {
  return schema.attributes.filter((attribute) => attribute.type === AttributeType.EMBEDDED);
}
