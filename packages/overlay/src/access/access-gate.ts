/**
 * Access Gate
 *
 * Decides whether a principal may perform an operation on a collection and
 * which attributes it may see and write. The record access API consults the
 * gate before anything touches storage.
 */

import { AttributeType, type CollectionSchema } from '@palimpsest/core';
import type { AccessConfig } from '../config/index.js';
import type { SchemaCatalog } from '../catalog/index.js';

// ============================================================================
// Types
// ============================================================================

export const AccessOperation = {
  READ: 'read',
  CREATE: 'create',
  UPDATE: 'update',
  DELETE: 'delete',
  MOVE: 'move',
} as const;

export type AccessOperation = (typeof AccessOperation)[keyof typeof AccessOperation];

export interface AccessDecision {
  readonly allowed: boolean;
  readonly reason?: string;
  /** Denied because the collection or principal may only read */
  readonly readOnly?: boolean;
  readonly readableAttributes: readonly string[];
  readonly writableAttributes: readonly string[];
}

export interface AccessGate {
  check(principal: string, collection: string, operation: AccessOperation): AccessDecision;
}

export function isWriteOperation(operation: AccessOperation): boolean {
  return operation !== AccessOperation.READ;
}

// ============================================================================
// ConfiguredAccessGate
// ============================================================================

/**
 * Gate driven by the `access` configuration section
 */
export class ConfiguredAccessGate implements AccessGate {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly config: AccessConfig
  ) {}

  check(principal: string, collection: string, operation: AccessOperation): AccessDecision {
    const schema = this.catalog.require(collection);
    const readableAttributes = this.readableAttributes(schema);
    const writableAttributes = this.writableAttributes(schema, readableAttributes);
    const deny = (reason: string, readOnly = false): AccessDecision => ({
      allowed: false,
      reason,
      readOnly,
      readableAttributes,
      writableAttributes,
    });

    if (this.config.restrictedCollections.includes(collection)) {
      return deny('collection is restricted');
    }

    const rules = this.config.principals[principal];
    if (rules?.collections && !rules.collections.includes(collection)) {
      return deny('collection is not available to this principal');
    }

    if (isWriteOperation(operation)) {
      if (this.config.readOnlyCollections.includes(collection)) {
        return deny('collection is read-only', true);
      }
      if (rules?.readOnly) {
        return deny('principal may only read', true);
      }
    }

    return { allowed: true, readableAttributes, writableAttributes };
  }

  private readableAttributes(schema: CollectionSchema): string[] {
    const excluded = this.config.excludedAttributes[schema.name] ?? [];
    return schema.attributes.map((a) => a.name).filter((name) => !excluded.includes(name));
  }

  /**
   * Readable stored attributes, minus the parent link which only the
   * dependent-link reconciler writes
   */
  private writableAttributes(schema: CollectionSchema, readable: readonly string[]): string[] {
    return schema.attributes
      .filter((a) => a.type !== AttributeType.EMBEDDED)
      .map((a) => a.name)
      .filter((name) => readable.includes(name) && name !== schema.parentLinkField);
  }
}
