/**
 * Write Router
 *
 * Routes create, update, delete and move requests keyed by logical id into
 * the active draft context. Live rows and other contexts' rows are never
 * written. Each operation runs in one storage transaction and returns the
 * logical id.
 */

import {
  AttributeType,
  ErrorCode,
  SYSTEM_COLUMNS,
  VersionState,
  accessDenied,
  concurrentModification,
  createLogger,
  embeddedAttributes,
  findAttribute,
  identityFieldRejected,
  invalidAttribute,
  invalidId,
  invalidInput,
  isAccessError,
  isNotFoundError,
  isPalimpsestError,
  isValidRecordId,
  isValidationError,
  missingRequiredField,
  recordNotFound,
  storedAttributes,
  unknownAttribute,
  writeFailed,
  type AttributeValue,
  type Attributes,
  type CollectionSchema,
  type DraftContextId,
  type LogicalId,
  type PalimpsestError,
  type PhysicalVersion,
} from '@palimpsest/core';
import { checkAttributeValue, type SchemaCatalog } from '../catalog/index.js';
import type { StorageGateway } from '../gateway/index.js';
import { requireDraftContext, type IdentityResolver } from './identity-resolver.js';
import type { OverlayReader } from './overlay-reader.js';

const logger = createLogger('write-router');

// ============================================================================
// Types
// ============================================================================

export interface WriteContext {
  readonly draftContextId: DraftContextId;
  /** Acting principal, used in access errors */
  readonly principal: string;
  /**
   * Attributes the caller may write. Defaults to every stored attribute
   * except the collection's parent link field.
   */
  readonly writableAttributes?: readonly string[];
}

export interface UpdateOptions {
  /**
   * updatedAt the caller last read. When given and the effective version
   * changed since, the update fails with CONCURRENT_MODIFICATION.
   */
  readonly expectedUpdatedAt?: string;
}

type InputMode = 'create' | 'update';

/** Errors that describe the request rather than a storage failure */
const PASS_THROUGH_CODES: ReadonlySet<string> = new Set([
  ErrorCode.CONCURRENT_MODIFICATION,
  ErrorCode.INVALID_PARENT,
  ErrorCode.WRITE_FAILED,
  ErrorCode.CONTEXT_UNAVAILABLE,
]);

function isDomainError(error: unknown): error is PalimpsestError {
  return (
    isNotFoundError(error) ||
    isValidationError(error) ||
    isAccessError(error) ||
    (isPalimpsestError(error) && PASS_THROUGH_CODES.has(error.code))
  );
}

export function requireLogicalId(logicalId: LogicalId): void {
  if (!isValidRecordId(logicalId)) {
    throw invalidId('logicalId', logicalId);
  }
}

// ============================================================================
// WriteRouter
// ============================================================================

export class WriteRouter {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly catalog: SchemaCatalog,
    private readonly resolver: IdentityResolver,
    private readonly reader: OverlayReader
  ) {}

  create(collection: string, data: Attributes, context: WriteContext): LogicalId {
    const schema = this.catalog.require(collection);
    requireDraftContext(context.draftContextId);
    const attributes = this.validateInput(schema, data, context, 'create');

    const logicalId = this.route('create', collection, () =>
      this.gateway.insert(collection, {
        originId: 0,
        draftContextId: context.draftContextId,
        state: VersionState.NEW,
        attributes,
      })
    );
    logger.debug(`create ${collection}[${logicalId}] in draft ${context.draftContextId}`);
    return logicalId;
  }

  update(
    collection: string,
    logicalId: LogicalId,
    patch: Attributes,
    context: WriteContext,
    options: UpdateOptions = {}
  ): LogicalId {
    const schema = this.catalog.require(collection);
    requireLogicalId(logicalId);
    requireDraftContext(context.draftContextId);
    if (Object.keys(patch).length === 0) {
      throw invalidInput('patch', patch, 'at least one attribute');
    }
    const attributes = this.validateInput(schema, patch, context, 'update');

    this.route('update', collection, () => {
      const effective = this.requireEffective(collection, logicalId, context.draftContextId);
      if (options.expectedUpdatedAt !== undefined && options.expectedUpdatedAt !== effective.updatedAt) {
        throw concurrentModification(collection, logicalId, options.expectedUpdatedAt, effective.updatedAt, {
          draftContextId: context.draftContextId,
        });
      }
      const draft = this.resolver.ensureDraftVersion(effective, context.draftContextId);
      this.gateway.update(collection, draft.physicalId, { attributes });
    });
    logger.debug(`update ${collection}[${logicalId}] in draft ${context.draftContextId}`);
    return logicalId;
  }

  /**
   * Deletes the record and its embedded children inside the context
   */
  delete(collection: string, logicalId: LogicalId, context: WriteContext): void {
    const schema = this.catalog.require(collection);
    requireLogicalId(logicalId);
    requireDraftContext(context.draftContextId);

    this.route('delete', collection, () => {
      this.deleteRecord(schema, logicalId, context.draftContextId);
    });
    logger.debug(`delete ${collection}[${logicalId}] in draft ${context.draftContextId}`);
  }

  /**
   * Puts the record into another container
   */
  move(collection: string, logicalId: LogicalId, container: AttributeValue, context: WriteContext): LogicalId {
    const schema = this.catalog.require(collection);
    requireLogicalId(logicalId);
    requireDraftContext(context.draftContextId);

    const containerField = schema.containerField;
    if (containerField === undefined) {
      throw invalidInput('collection', collection, 'a collection with a container field');
    }
    const attributes = this.validateInput(schema, { [containerField]: container }, context, 'update');

    this.route('move', collection, () => {
      const effective = this.requireEffective(collection, logicalId, context.draftContextId);
      const draft = this.resolver.ensureDraftVersion(effective, context.draftContextId);
      this.gateway.update(collection, draft.physicalId, {
        state: draft.state === VersionState.NEW ? undefined : VersionState.MOVE_POINTER,
        attributes,
      });
    });
    logger.debug(`move ${collection}[${logicalId}] to ${String(container)} in draft ${context.draftContextId}`);
    return logicalId;
  }

  /**
   * Runs `fn` in a transaction. Domain errors propagate as they are; any
   * other failure is logged and reported as WRITE_FAILED.
   */
  route<T>(operation: string, collection: string, fn: () => T): T {
    try {
      return this.gateway.runInTransaction(fn);
    } catch (error) {
      throw this.reclassify(operation, collection, error);
    }
  }

  reclassify(operation: string, collection: string, error: unknown): PalimpsestError {
    if (isDomainError(error)) {
      return error;
    }
    logger.error(`${operation} on ${collection} failed and was rolled back`, error);
    return writeFailed(operation, collection, error instanceof Error ? error : undefined);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private requireEffective(collection: string, logicalId: LogicalId, draftContextId: DraftContextId): PhysicalVersion {
    const effective = this.resolver.resolveEffective(collection, logicalId, draftContextId);
    if (!effective) {
      throw recordNotFound(collection, logicalId, { draftContextId });
    }
    return effective;
  }

  private deleteRecord(schema: CollectionSchema, logicalId: LogicalId, draftContextId: DraftContextId): void {
    const effective = this.requireEffective(schema.name, logicalId, draftContextId);

    for (const attribute of embeddedAttributes(schema)) {
      if (!attribute.embedded) {
        continue;
      }
      const childSchema = this.catalog.require(attribute.embedded.collection);
      for (const child of this.reader.children(attribute.embedded, logicalId, draftContextId)) {
        this.deleteRecord(childSchema, this.resolver.toLogicalId(child), draftContextId);
      }
    }

    if (effective.state === VersionState.NEW) {
      this.gateway.delete(schema.name, effective.physicalId);
    } else if (effective.draftContextId === draftContextId) {
      this.gateway.update(schema.name, effective.physicalId, { state: VersionState.TOMBSTONE });
    } else {
      this.gateway.insert(schema.name, {
        originId: effective.physicalId,
        draftContextId,
        state: VersionState.TOMBSTONE,
        attributes: effective.attributes,
      });
    }
  }

  /**
   * Checks caller input before any storage access and returns the
   * attributes to store (with defaults applied on create)
   */
  private validateInput(
    schema: CollectionSchema,
    data: Attributes,
    context: WriteContext,
    mode: InputMode
  ): Attributes {
    const names = Object.keys(data);

    const identity = names.filter((name) => SYSTEM_COLUMNS.includes(name) || schema.identityFields.includes(name));
    if (identity.length > 0) {
      throw identityFieldRejected(schema.name, identity);
    }

    const unknown = names.filter((name) => !findAttribute(schema, name));
    if (unknown.length > 0) {
      throw unknownAttribute(schema.name, unknown);
    }

    for (const name of names) {
      const definition = findAttribute(schema, name);
      if (definition?.type === AttributeType.EMBEDDED) {
        throw invalidAttribute(schema.name, name, data[name], 'records created together with their parent');
      }
    }

    const writable =
      context.writableAttributes ??
      storedAttributes(schema)
        .map((a) => a.name)
        .filter((name) => name !== schema.parentLinkField);
    const forbidden = names.filter((name) => !writable.includes(name));
    if (forbidden.length > 0) {
      throw accessDenied(context.principal, schema.name, `attributes not writable: ${forbidden.join(', ')}`, {
        field: forbidden[0],
      });
    }

    const result: Attributes = {};
    for (const definition of storedAttributes(schema)) {
      const value = data[definition.name];
      if (value !== undefined) {
        checkAttributeValue(schema.name, definition, value);
        result[definition.name] = value;
      } else if (mode === 'create') {
        if (definition.default !== undefined) {
          result[definition.name] = definition.default;
        } else if (definition.required) {
          throw missingRequiredField(schema.name, definition.name);
        }
      }
    }
    return result;
  }
}
