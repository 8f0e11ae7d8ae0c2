/**
 * Record Access API
 *
 * The operations exposed to the dispatch layer. Every call is checked by the
 * access gate before storage is touched, runs in the principal's draft
 * context and speaks logical ids only.
 */

import {
  AttributeType,
  accessDenied,
  embeddedAttributes,
  findAttribute,
  invalidAttribute,
  invalidInput,
  readOnlyCollection,
  recordNotFound,
  unknownAttribute,
  type AttributeValue,
  type Attributes,
  type CollectionSchema,
  type DraftContextId,
  type DraftContextInfo,
  type LogicalId,
  type PhysicalVersion,
  type RecordList,
  type RecordView,
} from '@palimpsest/core';
import { AccessOperation, type AccessDecision, type AccessGate } from '../access/index.js';
import type { SchemaCatalog } from '../catalog/index.js';
import type { ReadConfig } from '../config/index.js';
import type { DraftContextSelector } from '../drafts/index.js';
import {
  requireLogicalId,
  type DependentLinkReconciler,
  type IdentityResolver,
  type OverlayReader,
  type WriteRouter,
} from '../versioning/index.js';
import type {
  DeleteResult,
  OperationOptions,
  ReadQuery,
  UpdateRecordOptions,
  WriteResult,
} from './types.js';

/** How deep embedded children of embedded children are attached */
export const MAX_EMBED_DEPTH = 3;

export interface RecordAccessComponents {
  catalog: SchemaCatalog;
  gate: AccessGate;
  selector: DraftContextSelector;
  reader: OverlayReader;
  resolver: IdentityResolver;
  router: WriteRouter;
  reconciler: DependentLinkReconciler;
  read: ReadConfig;
}

function requirePrincipal(options: OperationOptions): string {
  const principal = options.principal;
  if (typeof principal !== 'string' || principal.trim() === '') {
    throw invalidInput('principal', principal, 'non-empty principal name');
  }
  return principal;
}

export class RecordAccessAPI {
  constructor(private readonly components: RecordAccessComponents) {}

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async read(collection: string, query: ReadQuery, options: OperationOptions): Promise<RecordList> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.READ);
    const { catalog, selector, reader } = this.components;
    const schema = catalog.require(collection);

    const fields = this.selectFields(principal, schema, decision, query.fields);
    this.checkWhere(principal, schema, decision, query.where);
    const limit = this.resolveLimit(query.limit);
    const offset = query.offset ?? 0;
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw invalidInput('offset', offset, 'non-negative integer');
    }
    const embed = query.embed ?? this.components.read.embedChildren;

    const draftContextId = selector.findActive(principal);

    let versions: PhysicalVersion[];
    let total: number;
    if (query.logicalId !== undefined) {
      requireLogicalId(query.logicalId);
      const effective = reader.effectiveVersion(collection, draftContextId, query.logicalId);
      if (!effective) {
        throw recordNotFound(collection, query.logicalId, { draftContextId });
      }
      versions = [effective];
      total = 1;
    } else {
      const all = reader.list(collection, draftContextId, {
        container: query.container,
        includeHidden: query.includeHidden,
        where: query.where,
      });
      total = all.length;
      versions = all.slice(offset, offset + limit);
    }

    const records = versions.map((version) =>
      this.toView(principal, schema, version, fields, draftContextId, embed ? 1 : MAX_EMBED_DEPTH + 1)
    );
    return {
      collection,
      draftContextId,
      records,
      total,
      limit,
      offset,
      hasMore: query.logicalId === undefined && offset + records.length < total,
    };
  }

  async getDraftContextInfo(options: OperationOptions): Promise<DraftContextInfo> {
    const principal = requirePrincipal(options);
    const { selector } = this.components;
    return selector.describe(selector.findActive(principal));
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  async create(collection: string, attributes: Attributes, options: OperationOptions): Promise<WriteResult> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.CREATE);
    const logicalId = this.inDraftContext('create', collection, principal, (draftContextId) =>
      this.components.router.create(collection, attributes, {
        draftContextId,
        principal,
        writableAttributes: decision.writableAttributes,
      })
    );
    return { logicalId };
  }

  async update(
    collection: string,
    logicalId: LogicalId,
    patch: Attributes,
    options: UpdateRecordOptions
  ): Promise<WriteResult> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.UPDATE);
    this.inDraftContext('update', collection, principal, (draftContextId) =>
      this.components.router.update(
        collection,
        logicalId,
        patch,
        { draftContextId, principal, writableAttributes: decision.writableAttributes },
        { expectedUpdatedAt: options.expectedUpdatedAt }
      )
    );
    return { logicalId };
  }

  async delete(collection: string, logicalId: LogicalId, options: OperationOptions): Promise<DeleteResult> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.DELETE);
    this.authorizeCascade(principal, this.components.catalog.require(collection), new Set([collection]));
    this.inDraftContext('delete', collection, principal, (draftContextId) =>
      this.components.router.delete(collection, logicalId, {
        draftContextId,
        principal,
        writableAttributes: decision.writableAttributes,
      })
    );
    return { ok: true };
  }

  async move(
    collection: string,
    logicalId: LogicalId,
    container: AttributeValue,
    options: OperationOptions
  ): Promise<WriteResult> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.MOVE);
    this.inDraftContext('move', collection, principal, (draftContextId) =>
      this.components.router.move(collection, logicalId, container, {
        draftContextId,
        principal,
        writableAttributes: decision.writableAttributes,
      })
    );
    return { logicalId };
  }

  async createWithEmbeddedChildren(
    collection: string,
    attributes: Attributes,
    childField: string,
    children: readonly Attributes[],
    options: OperationOptions
  ): Promise<WriteResult> {
    const principal = requirePrincipal(options);
    const decision = this.authorize(principal, collection, AccessOperation.CREATE);
    const schema = this.components.catalog.require(collection);
    const target = findAttribute(schema, childField)?.embedded;
    const childDecision = target
      ? this.authorize(principal, target.collection, AccessOperation.CREATE)
      : undefined;

    const logicalId = this.inDraftContext('createWithEmbeddedChildren', collection, principal, (draftContextId) =>
      this.components.reconciler.createWithEmbeddedChildren(collection, attributes, childField, children, {
        draftContextId,
        principal,
        writableAttributes: decision.writableAttributes,
        childWritableAttributes: childDecision?.writableAttributes,
      })
    );
    return { logicalId };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private authorize(principal: string, collection: string, operation: AccessOperation): AccessDecision {
    const decision = this.components.gate.check(principal, collection, operation);
    if (!decision.allowed) {
      throw decision.readOnly
        ? readOnlyCollection(principal, collection, { operation })
        : accessDenied(principal, collection, decision.reason ?? 'operation not permitted', { operation });
    }
    return decision;
  }

  /**
   * Deleting a record deletes its embedded children too, so DELETE must be
   * allowed on every collection the cascade reaches
   */
  private authorizeCascade(principal: string, schema: CollectionSchema, seen: Set<string>): void {
    for (const attribute of embeddedAttributes(schema)) {
      const target = attribute.embedded;
      if (!target || seen.has(target.collection)) {
        continue;
      }
      seen.add(target.collection);
      this.authorize(principal, target.collection, AccessOperation.DELETE);
      this.authorizeCascade(principal, this.components.catalog.require(target.collection), seen);
    }
  }

  /**
   * Selects the principal's draft context in the same transaction as the
   * write, so a rejected first write leaves no context behind
   */
  private inDraftContext<T>(
    operation: string,
    collection: string,
    principal: string,
    write: (draftContextId: DraftContextId) => T
  ): T {
    const { router, selector } = this.components;
    return router.route(operation, collection, () => write(selector.select(principal)));
  }

  private resolveLimit(limit: number | undefined): number {
    const { defaultLimit, maxLimit } = this.components.read;
    if (limit === undefined) {
      return defaultLimit;
    }
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw invalidInput('limit', limit, 'positive integer');
    }
    return Math.min(limit, maxLimit);
  }

  /**
   * Requested fields must exist and be readable; no request means every
   * readable attribute
   */
  private selectFields(
    principal: string,
    schema: CollectionSchema,
    decision: AccessDecision,
    requested: readonly string[] | undefined
  ): readonly string[] {
    if (requested === undefined) {
      return decision.readableAttributes;
    }
    this.requireReadable(principal, schema, decision, requested);
    return requested;
  }

  /**
   * Filters compare stored attributes the principal may read
   */
  private checkWhere(
    principal: string,
    schema: CollectionSchema,
    decision: AccessDecision,
    where: Attributes | undefined
  ): void {
    if (where === undefined) {
      return;
    }
    const names = Object.keys(where);
    this.requireReadable(principal, schema, decision, names);
    for (const name of names) {
      if (findAttribute(schema, name)?.type === AttributeType.EMBEDDED) {
        throw invalidAttribute(schema.name, name, where[name], 'a stored attribute to filter on');
      }
    }
  }

  private requireReadable(
    principal: string,
    schema: CollectionSchema,
    decision: AccessDecision,
    names: readonly string[]
  ): void {
    const unknown = names.filter((name) => !findAttribute(schema, name));
    if (unknown.length > 0) {
      throw unknownAttribute(schema.name, unknown);
    }
    const hidden = names.filter((name) => !decision.readableAttributes.includes(name));
    if (hidden.length > 0) {
      throw accessDenied(principal, schema.name, `attributes not readable: ${hidden.join(', ')}`, {
        field: hidden[0],
      });
    }
  }

  private toView(
    principal: string,
    schema: CollectionSchema,
    version: PhysicalVersion,
    fields: readonly string[],
    draftContextId: DraftContextId,
    depth: number
  ): RecordView {
    const attributes: Attributes = {};
    for (const name of fields) {
      const value = version.attributes[name];
      if (value !== undefined) {
        attributes[name] = value;
      }
    }

    const view: RecordView = {
      logicalId: this.components.resolver.toLogicalId(version),
      attributes,
      updatedAt: version.updatedAt,
    };
    if (depth > MAX_EMBED_DEPTH) {
      return view;
    }

    const embedded: Record<string, RecordView[]> = {};
    for (const attribute of embeddedAttributes(schema)) {
      const target = attribute.embedded;
      if (!target || !fields.includes(attribute.name)) {
        continue;
      }
      const childDecision = this.components.gate.check(principal, target.collection, AccessOperation.READ);
      if (!childDecision.allowed) {
        continue;
      }
      const childSchema = this.components.catalog.require(target.collection);
      embedded[attribute.name] = this.components.reader
        .children(target, view.logicalId, draftContextId)
        .map((child) =>
          this.toView(principal, childSchema, child, childDecision.readableAttributes, draftContextId, depth + 1)
        );
    }

    return Object.keys(embedded).length > 0 ? { ...view, embedded } : view;
  }
}
