/**
 * Identity Resolver
 *
 * Translates between logical ids, which callers see, and physical ids of
 * the rows behind them. Writes get a draft copy of the live row on demand.
 */

import {
  LIVE_CONTEXT_ID,
  SystemColumn,
  VersionState,
  databaseError,
  invalidInput,
  logicalIdOf,
  recordNotFound,
  type DraftContextId,
  type LogicalId,
  type PhysicalId,
  type PhysicalVersion,
} from '@palimpsest/core';
import { eq, type StorageGateway } from '../gateway/index.js';
import type { OverlayReader } from './overlay-reader.js';

export function requireDraftContext(draftContextId: DraftContextId): void {
  if (!Number.isSafeInteger(draftContextId) || draftContextId <= LIVE_CONTEXT_ID) {
    throw invalidInput('draftContextId', draftContextId, 'a draft context id; writes never target the live dataset');
  }
}

export class IdentityResolver {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly reader: OverlayReader
  ) {}

  toLogicalId(version: PhysicalVersion): LogicalId {
    return logicalIdOf(version);
  }

  /**
   * Effective version of a logical record, or undefined when it does not
   * exist or is deleted in the context
   */
  resolveEffective(
    collection: string,
    logicalId: LogicalId,
    draftContextId: DraftContextId
  ): PhysicalVersion | undefined {
    return this.reader.effectiveVersion(collection, draftContextId, logicalId);
  }

  resolvePhysicalForRead(collection: string, logicalId: LogicalId, draftContextId: DraftContextId): PhysicalId {
    const effective = this.resolveEffective(collection, logicalId, draftContextId);
    if (!effective) {
      throw recordNotFound(collection, logicalId, { draftContextId });
    }
    return effective.physicalId;
  }

  /**
   * Draft version of a logical record in the context, copying the live row
   * when the context has none yet
   */
  resolveDraftVersion(collection: string, logicalId: LogicalId, draftContextId: DraftContextId): PhysicalVersion {
    requireDraftContext(draftContextId);
    const effective = this.resolveEffective(collection, logicalId, draftContextId);
    if (!effective) {
      throw recordNotFound(collection, logicalId, { draftContextId });
    }
    return this.ensureDraftVersion(effective, draftContextId);
  }

  resolvePhysicalForWrite(collection: string, logicalId: LogicalId, draftContextId: DraftContextId): PhysicalId {
    return this.resolveDraftVersion(collection, logicalId, draftContextId).physicalId;
  }

  /**
   * Returns `effective` when it already belongs to the context, otherwise
   * inserts a modified copy of the live row
   */
  ensureDraftVersion(effective: PhysicalVersion, draftContextId: DraftContextId): PhysicalVersion {
    requireDraftContext(draftContextId);
    if (effective.draftContextId === draftContextId) {
      return effective;
    }

    const collection = effective.collection;
    const physicalId = this.gateway.insert(collection, {
      originId: effective.physicalId,
      draftContextId,
      state: VersionState.MODIFIED,
      attributes: effective.attributes,
    });
    const [copy] = this.gateway.select(collection, eq(SystemColumn.ID, physicalId));
    if (!copy) {
      throw databaseError(`draft copy of ${collection}[${effective.physicalId}] was not stored`);
    }
    return copy;
  }
}
