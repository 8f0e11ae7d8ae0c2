import type { Attributes } from './attributes.js';
import type { DraftContextId, LogicalId, PhysicalId, VersionState } from './version-state.js';
import { VersionState as States } from './version-state.js';

/**
 * One stored row of a collection
 */
export interface PhysicalVersion {
  readonly physicalId: PhysicalId;
  readonly collection: string;
  /** Physical id of the live row this version derives from; 0 for live and new rows */
  readonly originId: PhysicalId;
  /** 0 for the live dataset */
  readonly draftContextId: DraftContextId;
  readonly state: VersionState;
  readonly updatedAt: string;
  readonly attributes: Attributes;
}

/**
 * Maps a physical version to the logical id callers see.
 *
 * New rows are their own logical record. Every other draft row points at the
 * live row it was copied from.
 */
export function logicalIdOf(version: Pick<PhysicalVersion, 'physicalId' | 'originId' | 'state'>): LogicalId {
  if (version.state === States.NEW) {
    return version.physicalId;
  }
  return version.originId !== 0 ? version.originId : version.physicalId;
}
