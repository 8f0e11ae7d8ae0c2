/**
 * Query Filter Builder
 *
 * Builds the predicate that overlays a draft context on the live dataset.
 * Rows of the live dataset and of the active context are selected, tombstone
 * rows and every row of a tombstoned logical id are left out, and draft rows
 * sort before live rows so the first row per logical id is the effective
 * version.
 */

import {
  LIVE_CONTEXT_ID,
  SystemColumn,
  VERSION_STATES,
  VersionState,
  type DraftContextId,
  type LogicalId,
} from '@palimpsest/core';
import type { SchemaCatalog } from '../catalog/index.js';
import { and, eq, inList, notInSelect, or, type OrderBy, type Predicate } from '../gateway/index.js';

// ============================================================================
// Version Roles
// ============================================================================

/**
 * How a row of a given state takes part in an overlay read:
 * `base` rows are live, `overlay` rows replace them within a draft context,
 * `filter` rows are never returned and remove their logical id.
 */
export type VersionRole = 'base' | 'overlay' | 'filter';

export function roleOf(state: VersionState): VersionRole {
  switch (state) {
    case VersionState.LIVE:
      return 'base';
    case VersionState.MODIFIED:
    case VersionState.NEW:
    case VersionState.MOVE_POINTER:
      return 'overlay';
    case VersionState.TOMBSTONE:
      return 'filter';
    default: {
      const unhandled: never = state;
      throw new Error(`Unhandled version state: ${String(unhandled)}`);
    }
  }
}

/** States of rows an overlay read may return */
export const VISIBLE_STATES: readonly VersionState[] = VERSION_STATES.filter(
  (state) => roleOf(state) !== 'filter'
);

// ============================================================================
// Predicates
// ============================================================================

export interface OverlayQuery {
  readonly predicate: Predicate;
  readonly orderBy: readonly OrderBy[];
}

/** Draft rows first, then by physical id */
export const OVERLAY_ORDER: readonly OrderBy[] = [
  { column: SystemColumn.DRAFT_CONTEXT_ID, direction: 'desc' },
  { column: SystemColumn.ID, direction: 'asc' },
];

/**
 * Rows belonging to one logical id: draft copies point at it through
 * origin_id, while live and new rows carry it as their own id
 */
export function logicalIdPredicate(logicalId: LogicalId): Predicate {
  return or(
    eq(SystemColumn.ORIGIN_ID, logicalId),
    and(eq(SystemColumn.ID, logicalId), eq(SystemColumn.ORIGIN_ID, 0))
  );
}

export function contextPredicate(draftContextId: DraftContextId): Predicate {
  return draftContextId === LIVE_CONTEXT_ID
    ? eq(SystemColumn.DRAFT_CONTEXT_ID, LIVE_CONTEXT_ID)
    : inList(SystemColumn.DRAFT_CONTEXT_ID, [LIVE_CONTEXT_ID, draftContextId]);
}

/**
 * Leaves out every row of a logical id deleted inside the draft context.
 * A tombstone always carries the deleted record's logical id in origin_id.
 */
export function tombstonePredicate(draftContextId: DraftContextId): Predicate {
  return notInSelect(
    SystemColumn.ID,
    SystemColumn.ORIGIN_ID,
    and(
      eq(SystemColumn.DRAFT_CONTEXT_ID, draftContextId),
      eq(SystemColumn.VERSION_STATE, VersionState.TOMBSTONE)
    )
  );
}

// ============================================================================
// QueryFilterBuilder
// ============================================================================

export class QueryFilterBuilder {
  constructor(private readonly catalog: SchemaCatalog) {}

  buildPredicate(collection: string, draftContextId: DraftContextId, logicalId?: LogicalId): OverlayQuery {
    this.catalog.require(collection);

    const parts: Predicate[] = [
      contextPredicate(draftContextId),
      inList(SystemColumn.VERSION_STATE, VISIBLE_STATES),
    ];
    if (draftContextId !== LIVE_CONTEXT_ID) {
      parts.push(tombstonePredicate(draftContextId));
    }
    if (logicalId !== undefined) {
      parts.push(logicalIdPredicate(logicalId));
    }

    return { predicate: and(...parts), orderBy: OVERLAY_ORDER };
  }
}
