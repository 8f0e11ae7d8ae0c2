/**
 * Version States
 *
 * Every physical row of a collection carries one of these states. The live
 * dataset only ever holds `live` rows; every other state lives inside a
 * draft context.
 */

// ============================================================================
// Version State
// ============================================================================

export const VersionState = {
  /** Row of the authoritative dataset */
  LIVE: 'live',
  /** Draft copy of a live row with changed attributes */
  MODIFIED: 'modified',
  /** Draft row without a live counterpart */
  NEW: 'new',
  /** Marks the logical record as deleted inside the draft context */
  TOMBSTONE: 'tombstone',
  /** Draft copy of a live row that now sits in another container */
  MOVE_POINTER: 'move_pointer',
} as const;

export type VersionState = (typeof VersionState)[keyof typeof VersionState];

export const VERSION_STATES: readonly VersionState[] = Object.values(VersionState);

const VERSION_STATE_SET = new Set<string>(VERSION_STATES);

export function isVersionState(value: unknown): value is VersionState {
  return typeof value === 'string' && VERSION_STATE_SET.has(value);
}

/**
 * True for every state that can only exist inside a draft context
 */
export function isDraftState(state: VersionState): boolean {
  return state !== VersionState.LIVE;
}

// ============================================================================
// Identifiers
// ============================================================================

/** Draft context id that stands for the live dataset */
export const LIVE_CONTEXT_ID = 0;

/** Stable, caller-visible identity of a record */
export type LogicalId = number;

/** Storage-assigned row id */
export type PhysicalId = number;

export type DraftContextId = number;

/**
 * Checks whether a value can be used as a logical or physical id
 */
export function isValidRecordId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}
