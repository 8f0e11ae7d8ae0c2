import type { DraftContextId } from './version-state.js';

/**
 * Isolated sandbox in which one principal's pending changes accumulate
 */
export interface DraftContext {
  readonly id: DraftContextId;
  readonly ownerPrincipal: string;
  readonly title: string;
  readonly createdAt: string;
  /** Frozen contexts are never selected for new writes */
  readonly isFrozen: boolean;
}

/**
 * What a caller may learn about the context its requests run in
 */
export interface DraftContextInfo {
  readonly draftContextId: DraftContextId;
  readonly title: string;
  readonly ownerPrincipal: string | null;
  readonly isFrozen: boolean;
  /** True when requests read the live dataset because no draft context exists yet */
  readonly isLive: boolean;
}
