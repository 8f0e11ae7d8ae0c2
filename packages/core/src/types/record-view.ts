import type { Attributes } from './attributes.js';
import type { DraftContextId, LogicalId } from './version-state.js';

/**
 * A record as returned to callers: one effective version, keyed by its
 * logical id
 */
export interface RecordView {
  readonly logicalId: LogicalId;
  readonly attributes: Attributes;
  readonly updatedAt: string;
  /** Embedded children per embedded attribute name */
  readonly embedded?: Readonly<Record<string, RecordView[]>>;
}

/**
 * Paginated read result
 */
export interface RecordList {
  readonly collection: string;
  /** Context the read ran in; 0 when the caller has no draft context */
  readonly draftContextId: DraftContextId;
  readonly records: RecordView[];
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
  readonly hasMore: boolean;
}
