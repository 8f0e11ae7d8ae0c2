/**
 * Record Access API Types
 */

import type { AttributeValue, Attributes, LogicalId } from '@palimpsest/core';

export interface OperationOptions {
  /** Acting principal; selects the draft context */
  readonly principal: string;
}

export interface UpdateRecordOptions extends OperationOptions {
  /** Fail with CONCURRENT_MODIFICATION when the record changed since this timestamp */
  readonly expectedUpdatedAt?: string;
}

export interface ReadQuery {
  /** Read a single record; fails with NOT_FOUND when it has no effective version */
  readonly logicalId?: LogicalId;
  /** Only records in this container */
  readonly container?: AttributeValue;
  readonly includeHidden?: boolean;
  /**
   * Only records whose effective version has these attribute values.
   * Like container and includeHidden, ignored when logicalId is given.
   */
  readonly where?: Attributes;
  /** Attributes to return; defaults to every readable attribute */
  readonly fields?: readonly string[];
  readonly limit?: number;
  readonly offset?: number;
  /** Attach embedded children; defaults to read.embedChildren */
  readonly embed?: boolean;
}

export interface WriteResult {
  readonly logicalId: LogicalId;
}

export interface DeleteResult {
  readonly ok: true;
}
