export {
  QueryFilterBuilder,
  roleOf,
  logicalIdPredicate,
  contextPredicate,
  tombstonePredicate,
  VISIBLE_STATES,
  OVERLAY_ORDER,
  type VersionRole,
  type OverlayQuery,
} from './query-filter-builder.js';
export { OverlayReader, attributeEquals, dedupeByLogicalId, type ListFilter } from './overlay-reader.js';
export { IdentityResolver, requireDraftContext } from './identity-resolver.js';
export {
  WriteRouter,
  requireLogicalId,
  type WriteContext,
  type UpdateOptions,
} from './write-router.js';
export { DependentLinkReconciler, type EmbeddedWriteContext } from './dependent-link-reconciler.js';
export { sanitizeReadError } from './read-errors.js';
