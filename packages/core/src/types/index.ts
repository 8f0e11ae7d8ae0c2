/**
 * Domain types shared by the storage and overlay packages
 */

export {
  VersionState,
  VERSION_STATES,
  LIVE_CONTEXT_ID,
  isVersionState,
  isDraftState,
  isValidRecordId,
  type LogicalId,
  type PhysicalId,
  type DraftContextId,
} from './version-state.js';

export { isAttributeObject, isAttributeValue, type AttributeValue, type Attributes } from './attributes.js';

export { logicalIdOf, type PhysicalVersion } from './physical-version.js';

export type { DraftContext, DraftContextInfo } from './draft-context.js';

export {
  AttributeType,
  ATTRIBUTE_TYPES,
  SystemColumn,
  SYSTEM_COLUMNS,
  findAttribute,
  storedAttributes,
  embeddedAttributes,
  type EmbeddedTarget,
  type AttributeDefinition,
  type CollectionSchema,
} from './collection-schema.js';

export type { RecordView, RecordList } from './record-view.js';
