/**
 * Storage gateway module
 */

export {
  eq,
  ne,
  inList,
  notInList,
  notInSelect,
  and,
  or,
  compilePredicate,
  compileOrderBy,
  type Predicate,
  type OrderBy,
  type SortDirection,
  type CompiledPredicate,
} from './predicate.js';
export { encodeAttribute, decodeAttribute } from './codec.js';
export {
  SqliteStorageGateway,
  type StorageGateway,
  type SelectOptions,
  type VersionInsert,
  type VersionUpdate,
  type SqliteStorageGatewayOptions,
} from './storage-gateway.js';
export {
  ensureCollectionTable,
  ensureCollectionTables,
  columnTypeOf,
  type CollectionTableResult,
} from './collection-tables.js';
