export { RecordAccessAPI, MAX_EMBED_DEPTH, type RecordAccessComponents } from './record-access-api.js';
export { openRecordAccess, type OpenRecordAccessOptions, type RecordAccess } from './open.js';
export type {
  OperationOptions,
  UpdateRecordOptions,
  ReadQuery,
  WriteResult,
  DeleteResult,
} from './types.js';
