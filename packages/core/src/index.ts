/**
 * @palimpsest/core
 *
 * Domain types, structured errors and logging shared by every package.
 */

// Types - version states, draft contexts, collection schemas, records
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';

// Utils - logging
export * from './utils/index.js';
