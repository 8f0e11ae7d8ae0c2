/**
 * @palimpsest/overlay
 *
 * Versioned record access: draft contexts per principal, overlay reads that
 * show exactly one version of each record, and writes routed into drafts.
 */

export * from './api/index.js';
export * from './versioning/index.js';
export * from './drafts/index.js';
export * from './gateway/index.js';
export * from './access/index.js';
export * from './catalog/index.js';
export * from './config/index.js';
