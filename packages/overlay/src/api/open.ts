/**
 * Wiring
 *
 * Opens the database, brings its schema and collection tables up to date
 * and assembles the record access API.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger } from '@palimpsest/core';
import { createNodeStorage, initializeSchema, type StorageBackend } from '@palimpsest/storage';
import { ConfiguredAccessGate, type AccessGate } from '../access/index.js';
import { loadCatalogFile, type SchemaCatalog } from '../catalog/index.js';
import { loadConfig, type Configuration } from '../config/index.js';
import { DraftContextRepository, DraftContextSelector } from '../drafts/index.js';
import { SqliteStorageGateway, ensureCollectionTables, type StorageGateway } from '../gateway/index.js';
import {
  DependentLinkReconciler,
  IdentityResolver,
  OverlayReader,
  QueryFilterBuilder,
  WriteRouter,
} from '../versioning/index.js';
import { RecordAccessAPI } from './record-access-api.js';

const logger = createLogger('record-access');

export interface OpenRecordAccessOptions {
  /** Defaults to loadConfig() */
  config?: Configuration;
  /** Use an already open backend instead of config.database */
  backend?: StorageBackend;
  /** Use this catalog instead of loading config.schema */
  catalog?: SchemaCatalog;
  gate?: AccessGate;
  /** Replace the gateway built over the backend */
  gateway?: StorageGateway;
  /** Clock for updated_at and draft context timestamps */
  now?: () => Date;
}

export interface RecordAccess {
  api: RecordAccessAPI;
  backend: StorageBackend;
  catalog: SchemaCatalog;
  selector: DraftContextSelector;
  close(): void;
}

function openBackend(config: Configuration): StorageBackend {
  if (config.database !== ':memory:' && !config.readonly) {
    fs.mkdirSync(path.dirname(path.resolve(config.database)), { recursive: true });
  }
  return createNodeStorage({ path: config.database, readonly: config.readonly });
}

export function openRecordAccess(options: OpenRecordAccessOptions = {}): RecordAccess {
  const config = options.config ?? loadConfig();
  const catalog = options.catalog ?? loadCatalogFile(config.schema);
  const backend = options.backend ?? openBackend(config);

  if (!backend.readonly) {
    const migrations = initializeSchema(backend);
    if (migrations.applied.length > 0) {
      logger.info(`Applied migrations ${migrations.applied.join(', ')} to ${backend.path}`);
    }
    ensureCollectionTables(backend, catalog);
  }

  const gateway = options.gateway ?? new SqliteStorageGateway(backend, catalog, { now: options.now });
  const builder = new QueryFilterBuilder(catalog);
  const reader = new OverlayReader(gateway, builder, catalog);
  const resolver = new IdentityResolver(gateway, reader);
  const router = new WriteRouter(gateway, catalog, resolver, reader);
  const reconciler = new DependentLinkReconciler(gateway, catalog, router);
  const selector = new DraftContextSelector(new DraftContextRepository(backend), {
    autoCreate: config.drafts.autoCreate,
    titleTemplate: config.drafts.titleTemplate,
    readonly: backend.readonly,
    now: options.now,
  });

  const api = new RecordAccessAPI({
    catalog,
    gate: options.gate ?? new ConfiguredAccessGate(catalog, config.access),
    selector,
    reader,
    resolver,
    router,
    reconciler,
    read: config.read,
  });

  return {
    api,
    backend,
    catalog,
    selector,
    close: () => backend.close(),
  };
}
