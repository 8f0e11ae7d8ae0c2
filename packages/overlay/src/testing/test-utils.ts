/**
 * Test Utilities
 *
 * A small catalog and an in-memory database wired the same way
 * openRecordAccess wires them.
 *
 * @module
 */

import {
  AttributeType,
  VersionState,
  type Attributes,
  type CollectionSchema,
  type PhysicalId,
} from '@palimpsest/core';
import { createNodeStorage, initializeSchema, type StorageBackend } from '@palimpsest/storage';
import { ConfiguredSchemaCatalog } from '../catalog/index.js';
import { getDefaultConfig, type Configuration } from '../config/index.js';
import { DraftContextRepository, DraftContextSelector } from '../drafts/index.js';
import {
  SqliteStorageGateway,
  ensureCollectionTables,
  type StorageGateway,
  type VersionInsert,
  type VersionUpdate,
} from '../gateway/index.js';
import {
  DependentLinkReconciler,
  IdentityResolver,
  OverlayReader,
  QueryFilterBuilder,
  WriteRouter,
} from '../versioning/index.js';

// ============================================================================
// Catalog
// ============================================================================

export const TEST_SCHEMAS: readonly CollectionSchema[] = [
  {
    name: 'pages',
    identityFields: ['uid'],
    containerField: 'pid',
    sortingField: 'sorting',
    hiddenField: 'hidden',
    attributes: [
      { name: 'pid', type: AttributeType.INTEGER, default: 0 },
      { name: 'title', type: AttributeType.STRING, required: true, maxLength: 255 },
      { name: 'slug', type: AttributeType.STRING },
      { name: 'sorting', type: AttributeType.INTEGER, default: 0 },
      { name: 'hidden', type: AttributeType.BOOLEAN, default: false },
      { name: 'doktype', type: AttributeType.INTEGER, allowedValues: [1, 254], default: 1 },
      { name: 'tsconfig', type: AttributeType.TEXT },
    ],
  },
  {
    name: 'news',
    identityFields: [],
    attributes: [
      { name: 'title', type: AttributeType.STRING, required: true, maxLength: 100 },
      { name: 'teaser', type: AttributeType.TEXT },
      {
        name: 'links',
        type: AttributeType.EMBEDDED,
        embedded: { collection: 'links', foreignField: 'parent_id' },
      },
    ],
  },
  {
    name: 'links',
    identityFields: [],
    parentLinkField: 'parent_id',
    sortingField: 'sorting',
    attributes: [
      { name: 'parent_id', type: AttributeType.INTEGER },
      { name: 'uri', type: AttributeType.STRING, required: true },
      { name: 'sorting', type: AttributeType.INTEGER, default: 0 },
    ],
  },
  {
    name: 'content',
    identityFields: [],
    containerField: 'pid',
    sortingField: 'sorting',
    attributes: [
      { name: 'pid', type: AttributeType.INTEGER, required: true },
      { name: 'header', type: AttributeType.STRING },
      { name: 'ctype', type: AttributeType.STRING, allowedValues: ['text', 'image'], default: 'text' },
      { name: 'settings', type: AttributeType.JSON },
      { name: 'sorting', type: AttributeType.INTEGER, default: 0 },
    ],
  },
];

export function createTestCatalog(): ConfiguredSchemaCatalog {
  return new ConfiguredSchemaCatalog(TEST_SCHEMAS);
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Clock starting at 2024-01-01T00:00:00.000Z that advances one second per call
 */
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let next = start;
  return () => {
    const current = new Date(next);
    next += 1000;
    return current;
  };
}

export interface TestEnvironment {
  backend: StorageBackend;
  catalog: ConfiguredSchemaCatalog;
  gateway: StorageGateway;
  builder: QueryFilterBuilder;
  reader: OverlayReader;
  resolver: IdentityResolver;
  router: WriteRouter;
  reconciler: DependentLinkReconciler;
  repository: DraftContextRepository;
  selector: DraftContextSelector;
  config: Configuration;
}

export interface TestEnvironmentOptions {
  backend?: StorageBackend;
  /** Replaces the gateway built over the backend */
  gateway?: (backend: StorageBackend, catalog: ConfiguredSchemaCatalog) => StorageGateway;
  repository?: (backend: StorageBackend) => DraftContextRepository;
}

export function createTestEnvironment(options: TestEnvironmentOptions = {}): TestEnvironment {
  const backend = options.backend ?? createNodeStorage({ path: ':memory:' });
  const catalog = createTestCatalog();
  if (!backend.readonly) {
    initializeSchema(backend);
    ensureCollectionTables(backend, catalog);
  }

  const gateway = options.gateway
    ? options.gateway(backend, catalog)
    : new SqliteStorageGateway(backend, catalog, { now: steppingClock() });
  const builder = new QueryFilterBuilder(catalog);
  const reader = new OverlayReader(gateway, builder, catalog);
  const resolver = new IdentityResolver(gateway, reader);
  const router = new WriteRouter(gateway, catalog, resolver, reader);
  const reconciler = new DependentLinkReconciler(gateway, catalog, router);
  const repository = options.repository ? options.repository(backend) : new DraftContextRepository(backend);
  const config = getDefaultConfig();
  const selector = new DraftContextSelector(repository, {
    autoCreate: config.drafts.autoCreate,
    titleTemplate: config.drafts.titleTemplate,
    readonly: backend.readonly,
    now: steppingClock(),
  });

  return { backend, catalog, gateway, builder, reader, resolver, router, reconciler, repository, selector, config };
}

export interface InjectedFaults {
  /** Collection whose inserts fail */
  insert?: string;
  /** Collection whose updates fail */
  update?: string;
}

/**
 * Gateway that fails writes to chosen collections with a plain Error, the
 * way a driver failure surfaces
 */
export class FaultyStorageGateway extends SqliteStorageGateway {
  constructor(
    backend: StorageBackend,
    catalog: ConfiguredSchemaCatalog,
    private readonly faults: InjectedFaults
  ) {
    super(backend, catalog, { now: steppingClock() });
  }

  override insert(collection: string, version: VersionInsert): PhysicalId {
    if (collection === this.faults.insert) {
      throw new Error(`disk I/O error on ${collection}`);
    }
    return super.insert(collection, version);
  }

  override update(collection: string, physicalId: PhysicalId, patch: VersionUpdate): number {
    if (collection === this.faults.update) {
      throw new Error(`disk I/O error on ${collection}`);
    }
    return super.update(collection, physicalId, patch);
  }
}

/**
 * Inserts a row of the live dataset, the way published content exists
 * before any agent touches it
 */
export function seedLive(gateway: StorageGateway, collection: string, attributes: Attributes): PhysicalId {
  return gateway.insert(collection, {
    originId: 0,
    draftContextId: 0,
    state: VersionState.LIVE,
    attributes,
  });
}

/**
 * Error thrown by `fn`, or undefined when it returns
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
