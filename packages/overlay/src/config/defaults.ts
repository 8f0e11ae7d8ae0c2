/**
 * Configuration Defaults
 */

import type { Configuration, DraftsConfig, ReadConfig, AccessConfig } from './types.js';

/** Directory holding the config file, database and catalog */
export const CONFIG_DIR = '.palimpsest';

export const DEFAULT_DRAFTS_CONFIG: DraftsConfig = {
  autoCreate: true,
  titleTemplate: 'Agent drafts for {principal}',
};

export const DEFAULT_READ_CONFIG: ReadConfig = {
  defaultLimit: 20,
  maxLimit: 200,
  embedChildren: true,
};

export const DEFAULT_ACCESS_CONFIG: AccessConfig = {
  readOnlyCollections: [],
  restrictedCollections: [],
  excludedAttributes: {},
  principals: {},
};

/** Hard ceiling for read.maxLimit */
export const MAX_READ_LIMIT = 1000;

export const DEFAULT_CONFIG: Configuration = {
  database: `${CONFIG_DIR}/palimpsest.db`,
  readonly: false,
  schema: `${CONFIG_DIR}/collections.yaml`,
  drafts: DEFAULT_DRAFTS_CONFIG,
  read: DEFAULT_READ_CONFIG,
  access: DEFAULT_ACCESS_CONFIG,
};

/**
 * Returns a fresh copy of the defaults
 */
export function getDefaultConfig(): Configuration {
  return {
    database: DEFAULT_CONFIG.database,
    readonly: DEFAULT_CONFIG.readonly,
    schema: DEFAULT_CONFIG.schema,
    drafts: { ...DEFAULT_DRAFTS_CONFIG },
    read: { ...DEFAULT_READ_CONFIG },
    access: {
      readOnlyCollections: [],
      restrictedCollections: [],
      excludedAttributes: {},
      principals: {},
    },
  };
}
