/**
 * Configuration Merging
 *
 * Field-by-field merge: defined values in the partial win, lists and maps
 * are replaced rather than combined.
 */

import type { Configuration, PartialConfiguration, AccessConfig } from './types.js';

function pick<T>(override: T | undefined, base: T): T {
  return override !== undefined ? override : base;
}

export function mergeConfiguration(
  base: Configuration,
  partial: PartialConfiguration
): Configuration {
  return {
    database: pick(partial.database, base.database),
    readonly: pick(partial.readonly, base.readonly),
    schema: pick(partial.schema, base.schema),
    drafts: {
      autoCreate: pick(partial.drafts?.autoCreate, base.drafts.autoCreate),
      titleTemplate: pick(partial.drafts?.titleTemplate, base.drafts.titleTemplate),
    },
    read: {
      defaultLimit: pick(partial.read?.defaultLimit, base.read.defaultLimit),
      maxLimit: pick(partial.read?.maxLimit, base.read.maxLimit),
      embedChildren: pick(partial.read?.embedChildren, base.read.embedChildren),
    },
    access: {
      readOnlyCollections: pick(partial.access?.readOnlyCollections, base.access.readOnlyCollections),
      restrictedCollections: pick(partial.access?.restrictedCollections, base.access.restrictedCollections),
      excludedAttributes: pick(partial.access?.excludedAttributes, base.access.excludedAttributes),
      principals: pick(partial.access?.principals, base.access.principals),
    },
  };
}

function cloneAccess(access: AccessConfig): AccessConfig {
  const excludedAttributes: Record<string, string[]> = {};
  for (const [collection, attributes] of Object.entries(access.excludedAttributes)) {
    excludedAttributes[collection] = [...attributes];
  }
  const principals: AccessConfig['principals'] = {};
  for (const [principal, rules] of Object.entries(access.principals)) {
    principals[principal] = {
      ...rules,
      ...(rules.collections ? { collections: [...rules.collections] } : {}),
    };
  }
  return {
    readOnlyCollections: [...access.readOnlyCollections],
    restrictedCollections: [...access.restrictedCollections],
    excludedAttributes,
    principals,
  };
}

/**
 * Deep copy, so callers cannot mutate a cached configuration
 */
export function cloneConfiguration(config: Configuration): Configuration {
  return {
    database: config.database,
    readonly: config.readonly,
    schema: config.schema,
    drafts: { ...config.drafts },
    read: { ...config.read },
    access: cloneAccess(config.access),
  };
}
