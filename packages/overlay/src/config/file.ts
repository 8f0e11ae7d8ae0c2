/**
 * Configuration File Loading
 *
 * Discovery of `.palimpsest/config.yaml` and conversion of its snake_case
 * keys into the internal configuration shape.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, isAttributeObject } from '@palimpsest/core';
import type {
  PartialConfiguration,
  ConfigFileDiscovery,
  DraftsConfig,
  ReadConfig,
  AccessConfig,
  PrincipalAccess,
} from './types.js';
import { EnvVars } from './types.js';
import { CONFIG_DIR } from './defaults.js';
import { readString, readBoolean, readInteger, readStringList, readSection } from './readers.js';

export const CONFIG_FILE_NAME = 'config.yaml';

// ============================================================================
// File Discovery
// ============================================================================

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

/**
 * Finds the nearest .palimpsest directory, checking PALIMPSEST_ROOT before
 * walking up from `startDir`
 */
export function findConfigDir(
  startDir: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const envRoot = env[EnvVars.ROOT];
  if (envRoot) {
    const candidate = path.join(envRoot, CONFIG_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
  }

  let currentDir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(currentDir, CONFIG_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(overridePath);
    return { path: resolvedPath, exists: fs.existsSync(resolvedPath) };
  }

  const configDir = findConfigDir(startDir, env);
  if (!configDir) {
    return { path: undefined, exists: false };
  }
  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  return { path: configPath, exists: fs.existsSync(configPath) };
}

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parses YAML content into a plain object
 */
export function parseYamlConfig(content: string, filePath?: string): Record<string, unknown> {
  const where = filePath ? ` (${filePath})` : '';
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${where}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isAttributeObject(parsed)) {
    throw new ValidationError(
      `Configuration file must contain an object${where}`,
      ErrorCode.INVALID_INPUT,
      { filePath, value: parsed }
    );
  }
  return parsed;
}

// ============================================================================
// Conversion
// ============================================================================

function convertDrafts(section: Record<string, unknown>): Partial<DraftsConfig> {
  const drafts: Partial<DraftsConfig> = {};
  const autoCreate = readBoolean(section, 'auto_create', 'drafts.auto_create');
  if (autoCreate !== undefined) {
    drafts.autoCreate = autoCreate;
  }
  const titleTemplate = readString(section, 'title_template', 'drafts.title_template');
  if (titleTemplate !== undefined) {
    drafts.titleTemplate = titleTemplate;
  }
  return drafts;
}

function convertRead(section: Record<string, unknown>): Partial<ReadConfig> {
  const read: Partial<ReadConfig> = {};
  const defaultLimit = readInteger(section, 'default_limit', 'read.default_limit');
  if (defaultLimit !== undefined) {
    read.defaultLimit = defaultLimit;
  }
  const maxLimit = readInteger(section, 'max_limit', 'read.max_limit');
  if (maxLimit !== undefined) {
    read.maxLimit = maxLimit;
  }
  const embedChildren = readBoolean(section, 'embed_children', 'read.embed_children');
  if (embedChildren !== undefined) {
    read.embedChildren = embedChildren;
  }
  return read;
}

function convertAccess(section: Record<string, unknown>): Partial<AccessConfig> {
  const access: Partial<AccessConfig> = {};

  const readOnly = readStringList(section, 'read_only_collections', 'access.read_only_collections');
  if (readOnly !== undefined) {
    access.readOnlyCollections = readOnly;
  }
  const restricted = readStringList(section, 'restricted_collections', 'access.restricted_collections');
  if (restricted !== undefined) {
    access.restrictedCollections = restricted;
  }

  const excluded = readSection(section, 'excluded_attributes', 'access.excluded_attributes');
  if (excluded !== undefined) {
    const excludedAttributes: Record<string, string[]> = {};
    for (const collection of Object.keys(excluded)) {
      excludedAttributes[collection] =
        readStringList(excluded, collection, `access.excluded_attributes.${collection}`) ?? [];
    }
    access.excludedAttributes = excludedAttributes;
  }

  const principals = readSection(section, 'principals', 'access.principals');
  if (principals !== undefined) {
    const result: Record<string, PrincipalAccess> = {};
    for (const principal of Object.keys(principals)) {
      const field = `access.principals.${principal}`;
      const entry = readSection(principals, principal, field) ?? {};
      const rules: PrincipalAccess = {};
      const collections = readStringList(entry, 'collections', `${field}.collections`);
      if (collections !== undefined) {
        rules.collections = collections;
      }
      const principalReadOnly = readBoolean(entry, 'read_only', `${field}.read_only`);
      if (principalReadOnly !== undefined) {
        rules.readOnly = principalReadOnly;
      }
      result[principal] = rules;
    }
    access.principals = result;
  }

  return access;
}

/**
 * Converts a parsed YAML document (snake_case) into a partial configuration.
 * Relative paths are resolved against `baseDir` when one is given.
 */
export function convertYamlToConfig(
  yamlConfig: Record<string, unknown>,
  baseDir?: string
): PartialConfiguration {
  const result: PartialConfiguration = {};
  const resolve = (value: string): string => (baseDir ? path.resolve(baseDir, value) : value);

  const database = readString(yamlConfig, 'database', 'database');
  if (database !== undefined) {
    result.database = database === ':memory:' ? database : resolve(database);
  }
  const readonly = readBoolean(yamlConfig, 'readonly', 'readonly');
  if (readonly !== undefined) {
    result.readonly = readonly;
  }
  const schema = readString(yamlConfig, 'schema', 'schema');
  if (schema !== undefined) {
    result.schema = resolve(schema);
  }

  const drafts = readSection(yamlConfig, 'drafts', 'drafts');
  if (drafts) {
    result.drafts = convertDrafts(drafts);
  }
  const read = readSection(yamlConfig, 'read', 'read');
  if (read) {
    result.read = convertRead(read);
  }
  const access = readSection(yamlConfig, 'access', 'access');
  if (access) {
    result.access = convertAccess(access);
  }

  return result;
}

/**
 * Reads and converts a configuration file. Relative paths inside the file
 * are resolved against the file's directory.
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(
      `Cannot read configuration file ${filePath}`,
      ErrorCode.INVALID_INPUT,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }
  return convertYamlToConfig(parseYamlConfig(content, filePath), path.dirname(filePath));
}
