/**
 * Configuration Types
 *
 * Sources are layered with the precedence overrides > environment > file >
 * defaults.
 */

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Draft context settings
 */
export interface DraftsConfig {
  /** Create a draft context on the first write of a principal (default: true) */
  autoCreate: boolean;
  /** Title of new contexts; `{principal}` is replaced (default: 'Agent drafts for {principal}') */
  titleTemplate: string;
}

/**
 * Read settings
 */
export interface ReadConfig {
  /** Page size when a read does not give a limit (default: 20) */
  defaultLimit: number;
  /** Upper bound for requested page sizes (default: 200) */
  maxLimit: number;
  /** Attach embedded children to read results (default: true) */
  embedChildren: boolean;
}

/**
 * Per-principal restrictions
 */
export interface PrincipalAccess {
  /** Only these collections are visible to the principal */
  collections?: string[];
  /** The principal may only read */
  readOnly?: boolean;
}

/**
 * Access rules used by the configured access gate
 */
export interface AccessConfig {
  /** Collections that may be read but not written */
  readOnlyCollections: string[];
  /** Collections that may not be accessed at all */
  restrictedCollections: string[];
  /** Attributes hidden from every principal, per collection */
  excludedAttributes: Record<string, string[]>;
  principals: Record<string, PrincipalAccess>;
}

/**
 * Complete configuration
 */
export interface Configuration {
  /** SQLite database file (default: '.palimpsest/palimpsest.db') */
  database: string;
  /** Open the database read-only (default: false) */
  readonly: boolean;
  /** Collection catalog YAML file (default: '.palimpsest/collections.yaml') */
  schema: string;
  drafts: DraftsConfig;
  read: ReadConfig;
  access: AccessConfig;
}

/**
 * Partial configuration for merging
 */
export interface PartialConfiguration {
  database?: string;
  readonly?: boolean;
  schema?: string;
  drafts?: Partial<DraftsConfig>;
  read?: Partial<ReadConfig>;
  access?: Partial<AccessConfig>;
}

// ============================================================================
// Configuration Sources
// ============================================================================

export const ConfigSource = {
  DEFAULT: 'default',
  FILE: 'file',
  ENVIRONMENT: 'environment',
  OVERRIDE: 'override',
} as const;

export type ConfigSource = (typeof ConfigSource)[keyof typeof ConfigSource];

// ============================================================================
// Environment Variables
// ============================================================================

export const EnvVars = {
  /** Project root holding the .palimpsest directory */
  ROOT: 'PALIMPSEST_ROOT',
  /** Explicit config file */
  CONFIG: 'PALIMPSEST_CONFIG',
  DB: 'PALIMPSEST_DB',
  DB_READONLY: 'PALIMPSEST_DB_READONLY',
  SCHEMA: 'PALIMPSEST_SCHEMA',
  DRAFTS_AUTO_CREATE: 'PALIMPSEST_DRAFTS_AUTO_CREATE',
  READ_LIMIT: 'PALIMPSEST_READ_LIMIT',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

// ============================================================================
// Loading Options
// ============================================================================

export interface LoadConfigOptions {
  /** Config file to read instead of discovering one */
  configPath?: string;
  /** Directory the discovery walk starts from (default: cwd) */
  startDir?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  skipEnv?: boolean;
  skipFile?: boolean;
  /** Highest-precedence values, e.g. from a command line */
  overrides?: PartialConfiguration;
}

export interface ConfigFileDiscovery {
  /** Resolved file path, if one was found or given */
  path: string | undefined;
  exists: boolean;
}

export interface LoadedConfiguration {
  config: Configuration;
  /** Config file that contributed values, if any */
  filePath: string | undefined;
  /** Source of each top-level section */
  sources: Record<keyof Configuration, ConfigSource>;
}
