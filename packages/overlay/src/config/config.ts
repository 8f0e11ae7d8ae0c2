/**
 * Configuration Access API
 *
 * Precedence: overrides > environment > file > defaults.
 */

import type {
  Configuration,
  PartialConfiguration,
  LoadConfigOptions,
  LoadedConfiguration,
  ConfigSource,
} from './types.js';
import { ConfigSource as Sources } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { mergeConfiguration, cloneConfiguration } from './merge.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { loadEnvConfig, getEnvConfigPath } from './env.js';

// ============================================================================
// Configuration State
// ============================================================================

let cached: LoadedConfiguration | null = null;

// ============================================================================
// Loading
// ============================================================================

const SECTIONS = ['database', 'readonly', 'schema', 'drafts', 'read', 'access'] as const;

function markSources(
  sources: LoadedConfiguration['sources'],
  partial: PartialConfiguration,
  source: ConfigSource
): void {
  for (const key of SECTIONS) {
    if (partial[key] !== undefined) {
      sources[key] = source;
    }
  }
}

/**
 * Loads configuration from every source and validates the result.
 * A config file that exists but cannot be parsed is an error.
 */
export function loadConfigWithSources(options: LoadConfigOptions = {}): LoadedConfiguration {
  const env = options.env ?? process.env;
  let config = getDefaultConfig();
  const sources: LoadedConfiguration['sources'] = {
    database: Sources.DEFAULT,
    readonly: Sources.DEFAULT,
    schema: Sources.DEFAULT,
    drafts: Sources.DEFAULT,
    read: Sources.DEFAULT,
    access: Sources.DEFAULT,
  };

  let filePath: string | undefined;
  if (!options.skipFile) {
    const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
    const discovery = discoverConfigFile(options.configPath ?? envConfigPath, options.startDir, env);
    if (discovery.exists && discovery.path) {
      const fileConfig = readConfigFile(discovery.path);
      config = mergeConfiguration(config, fileConfig);
      markSources(sources, fileConfig, Sources.FILE);
      filePath = discovery.path;
    }
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig(env);
    config = mergeConfiguration(config, envConfig);
    markSources(sources, envConfig, Sources.ENVIRONMENT);
  }

  if (options.overrides) {
    validatePartialConfiguration(options.overrides);
    config = mergeConfiguration(config, options.overrides);
    markSources(sources, options.overrides, Sources.OVERRIDE);
  }

  validateConfiguration(config);
  return { config, filePath, sources };
}

export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  cached = loadConfigWithSources(options);
  return cloneConfiguration(cached.config);
}

/**
 * Returns the cached configuration, loading it on first use
 */
export function getConfig(): Configuration {
  if (cached === null) {
    cached = loadConfigWithSources();
  }
  return cloneConfiguration(cached.config);
}

export function getConfigSource(section: keyof Configuration): ConfigSource {
  if (cached === null) {
    cached = loadConfigWithSources();
  }
  return cached.sources[section];
}

export function reloadConfig(options: LoadConfigOptions = {}): Configuration {
  cached = null;
  return loadConfig(options);
}

export function clearConfigCache(): void {
  cached = null;
}
