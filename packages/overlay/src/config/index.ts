/**
 * Configuration module
 */

export type {
  Configuration,
  PartialConfiguration,
  DraftsConfig,
  ReadConfig,
  AccessConfig,
  PrincipalAccess,
  LoadConfigOptions,
  LoadedConfiguration,
  ConfigFileDiscovery,
  EnvVar,
} from './types.js';
export { ConfigSource, EnvVars } from './types.js';

export {
  CONFIG_DIR,
  DEFAULT_CONFIG,
  DEFAULT_DRAFTS_CONFIG,
  DEFAULT_READ_CONFIG,
  DEFAULT_ACCESS_CONFIG,
  MAX_READ_LIMIT,
  getDefaultConfig,
} from './defaults.js';

export { parseEnvBoolean, parseEnvPositiveInteger, loadEnvConfig, getEnvConfigPath } from './env.js';

export {
  CONFIG_FILE_NAME,
  findConfigDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
} from './file.js';

export { typeError, readString, readBoolean, readInteger, readStringList, readSection } from './readers.js';

export { mergeConfiguration, cloneConfiguration } from './merge.js';

export {
  validateConfiguration,
  validatePartialConfiguration,
  validateLimit,
  validatePath,
  validateTitleTemplate,
} from './validation.js';

export {
  loadConfig,
  loadConfigWithSources,
  getConfig,
  getConfigSource,
  reloadConfig,
  clearConfigCache,
} from './config.js';
