export {
  ConfigSchema,
  ConfigDefaults,
  type RawConfig,
  type Config,
  type ProviderName,
  type OutputFormat,
  type VerificationConfig,
} from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
