import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { ConfigSchema, ConfigDefaults, type Config, type ProviderName } from './schema.js';

const DEFAULT_CONFIG_PATH = '.corroborate/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

const PROVIDER_NAMES: readonly ProviderName[] = ['deepseek', 'openai', 'anthropic', 'google'];

/** Standard env vars consulted, in order, for each provider's API key. */
const API_KEY_ENV_VARS: Record<ProviderName, readonly string[]> = {
  deepseek: ['DEEPSEEK_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

function firstEnvVar(names: readonly string[]): string | undefined {
  return names.find(name => process.env[name]);
}

/**
 * Apply environment variable fallbacks for API keys.
 * If a provider's api_key is not set or is an unresolved env ref, check the standard env var.
 */
function applyEnvVarFallbacks(config: Config): void {
  for (const name of PROVIDER_NAMES) {
    const provider = config.providers[name];
    if (isUnresolvedEnvRef(provider.api_key)) {
      provider.api_key = undefined;
    }
    if (!provider.api_key) {
      const envName = firstEnvVar(API_KEY_ENV_VARS[name]);
      if (envName) {
        provider.api_key = process.env[envName];
      }
    }
  }
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

function readConfigDocument(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  try {
    return parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  const result: Config = structuredClone(ConfigDefaults);
  let baseUrlFromFile = false;
  let primaryModelFromFile = false;

  const rawConfig = configFileExists ? readConfigDocument(configPath) : undefined;

  if (rawConfig !== null && rawConfig !== undefined) {
    const resolvedConfig = resolveEnvVarsInObject(stripNullValues(rawConfig));
    const validated = ConfigSchema.safeParse(resolvedConfig);

    if (!validated.success) {
      const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
      throw new ConfigError(`Invalid config: ${issues}`);
    }

    const { providers, verification, output } = validated.data;
    if (providers) {
      result.providers = {
        deepseek: { ...result.providers.deepseek, ...providers.deepseek },
        openai: { ...result.providers.openai, ...providers.openai },
        anthropic: { ...result.providers.anthropic, ...providers.anthropic },
        google: { ...result.providers.google, ...providers.google },
      };
      baseUrlFromFile = providers.deepseek?.base_url !== undefined;
      primaryModelFromFile = providers.deepseek?.default_model !== undefined;
    }
    if (verification) {
      result.verification = { ...result.verification, ...verification };
    }
    if (output) {
      result.output = { ...result.output, ...output };
    }
  }

  // Track which env vars provide API keys (before applying fallbacks)
  const envKeysUsed: string[] = [];
  for (const name of PROVIDER_NAMES) {
    const apiKey = result.providers[name].api_key;
    if (apiKey && !isUnresolvedEnvRef(apiKey)) continue;
    const envName = firstEnvVar(API_KEY_ENV_VARS[name]);
    if (envName) {
      envKeysUsed.push(envName);
    }
  }

  applyEnvVarFallbacks(result);

  const deepseek = result.providers.deepseek;
  if (isUnresolvedEnvRef(deepseek.base_url)) {
    baseUrlFromFile = false;
    deepseek.base_url = ConfigDefaults.providers.deepseek.base_url;
  }
  const envBaseUrl = process.env['DEEPSEEK_BASE_URL'];
  if (!baseUrlFromFile && envBaseUrl) {
    deepseek.base_url = envBaseUrl;
  }
  const envModel = process.env['DEEPSEEK_MODEL'];
  if (!primaryModelFromFile && envModel) {
    deepseek.default_model = envModel;
  }

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): unknown {
  // Flow sequences such as "[deepseek-chat, gpt-4o]" set list keys
  if (value.trim().startsWith('[')) {
    try {
      return parse(value);
    } catch {
      throw new ConfigError(`Invalid list value: ${value}`);
    }
  }
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'corroborate config init' first.`);
  }

  const parsed = readConfigDocument(configPath);
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  // Navigate dot-notation key
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey || keys.some(k => k === '')) {
    throw new ConfigError(`Invalid config key: ${key}`);
  }

  let current = doc;
  for (const segment of keys) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  current[lastKey] = coerceValue(value);

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid config after setting ${key}: ${issues}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}
