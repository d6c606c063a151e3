import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigFileSchema, ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, writeYaml, formatZodError } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/** Environment variable overriding the skelly home directory. */
export const HOME_ENV = 'SKELLY_HOME';

const CONFIG_FILE = 'config.yaml';

const STRING_KEYS = ['projects_dir', 'editor', 'default_template', 'templates_dir'] as const;
type StringKey = (typeof STRING_KEYS)[number];

function isStringKey(key: string): key is StringKey {
  return (STRING_KEYS as readonly string[]).includes(key);
}

/**
 * Directory holding skelly's own files (`~/.skelly` unless overridden).
 */
export function getSkellyHome(): string {
  return process.env[HOME_ENV] || path.join(os.homedir(), '.skelly');
}

/**
 * Get the expected config file path.
 */
export function getConfigPath(): string {
  return path.join(getSkellyHome(), CONFIG_FILE);
}

/**
 * Templates shipped with the package.
 */
export function getBundledTemplatesDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '../../../templates');
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const fullPath = path.resolve(expandHome(configPath ?? getConfigPath()));

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Write configuration to a file, creating its directory when needed.
 */
export async function saveConfig(config: Config, configPath?: string): Promise<string> {
  const fullPath = path.resolve(expandHome(configPath ?? getConfigPath()));
  try {
    await writeYaml(fullPath, config);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_SAVE,
      `Failed to save config to ${fullPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { path: fullPath }
    );
  }
  return fullPath;
}

/**
 * Read a setting by key. `defaults.<name>` reads a default context value.
 */
export function getConfigValue(config: Config, key: string): string | undefined {
  if (isStringKey(key)) {
    return config[key];
  }
  if (key.startsWith('defaults.')) {
    return config.defaults[key.slice('defaults.'.length)];
  }
  if (key === 'post_create.enabled') {
    return String(config.post_create.enabled);
  }
  if (key === 'post_create.timeout_ms') {
    return String(config.post_create.timeout_ms);
  }
  throw unknownKey(key);
}

/**
 * Return a copy of `config` with one setting changed.
 *
 * @throws ConfigError for unknown keys and values the schema rejects
 */
export function setConfigValue(config: Config, key: string, value: string): Config {
  const next: Config = {
    ...config,
    defaults: { ...config.defaults },
    post_create: { ...config.post_create },
  };

  if (isStringKey(key)) {
    next[key] = value;
  } else if (key.startsWith('defaults.') && key.length > 'defaults.'.length) {
    next.defaults[key.slice('defaults.'.length)] = value;
  } else if (key === 'post_create.enabled') {
    if (value !== 'true' && value !== 'false') {
      throw invalidValue(key, 'expected true or false');
    }
    next.post_create.enabled = value === 'true';
  } else if (key === 'post_create.timeout_ms') {
    next.post_create.timeout_ms = Number(value);
  } else {
    throw unknownKey(key);
  }

  const result = ConfigSchema.safeParse(next);
  if (!result.success) {
    throw invalidValue(key, formatZodError(result.error));
  }
  return result.data;
}

/**
 * Template repository for a config: `templates_dir` if set, otherwise the
 * bundled templates.
 */
export function resolveTemplatesDir(config: Config): string {
  return config.templates_dir
    ? path.resolve(expandHome(config.templates_dir))
    : getBundledTemplatesDir();
}

function unknownKey(key: string): ConfigError {
  return new ConfigError(ErrorCodes.CONFIG_KEY, `Unknown setting: ${key}`, { key });
}

function invalidValue(key: string, reason: string): ConfigError {
  return new ConfigError(ErrorCodes.CONFIG_VALUE, `Invalid value for ${key}: ${reason}`, { key });
}
