/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { ProviderNameSchema } from '../types/ai.js';
import { AnalysisModeSchema } from '../types/document.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { ConfigSchema, LogThresholdSchema, type Config } from './schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';
export * from './providers.js';

type PlainObject = Record<string, unknown>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('docsurvey', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  /** Directory searched for a project config file */
  cwd?: string;
  /** Explicit config file; bypasses the search and must exist */
  configPath?: string;
  /** Read ~/.docsurvey/config.yaml (default true) */
  includeGlobal?: boolean;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge configuration objects. Arrays and scalars from the source
 * replace the target's; nested objects merge key by key.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function describeIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load global configuration from ~/.docsurvey/config.yaml
 */
async function loadGlobalConfig(logger: Logger): Promise<PlainObject> {
  const globalConfigPath = path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch {
    // Global config doesn't exist
    return {};
  }

  try {
    const parsed: unknown = parseYaml(content);
    return isPlainObject(parsed) ? parsed : {};
  } catch (error) {
    logger.warn('config', `Ignoring invalid global config ${globalConfigPath}: ${errorMessage(error)}`);
    return {};
  }
}

/**
 * Load project-specific configuration found by searching from cwd
 */
async function loadProjectConfig(cwd: string | undefined, logger: Logger): Promise<PlainObject> {
  try {
    explorer.clearCaches();
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty && isPlainObject(result.config)) {
      logger.info('config', `Loaded configuration from ${result.filepath}`);
      return result.config;
    }
  } catch (error) {
    logger.warn('config', `Failed to load config file: ${errorMessage(error)}`);
  }
  return {};
}

/**
 * Load an explicitly named configuration file
 *
 * @throws ConfigError when the file is missing or is not a YAML mapping
 */
async function loadExplicitConfig(configPath: string): Promise<PlainObject> {
  const resolved = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${errorMessage(error)}`, resolved);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${resolved}: ${errorMessage(error)}`, resolved);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${resolved} must contain a mapping`, resolved);
  }
  return parsed;
}

/**
 * Load configuration overrides from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const config: PlainObject = {};

  const provider = ProviderNameSchema.safeParse(env[ENV_VARS.DEFAULT_PROVIDER]);
  if (provider.success) {
    config.ai_providers = { default: provider.data };
  }

  const mode = AnalysisModeSchema.safeParse(env[ENV_VARS.ANALYSIS_MODE]);
  if (mode.success) {
    config.analysis = { mode: mode.data };
  }

  const reportsDir = env[ENV_VARS.REPORTS_DIR];
  if (reportsDir) {
    config.reports = { dir: reportsDir };
  }

  const level = LogThresholdSchema.safeParse(env[ENV_VARS.LOG_LEVEL]);
  if (level.success) {
    config.logging = { level: level.data };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > explicit or project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const logger = options.logger ?? silentLogger;

  const globalConfig = options.includeGlobal === false ? {} : await loadGlobalConfig(logger);
  const fileConfig = options.configPath
    ? await loadExplicitConfig(options.configPath)
    : await loadProjectConfig(options.cwd, logger);
  const envConfig = loadEnvConfig(options.env);

  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, fileConfig);
  merged = deepMerge(merged, envConfig);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = describeIssues(result.error);
    if (options.configPath) {
      throw new ConfigError(`Invalid configuration: ${issues}`, path.resolve(options.configPath));
    }
    logger.warn('config', `Configuration validation failed, using defaults: ${issues}`);
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Search for the project config file
 *
 * @returns Absolute path, or null when defaults are in use
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  try {
    explorer.clearCaches();
    const result = await explorer.search(cwd);
    return result?.filepath ?? null;
  } catch {
    // An unparsable file still counts as not found
    return null;
  }
}

/**
 * Save configuration as YAML
 *
 * @returns The path written
 */
export async function saveConfig(config: Config, filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, stringifyYaml(config), 'utf-8');
  return resolved;
}

/**
 * Get a specific config value by dotted path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}
