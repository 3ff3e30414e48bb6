/**
 * Configuration loader for Fathom
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  type FathomConfig,
  type FathomConfigInput,
  validateConfig,
} from './schema.js';
import { getDataDir } from './paths.js';

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILE_NAMES = [
  'fathom.config.json',
  'fathom.json',
  '.fathomrc.json',
  'fathom.config.yaml',
  'fathom.config.yml',
];

/**
 * Map of environment variable names to configuration paths
 * All environment variables use the FATHOM_ prefix.
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  // Registry
  FATHOM_DATABASE_PATH: ['storage', 'databasePath'],
  // Vector storage
  FATHOM_VECTOR_PROVIDER: ['vectorStorage', 'provider'],
  FATHOM_VECTOR_DATABASE_PATH: ['vectorStorage', 'sqliteVec', 'databasePath'],
  FATHOM_QDRANT_URL: ['vectorStorage', 'qdrant', 'url'],
  FATHOM_QDRANT_API_KEY: ['vectorStorage', 'qdrant', 'apiKey'],
  // Embedding
  FATHOM_EMBEDDING_PROVIDER: ['embedding', 'provider'],
  FATHOM_EMBEDDING_MODEL: ['embedding', 'model'],
  FATHOM_EMBEDDING_DIMENSIONS: ['embedding', 'dimensions'],
  FATHOM_EMBEDDING_BATCH_SIZE: ['embedding', 'batchSize'],
  FATHOM_EMBEDDING_REMOTE_URL: ['embedding', 'remoteUrl'],
  FATHOM_EMBEDDING_REMOTE_API_KEY: ['embedding', 'remoteApiKey'],
  // Indexing
  FATHOM_PRUNE_ORPHANS: ['indexing', 'pruneOrphans'],
  FATHOM_LOCK_DIR: ['indexing', 'lockDir'],
  // External tools
  FATHOM_RG_COMMAND: ['literal', 'command'],
  FATHOM_RG_TIMEOUT_MS: ['literal', 'timeoutMs'],
  FATHOM_SCIP_INDEX_DIR: ['structural', 'indexDir'],
  FATHOM_SCIP_COMMAND: ['structural', 'command'],
  FATHOM_SCIP_TIMEOUT_MS: ['structural', 'timeoutMs'],
  // Dependency sources
  FATHOM_DEPS_CACHE_DIR: ['dependencies', 'cacheDir'],
  FATHOM_DEPS_DIR: ['dependencies', 'extractDir'],
  // Search
  FATHOM_SEARCH_DEFAULT_TOP_K: ['search', 'defaultTopK'],
  FATHOM_SEARCH_MAX_TOP_K: ['search', 'maxTopK'],
  // Logging
  FATHOM_LOG_LEVEL: ['logging', 'level'],
  FATHOM_LOG_FILE: ['logging', 'file'],
  FATHOM_LOG_PRETTY: ['logging', 'pretty'],
};

/**
 * Configuration paths holding integers
 */
const NUMERIC_PATHS = new Set([
  'embedding.dimensions',
  'embedding.batchSize',
  'literal.timeoutMs',
  'structural.timeoutMs',
  'search.defaultTopK',
  'search.maxTopK',
]);

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error raised when a configuration file cannot be read or parsed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace those in `target`
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: PlainObject, path: string[], value: unknown): void {
  let current = obj;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.has(path.join('.'))) {
    const num = parseInt(value, 10);
    if (!isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Global configuration file inside the data directory
 */
export function getGlobalConfigPath(): string {
  return join(getDataDir(), 'config.json');
}

/**
 * Find configuration file in the given directory or up the directory tree,
 * falling back to the global config file
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(currentDir, '..');
    if (parent === currentDir) break;
    currentDir = parent;
  }

  const globalPath = getGlobalConfigPath();
  return existsSync(globalPath) ? globalPath : null;
}

/**
 * Load configuration from a JSON or YAML file
 */
function loadFileConfig(filePath: string): PlainObject {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    const ext = extname(filePath).toLowerCase();
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to load configuration from ${filePath}: ${message}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(
      `Configuration in ${filePath} must be an object`,
      filePath
    );
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: FathomConfigInput;
}

/**
 * Load and validate Fathom configuration
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): FathomConfig {
  let config: PlainObject = {};

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Create a configuration instance with partial overrides, ignoring files and environment
 */
export function createConfig(overrides: FathomConfigInput = {}): FathomConfig {
  return loadConfig({ skipFile: true, skipEnv: true, overrides });
}
