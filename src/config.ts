/**
 * Configuration Loader for mixup
 * Loads and validates mixup.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_TOKEN_PATTERN } from './text/tokenizer.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'mixup.config.yaml';

export interface MixupConfig {
  /** Directories searched for word lists, phrase lists and annotators */
  readonly searchPaths: readonly string[];
  /** Regex source for the base tokenizer */
  readonly tokenPattern: string;
  readonly verbose: boolean;
}

/** Raw file contents after validation; every field optional */
interface ConfigFile {
  searchPaths?: string[];
  tokenPattern?: string;
  verbose?: boolean;
}

export function createDefaultConfig(): MixupConfig {
  return {
    searchPaths: [],
    tokenPattern: DEFAULT_TOKEN_PATTERN,
    verbose: false,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

const KNOWN_FIELDS = new Set(['searchPaths', 'tokenPattern', 'verbose']);

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is ConfigFile {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_FIELDS.has(key)) {
      throw new Error(`Invalid configuration: unknown field ${key}`);
    }
  }

  if ('searchPaths' in data && !isStringArray(data['searchPaths'])) {
    throw new Error(
      'Invalid configuration: searchPaths must be a list of strings'
    );
  }

  if ('tokenPattern' in data) {
    const pattern = data['tokenPattern'];
    if (typeof pattern !== 'string' || pattern === '') {
      throw new Error(
        'Invalid configuration: tokenPattern must be a non-empty string'
      );
    }
    try {
      new RegExp(pattern, 'g');
    } catch (err) {
      throw new Error(
        `Invalid configuration: tokenPattern is not a valid regex (${err instanceof Error ? err.message : String(err)})`
      );
    }
  }

  if ('verbose' in data && typeof data['verbose'] !== 'boolean') {
    throw new Error('Invalid configuration: verbose must be true or false');
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text. Relative search paths are resolved against
 * `baseDir`, the directory the file lives in.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfig(text: string, baseDir: string): MixupConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // An empty file parses to null
  if (parsedData === null || parsedData === undefined) {
    return createDefaultConfig();
  }

  validateConfig(parsedData);

  const defaults = createDefaultConfig();
  return {
    searchPaths: (parsedData.searchPaths ?? []).map((dir) =>
      resolve(baseDir, dir)
    ),
    tokenPattern: parsedData.tokenPattern ?? defaults.tokenPattern,
    verbose: parsedData.verbose ?? defaults.verbose,
  };
}

/**
 * Load configuration from an explicit path, or from mixup.config.yaml in
 * `cwd` when no path is given.
 *
 * @returns Defaults when no path is given and the file is absent
 * @throws Error with "Invalid configuration: {reason}"
 */
export function loadConfig(cwd: string, configPath?: string): MixupConfig {
  const file = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(file)) {
    if (configPath) {
      throw new Error(`Invalid configuration: file not found: ${file}`);
    }
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent, dirname(file));
}
