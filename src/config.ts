/**
 * Configuration Loader
 * Loads and validates manifold.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError } from './types.js';
import { DEFAULT_MAX_DEPTH } from './runtime/core/compilation.js';
import { DEFAULT_LOG_LEVEL, isLogLevel, type LogLevel } from './logger.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name, looked up beside the manifest */
export const CONFIG_FILE_NAME = 'manifold.config.yaml';

export interface ManifoldConfig {
  /** Reading an unassigned variable is an error instead of undef */
  readonly strictVariables: boolean;
  /** Limit on nested calls, define instances and class evaluations */
  readonly maxDepth: number;
  readonly logLevel: LogLevel;
  /** Resource types accepted in addition to the native ones */
  readonly resourceTypes: readonly string[];
}

export function createDefaultConfig(): ManifoldConfig {
  return {
    strictVariables: false,
    maxDepth: DEFAULT_MAX_DEPTH,
    logLevel: DEFAULT_LOG_LEVEL,
    resourceTypes: [],
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate configuration structure and values, filling unset keys with
 * defaults.
 *
 * @throws ConfigError on a non-mapping document, unknown key or bad value
 */
export function validateConfig(data: unknown, file?: string): ManifoldConfig {
  // An empty document parses to null
  if (data === null || data === undefined) {
    return createDefaultConfig();
  }
  if (!isRecord(data)) {
    throw new ConfigError('must be a mapping', file);
  }

  let config = createDefaultConfig();

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'strictVariables':
        if (typeof value !== 'boolean') {
          throw new ConfigError('strictVariables must be a boolean', file);
        }
        config = { ...config, strictVariables: value };
        break;
      case 'maxDepth':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
          throw new ConfigError('maxDepth must be a positive integer', file);
        }
        config = { ...config, maxDepth: value };
        break;
      case 'logLevel':
        if (!isLogLevel(value)) {
          throw new ConfigError(
            `logLevel has invalid value "${String(value)}" (must be 'error', 'warn', 'info', or 'debug')`,
            file
          );
        }
        config = { ...config, logLevel: value };
        break;
      case 'resourceTypes':
        if (!isStringArray(value)) {
          throw new ConfigError('resourceTypes must be a list of strings', file);
        }
        config = { ...config, resourceTypes: value };
        break;
      default:
        throw new ConfigError(`unknown key ${key}`, file);
    }
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load and validate a configuration file.
 *
 * @throws ConfigError if the file cannot be read, is not valid YAML or
 * fails validation
 */
export function loadConfigFile(configPath: string): ManifoldConfig {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`,
      configPath
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`,
      configPath
    );
  }

  return validateConfig(parsedData, configPath);
}

/**
 * Load manifold.config.yaml from a directory.
 *
 * @returns the configuration, or null when the directory has none
 */
export function loadConfig(dir: string): ManifoldConfig | null {
  const configPath = join(dir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return null;
  }
  return loadConfigFile(configPath);
}
