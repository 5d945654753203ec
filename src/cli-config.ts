/**
 * Configuration Loader for clex
 * Loads and validates .clex.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { CONFIG_ERROR_IDS, ConfigError } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.clex.yaml';

export const OUTPUT_FORMATS = ['human', 'json', 'compact'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ClexConfig {
  readonly strictAssign: boolean;
  readonly format: OutputFormat;
  /** Stop reporting after this many errors; undefined means no limit */
  readonly maxErrors: number | undefined;
}

export function createDefaultConfig(): ClexConfig {
  return { strictAssign: true, format: 'human', maxErrors: undefined };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function invalid(reason: string): ConfigError {
  return new ConfigError(CONFIG_ERROR_IDS.INVALID_CONFIG, { reason });
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * A null document (empty file) yields the defaults.
 */
export function validateConfig(data: unknown): ClexConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw invalid('must be a mapping');
  }

  let { strictAssign, format, maxErrors } = defaults;

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'strictAssign':
        if (typeof value !== 'boolean') {
          throw invalid('strictAssign must be a boolean');
        }
        strictAssign = value;
        break;
      case 'format':
        if (!isOutputFormat(value)) {
          throw invalid(`format must be one of ${OUTPUT_FORMATS.join(', ')}`);
        }
        format = value;
        break;
      case 'maxErrors':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
          throw invalid('maxErrors must be a positive integer');
        }
        maxErrors = value;
        break;
      default:
        throw invalid(`unknown key ${key}`);
    }
  }

  return { strictAssign, format, maxErrors };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

export function parseConfig(text: string, path: string): ClexConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new ConfigError(CONFIG_ERROR_IDS.UNREADABLE_CONFIG, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return validateConfig(parsed);
}

/**
 * Load configuration from an explicit path, or from .clex.yaml in `cwd`.
 * A missing .clex.yaml yields the defaults; a missing explicit path is an error.
 *
 * @throws ConfigError when the file cannot be read or fails validation
 */
export function loadConfig(cwd: string, explicitPath?: string): ClexConfig {
  const configPath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);

  if (explicitPath === undefined && !existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(CONFIG_ERROR_IDS.UNREADABLE_CONFIG, {
      path: configPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  return parseConfig(fileContent, configPath);
}
