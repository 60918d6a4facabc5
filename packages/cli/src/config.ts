/**
 * Configuration Loader for glyph-lex
 * Loads and validates .glyph-lex.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.glyph-lex.yaml';

const KNOWN_KEYS = ['format', 'showEof'];

// ============================================================
// TYPES
// ============================================================

export type OutputFormat = 'text' | 'json';

export interface LexConfig {
  readonly format: OutputFormat;
  /** Print the EOF sentinel token */
  readonly showEof: boolean;
}

export function createDefaultConfig(): LexConfig {
  return { format: 'text', showEof: true };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function validateConfig(data: unknown): asserts data is {
  format?: OutputFormat;
  showEof?: boolean;
} {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
    if (key === 'format' && !isOutputFormat(value)) {
      throw new Error(
        `Invalid configuration: format has invalid value "${String(value)}" (must be 'text' or 'json')`
      );
    }
    if (key === 'showEof' && typeof value !== 'boolean') {
      throw new Error('Invalid configuration: showEof must be a boolean');
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .glyph-lex.yaml in the specified directory.
 * Missing keys take their default values.
 *
 * @returns LexConfig, or null if the file does not exist
 * @throws Error with "Invalid configuration: {reason}" for unreadable or invalid files
 */
export function loadConfig(cwd: string): LexConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
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
    format: parsedData.format ?? defaults.format,
    showEof: parsedData.showEof ?? defaults.showEof,
  };
}
