/**
 * Configuration Loader for quill-call
 * Loads and validates .quillrc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { FileEncoding } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.quillrc.yaml';

const ENCODINGS: readonly FileEncoding[] = ['utf-8', 'utf8', 'ascii', 'latin1'];

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** Encoding for ReadFile and WriteFile */
  readonly encoding: FileEncoding;
  /** Print builtin calls and returns to stderr */
  readonly trace: boolean;
}

export function createDefaultConfig(): CliConfig {
  return { encoding: 'utf-8', trace: false };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEncoding(value: unknown): value is FileEncoding {
  return ENCODINGS.some((encoding) => encoding === value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is {
  encoding?: FileEncoding;
  trace?: boolean;
} {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (key !== 'encoding' && key !== 'trace') {
      throw new Error(`Invalid configuration: unknown key '${key}'`);
    }
  }

  if ('encoding' in data && !isEncoding(data['encoding'])) {
    throw new Error(
      `Invalid configuration: encoding must be one of ${ENCODINGS.join(', ')}`
    );
  }

  if ('trace' in data && typeof data['trace'] !== 'boolean') {
    throw new Error('Invalid configuration: trace must be a boolean');
  }
}

// ============================================================
// LOADING
// ============================================================

/**
 * Parse configuration text.
 * An empty document yields the defaults.
 *
 * @throws Error if the YAML is malformed or fails validation
 */
export function parseConfig(text: string): CliConfig {
  const data: unknown = yaml.parse(text);
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;

  validateConfig(data);
  return {
    encoding: data.encoding ?? defaults.encoding,
    trace: data.trace ?? defaults.trace,
  };
}

/**
 * Load configuration.
 * With an explicit path the file must exist; otherwise .quillrc.yaml in
 * the working directory is used when present, and defaults when not.
 */
export function loadConfig(cwd: string, explicitPath?: string): CliConfig {
  if (explicitPath !== undefined) {
    return parseConfig(readFileSync(explicitPath, 'utf-8'));
  }

  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }
  return parseConfig(readFileSync(configPath, 'utf-8'));
}
