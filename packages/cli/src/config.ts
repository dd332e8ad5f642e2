/**
 * Configuration Loader for lox
 * Loads and validates .loxrc.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_ARGUMENTS } from '@loxkit/core';

// ============================================================
// TYPES
// ============================================================

export type DiagnosticFormat = 'text' | 'json';

export const DIAGNOSTIC_FORMATS: readonly DiagnosticFormat[] = ['text', 'json'];

export interface LoxConfig {
  readonly parser: {
    /** Limit for call arguments and function parameters */
    readonly maxArguments: number;
  };
  readonly diagnostics: {
    readonly format: DiagnosticFormat;
  };
}

export interface LoadedConfig {
  readonly config: LoxConfig;
  /** Absolute path of the file read, or null when defaults were used */
  readonly path: string | null;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = '.loxrc.yaml';

export function createDefaultConfig(): LoxConfig {
  return {
    parser: { maxArguments: DEFAULT_MAX_ARGUMENTS },
    diagnostics: { format: 'text' },
  };
}

// ============================================================
// VALIDATION
// ============================================================

interface RawConfig {
  parser?: { maxArguments?: number };
  diagnostics?: { format?: DiagnosticFormat };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDiagnosticFormat(value: unknown): value is DiagnosticFormat {
  return value === 'text' || value === 'json';
}

function checkKeys(
  section: Record<string, unknown>,
  allowed: readonly string[],
  prefix: string
): void {
  for (const key of Object.keys(section)) {
    if (!allowed.includes(key)) {
      throw new Error(`Invalid configuration: unknown key ${prefix}${key}`);
    }
  }
}

function validateParserSection(
  section: unknown
): asserts section is { maxArguments?: number } {
  if (!isRecord(section)) {
    throw new Error('Invalid configuration: parser must be a mapping');
  }
  checkKeys(section, ['maxArguments'], 'parser.');

  const max = section['maxArguments'];
  if (
    max !== undefined &&
    (typeof max !== 'number' ||
      !Number.isInteger(max) ||
      max < 1 ||
      max > DEFAULT_MAX_ARGUMENTS)
  ) {
    throw new Error(
      `Invalid configuration: parser.maxArguments must be an integer between 1 and ${DEFAULT_MAX_ARGUMENTS}`
    );
  }
}

function validateDiagnosticsSection(
  section: unknown
): asserts section is { format?: DiagnosticFormat } {
  if (!isRecord(section)) {
    throw new Error('Invalid configuration: diagnostics must be a mapping');
  }
  checkKeys(section, ['format'], 'diagnostics.');

  const format = section['format'];
  if (format !== undefined && !isDiagnosticFormat(format)) {
    throw new Error(
      `Invalid configuration: diagnostics.format must be one of: ${DIAGNOSTIC_FORMATS.join(', ')}`
    );
  }
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is RawConfig {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }
  checkKeys(data, ['parser', 'diagnostics'], '');

  if (data['parser'] !== undefined) {
    validateParserSection(data['parser']);
  }
  if (data['diagnostics'] !== undefined) {
    validateDiagnosticsSection(data['diagnostics']);
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse and validate configuration text, filling in defaults.
 * An empty document yields the defaults.
 *
 * @throws Error "Invalid configuration: {reason}"
 */
export function parseConfig(text: string): LoxConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }

  validateConfig(data);

  return {
    parser: {
      maxArguments:
        data.parser?.maxArguments ?? defaults.parser.maxArguments,
    },
    diagnostics: {
      format: data.diagnostics?.format ?? defaults.diagnostics.format,
    },
  };
}

/**
 * Load configuration from an explicit path, or from .loxrc.yaml in cwd.
 *
 * A missing default file is not an error; a missing explicit file is.
 *
 * @throws Error "Config file not found: {path}"
 * @throws Error "Invalid configuration: {reason}"
 */
export function loadConfig(cwd: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath
    ? resolve(cwd, explicitPath)
    : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${explicitPath}`);
    }
    return { config: createDefaultConfig(), path: null };
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { config: parseConfig(fileContent), path: configPath };
}
