/**
 * Configuration Loader Tests
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../src/config.js';

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({
      parser: { maxArguments: 255 },
      diagnostics: { format: 'text' },
    });
  });

  it('merges values with defaults', () => {
    expect(parseConfig('parser:\n  maxArguments: 10\n')).toEqual({
      parser: { maxArguments: 10 },
      diagnostics: { format: 'text' },
    });
  });

  it('reads the diagnostic format', () => {
    expect(parseConfig('diagnostics:\n  format: json\n').diagnostics.format).toBe(
      'json'
    );
  });

  it('rejects invalid YAML', () => {
    expect(() => parseConfig('parser: [')).toThrow(
      /^Invalid configuration: invalid YAML/
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n')).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('colors: true\n')).toThrow(
      'Invalid configuration: unknown key colors'
    );
    expect(() => parseConfig('parser:\n  depth: 3\n')).toThrow(
      'Invalid configuration: unknown key parser.depth'
    );
  });

  it('rejects a section that is not a mapping', () => {
    expect(() => parseConfig('parser: 5\n')).toThrow(
      'Invalid configuration: parser must be a mapping'
    );
  });

  it('rejects argument limits outside 1..255', () => {
    const message =
      'Invalid configuration: parser.maxArguments must be an integer between 1 and 255';
    expect(() => parseConfig('parser:\n  maxArguments: 0\n')).toThrow(message);
    expect(() => parseConfig('parser:\n  maxArguments: 256\n')).toThrow(message);
    expect(() => parseConfig('parser:\n  maxArguments: 2.5\n')).toThrow(message);
    expect(() => parseConfig('parser:\n  maxArguments: many\n')).toThrow(message);
  });

  it('rejects unknown formats', () => {
    expect(() => parseConfig('diagnostics:\n  format: xml\n')).toThrow(
      'Invalid configuration: diagnostics.format must be one of: text, json'
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lox-config-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when no file is present', () => {
    expect(loadConfig(tempDir)).toEqual({
      config: createDefaultConfig(),
      path: null,
    });
  });

  it('reads .loxrc.yaml from the directory', async () => {
    const dir = await fs.mkdtemp(path.join(tempDir, 'rc-'));
    await fs.writeFile(
      path.join(dir, CONFIG_FILE_NAME),
      'parser:\n  maxArguments: 8\n',
      'utf-8'
    );

    const loaded = loadConfig(dir);
    expect(loaded.path).toBe(path.join(dir, CONFIG_FILE_NAME));
    expect(loaded.config.parser.maxArguments).toBe(8);
  });

  it('resolves an explicit path against the directory', async () => {
    await fs.writeFile(
      path.join(tempDir, 'custom.yaml'),
      'diagnostics:\n  format: json\n',
      'utf-8'
    );

    const loaded = loadConfig(tempDir, 'custom.yaml');
    expect(loaded.path).toBe(path.join(tempDir, 'custom.yaml'));
    expect(loaded.config.diagnostics.format).toBe('json');
  });

  it('rejects a missing explicit file', () => {
    expect(() => loadConfig(tempDir, 'nope.yaml')).toThrow(
      'Config file not found: nope.yaml'
    );
  });
});
