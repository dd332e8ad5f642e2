/**
 * CLI Shared Utilities
 * Output seam, source reading, and error formatting for the lox binary
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { LoxError } from '@loxkit/core';

/** Package version, kept in step with packages/cli/package.json */
export const VERSION = '0.1.0';

// ============================================================
// OUTPUT
// ============================================================

/**
 * Where the CLI writes. Results go to stdout, diagnostics and logs to
 * stderr. Tests pass a capturing implementation.
 */
export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/** CliOutput that records lines instead of printing them */
export interface CapturedOutput extends CliOutput {
  readonly out: string[];
  readonly err: string[];
}

export function captureOutput(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

// ============================================================
// INPUT
// ============================================================

/**
 * Read source text from a file, or from stdin when file is '-'.
 * A relative path is resolved against `cwd`.
 *
 * @throws Error "File not found: <file>" when the file cannot be accessed
 */
export async function readSource(file: string, cwd: string): Promise<string> {
  if (file === '-') {
    // stdin must use the sync API
    return fsSync.readFileSync(0, 'utf-8');
  }

  const filePath = path.resolve(cwd, file);
  try {
    await fs.access(filePath);
  } catch {
    throw new Error(`File not found: ${file}`);
  }

  return fs.readFile(filePath, 'utf-8');
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Format an error for stderr.
 *
 * Front-end errors use the `[line N] Error...` shape; anything else
 * (usage errors, configuration errors) prints its message.
 */
export function formatError(err: unknown): string {
  if (err instanceof LoxError) {
    return err.format();
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
