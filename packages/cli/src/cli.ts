#!/usr/bin/env node
/**
 * Lox CLI - Inspect the Lox front end from the command line
 *
 * Usage:
 *   lox tokenize <file>
 *   lox parse [--program] <file>
 *   lox --explain LOX-P002
 */

import { EXIT_CODES, type ExitCode } from '@loxkit/core';
import { parseArgs } from './cli-args.js';
import { runParse, runTokenize } from './cli-commands.js';
import { explainError } from './cli-explain.js';
import {
  type CliOutput,
  consoleOutput,
  formatError,
  VERSION,
} from './cli-shared.js';
import { loadConfig, type LoxConfig } from './config.js';

const USAGE = `Usage:
  lox tokenize <file>          Print one line per token
  lox parse <file>             Print the parsed expression in prefix form
  lox parse --program <file>   Print every parsed statement in prefix form
  lox --explain LOX-XNNN       Show error documentation
  lox --help                   Show this help message
  lox --version                Show version information

Options:
  --format <format>   Diagnostic format: text, json (default: text)
  --config <path>     Configuration file (default: .loxrc.yaml in the working directory)
  --verbose           Log configuration and phase summaries to stderr

Use - as <file> to read source from stdin.

Exit codes:
  0   success
  1   usage, file, or configuration error
  65  lexical or syntax errors in the input`;

export interface RunOptions {
  readonly output?: CliOutput;
  /** Directory searched for .loxrc.yaml and used to resolve --config */
  readonly cwd?: string;
}

/**
 * Run the CLI with the given arguments and return the exit code.
 * Never exits the process.
 */
export async function run(
  argv: string[],
  options: RunOptions = {}
): Promise<ExitCode> {
  const output = options.output ?? consoleOutput;
  const cwd = options.cwd ?? process.cwd();

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        output.stdout(USAGE);
        return EXIT_CODES.SUCCESS;

      case 'version':
        output.stdout(VERSION);
        return EXIT_CODES.SUCCESS;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          output.stderr(`Invalid error ID: ${parsed.errorId}`);
          output.stderr(
            'Error ID must be a registered LOX-{L|P}{3-digit} code, e.g., LOX-P002'
          );
          return EXIT_CODES.FAILURE;
        }
        output.stdout(documentation);
        return EXIT_CODES.SUCCESS;
      }

      case 'tokenize':
      case 'parse': {
        const loaded = loadConfig(cwd, parsed.options.configPath);
        const config: LoxConfig = {
          ...loaded.config,
          diagnostics: {
            format: parsed.options.format ?? loaded.config.diagnostics.format,
          },
        };

        if (parsed.options.verbose) {
          output.stderr(`[verbose] config: ${loaded.path ?? 'defaults'}`);
        }

        const ctx = {
          file: parsed.file,
          cwd,
          config,
          verbose: parsed.options.verbose,
          output,
        };
        return parsed.mode === 'tokenize'
          ? await runTokenize(ctx)
          : await runParse(ctx, parsed.program);
      }
    }
  } catch (err) {
    output.stderr(formatError(err));
    return EXIT_CODES.FAILURE;
  }
}

/**
 * Entry point for the lox binary
 */
export async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = EXIT_CODES.FAILURE;
  });
}
