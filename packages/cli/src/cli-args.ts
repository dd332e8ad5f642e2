/**
 * CLI Argument Parsing
 * Turns argv into a structured command for the lox binary
 */

import { DIAGNOSTIC_FORMATS, type DiagnosticFormat, isDiagnosticFormat } from './config.js';

/** Options shared by the tokenize and parse commands */
export interface CommandOptions {
  /** Overrides diagnostics.format from the configuration file */
  readonly format?: DiagnosticFormat | undefined;
  readonly configPath?: string | undefined;
  readonly verbose: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'tokenize'; file: string; options: CommandOptions }
  | { mode: 'parse'; file: string; program: boolean; options: CommandOptions }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const COMMANDS = ['tokenize', 'parse'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return value === 'tokenize' || value === 'parse';
}

/** Flags followed by a value */
const VALUE_FLAGS = ['--format', '--config', '--explain'];

const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--verbose',
  '--program',
  ...VALUE_FLAGS,
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error describing the first usage problem found
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Help and version win in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId) {
      throw new Error('Missing error ID after --explain');
    }
    return { mode: 'explain', errorId };
  }

  let format: DiagnosticFormat | undefined;
  let configPath: string | undefined;
  let verbose = false;
  let program = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }

      if (VALUE_FLAGS.includes(arg)) {
        const value = argv[i + 1];
        i++;
        if (arg === '--format') {
          if (!isDiagnosticFormat(value)) {
            throw new Error(
              `Invalid --format value: ${value ?? ''}. Must be one of: ${DIAGNOSTIC_FORMATS.join(', ')}`
            );
          }
          format = value;
        } else if (arg === '--config') {
          if (!value) {
            throw new Error('Missing value after --config');
          }
          configPath = value;
        }
        continue;
      }

      if (arg === '--verbose') verbose = true;
      if (arg === '--program') program = true;
      continue;
    }

    positional.push(arg);
  }

  const [command, file, ...rest] = positional;

  if (command === undefined) {
    throw new Error('Missing command');
  }
  if (!isCommand(command)) {
    throw new Error(
      `Unknown command: ${command}. Must be one of: ${COMMANDS.join(', ')}`
    );
  }
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (rest.length > 0) {
    throw new Error(`Unexpected argument: ${rest[0] ?? ''}`);
  }

  const options: CommandOptions = { format, configPath, verbose };

  if (command === 'tokenize') {
    if (program) {
      throw new Error('--program is only valid with parse');
    }
    return { mode: 'tokenize', file, options };
  }

  return { mode: 'parse', file, program, options };
}
