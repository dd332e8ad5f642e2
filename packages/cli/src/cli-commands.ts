/**
 * CLI Commands
 * `tokenize` and `parse` over a source file
 */

import {
  exitCodeFor,
  formatToken,
  type LoxError,
  mergeErrors,
  parse,
  parseExpression,
  printExpression,
  printProgram,
  scan,
  type ExitCode,
} from '@loxkit/core';
import type { DiagnosticFormat, LoxConfig } from './config.js';
import { toLspReport } from './cli-lsp-diagnostic.js';
import { type CliOutput, readSource } from './cli-shared.js';

/** Resolved settings for one command run */
export interface CommandContext {
  readonly file: string;
  /** Directory a relative `file` is resolved against */
  readonly cwd: string;
  readonly config: LoxConfig;
  readonly verbose: boolean;
  readonly output: CliOutput;
}

/**
 * Write diagnostics to stderr: one `[line N] Error...` line each, or a
 * single JSON document.
 */
export function reportDiagnostics(
  file: string,
  errors: readonly LoxError[],
  format: DiagnosticFormat,
  output: CliOutput
): void {
  if (errors.length === 0) return;

  if (format === 'json') {
    output.stderr(JSON.stringify(toLspReport(file, errors), null, 2));
    return;
  }

  for (const error of errors) {
    output.stderr(error.format());
  }
}

function logVerbose(ctx: CommandContext, message: string): void {
  if (ctx.verbose) {
    ctx.output.stderr(`[verbose] ${message}`);
  }
}

/**
 * Print every token, EOF included, then report lexical errors.
 * Tokens are printed even when there are errors.
 */
export async function runTokenize(ctx: CommandContext): Promise<ExitCode> {
  const source = await readSource(ctx.file, ctx.cwd);
  const { tokens, errors } = scan(source);
  logVerbose(ctx, `scanned ${tokens.length} tokens, ${errors.length} lexical errors`);

  for (const token of tokens) {
    ctx.output.stdout(formatToken(token));
  }

  reportDiagnostics(ctx.file, errors, ctx.config.diagnostics.format, ctx.output);
  return exitCodeFor(errors);
}

/**
 * Parse the file as a single expression, or as a whole program, and print
 * the prefix rendering. Nothing reaches stdout when there are errors.
 */
export async function runParse(
  ctx: CommandContext,
  program: boolean
): Promise<ExitCode> {
  const source = await readSource(ctx.file, ctx.cwd);
  const scanned = scan(source);
  logVerbose(
    ctx,
    `scanned ${scanned.tokens.length} tokens, ${scanned.errors.length} lexical errors`
  );

  const options = { maxArguments: ctx.config.parser.maxArguments };
  let rendered: string | null;
  let syntaxErrors: LoxError[];

  if (program) {
    const result = parse(scanned.tokens, options);
    logVerbose(
      ctx,
      `parsed ${result.program.statements.length} statements, ${result.errors.length} syntax errors`
    );
    rendered =
      result.program.statements.length > 0
        ? printProgram(result.program)
        : null;
    syntaxErrors = result.errors;
  } else {
    const result = parseExpression(scanned.tokens, options);
    logVerbose(ctx, `parsed expression, ${result.errors.length} syntax errors`);
    rendered = result.expression ? printExpression(result.expression) : null;
    syntaxErrors = result.errors;
  }

  const errors = mergeErrors(scanned.errors, syntaxErrors);
  if (errors.length > 0) {
    reportDiagnostics(ctx.file, errors, ctx.config.diagnostics.format, ctx.output);
    return exitCodeFor(errors);
  }

  if (rendered !== null) {
    ctx.output.stdout(rendered);
  }
  return exitCodeFor(errors);
}
