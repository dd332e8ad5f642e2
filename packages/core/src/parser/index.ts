/**
 * Lox Parser
 * Main entry points and re-exports
 */

import type { ExpressionNode, ProgramNode } from '../ast-nodes.js';
import type { LexerError, ParseError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { scan } from '../lexer/index.js';
import { mergeErrors } from '../diagnostics.js';
import { Parser, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-variables.js';
import './parser-expr.js';

// ============================================================
// RESULT TYPES
// ============================================================

export interface ParseResult {
  readonly program: ProgramNode;
  /** Syntax errors in source order; the program omits failed declarations */
  readonly errors: ParseError[];
}

export interface ExpressionParseResult {
  /** null when the expression could not be parsed */
  readonly expression: ExpressionNode | null;
  readonly errors: ParseError[];
}

export interface SourceParseResult {
  readonly tokens: Token[];
  readonly program: ProgramNode;
  /** Lexical and syntax errors together, in source order */
  readonly errors: (LexerError | ParseError)[];
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token sequence into a program.
 *
 * Never throws on bad input: syntax errors are collected, the parser
 * resynchronizes at the next statement boundary, and parsing continues.
 *
 * @example
 * ```typescript
 * const { tokens } = scan('print 1 + 2;');
 * const { program, errors } = parse(tokens);
 * ```
 */
export function parse(
  tokens: readonly Token[],
  options?: ParserOptions
): ParseResult {
  const parser = new Parser(tokens, options);
  const program = parser.parse();
  return { program, errors: parser.errors };
}

/**
 * Parse a token sequence holding exactly one expression.
 * Tokens left over after the expression are reported as an error.
 */
export function parseExpression(
  tokens: readonly Token[],
  options?: ParserOptions
): ExpressionParseResult {
  const parser = new Parser(tokens, options);
  const expression = parser.parseStandaloneExpression();
  return { expression, errors: parser.errors };
}

/** Scan and parse source text in one step */
export function parseSource(
  source: string,
  options?: ParserOptions
): SourceParseResult {
  const scanned = scan(source);
  const { program, errors } = parse(scanned.tokens, options);
  return {
    tokens: scanned.tokens,
    program,
    errors: mergeErrors(scanned.errors, errors),
  };
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser, type ParserOptions } from './parser.js';
export {
  createParserState,
  DEFAULT_MAX_ARGUMENTS,
  DEFAULT_MAX_NESTING_DEPTH,
  type ParserState,
} from './state.js';
export type { FunctionKind } from './parser-functions.js';
