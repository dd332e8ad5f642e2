/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { ParseError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';

// ============================================================
// PARSER STATE
// ============================================================

/** Upper bound on call arguments and function parameters */
export const DEFAULT_MAX_ARGUMENTS = 255;

/**
 * Upper bound on nested groupings, calls, unary operands, assignments,
 * statements and functions. Keeps recursion well inside the call stack.
 */
export const DEFAULT_MAX_NESTING_DEPTH = 256;

export interface ParserState {
  /** Always ends with an EOF token */
  readonly tokens: readonly Token[];
  pos: number;
  /** Errors collected during parsing, in source order */
  readonly errors: ParseError[];
  readonly maxArguments: number;
  /** Current nesting level, see `nested` */
  depth: number;
  readonly maxNestingDepth: number;
}

export interface ParserStateOptions {
  /** Limit for call arguments and function parameters (default: 255) */
  maxArguments?: number;
  /** Limit for nesting depth (default: 256) */
  maxNestingDepth?: number;
}

function eofAfter(tokens: readonly Token[]): Token {
  const last = tokens[tokens.length - 1];
  const end: SourceLocation = last
    ? last.span.end
    : { line: 1, column: 1, offset: 0 };
  return {
    type: TOKEN_TYPES.EOF,
    lexeme: '',
    literal: null,
    line: last?.line ?? 1,
    span: { start: end, end },
  };
}

export function createParserState(
  tokens: readonly Token[],
  options: ParserStateOptions = {}
): ParserState {
  const terminated =
    tokens[tokens.length - 1]?.type === TOKEN_TYPES.EOF
      ? tokens
      : [...tokens, eofAfter(tokens)];

  return {
    tokens: terminated,
    pos: 0,
    errors: [],
    maxArguments: options.maxArguments ?? DEFAULT_MAX_ARGUMENTS,
    depth: 0,
    maxNestingDepth: options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const idx = Math.min(state.pos + offset, state.tokens.length - 1);
  const token = state.tokens[idx];
  if (token) return token;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state);
}

/** Most recently consumed token (the current one before anything is consumed) */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume the current token when it has one of the given types.
 * @internal
 */
export function match(state: ParserState, ...types: TokenType[]): Token | null {
  return check(state, ...types) ? advance(state) : null;
}

/**
 * Consume a required token or throw LOX-P001 at the current token.
 * `description` completes the message: `"';' after value"` reports
 * "Expect ';' after value.".
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  description: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const suggestions = generateHints(
    type,
    token,
    state.pos > 0 ? previous(state) : null
  );
  throw errorAt(
    'LOX-P001',
    token,
    suggestions.length > 0
      ? { expected: type, description, suggestions }
      : { expected: type, description }
  );
}

/**
 * Record an error without unwinding the current production.
 * @internal
 */
export function report(state: ParserState, error: ParseError): void {
  state.errors.push(error);
}

/**
 * Build a registry error reported at `token`, rendering its template.
 * @internal
 */
export function errorAt(
  errorId: string,
  token: Token,
  context: Record<string, unknown> = {}
): ParseError {
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? errorId;
  return ParseError.atToken(
    errorId,
    renderMessage(template, context),
    token,
    context
  );
}

/**
 * Run a production one nesting level deeper. Past `maxNestingDepth` this
 * throws LOX-P006 at `token`, which declaration-level recovery handles like
 * any other syntax error.
 * @internal
 */
export function nested<T>(state: ParserState, token: Token, parse: () => T): T {
  if (state.depth >= state.maxNestingDepth) {
    throw errorAt('LOX-P006', token, { limit: state.maxNestingDepth });
  }
  state.depth++;
  try {
    return parse();
  } finally {
    state.depth--;
  }
}

// ============================================================
// ERROR HINTS
// ============================================================

const KEYWORD_TYPOS: Readonly<Record<string, string>> = {
  fucn: 'fun',
  fn: 'fun',
  func: 'fun',
  function: 'fun',
  retrun: 'return',
  retrn: 'return',
  pritn: 'print',
  prnt: 'print',
  whlie: 'while',
  wihle: 'while',
  esle: 'else',
  flase: 'false',
  ture: 'true',
  nill: 'nil',
  null: 'nil',
  let: 'var',
  const: 'var',
};

/**
 * Contextual hints for a failed `expect`, surfaced as `context.suggestions`.
 * @internal
 */
function generateHints(
  expectedType: TokenType,
  actual: Token,
  lastConsumed: Token | null
): string[] {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RIGHT_PAREN) {
      return ['Check for unclosed parenthesis'];
    }
    if (expectedType === TOKEN_TYPES.RIGHT_BRACE) {
      return ['Check for unclosed brace'];
    }
  }

  if (actual.type === TOKEN_TYPES.IDENTIFIER) {
    const suggestion = Object.prototype.hasOwnProperty.call(
      KEYWORD_TYPOS,
      actual.lexeme
    )
      ? KEYWORD_TYPOS[actual.lexeme]
      : undefined;
    if (suggestion) {
      return [`Did you mean '${suggestion}'?`];
    }
  }

  if (
    expectedType === TOKEN_TYPES.SEMICOLON &&
    lastConsumed !== null &&
    actual.span.start.line > lastConsumed.span.end.line
  ) {
    return [`Add ';' at the end of line ${lastConsumed.span.end.line}`];
  }

  return [];
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previous(state).span.end);
}
