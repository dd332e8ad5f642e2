/**
 * Lox Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { Token } from './token-types.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location: SourceLocation;
  /**
   * Line reported to the user. Differs from `location.line` for tokens that
   * span several lines (strings), which report the line they end on.
   */
  readonly line?: number | undefined;
  /**
   * Offending lexeme. `null` when the error is not tied to a token,
   * `''` when it sits at the end of input.
   */
  readonly lexeme?: string | null | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Lox front-end errors.
 * Provides structured data for host applications to format as needed.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly location: SourceLocation;
  readonly line: number;
  readonly lexeme: string | null;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: LoxErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'LoxError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.line = data.line ?? data.location.line;
    this.lexeme = data.lexeme ?? null;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      location: this.location,
      line: this.line,
      lexeme: this.lexeme,
      context: this.context,
    };
  }

  /**
   * Format error for display (can be overridden by host).
   *
   * Default shape:
   * - `[line 3] Error: Unexpected character: $`
   * - `[line 3] Error at ')': Expect expression.`
   * - `[line 3] Error at end: Expect ';' after value.`
   */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());

    let where = '';
    if (this.lexeme === '') {
      where = ' at end';
    } else if (this.lexeme !== null) {
      where = ` at '${this.lexeme}'`;
    }
    return `[line ${this.line}] Error${where}: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function requireCategory(errorId: string, category: 'lexer' | 'parse'): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Scan-time errors */
export class LexerError extends LoxError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    line?: number
  ) {
    requireCategory(errorId, 'lexer');
    super({ errorId, message, location, line, lexeme: null, context });
    this.name = 'LexerError';
  }
}

/** Parse-time errors */
export class ParseError extends LoxError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    lexeme: string | null,
    context?: Record<string, unknown>,
    line?: number
  ) {
    requireCategory(errorId, 'parse');
    super({ errorId, message, location, line, lexeme, context });
    this.name = 'ParseError';
  }

  /** Create an error reported at a token (EOF reports "at end") */
  static atToken(
    errorId: string,
    message: string,
    token: Token,
    context?: Record<string, unknown>
  ): ParseError {
    const lexeme = token.type === 'EOF' ? '' : token.lexeme;
    return new ParseError(
      errorId,
      message,
      token.span.start,
      lexeme,
      context,
      token.line
    );
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * Parse errors are reported at `token`; lexer errors ignore it.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LOX-P003', { limit: 255 }, token)
 * // ParseError: "Can't have more than 255 arguments."
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation,
  token?: Token
): LexerError | ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  if (definition.category === 'lexer') {
    return new LexerError(errorId, message, location, context);
  }
  if (token) {
    return ParseError.atToken(errorId, message, token, context);
  }
  return new ParseError(errorId, message, location, null, context);
}
