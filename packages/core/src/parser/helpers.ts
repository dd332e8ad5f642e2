/**
 * Parser Helpers
 * Operator tables, lookahead predicates, and small node builders
 * @internal This module contains internal parser utilities
 */

import type { LiteralNode } from '../ast-nodes.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { type ParserState, check } from './state.js';

// ============================================================
// OPERATOR TABLES (one row per precedence level, loosest first)
// ============================================================

/** @internal */
export const EQUALITY_OPERATORS: readonly TokenType[] = [
  TOKEN_TYPES.BANG_EQUAL,
  TOKEN_TYPES.EQUAL_EQUAL,
];

/** @internal */
export const COMPARISON_OPERATORS: readonly TokenType[] = [
  TOKEN_TYPES.GREATER,
  TOKEN_TYPES.GREATER_EQUAL,
  TOKEN_TYPES.LESS,
  TOKEN_TYPES.LESS_EQUAL,
];

/** @internal */
export const TERM_OPERATORS: readonly TokenType[] = [
  TOKEN_TYPES.MINUS,
  TOKEN_TYPES.PLUS,
];

/** @internal */
export const FACTOR_OPERATORS: readonly TokenType[] = [
  TOKEN_TYPES.SLASH,
  TOKEN_TYPES.STAR,
];

/** @internal */
export const UNARY_OPERATORS: readonly TokenType[] = [
  TOKEN_TYPES.BANG,
  TOKEN_TYPES.MINUS,
];

// ============================================================
// STATEMENT BOUNDARIES
// ============================================================

/**
 * Keywords that begin a declaration or statement. Error recovery stops in
 * front of these.
 * @internal
 */
export const STATEMENT_KEYWORDS: readonly TokenType[] = [
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
];

/** @internal */
export function isStatementStart(state: ParserState): boolean {
  return check(state, ...STATEMENT_KEYWORDS);
}

// ============================================================
// LITERALS
// ============================================================

/**
 * Build a Literal node from a TRUE, FALSE, NIL, NUMBER or STRING token.
 * @internal
 */
export function makeLiteral(token: Token): LiteralNode {
  let value: LiteralNode['value'];
  switch (token.type) {
    case TOKEN_TYPES.TRUE:
      value = true;
      break;
    case TOKEN_TYPES.FALSE:
      value = false;
      break;
    case TOKEN_TYPES.NIL:
      value = null;
      break;
    default:
      value = token.literal;
  }
  return { type: 'Literal', value, span: token.span };
}
