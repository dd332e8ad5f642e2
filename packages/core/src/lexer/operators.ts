/**
 * Operator and Keyword Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operators, matched before single characters (maximal munch) */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '!=': TOKEN_TYPES.BANG_EQUAL,
  '==': TOKEN_TYPES.EQUAL_EQUAL,
  '<=': TOKEN_TYPES.LESS_EQUAL,
  '>=': TOKEN_TYPES.GREATER_EQUAL,
};

export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '(': TOKEN_TYPES.LEFT_PAREN,
  ')': TOKEN_TYPES.RIGHT_PAREN,
  '{': TOKEN_TYPES.LEFT_BRACE,
  '}': TOKEN_TYPES.RIGHT_BRACE,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  '-': TOKEN_TYPES.MINUS,
  '+': TOKEN_TYPES.PLUS,
  ';': TOKEN_TYPES.SEMICOLON,
  '/': TOKEN_TYPES.SLASH,
  '*': TOKEN_TYPES.STAR,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.EQUAL,
  '<': TOKEN_TYPES.LESS,
  '>': TOKEN_TYPES.GREATER,
};

/** Reserved words. Matching is case-sensitive: `AND` is an identifier. */
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  and: TOKEN_TYPES.AND,
  class: TOKEN_TYPES.CLASS,
  else: TOKEN_TYPES.ELSE,
  false: TOKEN_TYPES.FALSE,
  for: TOKEN_TYPES.FOR,
  fun: TOKEN_TYPES.FUN,
  if: TOKEN_TYPES.IF,
  nil: TOKEN_TYPES.NIL,
  or: TOKEN_TYPES.OR,
  print: TOKEN_TYPES.PRINT,
  return: TOKEN_TYPES.RETURN,
  super: TOKEN_TYPES.SUPER,
  this: TOKEN_TYPES.THIS,
  true: TOKEN_TYPES.TRUE,
  var: TOKEN_TYPES.VAR,
  while: TOKEN_TYPES.WHILE,
};

export function lookupKeyword(word: string): TokenType | undefined {
  return Object.prototype.hasOwnProperty.call(KEYWORDS, word)
    ? KEYWORDS[word]
    : undefined;
}
