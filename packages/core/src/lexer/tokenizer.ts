/**
 * Tokenizer
 * Main scanning loop
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip whitespace and `//` comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (peekString(state, 2) === '//') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/** Record LOX-L002 and skip one code point */
function skipUnexpected(state: LexerState): void {
  const start = currentLocation(state);
  const codePoint = state.source.codePointAt(state.pos) ?? 0;
  const char = String.fromCodePoint(codePoint);

  for (let i = 0; i < char.length; i++) advance(state);

  state.errors.push(
    new LexerError('LOX-L002', `Unexpected character: ${char}`, start, {
      char,
    })
  );
}

/**
 * Return the next token, recording lexical errors on the state and moving
 * past them. Returns EOF once input is exhausted (and on every later call).
 */
export function nextToken(state: LexerState): Token {
  for (;;) {
    skipTrivia(state);

    const start = currentLocation(state);
    if (isAtEnd(state)) {
      return makeToken(state, TOKEN_TYPES.EOF, start);
    }

    const ch = peek(state);

    if (ch === '"') {
      const token = readString(state);
      if (token) return token;
      continue;
    }

    if (isDigit(ch)) {
      return readNumber(state);
    }

    if (isIdentifierStart(ch)) {
      return readIdentifier(state);
    }

    const twoCharType = TWO_CHAR_OPERATORS[peekString(state, 2)];
    if (twoCharType) {
      return advanceAndMakeToken(state, 2, twoCharType, start);
    }

    const singleCharType = SINGLE_CHAR_OPERATORS[ch];
    if (singleCharType) {
      return advanceAndMakeToken(state, 1, singleCharType, start);
    }

    skipUnexpected(state);
  }
}

export interface ScanResult {
  /** Ends with exactly one EOF token */
  readonly tokens: Token[];
  /** Lexical errors in source order */
  readonly errors: LexerError[];
}

/**
 * Scan source text into tokens, collecting lexical errors instead of
 * stopping at the first one.
 *
 * @example
 * ```typescript
 * const { tokens, errors } = scan('var x = "hi";');
 * ```
 */
export function scan(source: string): ScanResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return { tokens, errors: state.errors };
}
