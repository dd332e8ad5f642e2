/**
 * Token Readers
 * Functions to read literal and identifier tokens from source
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { lookupKeyword } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a double-quoted string. Strings may span lines and have no escape
 * sequences. Returns null after recording LOX-L001 when the closing quote is
 * missing; the state is then at end of input.
 */
export function readString(state: LexerState): Token | null {
  const start = currentLocation(state);
  advance(state); // consume opening "

  while (!isAtEnd(state) && peek(state) !== '"') {
    advance(state);
  }

  if (isAtEnd(state)) {
    state.errors.push(
      new LexerError(
        'LOX-L001',
        'Unterminated string.',
        start,
        {},
        state.line
      )
    );
    return null;
  }

  advance(state); // consume closing "

  const value = state.source.slice(start.offset + 1, state.pos - 1);
  return makeToken(state, TOKEN_TYPES.STRING, start, value);
}

/** Read `digits ('.' digits)?`. A trailing dot is left for the DOT token. */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isDigit(peek(state))) {
    advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      advance(state);
    }
  }

  const text = state.source.slice(start.offset, state.pos);
  return makeToken(state, TOKEN_TYPES.NUMBER, start, Number(text));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    advance(state);
  }

  const text = state.source.slice(start.offset, state.pos);
  const type = lookupKeyword(text) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(state, type, start);
}
