/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { KEYWORDS, lookupKeyword } from './operators.js';
export { nextToken, scan, type ScanResult } from './tokenizer.js';
