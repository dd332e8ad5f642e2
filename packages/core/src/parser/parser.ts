/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Productions are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode } from '../ast-nodes.js';
import type { ParseError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import {
  type ParserState,
  type ParserStateOptions,
  createParserState,
} from './state.js';

export type ParserOptions = ParserStateOptions;

/**
 * Recursive-descent parser that converts tokens into an AST.
 *
 * Productions are organized across multiple files:
 * - parser-script.ts: program, declarations, simple statements, recovery
 * - parser-control.ts: blocks, if, while, for
 * - parser-functions.ts: function and class declarations, calls
 * - parser-variables.ts: assignment and its targets
 * - parser-expr.ts: precedence chain from logical-or down to primary
 *
 * Errors never escape `parse()`; they are collected on `errors`.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { maxArguments: 255 });
 * const program = parser.parse();
 * if (parser.errors.length > 0) {
 *   // report and stop before evaluation
 * }
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: readonly Token[], options?: ParserOptions) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse tokens into a complete program.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /** Errors collected so far, in source order */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
