/**
 * Parser Extension: Assignment
 * Variable and property assignment targets
 */

import { Parser } from './parser.js';
import type { ExpressionNode } from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { errorAt, match, nested, report, spanFrom } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseAssignment(): ExpressionNode;
  }
}

// ============================================================
// ASSIGNMENT
// ============================================================

/**
 * assignment → ( call "." )? IDENTIFIER "=" assignment | logic_or
 *
 * The left side is parsed as an ordinary expression and then checked, so
 * `a.b.c = v` needs no lookahead. Right-associative: `a = b = c` assigns
 * `b = c` to `a`.
 *
 * An invalid target is reported without unwinding; the parser is not
 * confused, so no resynchronization is needed.
 */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const expr = this.parseLogicalOr();

  const equals = match(this.state, TOKEN_TYPES.EQUAL);
  if (!equals) return expr;

  const value = nested(this.state, equals, () => this.parseAssignment());
  const span = spanFrom(this.state, expr.span.start);

  if (expr.type === 'Variable') {
    return { type: 'Assign', name: expr.name, value, span };
  }
  if (expr.type === 'Get') {
    return { type: 'Set', object: expr.object, name: expr.name, value, span };
  }

  report(this.state, errorAt('LOX-P004', equals));
  return expr;
};
