/**
 * Parser Extension: Expression Parsing
 * Precedence chain from logical or down to primary expressions
 */

import { Parser } from './parser.js';
import type {
  BinaryNode,
  ExpressionNode,
  LogicalNode,
} from '../ast-nodes.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  current,
  errorAt,
  expect,
  match,
  nested,
  spanFrom,
} from './state.js';
import {
  COMPARISON_OPERATORS,
  EQUALITY_OPERATORS,
  FACTOR_OPERATORS,
  TERM_OPERATORS,
  UNARY_OPERATORS,
  makeLiteral,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseBinaryLevel(
      operators: readonly TokenType[],
      operand: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// ENTRY
// ============================================================

/** expression → assignment */
Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

// ============================================================
// LOGICAL OPERATORS
// ============================================================

/** logic_or → logic_and ( "or" logic_and )* */
Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  let left = this.parseLogicalAnd();

  let operator = match(this.state, TOKEN_TYPES.OR);
  while (operator) {
    const right = this.parseLogicalAnd();
    const node: LogicalNode = {
      type: 'Logical',
      left,
      operator,
      right,
      span: spanFrom(this.state, left.span.start),
    };
    left = node;
    operator = match(this.state, TOKEN_TYPES.OR);
  }

  return left;
};

/** logic_and → equality ( "and" equality )* */
Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  let left = this.parseEquality();

  let operator = match(this.state, TOKEN_TYPES.AND);
  while (operator) {
    const right = this.parseEquality();
    const node: LogicalNode = {
      type: 'Logical',
      left,
      operator,
      right,
      span: spanFrom(this.state, left.span.start),
    };
    left = node;
    operator = match(this.state, TOKEN_TYPES.AND);
  }

  return left;
};

// ============================================================
// BINARY OPERATORS
// ============================================================

/**
 * Left-associative fold shared by the binary precedence levels:
 * `operand ( op operand )*`, built iteratively so long chains do not
 * deepen the call stack.
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: readonly TokenType[],
  operand: () => ExpressionNode
): ExpressionNode {
  let left = operand();

  let operator = match(this.state, ...operators);
  while (operator) {
    const right = operand();
    const node: BinaryNode = {
      type: 'Binary',
      left,
      operator,
      right,
      span: spanFrom(this.state, left.span.start),
    };
    left = node;
    operator = match(this.state, ...operators);
  }

  return left;
};

/** equality → comparison ( ( "!=" | "==" ) comparison )* */
Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPERATORS, () =>
    this.parseComparison()
  );
};

/** comparison → term ( ( ">" | ">=" | "<" | "<=" ) term )* */
Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPERATORS, () => this.parseTerm());
};

/** term → factor ( ( "-" | "+" ) factor )* */
Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(TERM_OPERATORS, () => this.parseFactor());
};

/** factor → unary ( ( "/" | "*" ) unary )* */
Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(FACTOR_OPERATORS, () => this.parseUnary());
};

// ============================================================
// UNARY
// ============================================================

/** unary → ( "!" | "-" ) unary | call */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const operator = match(this.state, ...UNARY_OPERATORS);
  if (!operator) return this.parseCall();

  const right = nested(this.state, operator, () => this.parseUnary());
  return {
    type: 'Unary',
    operator,
    right,
    span: spanFrom(this.state, operator.span.start),
  };
};

// ============================================================
// PRIMARY
// ============================================================

/**
 * primary → "true" | "false" | "nil" | NUMBER | STRING | "this"
 *         | IDENTIFIER | "(" expression ")" | "super" "." IDENTIFIER
 */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
    case TOKEN_TYPES.NIL:
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return makeLiteral(token);

    case TOKEN_TYPES.THIS:
      advance(this.state);
      return { type: 'This', keyword: token, span: token.span };

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token, span: token.span };

    case TOKEN_TYPES.SUPER: {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.DOT, "'.' after 'super'");
      const method = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'superclass method name'
      );
      return {
        type: 'Super',
        keyword: token,
        method,
        span: spanFrom(this.state, token.span.start),
      };
    }

    case TOKEN_TYPES.LEFT_PAREN:
      return nested<ExpressionNode>(this.state, token, () => {
        advance(this.state);
        const expression = this.parseExpression();
        expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "')' after expression");
        return {
          type: 'Grouping',
          expression,
          span: spanFrom(this.state, token.span.start),
        };
      });

    default:
      throw errorAt('LOX-P002', token);
  }
};
