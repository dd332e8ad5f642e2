/**
 * Parser Extension: Control Flow
 * Blocks, conditionals, and loops
 */

import { Parser } from './parser.js';
import type {
  BlockStmtNode,
  ExpressionNode,
  IfStmtNode,
  StatementNode,
  WhileStmtNode,
} from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  expect,
  isAtEnd,
  match,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseBlockStatement(): BlockStmtNode;
    parseBlockBody(): StatementNode[];
    parseIfStatement(): IfStmtNode;
    parseWhileStatement(): WhileStmtNode;
    parseForStatement(): StatementNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlockStatement = function (this: Parser): BlockStmtNode {
  const start = advance(this.state).span.start; // consume {
  const statements = this.parseBlockBody();
  return {
    type: 'BlockStmt',
    statements,
    span: spanFrom(this.state, start),
  };
};

/**
 * Parse `declaration* }` after an opening brace the caller consumed.
 * Shared by blocks and function bodies.
 */
Parser.prototype.parseBlockBody = function (this: Parser): StatementNode[] {
  const statements: StatementNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RIGHT_BRACE) && !isAtEnd(this.state)) {
    const statement = this.parseDeclaration();
    if (statement) statements.push(statement);
  }

  expect(this.state, TOKEN_TYPES.RIGHT_BRACE, "'}' after block");
  return statements;
};

// ============================================================
// CONDITIONALS
// ============================================================

/** ifStmt → "if" "(" expression ")" statement ( "else" statement )? */
Parser.prototype.parseIfStatement = function (this: Parser): IfStmtNode {
  const start = advance(this.state).span.start; // consume if
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "'(' after 'if'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "')' after if condition");

  const thenBranch = this.parseStatement();
  // A dangling else binds to the nearest if
  const elseBranch = match(this.state, TOKEN_TYPES.ELSE)
    ? this.parseStatement()
    : null;

  return {
    type: 'IfStmt',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhileStatement = function (this: Parser): WhileStmtNode {
  const start = advance(this.state).span.start; // consume while
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "'(' after 'while'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "')' after condition");
  const body = this.parseStatement();

  return {
    type: 'WhileStmt',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

/**
 * forStmt → "for" "(" ( varDecl | exprStmt | ";" ) expression? ";"
 *           expression? ")" statement
 *
 * Desugared into existing nodes:
 * `{ initializer; while (condition) { body; increment; } }`
 * A missing condition becomes `true`. Blocks are only introduced for the
 * parts that are present.
 */
Parser.prototype.parseForStatement = function (this: Parser): StatementNode {
  const start = advance(this.state).span.start; // consume for
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, "'(' after 'for'");

  let initializer: StatementNode | null;
  if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
    initializer = null;
  } else if (check(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration();
  } else {
    initializer = this.parseExpressionStatement();
  }

  let condition: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    condition = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after loop condition");

  let increment: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    increment = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "')' after for clauses");

  let body = this.parseStatement();
  const span = spanFrom(this.state, start);

  if (increment) {
    body = {
      type: 'BlockStmt',
      statements: [
        body,
        { type: 'ExpressionStmt', expression: increment, span: increment.span },
      ],
      span: body.span,
    };
  }

  const loop: WhileStmtNode = {
    type: 'WhileStmt',
    condition: condition ?? { type: 'Literal', value: true, span },
    body,
    span,
  };

  if (!initializer) return loop;

  return {
    type: 'BlockStmt',
    statements: [initializer, loop],
    span,
  };
};
