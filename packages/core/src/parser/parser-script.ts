/**
 * Parser Extension: Program Parsing
 * Program, declarations, simple statements, and error recovery
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  ExpressionStmtNode,
  PrintStmtNode,
  ProgramNode,
  ReturnStmtNode,
  StatementNode,
  VarStmtNode,
} from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  errorAt,
  expect,
  isAtEnd,
  makeSpan,
  match,
  nested,
  previous,
  report,
  spanFrom,
} from './state.js';
import { isStatementStart } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): StatementNode | null;
    parseVarDeclaration(): VarStmtNode;
    parseStatement(): StatementNode;
    parsePrintStatement(): PrintStmtNode;
    parseReturnStatement(): ReturnStmtNode;
    parseExpressionStatement(): ExpressionStmtNode;
    parseStandaloneExpression(): ExpressionNode | null;
    synchronize(): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    const statement = this.parseDeclaration();
    if (statement) statements.push(statement);
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse a lone expression that must use up every token. Used by the
 * expression-only entry point.
 */
Parser.prototype.parseStandaloneExpression = function (
  this: Parser
): ExpressionNode | null {
  try {
    const expression = this.parseExpression();
    if (!isAtEnd(this.state)) {
      throw errorAt('LOX-P001', current(this.state), {
        expected: TOKEN_TYPES.EOF,
        description: 'end of expression',
      });
    }
    return expression;
  } catch (err) {
    if (err instanceof ParseError) {
      report(this.state, err);
      return null;
    }
    throw err;
  }
};

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * declaration → classDecl | funDecl | varDecl | statement
 *
 * A syntax error anywhere inside the declaration is recorded, the parser
 * resynchronizes at the next statement boundary, and null is returned.
 */
Parser.prototype.parseDeclaration = function (
  this: Parser
): StatementNode | null {
  try {
    if (check(this.state, TOKEN_TYPES.CLASS)) {
      return this.parseClassDeclaration();
    }
    if (check(this.state, TOKEN_TYPES.FUN)) {
      advance(this.state); // consume fun
      return this.parseFunction('function');
    }
    if (check(this.state, TOKEN_TYPES.VAR)) {
      return this.parseVarDeclaration();
    }
    return this.parseStatement();
  } catch (err) {
    if (err instanceof ParseError) {
      report(this.state, err);
      this.synchronize();
      return null;
    }
    throw err;
  }
};

/** varDecl → "var" IDENTIFIER ( "=" expression )? ";" */
Parser.prototype.parseVarDeclaration = function (this: Parser): VarStmtNode {
  const start = expect(this.state, TOKEN_TYPES.VAR, "'var'").span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');

  let initializer: ExpressionNode | null = null;
  if (match(this.state, TOKEN_TYPES.EQUAL)) {
    initializer = this.parseExpression();
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after variable declaration");

  return {
    type: 'VarStmt',
    name,
    initializer,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

/** Each statement is one nesting level; nested bodies go deeper */
Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);
  return nested(this.state, token, () => {
    switch (token.type) {
      case TOKEN_TYPES.FOR:
        return this.parseForStatement();
      case TOKEN_TYPES.IF:
        return this.parseIfStatement();
      case TOKEN_TYPES.PRINT:
        return this.parsePrintStatement();
      case TOKEN_TYPES.RETURN:
        return this.parseReturnStatement();
      case TOKEN_TYPES.WHILE:
        return this.parseWhileStatement();
      case TOKEN_TYPES.LEFT_BRACE:
        return this.parseBlockStatement();
      default:
        return this.parseExpressionStatement();
    }
  });
};

Parser.prototype.parsePrintStatement = function (this: Parser): PrintStmtNode {
  const start = advance(this.state).span.start; // consume print
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after value");
  return {
    type: 'PrintStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseReturnStatement = function (
  this: Parser
): ReturnStmtNode {
  const keyword = advance(this.state); // consume return

  let value: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    value = this.parseExpression();
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after return value");
  return {
    type: 'ReturnStmt',
    keyword,
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");
  return {
    type: 'ExpressionStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ERROR RECOVERY
// ============================================================

/**
 * Discard tokens until just past a `;` or just before a keyword that starts
 * a new statement. Always consumes at least one token so recovery cannot
 * stall on the offending token.
 */
Parser.prototype.synchronize = function (this: Parser): void {
  advance(this.state);

  while (!isAtEnd(this.state)) {
    if (previous(this.state).type === TOKEN_TYPES.SEMICOLON) return;
    if (isStatementStart(this.state)) return;
    advance(this.state);
  }
};
