/**
 * Parser Extension: Functions and Classes
 * Declarations with parameter lists, calls, and property access
 */

import { Parser } from './parser.js';
import type {
  ClassStmtNode,
  ExpressionNode,
  FunctionStmtNode,
  StatementNode,
  VariableNode,
} from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  errorAt,
  expect,
  isAtEnd,
  match,
  nested,
  previous,
  report,
  spanFrom,
} from './state.js';

/** What a function declaration is, for error messages */
export type FunctionKind = 'function' | 'method';

declare module './parser.js' {
  interface Parser {
    parseClassDeclaration(): ClassStmtNode;
    parseFunction(kind: FunctionKind): FunctionStmtNode;
    parseParameters(): Token[];
    parseCall(): ExpressionNode;
    finishCall(callee: ExpressionNode): ExpressionNode;
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

/** classDecl → "class" IDENTIFIER ( "<" IDENTIFIER )? "{" function* "}" */
Parser.prototype.parseClassDeclaration = function (
  this: Parser
): ClassStmtNode {
  const start = advance(this.state).span.start; // consume class
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'class name');

  let superclass: VariableNode | null = null;
  if (match(this.state, TOKEN_TYPES.LESS)) {
    const superName = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'superclass name'
    );
    superclass = { type: 'Variable', name: superName, span: superName.span };
  }

  expect(this.state, TOKEN_TYPES.LEFT_BRACE, "'{' before class body");

  const methods: FunctionStmtNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RIGHT_BRACE) && !isAtEnd(this.state)) {
    methods.push(this.parseFunction('method'));
  }

  expect(this.state, TOKEN_TYPES.RIGHT_BRACE, "'}' after class body");

  return {
    type: 'ClassStmt',
    name,
    superclass,
    methods,
    span: spanFrom(this.state, start),
  };
};

/**
 * function → IDENTIFIER "(" parameters? ")" block
 *
 * For named functions the caller has already consumed `fun`; the span
 * starts there.
 */
Parser.prototype.parseFunction = function (
  this: Parser,
  kind: FunctionKind
): FunctionStmtNode {
  const start =
    kind === 'function'
      ? previous(this.state).span.start
      : current(this.state).span.start;

  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, `${kind} name`);
  expect(this.state, TOKEN_TYPES.LEFT_PAREN, `'(' after ${kind} name`);
  const params = this.parseParameters();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "')' after parameters");
  const brace = expect(
    this.state,
    TOKEN_TYPES.LEFT_BRACE,
    `'{' before ${kind} body`
  );
  const body: StatementNode[] = nested(this.state, brace, () =>
    this.parseBlockBody()
  );

  return {
    type: 'FunctionStmt',
    name,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** Parameter names up to (not including) the closing parenthesis */
Parser.prototype.parseParameters = function (this: Parser): Token[] {
  const params: Token[] = [];
  if (check(this.state, TOKEN_TYPES.RIGHT_PAREN)) return params;

  do {
    if (params.length >= this.state.maxArguments) {
      // Reported without unwinding: the declaration is still well formed
      report(
        this.state,
        errorAt('LOX-P005', current(this.state), {
          limit: this.state.maxArguments,
        })
      );
    }
    params.push(
      expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name')
    );
  } while (match(this.state, TOKEN_TYPES.COMMA));

  return params;
};

// ============================================================
// CALLS AND PROPERTY ACCESS
// ============================================================

/** call → primary ( "(" arguments? ")" | "." IDENTIFIER )* */
Parser.prototype.parseCall = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (match(this.state, TOKEN_TYPES.LEFT_PAREN)) {
      expr = this.finishCall(expr);
    } else if (match(this.state, TOKEN_TYPES.DOT)) {
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "property name after '.'"
      );
      expr = {
        type: 'Get',
        object: expr,
        name,
        span: spanFrom(this.state, expr.span.start),
      };
    } else {
      break;
    }
  }

  return expr;
};

Parser.prototype.finishCall = function (
  this: Parser,
  callee: ExpressionNode
): ExpressionNode {
  const args: ExpressionNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    do {
      if (args.length >= this.state.maxArguments) {
        report(
          this.state,
          errorAt('LOX-P003', current(this.state), {
            limit: this.state.maxArguments,
          })
        );
      }
      args.push(
        nested(this.state, current(this.state), () => this.parseExpression())
      );
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  const paren = expect(
    this.state,
    TOKEN_TYPES.RIGHT_PAREN,
    "')' after arguments"
  );

  return {
    type: 'Call',
    callee,
    paren,
    args,
    span: spanFrom(this.state, callee.span.start),
  };
};
