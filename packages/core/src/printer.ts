/**
 * AST Printer
 * Canonical parenthesized prefix rendering of expressions and statements
 */

import type {
  ExpressionNode,
  FunctionStmtNode,
  LiteralValue,
  ProgramNode,
  StatementNode,
} from './ast-nodes.js';
import type { Token, TokenLiteral } from './token-types.js';

// ============================================================
// LITERALS
// ============================================================

/**
 * Write a number in plain decimal notation. `String` switches to exponent
 * form below 1e-6 and `toFixed` at 1e21 and above.
 */
function expandExponent(text: string): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const sign = match[1] ?? '';
  const digits = `${match[2] ?? ''}${match[3] ?? ''}`;
  const exponent = Number(match[4]);
  const point = exponent + 1;

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits.padEnd(point, '0')}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Numbers with an integral value keep one decimal: `7` prints as `7.0`.
 * Output never uses exponent notation.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value)) {
    return `${BigInt(value).toString()}.0`;
  }
  return expandExponent(String(value));
}

/** Render a token payload; strings print without quotes */
export function formatLiteral(literal: TokenLiteral | null): string {
  if (literal === null) return 'null';
  return typeof literal === 'number' ? formatNumber(literal) : literal;
}

/**
 * Render a token as `<TYPE> <lexeme> <literal|null>`.
 *
 * @example
 * formatToken(numberToken) // "NUMBER 42 42.0"
 * formatToken(eofToken)    // "EOF  null"
 */
export function formatToken(token: Token): string {
  return `${token.type} ${token.lexeme} ${formatLiteral(token.literal)}`;
}

function formatValue(value: LiteralValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'number') return formatNumber(value);
  return String(value);
}

// ============================================================
// EXPRESSIONS
// ============================================================

function parenthesize(name: string, ...parts: string[]): string {
  return parts.length === 0 ? `(${name})` : `(${name} ${parts.join(' ')})`;
}

/**
 * Render an expression in prefix form.
 *
 * @example
 * printExpression(parseExpression(scan('1 + 2 * 3').tokens).expression)
 * // "(+ 1.0 (* 2.0 3.0))"
 */
export function printExpression(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'Literal':
      return formatValue(expr.value);
    case 'Grouping':
      return parenthesize('group', printExpression(expr.expression));
    case 'Unary':
      return parenthesize(expr.operator.lexeme, printExpression(expr.right));
    case 'Binary':
    case 'Logical':
      return parenthesize(
        expr.operator.lexeme,
        printExpression(expr.left),
        printExpression(expr.right)
      );
    case 'Variable':
      return expr.name.lexeme;
    case 'Assign':
      return parenthesize('=', expr.name.lexeme, printExpression(expr.value));
    case 'Call':
      return parenthesize(
        'call',
        printExpression(expr.callee),
        ...expr.args.map(printExpression)
      );
    case 'Get':
      return parenthesize('.', printExpression(expr.object), expr.name.lexeme);
    case 'Set':
      return parenthesize(
        '=',
        parenthesize('.', printExpression(expr.object), expr.name.lexeme),
        printExpression(expr.value)
      );
    case 'This':
      return 'this';
    case 'Super':
      return parenthesize('super', expr.method.lexeme);
  }
}

// ============================================================
// STATEMENTS
// ============================================================

function printFunction(fn: FunctionStmtNode): string {
  const params = `(${fn.params.map((p) => p.lexeme).join(' ')})`;
  return parenthesize(
    'fun',
    fn.name.lexeme,
    params,
    ...fn.body.map(printStatement)
  );
}

/** Render a statement in prefix form, nested statements inline */
export function printStatement(stmt: StatementNode): string {
  switch (stmt.type) {
    case 'ExpressionStmt':
      return parenthesize(';', printExpression(stmt.expression));
    case 'PrintStmt':
      return parenthesize('print', printExpression(stmt.expression));
    case 'VarStmt':
      return stmt.initializer
        ? parenthesize(
            'var',
            stmt.name.lexeme,
            printExpression(stmt.initializer)
          )
        : parenthesize('var', stmt.name.lexeme);
    case 'BlockStmt':
      return parenthesize('block', ...stmt.statements.map(printStatement));
    case 'IfStmt': {
      const parts = [
        printExpression(stmt.condition),
        printStatement(stmt.thenBranch),
      ];
      if (stmt.elseBranch) parts.push(printStatement(stmt.elseBranch));
      return parenthesize('if', ...parts);
    }
    case 'WhileStmt':
      return parenthesize(
        'while',
        printExpression(stmt.condition),
        printStatement(stmt.body)
      );
    case 'FunctionStmt':
      return printFunction(stmt);
    case 'ReturnStmt':
      return stmt.value
        ? parenthesize('return', printExpression(stmt.value))
        : parenthesize('return');
    case 'ClassStmt': {
      const head = stmt.superclass
        ? [stmt.name.lexeme, '<', stmt.superclass.name.lexeme]
        : [stmt.name.lexeme];
      return parenthesize('class', ...head, ...stmt.methods.map(printFunction));
    }
  }
}

/** Render a program, one top-level statement per line */
export function printProgram(program: ProgramNode): string {
  return program.statements.map(printStatement).join('\n');
}
