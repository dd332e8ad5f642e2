/**
 * Lox Parser Tests: Error Recovery
 * Synchronization, non-fatal errors, limits, and hints
 */

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_MAX_NESTING_DEPTH,
  parse,
  parseExpression,
  parseSource,
  printProgram,
  scan,
} from '../../src/index.js';
import { programErrors } from '../helpers/front-end.js';

function args(count: number): string {
  return Array.from({ length: count }, (_, i) => String(i)).join(', ');
}

describe('Lox Parser: Error Recovery', () => {
  describe('Synchronization', () => {
    it('resumes at the next statement after a bad declaration', () => {
      const result = parseSource('var = 1; var x = 2;');
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '=': Expect variable name.",
      ]);
      expect(result.program.statements).toHaveLength(1);
      expect(result.program.statements[0]).toMatchObject({
        type: 'VarStmt',
        name: { lexeme: 'x' },
      });
    });

    it('collects several errors in source order', () => {
      const result = parseSource('var 1;\nprint ;\nvar ok = 1;');
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '1': Expect variable name.",
        "[line 2] Error at ';': Expect expression.",
      ]);
      expect(result.program.statements).toHaveLength(1);
    });

    it('stops discarding in front of a statement keyword', () => {
      const result = parseSource('print 1 + ) 2 var y;');
      expect(result.errors).toHaveLength(1);
      expect(result.program.statements).toMatchObject([
        { type: 'VarStmt', name: { lexeme: 'y' } },
      ]);
    });

    it('recovers inside a block and keeps the block', () => {
      const result = parseSource('{ print; print 2; }');
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at ';': Expect expression.",
      ]);
      expect(result.program.statements).toHaveLength(1);
      const [block] = result.program.statements;
      expect(block?.type).toBe('BlockStmt');
      if (block?.type === 'BlockStmt') {
        expect(block.statements).toHaveLength(1);
      }
    });

    it('reports a missing semicolon at the next line', () => {
      expect(programErrors('print 1\nprint 2;')).toEqual([
        "[line 2] Error at 'print': Expect ';' after value.",
      ]);
    });
  });

  describe('Non-fatal errors', () => {
    it('keeps the statement after an invalid assignment target', () => {
      const result = parseSource('1 + 2 = 3; print 4;');
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '=': Invalid assignment target.",
      ]);
      expect(result.program.statements).toHaveLength(2);
    });

    it('reports too many arguments at the first extra argument', () => {
      const result = parseSource('f(1, 2, 3);', { maxArguments: 2 });
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '3': Can't have more than 2 arguments.",
      ]);
      expect(result.errors[0]?.errorId).toBe('LOX-P003');
      expect(result.program.statements).toHaveLength(1);
    });

    it('reports too many parameters', () => {
      expect(
        programErrors('fun f(a, b, c) {}', { maxArguments: 2 })
      ).toEqual(["[line 1] Error at 'c': Can't have more than 2 parameters."]);
    });

    it('allows 255 arguments by default', () => {
      expect(programErrors(`f(${args(255)});`)).toEqual([]);
    });

    it('rejects the 256th argument by default', () => {
      expect(programErrors(`f(${args(256)});`)).toEqual([
        "[line 1] Error at '255': Can't have more than 255 arguments.",
      ]);
    });
  });

  describe('Structural errors', () => {
    it('reports an unclosed block at end of input', () => {
      const result = parseSource('{ print 1;');
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at end: Expect '}' after block.",
      ]);
      expect(result.errors[0]?.context).toEqual({
        expected: 'RIGHT_BRACE',
        description: "'}' after block",
        suggestions: ['Check for unclosed brace'],
      });
    });

    it('reports a missing class name', () => {
      expect(programErrors('class { }')).toEqual([
        "[line 1] Error at '{': Expect class name.",
      ]);
    });

    it('reports a missing function name', () => {
      expect(programErrors('fun (a) {}')).toEqual([
        "[line 1] Error at '(': Expect function name.",
      ]);
    });

    it('names methods in method errors', () => {
      expect(programErrors('class A { m {} }')).toEqual([
        "[line 1] Error at '{': Expect '(' after method name.",
      ]);
    });

    it('reports a missing parenthesis after if', () => {
      expect(programErrors('if x) print 1;')).toEqual([
        "[line 1] Error at 'x': Expect '(' after 'if'.",
      ]);
    });

    it('reports a missing semicolon in a for clause', () => {
      expect(programErrors('for (var i = 0; i < 3 i = i + 1) print i;')).toEqual(
        ["[line 1] Error at 'i': Expect ';' after loop condition."]
      );
    });
  });

  describe('Hints', () => {
    it('suggests the line that is missing a semicolon', () => {
      const { errors } = parseSource('print 1\nprint 2;');
      expect(errors[0]?.context).toEqual({
        expected: 'SEMICOLON',
        description: "';' after value",
        suggestions: ["Add ';' at the end of line 1"],
      });
    });

    it('suggests a keyword for a likely typo', () => {
      const { errors } = parseSource('var x = 1\nfucn f() {}');
      expect(errors.map((e) => e.format())).toEqual([
        "[line 2] Error at 'fucn': Expect ';' after variable declaration.",
      ]);
      expect(errors[0]?.context).toEqual({
        expected: 'SEMICOLON',
        description: "';' after variable declaration",
        suggestions: ["Did you mean 'fun'?"],
      });
    });
  });

  describe('Lexical and syntax errors together', () => {
    it('orders errors from both stages by source position', () => {
      expect(programErrors('print;\n@ print 1;\nvar;')).toEqual([
        "[line 1] Error at ';': Expect expression.",
        '[line 2] Error: Unexpected character: @',
        "[line 3] Error at ';': Expect variable name.",
      ]);
    });

    it('puts a lexical error first when it precedes the syntax error', () => {
      expect(programErrors('print $;')).toEqual([
        '[line 1] Error: Unexpected character: $',
        "[line 1] Error at ';': Expect expression.",
      ]);
    });

    it('parses past an unterminated string', () => {
      const result = parseSource('print 1;\nprint "oops');
      expect(result.errors.map((e) => e.format())).toEqual([
        '[line 2] Error: Unterminated string.',
        '[line 2] Error at end: Expect expression.',
      ]);
      expect(result.program.statements).toHaveLength(1);
    });
  });

  describe('Nesting limit', () => {
    const groups = (depth: number): string =>
      `${'('.repeat(depth)}1${')'.repeat(depth)}`;

    it('accepts groupings nested up to the default limit', () => {
      expect(DEFAULT_MAX_NESTING_DEPTH).toBe(256);
      const result = parseExpression(scan(groups(256)).tokens);
      expect(result.errors).toEqual([]);
      expect(result.expression?.type).toBe('Grouping');
    });

    it('reports one level past the default limit', () => {
      const result = parseExpression(scan(groups(257)).tokens);
      expect(result.expression).toBeNull();
      expect(result.errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '(': Can't nest more than 256 levels.",
      ]);
    });

    it('reports very deep nesting instead of overflowing the stack', () => {
      const result = parseExpression(scan(groups(5000)).tokens);
      expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-P006']);
    });

    it('recovers at the next statement', () => {
      const result = parseSource(`print ${groups(300)};\nprint 2;`);
      expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-P006']);
      expect(printProgram(result.program)).toBe('(print 2.0)');
    });

    it('counts unary operands', () => {
      const options = { maxNestingDepth: 2 };
      expect(parseExpression(scan('--1').tokens, options).errors).toEqual([]);
      expect(
        parseExpression(scan('---1').tokens, options).errors.map((e) =>
          e.format()
        )
      ).toEqual(["[line 1] Error at '-': Can't nest more than 2 levels."]);
    });

    it('counts call arguments', () => {
      const { errors } = parseExpression(scan('f(f(f(1)))').tokens, {
        maxNestingDepth: 2,
      });
      expect(errors.map((e) => e.format())).toEqual([
        "[line 1] Error at '1': Can't nest more than 2 levels.",
      ]);
    });

    it('counts nested statements', () => {
      const { program, errors } = parse(scan('{ { print 1; } }').tokens, {
        maxNestingDepth: 2,
      });
      expect(errors.map((e) => e.format())).toEqual([
        "[line 1] Error at 'print': Can't nest more than 2 levels.",
      ]);
      expect(printProgram(program)).toBe('(block (block))');
    });
  });
});
