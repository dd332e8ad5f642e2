/**
 * CLI LSP Diagnostic Tests
 * Test LSP diagnostic conversion from LoxError
 */

import { describe, it, expect } from 'vitest';
import { ParseError, parseSource, scan } from '@loxkit/core';
import { toLspDiagnostic, toLspReport } from '../src/cli-lsp-diagnostic.js';

describe('CLI LSP Diagnostic', () => {
  describe('toLspDiagnostic', () => {
    it('converts a lexer error with zero-based positions', () => {
      const [error] = scan('  @').errors;
      expect(error).toBeDefined();
      if (!error) return;

      expect(toLspDiagnostic(error)).toEqual({
        range: {
          start: { line: 0, character: 2 },
          end: { line: 0, character: 2 },
        },
        severity: 1,
        code: 'LOX-L002',
        source: 'lox',
        message: 'Unexpected character: @',
      });
    });

    it('carries parser suggestions', () => {
      const [error] = parseSource('print 1\nprint 2;').errors;
      expect(error).toBeDefined();
      if (!error) return;

      expect(toLspDiagnostic(error)).toEqual({
        range: {
          start: { line: 1, character: 0 },
          end: { line: 1, character: 0 },
        },
        severity: 1,
        code: 'LOX-P001',
        source: 'lox',
        message: "Expect ';' after value.",
        suggestions: ["Add ';' at the end of line 1"],
      });
    });

    it('keeps at most three non-empty suggestions', () => {
      const error = new ParseError(
        'LOX-P001',
        'Expect x.',
        { line: 1, column: 1, offset: 0 },
        'y',
        { suggestions: ['a', 'b', '', 'c', 'd'] }
      );
      expect(toLspDiagnostic(error).suggestions).toEqual(['a', 'b']);
    });

    it('omits suggestions that are not a list', () => {
      const error = new ParseError(
        'LOX-P001',
        'Expect x.',
        { line: 1, column: 1, offset: 0 },
        'y',
        { suggestions: 'a' }
      );
      expect(toLspDiagnostic(error)).not.toHaveProperty('suggestions');
    });
  });

  describe('toLspReport', () => {
    it('wraps diagnostics with the file name', () => {
      expect(toLspReport('empty.lox', [])).toEqual({
        file: 'empty.lox',
        diagnostics: [],
      });
    });

    it('keeps error order', () => {
      const { errors } = parseSource('@\nvar;');
      expect(toLspReport('a.lox', errors).diagnostics.map((d) => d.code)).toEqual(
        ['LOX-L002', 'LOX-P001']
      );
    });
  });
});
