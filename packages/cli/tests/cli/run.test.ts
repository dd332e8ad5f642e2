/**
 * Lox CLI Tests: run
 *
 * Drives the CLI in-process against files in a temp directory and checks
 * stdout, stderr, and exit codes.
 */

import { describe, expect, it, beforeAll, afterAll, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { run } from '../../src/cli.js';
import { captureOutput, VERSION } from '../../src/cli-shared.js';
import { CONFIG_FILE_NAME } from '../../src/config.js';

describe('lox CLI', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lox-cli-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // Remove the config file after each test to prevent pollution between tests
  afterEach(async () => {
    await fs.rm(path.join(tempDir, CONFIG_FILE_NAME), { force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  async function lox(argv: string[]) {
    const output = captureOutput();
    const code = await run(argv, { output, cwd: tempDir });
    return { code, out: output.out, err: output.err };
  }

  describe('tokenize', () => {
    it('prints one line per token and EOF last', async () => {
      const file = await writeFile('decl.lox', 'var x = 1;\n');
      expect(await lox(['tokenize', file])).toEqual({
        code: 0,
        out: [
          'VAR var null',
          'IDENTIFIER x null',
          'EQUAL = null',
          'NUMBER 1 1.0',
          'SEMICOLON ; null',
          'EOF  null',
        ],
        err: [],
      });
    });

    it('prints tokens and lexical errors, then exits 65', async () => {
      const file = await writeFile('bad-char.lox', '@ "s"');
      expect(await lox(['tokenize', file])).toEqual({
        code: 65,
        out: ['STRING "s" s', 'EOF  null'],
        err: ['[line 1] Error: Unexpected character: @'],
      });
    });

    it('reports an unterminated string', async () => {
      const file = await writeFile('open-string.lox', 'print "abc');
      expect(await lox(['tokenize', file])).toEqual({
        code: 65,
        out: ['PRINT print null', 'EOF  null'],
        err: ['[line 1] Error: Unterminated string.'],
      });
    });

    it('prints only EOF for an empty file', async () => {
      const file = await writeFile('empty.lox', '');
      expect(await lox(['tokenize', file])).toEqual({
        code: 0,
        out: ['EOF  null'],
        err: [],
      });
    });
  });

  describe('parse', () => {
    it('prints an expression in prefix form', async () => {
      const file = await writeFile('expr.lox', '1 + 2 * 3');
      expect(await lox(['parse', file])).toEqual({
        code: 0,
        out: ['(+ 1.0 (* 2.0 3.0))'],
        err: [],
      });
    });

    it('prints nothing on stdout when there are errors', async () => {
      const file = await writeFile('dangling.lox', '(1 +');
      expect(await lox(['parse', file])).toEqual({
        code: 65,
        out: [],
        err: ['[line 1] Error at end: Expect expression.'],
      });
    });

    it('fails on lexical errors even when parsing succeeds', async () => {
      const file = await writeFile('lex-only.lox', '1 # 2');
      const result = await lox(['parse', file]);
      expect(result.code).toBe(65);
      expect(result.out).toEqual([]);
      expect(result.err).toEqual([
        '[line 1] Error: Unexpected character: #',
        "[line 1] Error at '2': Expect end of expression.",
      ]);
    });

    it('reports errors from both stages in source order', async () => {
      const file = await writeFile('mixed.lox', 'print;\n@');
      expect(await lox(['parse', '--program', file])).toEqual({
        code: 65,
        out: [],
        err: [
          "[line 1] Error at ';': Expect expression.",
          '[line 2] Error: Unexpected character: @',
        ],
      });
    });

    it('reports deeply nested input as a syntax error', async () => {
      const depth = 300;
      const file = await writeFile(
        'deep.lox',
        `${'('.repeat(depth)}1${')'.repeat(depth)}`
      );
      expect(await lox(['parse', file])).toEqual({
        code: 65,
        out: [],
        err: ["[line 1] Error at '(': Can't nest more than 256 levels."],
      });
    });

    it('prints every statement with --program', async () => {
      const file = await writeFile('prog.lox', 'print 1;\nvar a = "x";\n');
      expect(await lox(['parse', '--program', file])).toEqual({
        code: 0,
        out: ['(print 1.0)\n(var a x)'],
        err: [],
      });
    });

    it('prints nothing for an empty program', async () => {
      const file = await writeFile('blank.lox', '// nothing\n');
      expect(await lox(['parse', '--program', file])).toEqual({
        code: 0,
        out: [],
        err: [],
      });
    });

    it('reports every syntax error in a program', async () => {
      const file = await writeFile('two-errors.lox', 'var 1;\nprint ;\n');
      expect(await lox(['parse', '--program', file])).toEqual({
        code: 65,
        out: [],
        err: [
          "[line 1] Error at '1': Expect variable name.",
          "[line 2] Error at ';': Expect expression.",
        ],
      });
    });
  });

  describe('configuration', () => {
    it('applies parser.maxArguments from .loxrc.yaml', async () => {
      await writeFile(CONFIG_FILE_NAME, 'parser:\n  maxArguments: 2\n');
      const file = await writeFile('call.lox', 'f(1, 2, 3);');
      expect(await lox(['parse', '--program', file])).toEqual({
        code: 65,
        out: [],
        err: ["[line 1] Error at '3': Can't have more than 2 arguments."],
      });
    });

    it('prints JSON diagnostics when configured', async () => {
      await writeFile(CONFIG_FILE_NAME, 'diagnostics:\n  format: json\n');
      const file = await writeFile('json.lox', '1 +');
      const result = await lox(['parse', file]);

      expect(result.code).toBe(65);
      expect(result.err).toHaveLength(1);
      expect(JSON.parse(result.err[0] ?? '')).toEqual({
        file,
        diagnostics: [
          {
            range: {
              start: { line: 0, character: 3 },
              end: { line: 0, character: 3 },
            },
            severity: 1,
            code: 'LOX-P002',
            source: 'lox',
            message: 'Expect expression.',
          },
        ],
      });
    });

    it('lets --format override the configuration', async () => {
      await writeFile(CONFIG_FILE_NAME, 'diagnostics:\n  format: json\n');
      const file = await writeFile('override.lox', '1 +');
      expect((await lox(['parse', file, '--format', 'text'])).err).toEqual([
        '[line 1] Error at end: Expect expression.',
      ]);
    });

    it('exits 1 on invalid configuration', async () => {
      await writeFile(CONFIG_FILE_NAME, 'parser:\n  maxArguments: 0\n');
      const file = await writeFile('cfg.lox', '1');
      expect(await lox(['parse', file])).toEqual({
        code: 1,
        out: [],
        err: [
          'Invalid configuration: parser.maxArguments must be an integer between 1 and 255',
        ],
      });
    });

    it('logs the configuration and phases with --verbose', async () => {
      await writeFile('custom.yaml', 'parser:\n  maxArguments: 4\n');
      const file = await writeFile('verbose.lox', 'x');
      expect(
        await lox(['tokenize', file, '--verbose', '--config', 'custom.yaml'])
      ).toEqual({
        code: 0,
        out: ['IDENTIFIER x null', 'EOF  null'],
        err: [
          `[verbose] config: ${path.join(tempDir, 'custom.yaml')}`,
          '[verbose] scanned 2 tokens, 0 lexical errors',
        ],
      });
    });
  });

  describe('usage and files', () => {
    it('exits 1 when the file does not exist', async () => {
      const missing = path.join(tempDir, 'missing.lox');
      expect(await lox(['tokenize', missing])).toEqual({
        code: 1,
        out: [],
        err: [`File not found: ${missing}`],
      });
    });

    it('resolves a relative file against the working directory', async () => {
      await writeFile('relative.lox', 'nil');
      expect(await lox(['tokenize', 'relative.lox'])).toEqual({
        code: 0,
        out: ['NIL nil null', 'EOF  null'],
        err: [],
      });
    });

    it('names a missing relative file as given', async () => {
      expect(await lox(['parse', 'absent.lox'])).toEqual({
        code: 1,
        out: [],
        err: ['File not found: absent.lox'],
      });
    });

    it('exits 1 on usage errors', async () => {
      expect(await lox([])).toEqual({
        code: 1,
        out: [],
        err: ['Missing command'],
      });
    });

    it('prints help', async () => {
      const result = await lox(['--help']);
      expect(result.code).toBe(0);
      expect(result.out[0]?.startsWith('Usage:\n  lox tokenize <file>')).toBe(true);
    });

    it('prints the version', async () => {
      expect(await lox(['--version'])).toEqual({
        code: 0,
        out: [VERSION],
        err: [],
      });
    });

    it('explains a registered error', async () => {
      const result = await lox(['--explain', 'LOX-P002']);
      expect(result.code).toBe(0);
      expect(result.out[0]?.split('\n')[0]).toBe('LOX-P002: Expected expression');
    });

    it('rejects an unknown error ID', async () => {
      expect(await lox(['--explain', 'LOX-Z001'])).toEqual({
        code: 1,
        out: [],
        err: [
          'Invalid error ID: LOX-Z001',
          'Error ID must be a registered LOX-{L|P}{3-digit} code, e.g., LOX-P002',
        ],
      });
    });
  });
});
