/**
 * CLI Error Explanation Tests
 */

import { describe, expect, it } from 'vitest';
import { explainError } from '../src/cli-explain.js';

describe('explainError', () => {
  it('renders every section with indented examples', () => {
    expect(explainError('LOX-L001')).toBe(
      [
        'LOX-L001: Unterminated string',
        '',
        'Cause:',
        '  A string was opened with a double quote but never closed.',
        '',
        'Resolution:',
        '  Add the closing double quote. Strings may span several lines but must end before the end of the file.',
        '',
        'Examples:',
        '  Missing closing quote',
        '',
        '    print "hello;',
      ].join('\n')
    );
  });

  it('indents each line of a multi-line example', () => {
    const doc = explainError('LOX-P001');
    expect(doc).toContain('    var a = 1\n    print a;');
  });

  it('omits sections without content', () => {
    expect(explainError('LOX-P003')).toBe(
      [
        'LOX-P003: Too many arguments',
        '',
        'Cause:',
        '  A call passes more arguments than the configured limit.',
        '',
        'Resolution:',
        '  Pass fewer arguments, for example by grouping related values into an instance.',
      ].join('\n')
    );
  });

  it('returns null for malformed IDs', () => {
    expect(explainError('P002')).toBeNull();
    expect(explainError('LOX-R001')).toBeNull();
  });

  it('returns null for unknown IDs', () => {
    expect(explainError('LOX-P999')).toBeNull();
  });
});
