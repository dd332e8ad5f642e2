/**
 * Diagnostics
 * Text rendering of collected errors and the exit-code convention
 */

import type { LoxError } from './error-classes.js';

/** Process exit codes used by front-end tooling */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Usage errors and unreadable input files */
  FAILURE: 1,
  /** Lexical or syntax errors in the input (sysexits EX_DATAERR) */
  DATA_ERROR: 65,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Render one error as a single line.
 *
 * - lexical: `[line 1] Error: Unexpected character: $`
 * - at a token: `[line 1] Error at ')': Expect expression.`
 * - at end of input: `[line 1] Error at end: Expect ';' after value.`
 */
export function formatDiagnostic(error: LoxError): string {
  return error.format();
}

/** Render every error, one per line, in the order given */
export function formatDiagnostics(errors: readonly LoxError[]): string[] {
  return errors.map(formatDiagnostic);
}

/** 0 when the front end produced no errors, 65 otherwise */
export function exitCodeFor(errors: readonly LoxError[]): ExitCode {
  return errors.length === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.DATA_ERROR;
}

/**
 * Merge two error lists that are each already in source order (lexical and
 * syntax errors) into one list in source order. On equal offsets the
 * first list's error comes first.
 */
export function mergeErrors<A extends LoxError, B extends LoxError>(
  first: readonly A[],
  second: readonly B[]
): (A | B)[] {
  const merged: (A | B)[] = [];
  let i = 0;
  let j = 0;

  while (i < first.length && j < second.length) {
    const a = first[i];
    const b = second[j];
    if (a === undefined || b === undefined) break;
    if (a.location.offset <= b.location.offset) {
      merged.push(a);
      i++;
    } else {
      merged.push(b);
      j++;
    }
  }

  return [...merged, ...first.slice(i), ...second.slice(j)];
}
