/**
 * CLI LSP Diagnostic Conversion
 * Convert front-end errors to LSP Diagnostic format for `--format json`
 */

import type { LoxError, SourceLocation } from '@loxkit/core';

// ============================================================
// PUBLIC TYPES
// ============================================================

/** LSP DiagnosticSeverity.Error; every front-end error stops the pipeline */
const LSP_SEVERITY_ERROR = 1;

export interface LspDiagnostic {
  readonly range: LspRange;
  readonly severity: typeof LSP_SEVERITY_ERROR;
  readonly code: string;
  readonly source: 'lox';
  readonly message: string;
  readonly suggestions?: string[] | undefined;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

/** Document printed on stderr when diagnostics use the JSON format */
export interface LspReport {
  readonly file: string;
  readonly diagnostics: LspDiagnostic[];
}

// ============================================================
// LSP DIAGNOSTIC CONVERSION
// ============================================================

/**
 * Convert a LoxError to LSP Diagnostic format.
 *
 * LSP positions are zero-based. The range covers the error location only.
 * At most three suggestions are carried over from the error context.
 */
export function toLspDiagnostic(error: LoxError): LspDiagnostic {
  const position = sourceLocationToLspPosition(error.location);
  const suggestions = extractSuggestions(error.context);

  return {
    range: { start: position, end: position },
    severity: LSP_SEVERITY_ERROR,
    code: error.errorId,
    source: 'lox',
    message: error.message,
    ...(suggestions ? { suggestions } : {}),
  };
}

/** Build the JSON document for a file's diagnostics */
export function toLspReport(
  file: string,
  errors: readonly LoxError[]
): LspReport {
  return { file, diagnostics: errors.map(toLspDiagnostic) };
}

function extractSuggestions(
  context: Record<string, unknown> | undefined
): string[] | undefined {
  const raw = context?.['suggestions'];
  if (!Array.isArray(raw) || raw.length === 0) return undefined;

  const filtered = raw
    .slice(0, 3)
    .map((s) => String(s))
    .filter((s) => s.length > 0);
  return filtered.length > 0 ? filtered : undefined;
}

/** 1-based line and column to 0-based line and character */
function sourceLocationToLspPosition(location: SourceLocation): LspPosition {
  return {
    line: location.line - 1,
    character: location.column - 1,
  };
}
