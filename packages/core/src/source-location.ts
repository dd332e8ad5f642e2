// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column; 0-based UTF-16 offset into the source */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
