// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position of the lexer cursor in a source unit.
 * `row` and `column` are zero-based; `offset` is absolute into the source.
 */
export interface SourceLocation {
  readonly filepath: string;
  readonly row: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/**
 * Render a location as `file:row:column`, one-based for display.
 *
 * @example
 * formatLocation({ filepath: 'hw.c', row: 1, column: 0, offset: 2 })
 * // Returns: "hw.c:2:1"
 */
export function formatLocation(location: SourceLocation): string {
  return `${location.filepath}:${location.row + 1}:${location.column + 1}`;
}
