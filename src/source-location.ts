// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/**
 * Render a location as `file:line:column`, or `line:column` when the
 * source has no file (manifests compiled from a string).
 */
export function formatLocation(
  location: SourceLocation,
  file?: string | undefined
): string {
  const position = `${location.line}:${location.column}`;
  return file ? `${file}:${position}` : position;
}
