import type { Position, SourceLocation } from '@core/types';

export interface FormattedLocation {
  readonly display: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
}

export function formatLocation(
  location: Position | SourceLocation | undefined,
  filePath?: string
): FormattedLocation {
  if (!location) {
    return { display: filePath ?? 'unknown location' };
  }

  const position = 'start' in location ? location.start : location;

  if (filePath) {
    return {
      display: `${filePath}:${position.line}:${position.column}`,
      file: filePath,
      line: position.line,
      column: position.column
    };
  }

  return {
    display: `line ${position.line}, column ${position.column}`,
    line: position.line,
    column: position.column
  };
}

export function formatLocationForError(
  location: Position | SourceLocation | undefined,
  filePath?: string
): string {
  return formatLocation(location, filePath).display;
}
