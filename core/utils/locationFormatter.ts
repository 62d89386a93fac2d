import type { SourceLocation } from '../types';

export interface FormattedLocation {
  readonly display: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
}

export function formatLocation(location: SourceLocation | undefined): FormattedLocation {
  if (!location) {
    return { display: 'unknown location' };
  }

  const position = `${location.line}:${location.column}`;
  return {
    display: location.filePath ? `${location.filePath}:${position}` : position,
    file: location.filePath,
    line: location.line,
    column: location.column
  };
}

/**
 * `file:line:column:` or `line:column:`, used as the prefix of error messages.
 */
export function formatLocationPrefix(location: SourceLocation): string {
  return `${formatLocation(location).display}:`;
}
