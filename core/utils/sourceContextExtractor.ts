import type { FormattedLocation } from './locationFormatter';

export interface SourceLine {
  number: number;
  content: string;
  isErrorLine: boolean;
}

export interface SourceContext {
  file?: string;
  lines: SourceLine[];
  errorLine: number;
  errorColumn: number;
}

export interface ExtractSourceContextOptions {
  contextLines?: number;
  maxLineLength?: number;
}

/**
 * Cut the lines around an error location out of template source.
 * Returns null when the location does not fall inside the source.
 */
export function extractSourceContext(
  source: string,
  location: FormattedLocation,
  options: ExtractSourceContextOptions = {}
): SourceContext | null {
  const { contextLines = 2, maxLineLength = 120 } = options;

  if (!location.line) {
    return null;
  }

  const lines = source.split('\n');
  const errorLineIndex = location.line - 1;

  if (errorLineIndex < 0 || errorLineIndex >= lines.length) {
    return null;
  }

  const startLine = Math.max(0, errorLineIndex - contextLines);
  const endLine = Math.min(lines.length - 1, errorLineIndex + contextLines);

  const result: SourceLine[] = [];

  for (let i = startLine; i <= endLine; i++) {
    let content = lines[i] ?? '';

    if (content.length > maxLineLength) {
      const column = location.column || 1;
      const start = Math.max(0, column - 40);
      const end = Math.min(content.length, start + maxLineLength);
      content = (start > 0 ? '...' : '') + content.slice(start, end) + (end < content.length ? '...' : '');
    }

    result.push({
      number: i + 1,
      content,
      isErrorLine: i === errorLineIndex
    });
  }

  return {
    file: location.file,
    lines: result,
    errorLine: location.line,
    errorColumn: location.column || 1
  };
}
