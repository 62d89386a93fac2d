import * as path from 'path';
import * as yaml from 'js-yaml';

export class DataFileError extends Error {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataFileError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a context file. `.yaml`/`.yml` go through js-yaml, everything else
 * is JSON. The document must be a mapping.
 */
export function parseDataFile(filePath: string, content: string): Record<string, unknown> {
  const extension = path.extname(filePath).toLowerCase();

  let parsed: unknown;
  try {
    parsed = extension === '.yaml' || extension === '.yml'
      ? yaml.load(content, { filename: filePath })
      : JSON.parse(content);
  } catch (error) {
    throw new DataFileError(
      `Failed to parse data file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    );
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new DataFileError(`Data file ${filePath} must contain a mapping at the top level`, filePath);
  }
  return parsed;
}

/**
 * Apply `key=value` assignments from the command line. Values stay strings.
 */
export function applyAssignments(
  context: Record<string, unknown>,
  assignments: readonly string[]
): Record<string, unknown> {
  const result = { ...context };
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid assignment '${assignment}', expected key=value`);
    }
    result[assignment.slice(0, separator)] = assignment.slice(separator + 1);
  }
  return result;
}
