/**
 * Shared types for the template engine.
 */

/**
 * A position in template source. Lines and columns are 1-based, the offset
 * is 0-based and counted in UTF-16 code units.
 */
export interface Position {
  line: number;
  column: number;
  offset?: number;
}

/**
 * Source location attached to tokens and errors.
 */
export interface SourceLocation {
  /** Name or path of the template, when known */
  filePath?: string;
  /** Line number (1-based) */
  line: number;
  /** Column number (1-based) */
  column: number;
  /** Offset from the start of the template (0-based) */
  offset?: number;
}

export type { Scalar, TemplateContext, ValueNode } from './value';
