import type { SourceLocation } from '../types';
import { TemplateError } from './TemplateError';
import { TemplateErrorCode } from './codes';

export interface InvalidBlockDetails {
  /** Name of the block being closed or searched for */
  block: string;
  /** Innermost block that was open when the error was found */
  expected?: string;
  [key: string]: unknown;
}

/**
 * Unbalanced block structure: a close without a matching open, a close for
 * the wrong block, or an open that is never closed.
 */
export class InvalidBlockError extends TemplateError {
  declare readonly details: InvalidBlockDetails;

  constructor(message: string, location: SourceLocation, details: InvalidBlockDetails) {
    super(message, location, {
      code: TemplateErrorCode.INVALID_BLOCK,
      details
    });
  }
}
