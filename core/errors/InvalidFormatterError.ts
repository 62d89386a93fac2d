import type { SourceLocation } from '../types';
import { TemplateError } from './TemplateError';
import { TemplateErrorCode } from './codes';

export interface InvalidFormatterDetails {
  formatter: string;
  [key: string]: unknown;
}

/**
 * A formatter could not be found or instantiated, or it was attached to a
 * token that cannot take it.
 */
export class InvalidFormatterError extends TemplateError {
  declare readonly details: InvalidFormatterDetails;

  constructor(message: string, location: SourceLocation, details: InvalidFormatterDetails, cause?: unknown) {
    super(message, location, {
      code: TemplateErrorCode.INVALID_FORMATTER,
      details,
      cause
    });
  }
}
