import type { SourceLocation } from '../types';
import { TemplateError } from './TemplateError';
import { TemplateErrorCode } from './codes';

/**
 * A token is unterminated, incorrectly delimited or empty.
 */
export class InvalidTokenError extends TemplateError {
  constructor(message: string, location: SourceLocation, token?: string) {
    super(message, location, {
      code: TemplateErrorCode.INVALID_TOKEN,
      details: token === undefined ? undefined : { token }
    });
  }
}
