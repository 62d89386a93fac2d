import type { SourceLocation } from '../types';
import { TemplateError } from './TemplateError';
import { TemplateErrorCode } from './codes';

export class InvalidNamedCharacterError extends TemplateError {
  constructor(name: string, location: SourceLocation) {
    super(`Unrecognized named character token '${name}'`, location, {
      code: TemplateErrorCode.INVALID_NAMED_CHARACTER,
      details: { name }
    });
  }
}
