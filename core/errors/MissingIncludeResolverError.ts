import type { SourceLocation } from '../types';
import { QuireError, ErrorSeverity } from './QuireError';
import { TemplateErrorCode } from './codes';

/**
 * An include directive was rendered by a template that has no resolver.
 */
export class MissingIncludeResolverError extends QuireError {
  constructor(templateName: string, sourceLocation: SourceLocation) {
    super(`Cannot include '${templateName}' without an include resolver`, {
      code: TemplateErrorCode.MISSING_INCLUDE_RESOLVER,
      severity: ErrorSeverity.Fatal,
      details: { templateName },
      sourceLocation
    });
  }
}
