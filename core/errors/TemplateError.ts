import type { SourceLocation } from '../types';
import { formatLocationPrefix } from '../utils/locationFormatter';
import { QuireError, ErrorSeverity, type BaseErrorDetails } from './QuireError';
import { TemplateErrorCode } from './codes';

export interface TemplateErrorOptions {
  code?: TemplateErrorCode;
  details?: BaseErrorDetails;
  cause?: unknown;
}

export interface TemplatePosition {
  line: number;
  column: number;
  filePath?: string;
}

/**
 * Base class for everything that goes wrong while expanding a template.
 * Always carries the location of the offending token; the message is
 * prefixed with `file:line:column:`.
 */
export class TemplateError extends QuireError {
  /** Message without the location prefix */
  public readonly reason: string;
  public readonly location: SourceLocation;

  constructor(reason: string, location: SourceLocation, options: TemplateErrorOptions = {}) {
    super(`${formatLocationPrefix(location)}${reason}`, {
      code: options.code ?? TemplateErrorCode.TEMPLATE_ERROR,
      severity: ErrorSeverity.Fatal,
      details: options.details,
      sourceLocation: location,
      cause: options.cause
    });
    this.reason = reason;
    this.location = location;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getPosition(): TemplatePosition {
    return {
      line: this.location.line,
      column: this.location.column,
      filePath: this.location.filePath
    };
  }
}
