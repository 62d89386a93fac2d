import type { SourceLocation } from '../types';

/**
 * Defines the severity levels for quire errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a QuireError instance.
 */
export interface QuireErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  sourceLocation?: SourceLocation;
  cause?: unknown;
}

interface SerializedQuireError {
  name: string;
  message: string;
  code: string;
  severity: ErrorSeverity;
  sourceLocation?: SourceLocation;
  details?: BaseErrorDetails;
  cause?: string;
}

/**
 * Base class for all custom quire errors.
 * Provides structure for error codes, severity, details, and source location.
 */
export class QuireError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source location where the error occurred */
  public readonly sourceLocation?: SourceLocation;

  constructor(message: string, options: QuireErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.sourceLocation = options.sourceLocation;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings can be reported as warnings.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  /**
   * Custom serialization to avoid circular references and include only essential info
   */
  toJSON(): SerializedQuireError {
    const cause = this.cause;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      sourceLocation: this.sourceLocation,
      details: this.details,
      cause: cause === undefined ? undefined : cause instanceof Error ? cause.message : String(cause)
    };
  }
}
