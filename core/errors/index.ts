/**
 * Central export point for quire error types.
 */
export { QuireError, ErrorSeverity } from './QuireError';
export type { BaseErrorDetails, QuireErrorOptions } from './QuireError';
export { TemplateErrorCode } from './codes';
export { TemplateError } from './TemplateError';
export type { TemplateErrorOptions, TemplatePosition } from './TemplateError';
export * from './InvalidFormatterError';
export * from './InvalidTokenError';
export * from './InvalidNamedCharacterError';
export * from './InvalidBlockError';
export * from './PathResolutionError';
export * from './MissingIncludeResolverError';
export * from './TemplateNotFoundError';
