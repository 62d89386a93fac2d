export enum TemplateErrorCode {
  TEMPLATE_ERROR = 'TEMPLATE_ERROR',
  INVALID_FORMATTER = 'INVALID_FORMATTER',
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_NAMED_CHARACTER = 'INVALID_NAMED_CHARACTER',
  INVALID_BLOCK = 'INVALID_BLOCK',
  PATH_RESOLUTION_FAILED = 'PATH_RESOLUTION_FAILED',
  MISSING_INCLUDE_RESOLVER = 'MISSING_INCLUDE_RESOLVER',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND'
}
