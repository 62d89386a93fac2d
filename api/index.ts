/**
 * Public entry point of the quire package.
 */
export {
  Template,
  renderTemplate,
  ContextStack,
  ContextFrame,
  StringSink,
  TokenKind,
  ValueFormatter,
  BlockFormatter,
  FormatterArgumentError,
  FormatterInputError,
  getFormatter,
  registerFormatter,
  listFormatters,
  hasFormatter
} from '../interpreter';
export type {
  TemplateOptions,
  OutputSink,
  Token,
  Formatter,
  FormatterKind,
  FormatterDefinition
} from '../interpreter';
export {
  TemplateRepository,
  MemoryTemplateResolver,
  NodeTemplateFileSystem
} from '../services/templates';
export type {
  ITemplateResolver,
  ITemplateFileSystem,
  TemplateRepositoryOptions
} from '../services/templates';
export * from '../core/errors';
export type { SourceLocation, Position, Scalar, TemplateContext } from '../core/types';
export { ConfigLoader } from '../core/config/loader';
export type { QuireConfig, ResolvedConfig } from '../core/config/types';
