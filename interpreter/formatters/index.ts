export {
  ValueFormatter,
  BlockFormatter,
  FormatterArgumentError,
  FormatterInputError,
  parseIntegerArgument,
  substitutePlaceholders
} from './Formatter';
export type { Formatter, FormatterKind } from './Formatter';
export * from './value-formatters';
export * from './block-formatters';
export { getFormatter, registerFormatter, listFormatters, hasFormatter } from './registry';
export type {
  FormatterDefinition,
  NullaryFormatterDefinition,
  UnaryFormatterDefinition
} from './registry';
