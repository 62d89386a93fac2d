import type { SourceLocation } from '../../core/types';
import { InvalidFormatterError } from '../../core/errors';
import {
  FormatterArgumentError,
  parseIntegerArgument,
  type Formatter,
  type FormatterKind
} from './Formatter';
import {
  CBooleanFormatter,
  DefaultFormatter,
  EscapeNewlinesFormatter,
  EscapeStringFormatter,
  HexFormatter,
  PrefixFormatter,
  SuffixFormatter,
  UppercaseFormatter,
  WidthFormatter,
  WrapStringFormatter
} from './value-formatters';
import { IndentFormatter, ListSeparatorFormatter } from './block-formatters';

interface FormatterDefinitionBase {
  /** Every name the formatter answers to; the first is canonical */
  aliases: readonly string[];
  kind: FormatterKind;
  description: string;
}

export interface NullaryFormatterDefinition extends FormatterDefinitionBase {
  argument: 'none';
  create(name: string): Formatter;
}

export interface UnaryFormatterDefinition extends FormatterDefinitionBase {
  argument: 'required';
  create(name: string, argument: string): Formatter;
}

export type FormatterDefinition = NullaryFormatterDefinition | UnaryFormatterDefinition;

const registry = new Map<string, FormatterDefinition>();

/**
 * Add a formatter under all of its aliases. Aliases are unique.
 */
export function registerFormatter(definition: FormatterDefinition): void {
  if (definition.aliases.length === 0) {
    throw new Error('registerFormatter: a formatter needs at least one alias');
  }
  for (const alias of definition.aliases) {
    if (registry.has(alias)) {
      throw new Error(`registerFormatter: '${alias}' is already registered`);
    }
  }
  for (const alias of definition.aliases) {
    registry.set(alias, definition);
  }
}

/**
 * Registered definitions, each listed once, in registration order.
 */
export function listFormatters(): FormatterDefinition[] {
  return Array.from(new Set(registry.values()));
}

export function hasFormatter(name: string): boolean {
  return registry.has(name);
}

/**
 * Instantiate the formatter `name`. Unknown names, missing or unexpected
 * arguments and arguments the formatter rejects all raise
 * InvalidFormatterError at `location`.
 */
export function getFormatter(name: string, argument: string | undefined, location: SourceLocation): Formatter {
  const definition = registry.get(name);
  if (!definition) {
    throw new InvalidFormatterError(`Invalid formatter '${name}'`, location, { formatter: name });
  }

  try {
    if (definition.argument === 'none') {
      if (argument !== undefined) {
        throw new FormatterArgumentError(`Formatter '${name}' does not take a value`);
      }
      return definition.create(name);
    }

    if (argument === undefined) {
      throw new FormatterArgumentError(`Formatter '${name}' requires a value`);
    }
    return definition.create(name, argument);
  } catch (error) {
    if (error instanceof FormatterArgumentError) {
      throw new InvalidFormatterError(error.message, location, { formatter: name, argument }, error);
    }
    throw error;
  }
}

registerFormatter({
  aliases: ['width', 'w'],
  kind: 'value',
  argument: 'required',
  description: 'Pad to a width; negative pads on the left, positive on the right',
  create: (name, argument) => new WidthFormatter(name, parseIntegerArgument(name, argument))
});

registerFormatter({
  aliases: ['prefix'],
  kind: 'value',
  argument: 'required',
  description: 'Prepend a literal string',
  create: (name, argument) => new PrefixFormatter(name, argument)
});

registerFormatter({
  aliases: ['suffix'],
  kind: 'value',
  argument: 'required',
  description: 'Append a literal string',
  create: (name, argument) => new SuffixFormatter(name, argument)
});

registerFormatter({
  aliases: ['default'],
  kind: 'value',
  argument: 'required',
  description: 'Substitute a literal string for a null value',
  create: (name, argument) => new DefaultFormatter(name, argument)
});

registerFormatter({
  aliases: ['upper-case', 'uc'],
  kind: 'value',
  argument: 'none',
  description: 'Uppercase the text',
  create: name => new UppercaseFormatter(name)
});

registerFormatter({
  aliases: ['escape-newlines'],
  kind: 'value',
  argument: 'none',
  description: 'Replace line breaks with \\n',
  create: name => new EscapeNewlinesFormatter(name)
});

registerFormatter({
  aliases: ['escape-string'],
  kind: 'value',
  argument: 'none',
  description: 'Escape line breaks, tabs and double quotes',
  create: name => new EscapeStringFormatter(name)
});

registerFormatter({
  aliases: ['wrap-string'],
  kind: 'value',
  argument: 'none',
  description: 'Wrap string values in double quotes',
  create: name => new WrapStringFormatter(name)
});

registerFormatter({
  aliases: ['cbool'],
  kind: 'value',
  argument: 'none',
  description: 'Write booleans as true/false',
  create: name => new CBooleanFormatter(name)
});

registerFormatter({
  aliases: ['hex'],
  kind: 'value',
  argument: 'none',
  description: 'Write an integer as an uppercase hex literal',
  create: name => new HexFormatter(name)
});

registerFormatter({
  aliases: ['indent'],
  kind: 'block',
  argument: 'required',
  description: 'Indent each instance by a number of tabs',
  create: (name, argument) => {
    const depth = parseIntegerArgument(name, argument);
    if (depth < 0) {
      throw new FormatterArgumentError(`Formatter '${name}' expects a non-negative depth, got ${depth}`);
    }
    return new IndentFormatter(name, depth);
  }
});

registerFormatter({
  aliases: ['list-separator', 'separator', 'l-s'],
  kind: 'block',
  argument: 'required',
  description: 'Insert a separator between instances (NEWLINE and SPACE are substituted)',
  create: (name, argument) => new ListSeparatorFormatter(name, argument)
});
