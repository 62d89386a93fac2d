/**
 * Formatters transform a single value or a rendered block. They are created
 * from their name and optional argument while a token is parsed and are
 * immutable afterwards.
 */

export type FormatterKind = 'value' | 'block';

export abstract class ValueFormatter {
  readonly kind = 'value' as const;

  constructor(readonly name: string) {}

  /**
   * Map one value to another. Receives the previous formatter's output.
   */
  abstract format(value: unknown): unknown;
}

export abstract class BlockFormatter {
  readonly kind = 'block' as const;

  constructor(readonly name: string) {}

  /**
   * Text written before an instance is expanded, if any.
   */
  onBlockBegin(_isFirst: boolean): string | undefined {
    return undefined;
  }

  /**
   * Text written after an instance is expanded, if any.
   */
  onBlockEnd(_isLast: boolean): string | undefined {
    return undefined;
  }

  /**
   * Post-process the fully rendered text of one instance.
   */
  format(block: string): string {
    return block;
  }
}

export type Formatter = ValueFormatter | BlockFormatter;

/**
 * Thrown by a formatter factory when its argument is unusable. The token
 * parser turns it into an InvalidFormatterError with a source location.
 */
export class FormatterArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatterArgumentError';
  }
}

/**
 * Thrown by a value formatter that cannot handle its input.
 */
export class FormatterInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatterInputError';
  }
}

export function parseIntegerArgument(formatter: string, argument: string): number {
  if (!/^[+-]?\d+$/.test(argument.trim())) {
    throw new FormatterArgumentError(`Formatter '${formatter}' expects an integer, got '${argument}'`);
  }
  return Number.parseInt(argument, 10);
}

/**
 * Replace the NEWLINE and SPACE placeholders inside a formatter argument.
 */
export function substitutePlaceholders(argument: string): string {
  return argument.replace(/NEWLINE/g, '\n').replace(/SPACE/g, ' ');
}
