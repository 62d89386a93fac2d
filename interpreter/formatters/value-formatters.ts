import { toDisplayString } from '../../core/types/value';
import { ValueFormatter, FormatterInputError } from './Formatter';

function asText(value: unknown): string {
  return toDisplayString(value);
}

/**
 * Pad the value to a fixed width. Negative widths pad on the left
 * (`'  42'`), positive widths on the right (`'42  '`). Longer values are
 * never truncated.
 */
export class WidthFormatter extends ValueFormatter {
  constructor(name: string, private readonly width: number) {
    super(name);
  }

  format(value: unknown): string {
    const text = asText(value);
    return this.width < 0 ? text.padStart(-this.width) : text.padEnd(this.width);
  }
}

export class PrefixFormatter extends ValueFormatter {
  constructor(name: string, private readonly prefix: string) {
    super(name);
  }

  format(value: unknown): string {
    return this.prefix + asText(value);
  }
}

export class SuffixFormatter extends ValueFormatter {
  constructor(name: string, private readonly suffix: string) {
    super(name);
  }

  format(value: unknown): string {
    return asText(value) + this.suffix;
  }
}

/**
 * Substitutes its argument for null or undefined, passes anything else through.
 */
export class DefaultFormatter extends ValueFormatter {
  constructor(name: string, private readonly fallback: string) {
    super(name);
  }

  format(value: unknown): unknown {
    return value === null || value === undefined ? this.fallback : value;
  }
}

export class UppercaseFormatter extends ValueFormatter {
  format(value: unknown): string {
    return asText(value).toUpperCase();
  }
}

export class EscapeNewlinesFormatter extends ValueFormatter {
  format(value: unknown): string {
    return asText(value).replace(/\n/g, '\\n');
  }
}

/**
 * Escapes newlines, tabs and double quotes for use inside a string literal.
 */
export class EscapeStringFormatter extends ValueFormatter {
  format(value: unknown): string {
    return asText(value)
      .replace(/\n/g, '\\n')
      .replace(/\t/g, '\\t')
      .replace(/"/g, '\\"');
  }
}

/**
 * Quotes strings; other values pass through untouched.
 */
export class WrapStringFormatter extends ValueFormatter {
  format(value: unknown): unknown {
    return typeof value === 'string' ? `"${value}"` : value;
  }
}

export class CBooleanFormatter extends ValueFormatter {
  format(value: unknown): unknown {
    if (typeof value === 'boolean') {
      return value ? 'true' : 'false';
    }
    return value;
  }
}

/**
 * Integer as a hex literal with uppercase digits (`0x7F`).
 */
export class HexFormatter extends ValueFormatter {
  format(value: unknown): string {
    let integer: bigint;
    if (typeof value === 'bigint') {
      integer = value;
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
      integer = BigInt(value);
    } else {
      throw new FormatterInputError(`Formatter '${this.name}' expects an integer, got '${asText(value)}'`);
    }

    const sign = integer < 0n ? '-' : '';
    const magnitude = integer < 0n ? -integer : integer;
    return `${sign}0x${magnitude.toString(16).toUpperCase()}`;
  }
}
