import { describe, it, expect } from 'vitest';
import { InvalidFormatterError } from '../../core/errors';
import { ValueFormatter } from './Formatter';
import { getFormatter, hasFormatter, listFormatters, registerFormatter } from './registry';

const location = { line: 3, column: 5 };

class ReverseFormatter extends ValueFormatter {
  format(value: unknown): string {
    return String(value).split('').reverse().join('');
  }
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('formatter registry', () => {
  it('should resolve aliases to the same formatter type', () => {
    expect(getFormatter('width', '3', location).name).toBe('width');
    expect(getFormatter('w', '3', location).name).toBe('w');
    expect(getFormatter('separator', ',', location).kind).toBe('block');
    expect(getFormatter('list-separator', ',', location).kind).toBe('block');
  });

  it('should list each built-in formatter once', () => {
    const names = listFormatters().map(definition => definition.aliases[0]);

    expect(names.slice(0, 12)).toEqual([
      'width',
      'prefix',
      'suffix',
      'default',
      'upper-case',
      'escape-newlines',
      'escape-string',
      'wrap-string',
      'cbool',
      'hex',
      'indent',
      'list-separator'
    ]);
  });

  it('should reject unknown names', () => {
    const error = captureError(() => getFormatter('nope', undefined, location));

    expect(error).toBeInstanceOf(InvalidFormatterError);
    expect(error).toMatchObject({ message: "3:5:Invalid formatter 'nope'" });
  });

  it('should reject a value passed to a formatter that takes none', () => {
    expect(() => getFormatter('uc', 'x', location)).toThrow("3:5:Formatter 'uc' does not take a value");
  });

  it('should reject a missing value', () => {
    const error = captureError(() => getFormatter('prefix', undefined, location));

    expect(error).toBeInstanceOf(InvalidFormatterError);
    expect(error).toMatchObject({
      reason: "Formatter 'prefix' requires a value",
      details: { formatter: 'prefix', argument: undefined }
    });
  });

  it('should reject non-integer widths and negative indents', () => {
    expect(() => getFormatter('width', 'wide', location)).toThrow(
      "3:5:Formatter 'width' expects an integer, got 'wide'"
    );
    expect(() => getFormatter('indent', '-1', location)).toThrow(
      "3:5:Formatter 'indent' expects a non-negative depth, got -1"
    );
  });

  it('should register custom formatters', () => {
    registerFormatter({
      aliases: ['reverse', 'rev'],
      kind: 'value',
      argument: 'none',
      description: 'Reverse the text',
      create: name => new ReverseFormatter(name)
    });

    expect(hasFormatter('rev')).toBe(true);
    const formatter = getFormatter('rev', undefined, location);
    expect(formatter.kind === 'value' ? formatter.format('abc') : undefined).toBe('cba');
  });

  it('should refuse duplicate aliases', () => {
    expect(() =>
      registerFormatter({
        aliases: ['w'],
        kind: 'value',
        argument: 'none',
        description: 'Clash',
        create: name => new ReverseFormatter(name)
      })
    ).toThrow("registerFormatter: 'w' is already registered");
  });
});
