import { describe, it, expect } from 'vitest';
import { FormatterInputError } from './Formatter';
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

describe('value formatters', () => {
  it('should pad on the left for negative widths and on the right for positive ones', () => {
    expect(new WidthFormatter('width', -4).format(42)).toBe('  42');
    expect(new WidthFormatter('width', 4).format(42)).toBe('42  ');
    expect(new WidthFormatter('w', 2).format('long')).toBe('long');
  });

  it('should add prefixes and suffixes', () => {
    expect(new PrefixFormatter('prefix', '--').format('x')).toBe('--x');
    expect(new SuffixFormatter('suffix', ';').format(7)).toBe('7;');
  });

  it('should substitute a default only for null values', () => {
    const formatter = new DefaultFormatter('default', 'n/a');

    expect(formatter.format(null)).toBe('n/a');
    expect(formatter.format(undefined)).toBe('n/a');
    expect(formatter.format(0)).toBe(0);
    expect(formatter.format('')).toBe('');
  });

  it('should uppercase text', () => {
    expect(new UppercaseFormatter('uc').format('mixed Case')).toBe('MIXED CASE');
  });

  it('should escape newlines', () => {
    expect(new EscapeNewlinesFormatter('escape-newlines').format('a\nb\n')).toBe('a\\nb\\n');
  });

  it('should escape strings for a quoted literal', () => {
    expect(new EscapeStringFormatter('escape-string').format('say "hi"\n\tok')).toBe('say \\"hi\\"\\n\\tok');
  });

  it('should wrap only strings in quotes', () => {
    const formatter = new WrapStringFormatter('wrap-string');

    expect(formatter.format('id')).toBe('"id"');
    expect(formatter.format(3)).toBe(3);
  });

  it('should write booleans as lowercase words and pass other values through', () => {
    const formatter = new CBooleanFormatter('cbool');

    expect(formatter.format(true)).toBe('true');
    expect(formatter.format(false)).toBe('false');
    expect(formatter.format('yes')).toBe('yes');
  });

  describe('hex', () => {
    const formatter = new HexFormatter('hex');

    it('should format integers with uppercase digits', () => {
      expect(formatter.format(127)).toBe('0x7F');
      expect(formatter.format(0)).toBe('0x0');
      expect(formatter.format(-255)).toBe('-0xFF');
      expect(formatter.format(2n ** 64n)).toBe('0x10000000000000000');
    });

    it('should reject values that are not integers', () => {
      expect(() => formatter.format(1.5)).toThrow(FormatterInputError);
      expect(() => formatter.format('12')).toThrow("Formatter 'hex' expects an integer, got '12'");
    });
  });
});

describe('block formatters', () => {
  it('should indent the start of each instance and every line inside it', () => {
    const formatter = new IndentFormatter('indent', 2);

    expect(formatter.onBlockBegin()).toBe('\t\t');
    expect(formatter.format('a\nb')).toBe('a\n\t\tb');
    expect(formatter.onBlockEnd(false)).toBeUndefined();
  });

  it('should separate all but the last instance', () => {
    const formatter = new ListSeparatorFormatter('l-s', ',SPACE');

    expect(formatter.separator).toBe(', ');
    expect(formatter.onBlockEnd(false)).toBe(', ');
    expect(formatter.onBlockEnd(true)).toBeUndefined();
    expect(formatter.onBlockBegin(true)).toBeUndefined();
    expect(formatter.format('body')).toBe('body');
  });
});
