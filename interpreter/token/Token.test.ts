import { describe, it, expect } from 'vitest';
import { InvalidFormatterError, InvalidTokenError } from '../../core/errors';
import { TextScanner } from '../scanner/TextScanner';
import { TokenKind, parseToken, type Token } from './Token';
import { readToken } from './read-token';

const location = { line: 1, column: 1 };

function parse(raw: string): Token {
  return parseToken(raw, 0, raw.length + 4, location);
}

describe('parseToken', () => {
  it('should parse a plain value token', () => {
    const token = parse('name');

    expect(token.kind).toBe(TokenKind.Value);
    expect(token.name).toBe('name');
    expect(token.formatters).toEqual([]);
  });

  it.each([
    ['#items', TokenKind.BlockOpen, 'items'],
    ['!items', TokenKind.NegatedBlockOpen, 'items'],
    ['/items', TokenKind.BlockClose, 'items'],
    ['_NEWLINE', TokenKind.NamedCharacter, 'NEWLINE'],
    ['>header', TokenKind.Include, 'header'],
    ['.', TokenKind.SelfReference, '.'],
    ['.field.x', TokenKind.SelfReference, '.field.x'],
    ['a.b.[0]', TokenKind.Value, 'a.b.[0]']
  ])('should classify %s', (raw, kind, name) => {
    const token = parse(raw);
    expect(token.kind).toBe(kind);
    expect(token.name).toBe(name);
  });

  it('should instantiate value formatters in order', () => {
    const token = parse('count:width=-4:prefix=n');

    expect(token.name).toBe('count');
    expect(token.formatters.map(f => f.name)).toEqual(['width', 'prefix']);
  });

  it('should split formatter arguments on the first equals sign only', () => {
    const token = parse('v:prefix=a=b');
    const [prefix] = token.formatters;

    expect(token.kind).toBe(TokenKind.Value);
    if (token.kind === TokenKind.Value && prefix?.kind === 'value') {
      expect(prefix.format('x')).toBe('a=bx');
    }
  });

  it('should attach block formatters to block tokens', () => {
    const token = parse('#rows:indent=1:l-s=,');

    expect(token.kind).toBe(TokenKind.BlockOpen);
    expect(token.formatters.map(f => f.kind)).toEqual(['block', 'block']);
  });

  it('should treat a leading colon as part of the name', () => {
    const token = parse(':odd');
    expect(token.name).toBe(':odd');
    expect(token.formatters).toEqual([]);
  });

  it('should reject an empty name', () => {
    expect(() => parse('#')).toThrow(InvalidTokenError);
    expect(() => parse('')).toThrow("1:1:Token '' has no name");
  });

  it('should reject block formatters on values', () => {
    expect(() => parse('v:indent=1')).toThrow(
      "1:1:Requested block formatter 'indent' on non-block. Only block formatters can be used on blocks."
    );
  });

  it('should reject value formatters on blocks', () => {
    expect(() => parse('#b:uc')).toThrow(
      "1:1:Requested value formatter 'uc' for non-value. Only value formatters can be used with values."
    );
  });

  it('should reject formatters on close, named character and include tokens', () => {
    expect(() => parse('/b:uc')).toThrow("1:1:Formatter 'uc' cannot be applied to a block-close token");
    expect(() => parse('>inc:l-s=x')).toThrow("1:1:Formatter 'l-s' cannot be applied to a include token");
  });

  it('should reject unknown formatters', () => {
    const error = (() => {
      try {
        parse('v:bogus');
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(InvalidFormatterError);
    expect(error).toMatchObject({ reason: "Invalid formatter 'bogus'", details: { formatter: 'bogus' } });
  });
});

describe('readToken', () => {
  it('should read a token and leave the scanner after it', () => {
    const scanner = new TextScanner('{{name:uc}} rest');
    const token = readToken(scanner);

    expect(token.raw).toBe('name:uc');
    expect(token.start).toBe(0);
    expect(token.end).toBe(11);
    expect(scanner.getOffset()).toBe(11);
    expect(scanner.peek()).toBe(' ');
  });

  it('should report the token start position', () => {
    const scanner = new TextScanner('ab\n  {{x}}', { filePath: 't' });
    scanner.skip(2);
    scanner.get();
    scanner.skip(2);

    expect(readToken(scanner).location).toEqual({ filePath: 't', line: 2, column: 3, offset: 5 });
  });

  it('should fail at end of input inside a token', () => {
    const scanner = new TextScanner('{{name');
    expect(() => readToken(scanner)).toThrow('1:1:End-of-file reached while reading token');
  });

  it('should fail on a single closing brace', () => {
    const scanner = new TextScanner('{{na}me}}');
    expect(() => readToken(scanner)).toThrow("1:6:Token 'na' incorrectly delimited");
  });
});
