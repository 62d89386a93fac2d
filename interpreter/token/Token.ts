import type { SourceLocation } from '../../core/types';
import { InvalidFormatterError, InvalidTokenError } from '../../core/errors';
import type { BlockFormatter, Formatter, ValueFormatter } from '../formatters/Formatter';
import { getFormatter } from '../formatters/registry';

export enum TokenKind {
  Value = 'value',
  SelfReference = 'self-reference',
  BlockOpen = 'block-open',
  NegatedBlockOpen = 'negated-block-open',
  BlockClose = 'block-close',
  NamedCharacter = 'named-character',
  Include = 'include'
}

interface TokenBase {
  /** Name without prefix and formatters; may be dotted */
  name: string;
  /** Text between the delimiters */
  raw: string;
  /** Offset of the opening `{{` */
  start: number;
  /** Offset just past the closing `}}` */
  end: number;
  /** Position of the opening `{{` */
  location: SourceLocation;
}

export interface ValueToken extends TokenBase {
  kind: TokenKind.Value | TokenKind.SelfReference;
  formatters: readonly ValueFormatter[];
}

export interface BlockOpenToken extends TokenBase {
  kind: TokenKind.BlockOpen | TokenKind.NegatedBlockOpen;
  formatters: readonly BlockFormatter[];
}

export interface PlainToken extends TokenBase {
  kind: TokenKind.BlockClose | TokenKind.NamedCharacter | TokenKind.Include;
  formatters: readonly never[];
}

export type Token = ValueToken | BlockOpenToken | PlainToken;

const PREFIXES: Readonly<Record<string, TokenKind>> = {
  '#': TokenKind.BlockOpen,
  '!': TokenKind.NegatedBlockOpen,
  '/': TokenKind.BlockClose,
  '_': TokenKind.NamedCharacter,
  '>': TokenKind.Include
};

export const SELF_REFERENCE = '.';

export function isBlockOpen(token: Token): token is BlockOpenToken {
  return token.kind === TokenKind.BlockOpen || token.kind === TokenKind.NegatedBlockOpen;
}

/**
 * Split `key=value` on the first `=`.
 */
function parseFormatterSpec(spec: string, location: SourceLocation): Formatter {
  const separator = spec.indexOf('=');
  if (separator === -1) {
    return getFormatter(spec, undefined, location);
  }
  return getFormatter(spec.slice(0, separator), spec.slice(separator + 1), location);
}

function requireValueFormatter(formatter: Formatter, location: SourceLocation): ValueFormatter {
  if (formatter.kind !== 'value') {
    throw new InvalidFormatterError(
      `Requested block formatter '${formatter.name}' on non-block. Only block formatters can be used on blocks.`,
      location,
      { formatter: formatter.name }
    );
  }
  return formatter;
}

function requireBlockFormatter(formatter: Formatter, location: SourceLocation): BlockFormatter {
  if (formatter.kind !== 'block') {
    throw new InvalidFormatterError(
      `Requested value formatter '${formatter.name}' for non-value. Only value formatters can be used with values.`,
      location,
      { formatter: formatter.name }
    );
  }
  return formatter;
}

/**
 * Parse the payload of a token (the text between `{{` and `}}`).
 *
 * Grammar: `[prefix]? name (':' formatter ('=' argument)?)*` where prefix is
 * one of `# ! / _ >`. A name starting with `.` is a self-reference.
 */
export function parseToken(raw: string, start: number, end: number, location: SourceLocation): Token {
  const prefixKind = raw.length > 0 ? PREFIXES[raw[0]] : undefined;
  let name = prefixKind === undefined ? raw : raw.slice(1);

  let specs: string[] = [];
  const separator = name.indexOf(':');
  if (separator > 0) {
    specs = name.slice(separator + 1).split(':');
    name = name.slice(0, separator);
  }

  if (name.length === 0) {
    throw new InvalidTokenError(`Token '${raw}' has no name`, location, raw);
  }

  const kind = prefixKind ?? (name.startsWith(SELF_REFERENCE) ? TokenKind.SelfReference : TokenKind.Value);
  const formatters = specs.map(spec => parseFormatterSpec(spec, location));
  const base = { name, raw, start, end, location };

  switch (kind) {
    case TokenKind.Value:
    case TokenKind.SelfReference:
      return { ...base, kind, formatters: formatters.map(f => requireValueFormatter(f, location)) };
    case TokenKind.BlockOpen:
    case TokenKind.NegatedBlockOpen:
      return { ...base, kind, formatters: formatters.map(f => requireBlockFormatter(f, location)) };
    case TokenKind.BlockClose:
    case TokenKind.NamedCharacter:
    case TokenKind.Include: {
      const [first] = formatters;
      if (first !== undefined) {
        throw new InvalidFormatterError(
          `Formatter '${first.name}' cannot be applied to a ${kind} token`,
          location,
          { formatter: first.name }
        );
      }
      return { ...base, kind, formatters: [] };
    }
  }
}
