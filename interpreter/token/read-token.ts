import { InvalidTokenError } from '../../core/errors';
import type { TextScanner } from '../scanner/TextScanner';
import { parseToken, type Token } from './Token';

export const TOKEN_OPEN = '{{';

/**
 * True when the scanner has just returned the first brace of `{{`.
 */
export function atTokenStart(current: string | undefined, scanner: TextScanner): boolean {
  return current === '{' && scanner.peek() === '{';
}

/**
 * Read one token. The scanner must be positioned on the opening `{{`; on
 * return it sits just past the closing `}}`.
 */
export function readToken(scanner: TextScanner): Token {
  const start = scanner.getOffset();
  const location = scanner.getPosition();
  scanner.skip(TOKEN_OPEN.length);

  let raw = '';
  for (;;) {
    const c = scanner.get();
    if (c === undefined) {
      throw new InvalidTokenError('End-of-file reached while reading token', location, raw);
    }
    if (c !== '}') {
      raw += c;
      continue;
    }
    if (scanner.peek() === '}') {
      scanner.get();
      return parseToken(raw, start, scanner.getOffset(), location);
    }
    throw new InvalidTokenError(`Token '${raw}' incorrectly delimited`, scanner.getPosition(), raw);
  }
}
