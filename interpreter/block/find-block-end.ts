import { InvalidBlockError } from '../../core/errors';
import type { TextScanner } from '../scanner/TextScanner';
import { TokenKind, isBlockOpen, type BlockOpenToken, type Token } from '../token/Token';
import { atTokenStart, readToken } from '../token/read-token';

/**
 * Find the close token matching `open`, starting right after it.
 *
 * Nested tokens are fully read so formatter syntax is skipped correctly.
 * Open blocks are tracked on a stack seeded with `open`; a close must match
 * the innermost open block. Leaves the scanner just past the matching close.
 */
export function findBlockEnd(scanner: TextScanner, open: BlockOpenToken): Token {
  const openBlocks: string[] = [open.name];

  while (!scanner.isAtEnd()) {
    const current = scanner.get();
    if (!atTokenStart(current, scanner)) {
      continue;
    }

    scanner.unget();
    const token = readToken(scanner);

    if (isBlockOpen(token)) {
      openBlocks.push(token.name);
    } else if (token.kind === TokenKind.BlockClose) {
      const lastBlock = openBlocks.pop();
      if (token.name !== lastBlock) {
        throw new InvalidBlockError(
          `Cannot close block '${token.name}' here. Last open block is '${String(lastBlock)}'`,
          token.location,
          { block: token.name, expected: lastBlock }
        );
      }
      if (openBlocks.length === 0) {
        return token;
      }
    }
  }

  throw new InvalidBlockError(`Could not find block end for '${open.name}'`, open.location, {
    block: open.name
  });
}
