import {
  InvalidBlockError,
  InvalidFormatterError,
  InvalidNamedCharacterError,
  MissingIncludeResolverError,
  PathResolutionError
} from '../../core/errors';
import { classifyValue, toBlockInstances, toDisplayString } from '../../core/types/value';
import { templateLogger } from '../../core/utils/logger';
import type { ITemplateResolver } from '../../services/templates/ITemplateResolver';
import { findBlockEnd } from '../block/find-block-end';
import { ContextFrame, MARKER_VALUE } from '../context/ContextFrame';
import type { ContextStack } from '../context/ContextStack';
import { resolvePathComponent, splitPath } from '../context/path-resolution';
import { FormatterInputError } from '../formatters/Formatter';
import { StringSink, type OutputSink } from '../output/OutputSink';
import type { TextScanner } from '../scanner/TextScanner';
import { TokenKind, type BlockOpenToken, type PlainToken, type Token, type ValueToken } from '../token/Token';
import { atTokenStart, readToken } from '../token/read-token';

export const NAMED_CHARACTERS: ReadonlyMap<string, string> = new Map([
  ['NEWLINE', '\n'],
  ['SPACE', ' '],
  ['LEFT_BRACE', '{'],
  ['RIGHT_BRACE', '}']
]);

/**
 * Recursive-descent expander. Copies text through, and dispatches every
 * `{{...}}` token to the matching expansion against the context stack.
 */
export class Renderer {
  constructor(private readonly resolver?: ITemplateResolver) {}

  render(scanner: TextScanner, sink: OutputSink, stack: ContextStack): void {
    while (!scanner.isAtEnd()) {
      const current = scanner.get();

      if (!atTokenStart(current, scanner)) {
        // pass through to output
        if (current !== undefined) {
          sink.write(current);
        }
        continue;
      }

      scanner.unget();
      this.expandToken(readToken(scanner), scanner, sink, stack);
    }
  }

  private expandToken(token: Token, scanner: TextScanner, sink: OutputSink, stack: ContextStack): void {
    switch (token.kind) {
      case TokenKind.Value:
      case TokenKind.SelfReference:
        this.expandValue(token, sink, stack);
        return;
      case TokenKind.BlockOpen:
      case TokenKind.NegatedBlockOpen:
        this.expandBlock(token, scanner, sink, stack);
        return;
      case TokenKind.NamedCharacter:
        sink.write(this.evaluateNamedCharacter(token));
        return;
      case TokenKind.Include:
        this.expandInclude(token, sink, stack);
        return;
      case TokenKind.BlockClose:
        throw new InvalidBlockError(
          `Found block end '${token.name}' without a matching block start`,
          token.location,
          { block: token.name }
        );
    }
  }

  private expandValue(token: ValueToken, sink: OutputSink, stack: ContextStack): void {
    const { root, components } = splitPath(token.name);
    const lookup = stack.resolve(root);

    if (!lookup.found) {
      // Missing variables expand to nothing
      return;
    }

    let value = lookup.value;
    components.forEach((component, index) => {
      const step = resolvePathComponent(value, component);
      if (!step.ok) {
        throw new PathResolutionError(token.location, {
          path: token.name,
          component,
          failedAtIndex: index,
          reason: step.reason
        });
      }
      value = step.value;
    });

    value = this.applyValueFormatters(token, value);

    if (value === null || value === undefined) {
      templateLogger.warn(`None/Null value found for variable '${token.name}' after all formatters have run`, {
        location: token.location
      });
      return;
    }

    sink.write(toDisplayString(value));
  }

  private applyValueFormatters(token: ValueToken, value: unknown): unknown {
    let result = value;
    for (const formatter of token.formatters) {
      try {
        result = formatter.format(result);
      } catch (error) {
        if (error instanceof FormatterInputError) {
          throw new InvalidFormatterError(error.message, token.location, { formatter: formatter.name }, error);
        }
        throw error;
      }
    }
    return result;
  }

  /**
   * | value on stack    | `#`             | `!`             |
   * |-------------------|-----------------|-----------------|
   * | not found         | skip            | once, empty     |
   * | null              | once, empty     | once, empty     |
   * | anything else     | every instance  | skip            |
   */
  private expandBlock(open: BlockOpenToken, scanner: TextScanner, sink: OutputSink, stack: ContextStack): void {
    templateLogger.debug(`Expanding block '${open.name}'`);

    const bodyPosition = scanner.getPosition();
    const close = findBlockEnd(scanner, open);
    const lookup = stack.resolve(open.name);
    const node = lookup.found ? classifyValue(lookup.value) : undefined;

    let instances: readonly unknown[];
    if (open.kind === TokenKind.NegatedBlockOpen) {
      if (node !== undefined && node.kind !== 'null') {
        return;
      }
      instances = [MARKER_VALUE];
    } else if (node === undefined) {
      return;
    } else {
      instances = node.kind === 'null' ? [MARKER_VALUE] : toBlockInstances(node);
    }

    const formatters = open.formatters;
    const buffered = formatters.length > 0;
    const count = instances.length;

    instances.forEach((instance, index) => {
      const isFirst = index === 0;
      const isLast = index + 1 === count;

      for (const formatter of formatters) {
        const prefix = formatter.onBlockBegin(isFirst);
        if (prefix) {
          sink.write(prefix);
        }
      }

      const body = scanner.span(open.end, close.start, bodyPosition);
      stack.push(ContextFrame.forInstance(open.name, instance, index, count));
      try {
        if (buffered) {
          const buffer = new StringSink();
          this.render(body, buffer, stack);
          let text = buffer.toString();
          for (const formatter of formatters) {
            text = formatter.format(text);
          }
          sink.write(text);
        } else {
          this.render(body, sink, stack);
        }
      } finally {
        stack.pop();
      }

      for (const formatter of formatters) {
        const suffix = formatter.onBlockEnd(isLast);
        if (suffix) {
          sink.write(suffix);
        }
      }
    });
  }

  private evaluateNamedCharacter(token: PlainToken): string {
    const character = NAMED_CHARACTERS.get(token.name);
    if (character === undefined) {
      throw new InvalidNamedCharacterError(token.name, token.location);
    }
    return character;
  }

  private expandInclude(token: PlainToken, sink: OutputSink, stack: ContextStack): void {
    templateLogger.debug(`Expanding include statement: '${token.name}'`);

    if (!this.resolver) {
      throw new MissingIncludeResolverError(token.name, token.location);
    }

    const template = this.resolver.get(token.name);
    template.renderTo(sink, stack);
  }
}
