import { BlockFormatter, substitutePlaceholders } from './Formatter';

/**
 * Indents every instance by `depth` tabs, including lines inside it.
 */
export class IndentFormatter extends BlockFormatter {
  private readonly tabs: string;

  constructor(name: string, readonly depth: number) {
    super(name);
    this.tabs = '\t'.repeat(depth);
  }

  onBlockBegin(): string {
    return this.tabs;
  }

  format(block: string): string {
    return block.replace(/\n/g, '\n' + this.tabs);
  }
}

/**
 * Inserts a separator after every instance but the last.
 */
export class ListSeparatorFormatter extends BlockFormatter {
  readonly separator: string;

  constructor(name: string, value: string) {
    super(name);
    this.separator = substitutePlaceholders(value);
  }

  onBlockEnd(isLast: boolean): string | undefined {
    return isLast ? undefined : this.separator;
  }
}
