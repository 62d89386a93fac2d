import type { Position, SourceLocation } from '../../core/types';

export interface TextScannerOptions {
  filePath?: string;
  /** First offset the scanner may read (inclusive) */
  start?: number;
  /** Offset where input ends (exclusive) */
  end?: number;
  /** Line and column of `start` when it is not the beginning of the text */
  position?: Position;
}

/**
 * Read-only cursor over template source.
 *
 * Tracks offset, line and column. A scanner may cover only a span of the
 * text (a block body); offsets stay absolute so positions in errors point
 * into the original template. Out-of-range calls are programming errors and
 * throw immediately.
 */
export class TextScanner {
  private readonly start: number;
  private readonly end: number;
  private readonly startLine: number;
  private readonly startColumn: number;
  private readonly filePath?: string;
  private offset: number;
  private line: number;
  private column: number;

  constructor(private readonly text: string, options: TextScannerOptions = {}) {
    this.start = options.start ?? 0;
    this.end = options.end ?? text.length;
    if (this.start < 0 || this.end < this.start || this.end > text.length) {
      throw new Error(`TextScanner: invalid span [${this.start}, ${this.end})`);
    }
    this.startLine = options.position?.line ?? 1;
    this.startColumn = options.position?.column ?? 1;
    this.filePath = options.filePath;
    this.offset = this.start;
    this.line = this.startLine;
    this.column = this.startColumn;
  }

  reset(): void {
    this.offset = this.start;
    this.line = this.startLine;
    this.column = this.startColumn;
  }

  /**
   * Next character, or undefined at the end of input.
   */
  get(): string | undefined {
    if (this.offset >= this.end) {
      return undefined;
    }

    const result = this.text[this.offset];
    this.offset++;

    if (result === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }

    return result;
  }

  peek(): string | undefined {
    return this.offset < this.end ? this.text[this.offset] : undefined;
  }

  /**
   * Step back over the character just read. Only used to re-read an opening
   * brace, so it never has to undo a line break.
   */
  unget(): void {
    if (this.offset <= this.start) {
      throw new Error('TextScanner.unget: read pointer is at the beginning');
    }
    if (this.text[this.offset - 1] === '\n') {
      throw new Error('TextScanner.unget: cannot step back over a line break');
    }
    this.offset--;
    this.column--;
  }

  /**
   * Advance `length` characters that are known not to contain line breaks.
   */
  skip(length: number): void {
    if (length < 0 || this.offset + length > this.end) {
      throw new Error(`TextScanner.skip: cannot skip ${length} characters at offset ${this.offset}`);
    }
    this.offset += length;
    this.column += length;
  }

  /**
   * Raw text between two offsets previously recorded from this scanner.
   */
  substring(start: number, end: number): string {
    if (start < this.start || end < start || end > this.end) {
      throw new Error(`TextScanner.substring: invalid range [${start}, ${end})`);
    }
    return this.text.slice(start, end);
  }

  /**
   * A fresh scanner over `[start, end)` of the same text, starting at the
   * given position.
   */
  span(start: number, end: number, position: Position): TextScanner {
    if (start < this.start || end < start || end > this.end) {
      throw new Error(`TextScanner.span: invalid range [${start}, ${end})`);
    }
    return new TextScanner(this.text, { filePath: this.filePath, start, end, position });
  }

  getOffset(): number {
    return this.offset;
  }

  getPosition(): SourceLocation {
    return {
      filePath: this.filePath,
      line: this.line,
      column: this.column,
      offset: this.offset
    };
  }

  isAtEnd(): boolean {
    return this.offset >= this.end;
  }
}
