/**
 * Append-only character sink the renderer writes to.
 */
export interface OutputSink {
  write(text: string): void;
}

/**
 * Collects output in memory. Used for the final result and as the
 * temporary buffer of blocks that carry block formatters.
 */
export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    if (text.length > 0) {
      this.chunks.push(text);
    }
  }

  toString(): string {
    return this.chunks.join('');
  }
}
