import { ContextFrame, NOT_FOUND, type LookupResult } from './ContextFrame';

/**
 * Stack of scopes searched innermost-first, so inner names shadow outer
 * ones and anything not bound locally falls back to enclosing blocks.
 */
export class ContextStack {
  private readonly frames: ContextFrame[] = [];

  constructor(root?: ContextFrame) {
    if (root) {
      this.frames.push(root);
    }
  }

  get depth(): number {
    return this.frames.length;
  }

  push(frame: ContextFrame): void {
    this.frames.push(frame);
  }

  pop(): ContextFrame {
    const frame = this.frames.pop();
    if (!frame) {
      throw new Error('ContextStack.pop: stack is empty');
    }
    return frame;
  }

  resolve(name: string): LookupResult {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const result = this.frames[i].lookup(name);
      if (result.found) {
        return result;
      }
    }
    return NOT_FOUND;
  }
}
