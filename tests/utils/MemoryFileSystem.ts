import * as path from 'path';
import type { ITemplateFileSystem } from '../../services/templates/ITemplateFileSystem';

/**
 * In-memory file system for testing.
 * Paths are normalized with posix rules so tests can use '/project/...' literals.
 */
export class MemoryFileSystem implements ITemplateFileSystem {
  private files = new Map<string, string>();
  readonly reads: string[] = [];

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(this.normalizePath(filePath), content);
    }
  }

  readFile(filePath: string): string {
    const normalizedPath = this.normalizePath(filePath);
    this.reads.push(normalizedPath);
    const content = this.files.get(normalizedPath);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return content;
  }

  writeFile(filePath: string, content: string): void {
    this.files.set(this.normalizePath(filePath), content);
  }

  exists(filePath: string): boolean {
    return this.files.has(this.normalizePath(filePath));
  }

  getFile(filePath: string): string | undefined {
    return this.files.get(this.normalizePath(filePath));
  }

  private normalizePath(filePath: string): string {
    return path.posix.normalize(filePath.split(path.sep).join('/'));
  }
}
