import * as fs from 'fs';
import type { ITemplateFileSystem } from './ITemplateFileSystem';

/**
 * Node.js file system implementation for the template repository
 */
export class NodeTemplateFileSystem implements ITemplateFileSystem {
  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  exists(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }
}
