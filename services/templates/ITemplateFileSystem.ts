/**
 * Synchronous file access needed by the template repository. Rendering is
 * synchronous, so include lookups are too.
 */
export interface ITemplateFileSystem {
  readFile(filePath: string): string;
  exists(filePath: string): boolean;
}
