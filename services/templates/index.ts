export type { ITemplateResolver } from './ITemplateResolver';
export type { ITemplateFileSystem } from './ITemplateFileSystem';
export { NodeTemplateFileSystem } from './NodeTemplateFileSystem';
export { TemplateRepository } from './TemplateRepository';
export type { TemplateRepositoryOptions } from './TemplateRepository';
export { MemoryTemplateResolver } from './MemoryTemplateResolver';
