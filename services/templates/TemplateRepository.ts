import * as path from 'path';
import { TemplateNotFoundError } from '../../core/errors';
import { repositoryLogger } from '../../core/utils/logger';
import { Template } from '../../interpreter/Template';
import type { ITemplateFileSystem } from './ITemplateFileSystem';
import type { ITemplateResolver } from './ITemplateResolver';
import { NodeTemplateFileSystem } from './NodeTemplateFileSystem';

export interface TemplateRepositoryOptions {
  /** Appended to every template name, e.g. ".tmpl" */
  suffix?: string;
  fileSystem?: ITemplateFileSystem;
}

/**
 * Loads templates from a directory. Templates it returns resolve their own
 * includes through the same repository.
 */
export class TemplateRepository implements ITemplateResolver {
  private readonly suffix: string;
  private readonly fileSystem: ITemplateFileSystem;
  private readonly cache = new Map<string, Template>();

  constructor(readonly directory: string, options: TemplateRepositoryOptions = {}) {
    this.suffix = options.suffix ?? '';
    this.fileSystem = options.fileSystem ?? new NodeTemplateFileSystem();
  }

  /**
   * Path a template name maps to.
   */
  resolvePath(name: string): string {
    return path.join(this.directory, name + this.suffix);
  }

  isLoaded(name: string): boolean {
    return this.cache.has(name);
  }

  get(name: string): Template {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const filePath = this.resolvePath(name);
    if (!this.fileSystem.exists(filePath)) {
      throw new TemplateNotFoundError(name, filePath);
    }

    repositoryLogger.debug(`Loading template '${name}'`, { filePath });
    const template = new Template(this.fileSystem.readFile(filePath), { resolver: this, filePath: name });
    this.cache.set(name, template);
    return template;
  }
}
