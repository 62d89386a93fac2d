import { TemplateNotFoundError } from '../../core/errors';
import { Template } from '../../interpreter/Template';
import type { ITemplateResolver } from './ITemplateResolver';

/**
 * Resolves includes from an in-memory name -> source table.
 */
export class MemoryTemplateResolver implements ITemplateResolver {
  private readonly sources: Map<string, string>;

  constructor(sources: Readonly<Record<string, string>> = {}) {
    this.sources = new Map(Object.entries(sources));
  }

  set(name: string, source: string): this {
    this.sources.set(name, source);
    return this;
  }

  get(name: string): Template {
    const source = this.sources.get(name);
    if (source === undefined) {
      throw new TemplateNotFoundError(name, `memory:${name}`);
    }
    return new Template(source, { resolver: this, filePath: name });
  }
}
