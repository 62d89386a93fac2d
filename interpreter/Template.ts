import type { TemplateContext } from '../core/types/value';
import type { ITemplateResolver } from '../services/templates/ITemplateResolver';
import { ContextFrame } from './context/ContextFrame';
import { ContextStack } from './context/ContextStack';
import { Renderer } from './core/renderer';
import { StringSink, type OutputSink } from './output/OutputSink';
import { TextScanner } from './scanner/TextScanner';

export interface TemplateOptions {
  /** Resolves `{{>name}}` includes */
  resolver?: ITemplateResolver;
  /** Name reported in error locations */
  filePath?: string;
}

/**
 * Immutable template source. Each render works on its own scanner, context
 * stack and output, so one instance can be rendered any number of times.
 */
export class Template {
  private readonly renderer: Renderer;

  constructor(
    readonly source: string,
    private readonly options: TemplateOptions = {}
  ) {
    this.renderer = new Renderer(options.resolver);
  }

  get filePath(): string | undefined {
    return this.options.filePath;
  }

  get resolver(): ITemplateResolver | undefined {
    return this.options.resolver;
  }

  /**
   * Render against a root context mapping.
   */
  render(context: TemplateContext = {}): string {
    const sink = new StringSink();
    this.renderTo(sink, new ContextStack(ContextFrame.root(context)));
    return sink.toString();
  }

  /**
   * Convenience for call sites that build the context inline.
   */
  renderSimple(items: Readonly<Record<string, unknown>> = {}): string {
    return this.render({ ...items });
  }

  /**
   * Render into an existing sink using the caller's context stack. Includes
   * go through here so the included template sees the includer's scopes.
   */
  renderTo(sink: OutputSink, stack: ContextStack): void {
    this.renderer.render(new TextScanner(this.source, { filePath: this.options.filePath }), sink, stack);
  }
}

/**
 * Build a template and render it once.
 */
export function renderTemplate(source: string, context: TemplateContext = {}, options: TemplateOptions = {}): string {
  return new Template(source, options).render(context);
}
