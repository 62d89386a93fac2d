import { describe, it, expect } from 'vitest';
import {
  BlockFormatter,
  ContextFrame,
  ContextStack,
  MemoryTemplateResolver,
  PathResolutionError,
  QuireError,
  Template,
  TemplateError,
  registerFormatter,
  renderTemplate,
  type OutputSink
} from './index';

class BracketFormatter extends BlockFormatter {
  onBlockBegin(isFirst: boolean): string {
    return isFirst ? '[' : '';
  }

  onBlockEnd(isLast: boolean): string {
    return isLast ? ']' : '|';
  }

  format(block: string): string {
    return block.trim();
  }
}

registerFormatter({
  aliases: ['brackets'],
  kind: 'block',
  argument: 'none',
  description: 'Bracketed list',
  create: name => new BracketFormatter(name)
});

describe('public API', () => {
  it('should render through renderTemplate', () => {
    expect(renderTemplate('{{a}}-{{b:default=none}}', { a: 1, b: null })).toBe('1-none');
  });

  it('should apply custom block formatters', () => {
    const template = new Template('{{#xs:brackets}} {{.}} {{/xs}}');
    expect(template.render({ xs: ['a', 'b', 'c'] })).toBe('[a|b|c]');
  });

  it('should render into a caller-provided sink and stack', () => {
    const writes: string[] = [];
    const sink: OutputSink = { write: text => writes.push(text) };
    const stack = new ContextStack(ContextFrame.root({ who: 'x' }));

    new Template('hi {{who}}').renderTo(sink, stack);

    expect(writes.join('')).toBe('hi x');
    expect(stack.depth).toBe(1);
  });

  it('should accept Maps as the root context', () => {
    const template = new Template('{{k}}');
    expect(template.render(new Map([['k', 'from map']]))).toBe('from map');
  });

  it('should expose a common base class for errors', () => {
    let error: unknown;
    try {
      new Template('{{a.b}}', { filePath: 'doc' }).render({ a: 1 });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(PathResolutionError);
    expect(error).toBeInstanceOf(TemplateError);
    expect(error).toBeInstanceOf(QuireError);
    expect(error).toMatchObject({ location: { filePath: 'doc', line: 1, column: 1 } });
  });

  it('should resolve includes from a memory resolver', () => {
    const resolver = new MemoryTemplateResolver({ row: '{{name:w=5}}|' });
    const template = new Template('{{#rows}}{{>row}}{{/rows}}', { resolver });

    expect(template.render({ rows: [{ name: 'ab' }, { name: 'cde' }] })).toBe('ab   |cde  |');
  });
});
