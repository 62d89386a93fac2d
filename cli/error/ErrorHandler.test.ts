import { describe, it, expect } from 'vitest';
import { InvalidTokenError, TemplateNotFoundError } from '../../core/errors';
import { DataFileError } from '../utils/data-loader';
import { ErrorHandler } from './ErrorHandler';

describe('ErrorHandler', () => {
  const location = { filePath: 'main.tmpl', line: 2, column: 3 };
  const error = new InvalidTokenError('End-of-file reached while reading token', location);

  it('should print template errors with a source excerpt', () => {
    const handler = new ErrorHandler({
      useColors: false,
      sourceFor: loc => (loc.filePath === 'main.tmpl' ? 'a\nb {{x\nc' : undefined)
    });

    expect(handler.format(error)).toBe(
      [
        'InvalidTokenError: End-of-file reached while reading token',
        '  at main.tmpl:2:3',
        '',
        '  1 | a',
        '> 2 | b {{x',
        '    |   ^',
        '  3 | c'
      ].join('\n')
    );
  });

  it('should print only the location when the source is unknown', () => {
    expect(new ErrorHandler({ useColors: false }).format(error)).toBe(
      'InvalidTokenError: End-of-file reached while reading token\n  at main.tmpl:2:3'
    );
  });

  it('should print other errors by name', () => {
    const handler = new ErrorHandler({ useColors: false });

    expect(handler.format(new TemplateNotFoundError('x', '/t/x'))).toBe(
      "TemplateNotFoundError: Template 'x' not found at /t/x"
    );
    expect(handler.format(new DataFileError('bad data', '/d.json'))).toBe('DataFileError: bad data');
    expect(handler.format(new Error('plain'))).toBe('Error: plain');
    expect(handler.format('text')).toBe('Error: text');
  });
});
