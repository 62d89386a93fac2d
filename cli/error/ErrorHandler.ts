import chalk from 'chalk';
import { QuireError, TemplateError } from '../../core/errors';
import type { SourceLocation } from '../../core/types';
import { formatLocation } from '../../core/utils/locationFormatter';
import { extractSourceContext } from '../../core/utils/sourceContextExtractor';
import { DataFileError } from '../utils/data-loader';

export interface ErrorHandlerOptions {
  useColors?: boolean;
  /** Source text of the template a location points into, when available */
  sourceFor?: (location: SourceLocation) => string | undefined;
}

/**
 * Turns errors into the text the CLI prints on stderr.
 */
export class ErrorHandler {
  private readonly colors: chalk.Chalk;

  constructor(private readonly options: ErrorHandlerOptions = {}) {
    this.colors = new chalk.Instance({ level: options.useColors ? chalk.level : 0 });
  }

  format(error: unknown): string {
    if (error instanceof TemplateError) {
      return this.formatTemplateError(error);
    }
    if (error instanceof QuireError || error instanceof DataFileError) {
      return `${this.colors.red.bold(error.name)}: ${error.message}`;
    }
    if (error instanceof Error) {
      return `${this.colors.red.bold('Error')}: ${error.message}`;
    }
    return `${this.colors.red.bold('Error')}: ${String(error)}`;
  }

  private formatTemplateError(error: TemplateError): string {
    const location = formatLocation(error.location);
    const lines = [
      `${this.colors.red.bold(error.name)}: ${error.reason}`,
      `  ${this.colors.dim('at')} ${this.colors.cyan(location.display)}`
    ];

    const source = this.options.sourceFor?.(error.location);
    const context = source === undefined ? null : extractSourceContext(source, location);
    if (context) {
      const width = String(context.lines[context.lines.length - 1]?.number ?? context.errorLine).length;
      lines.push('');
      for (const line of context.lines) {
        const marker = line.isErrorLine ? this.colors.red('>') : ' ';
        const number = String(line.number).padStart(width, ' ');
        lines.push(`${marker} ${this.colors.dim(number + ' |')} ${line.content}`);
        if (line.isErrorLine) {
          const pointer = ' '.repeat(Math.max(0, context.errorColumn - 1)) + '^';
          lines.push(`  ${' '.repeat(width)} ${this.colors.dim('|')} ${this.colors.red(pointer)}`);
        }
      }
    }

    return lines.join('\n');
  }
}
