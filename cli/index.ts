import * as fs from 'fs';
import * as path from 'path';
import { Command, CommanderError } from 'commander';
import { ConfigLoader } from '../core/config/loader';
import type { ResolvedConfig } from '../core/config/types';
import { cliLogger, setLogLevel } from '../core/utils/logger';
import { version } from '../core/version';
import { Template } from '../interpreter/Template';
import { listFormatters } from '../interpreter/formatters/registry';
import type { ITemplateFileSystem } from '../services/templates/ITemplateFileSystem';
import { NodeTemplateFileSystem } from '../services/templates/NodeTemplateFileSystem';
import { TemplateRepository } from '../services/templates/TemplateRepository';
import { ErrorHandler } from './error/ErrorHandler';
import { applyAssignments, parseDataFile } from './utils/data-loader';

/**
 * Everything the CLI touches outside the process. Swapped out in tests.
 */
export interface CliIO extends ITemplateFileSystem {
  writeFile(filePath: string, content: string, encoding: BufferEncoding): void;
  stdout(text: string): void;
  stderr(text: string): void;
  cwd(): string;
  useColors: boolean;
}

export interface CliDependencies {
  io?: CliIO;
  loadConfig?: (cwd: string) => ResolvedConfig;
}

export interface RenderCommandOptions {
  data?: string;
  templates?: string;
  suffix?: string;
  output?: string;
  set: string[];
  debug?: boolean;
}

export interface CliResult {
  exitCode: number;
}

const templateFileSystem = new NodeTemplateFileSystem();

export const nodeIO: CliIO = {
  readFile: filePath => templateFileSystem.readFile(filePath),
  exists: filePath => templateFileSystem.exists(filePath),
  writeFile: (filePath, content, encoding) => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, { encoding });
  },
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
  cwd: () => process.cwd(),
  useColors: Boolean(process.stderr.isTTY)
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function defaultLoadConfig(cwd: string): ResolvedConfig {
  return new ConfigLoader({ projectPath: cwd }).resolve();
}

/**
 * Render a template file and write the result. Returns the exit code.
 */
export function runRender(
  templateArg: string,
  options: RenderCommandOptions,
  io: CliIO,
  config: ResolvedConfig
): number {
  const templatePath = path.resolve(io.cwd(), templateArg);
  const directory = options.templates
    ? path.resolve(io.cwd(), options.templates)
    : config.templates.directory ?? path.dirname(templatePath);
  const repository = new TemplateRepository(directory, {
    suffix: options.suffix ?? config.templates.suffix,
    fileSystem: io
  });

  let mainSource: string | undefined;
  const sourceFor = (name: string | undefined): string | undefined => {
    if (name === undefined) {
      return undefined;
    }
    if (name === templateArg) {
      return mainSource;
    }
    // Included templates are cached by the repository once loaded
    return repository.isLoaded(name) ? repository.get(name).source : undefined;
  };
  const errorHandler = new ErrorHandler({
    useColors: io.useColors,
    sourceFor: location => sourceFor(location.filePath)
  });

  try {
    mainSource = io.readFile(templatePath);

    let context: Record<string, unknown> = {};
    if (options.data) {
      const dataPath = path.resolve(io.cwd(), options.data);
      context = parseDataFile(dataPath, io.readFile(dataPath));
    }
    context = applyAssignments(context, options.set);

    cliLogger.debug('Rendering template', { templatePath, directory, keys: Object.keys(context) });

    const template = new Template(mainSource, { resolver: repository, filePath: templateArg });
    const output = template.render(context);

    if (options.output) {
      io.writeFile(path.resolve(io.cwd(), options.output), output, config.output.encoding);
      cliLogger.info('Wrote output', { output: options.output });
    } else {
      io.stdout(output);
    }
    return 0;
  } catch (error) {
    io.stderr(errorHandler.format(error) + '\n');
    return 1;
  }
}

export function createProgram(dependencies: CliDependencies = {}, result: CliResult = { exitCode: 0 }): Command {
  const io = dependencies.io ?? nodeIO;
  const loadConfig = dependencies.loadConfig ?? defaultLoadConfig;
  const program = new Command();

  program
    .name('quire')
    .description('Expand text templates against structured data')
    .version(version)
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text)
    });

  program
    .command('render')
    .description('Render a template file')
    .argument('<template>', 'Template file path')
    .option('-d, --data <file>', 'JSON or YAML file with the root context')
    .option('-t, --templates <dir>', 'Directory include directives are resolved in')
    .option('-s, --suffix <ext>', 'Suffix appended to included template names')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .option('--set <key=value>', 'Set a context value (repeatable)', collect, [])
    .option('--debug', 'Enable debug logging')
    .action((template: string, options: RenderCommandOptions) => {
      if (options.debug) {
        setLogLevel('debug');
      }
      result.exitCode = runRender(template, options, io, loadConfig(io.cwd()));
    });

  program
    .command('formatters')
    .description('List the available formatters')
    .action(() => {
      const lines = listFormatters().map(definition => {
        const usage = definition.argument === 'required' ? '=<value>' : '';
        return `${definition.aliases.join(', ')}${usage} (${definition.kind}) - ${definition.description}`;
      });
      io.stdout(lines.join('\n') + '\n');
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function main(argv: string[] = process.argv, dependencies: CliDependencies = {}): Promise<number> {
  const result: CliResult = { exitCode: 0 };
  const program = createProgram(dependencies, result);
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return result.exitCode;
}
