import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { QuireConfig, ResolvedConfig } from './types';
import { configLogger } from '../utils/logger';

export const PROJECT_CONFIG_FILE = 'quire.config.json';

export interface ConfigLoaderOptions {
  projectPath?: string;
  homePath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Load quire configuration from both global and project locations
 */
export class ConfigLoader {
  private readonly globalConfigPath: string;
  private readonly projectConfigPath: string;
  private cachedConfig?: QuireConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    // Global config location: ~/.config/quire.json
    this.globalConfigPath = path.join(options.homePath ?? os.homedir(), '.config', 'quire.json');

    // Project config location: <project>/quire.config.json
    this.projectConfigPath = path.join(options.projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations
   */
  load(): QuireConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Configuration with every default filled in. A relative template
   * directory is resolved against the project path.
   */
  resolve(): ResolvedConfig {
    const config = this.load();
    const directory = config.templates?.directory;

    return {
      templates: {
        directory: directory === undefined
          ? undefined
          : path.resolve(path.dirname(this.projectConfigPath), directory),
        suffix: config.templates?.suffix ?? ''
      },
      output: {
        encoding: config.output?.encoding ?? 'utf8'
      }
    };
  }

  private loadConfigFile(filePath: string): QuireConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(filePath, 'utf8');
      return this.parseConfig(JSON.parse(content));
    } catch (error) {
      configLogger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }
  }

  private parseConfig(raw: unknown): QuireConfig {
    if (!isRecord(raw)) {
      return {};
    }

    const config: QuireConfig = {};

    if (isRecord(raw.templates)) {
      config.templates = {
        directory: readString(raw.templates, 'directory'),
        suffix: readString(raw.templates, 'suffix')
      };
    }

    if (isRecord(raw.output)) {
      const encoding = readString(raw.output, 'encoding');
      if (encoding !== undefined && Buffer.isEncoding(encoding)) {
        config.output = { encoding };
      } else if (encoding !== undefined) {
        configLogger.warn(`Ignoring unknown output encoding '${encoding}'`);
      }
    }

    return config;
  }

  private mergeConfigs(global: QuireConfig, project: QuireConfig): QuireConfig {
    const merged: QuireConfig = {};

    if (global.templates || project.templates) {
      merged.templates = {
        directory: project.templates?.directory ?? global.templates?.directory,
        suffix: project.templates?.suffix ?? global.templates?.suffix
      };
    }

    if (global.output || project.output) {
      merged.output = {
        encoding: project.output?.encoding ?? global.output?.encoding
      };
    }

    return merged;
  }
}
