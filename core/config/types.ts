/**
 * Configuration types for quire
 */

export interface QuireConfig {
  templates?: TemplatesConfig;
  output?: OutputConfig;
}

export interface TemplatesConfig {
  /** Directory include directives are resolved against */
  directory?: string;
  /** Suffix appended to template names, e.g. ".tmpl" */
  suffix?: string;
}

export interface OutputConfig {
  /** Encoding used when the CLI writes rendered output */
  encoding?: BufferEncoding;
}

export interface ResolvedConfig {
  templates: {
    directory?: string;
    suffix: string;
  };
  output: {
    encoding: BufferEncoding;
  };
}
