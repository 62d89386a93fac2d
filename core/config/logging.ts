import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    template: {
      level: 'warn'
    },
    repository: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type LoggerServiceName = keyof typeof loggingConfig.services;
