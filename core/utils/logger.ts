import winston from 'winston';
import { loggingConfig, type LoggerServiceName } from '../config/logging';

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    if (process.env.QUIRE_DEBUG !== 'true') {
      return `${level}: ${String(message)}`;
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

function isTestRun(): boolean {
  return process.env.NODE_ENV === 'test';
}

/**
 * LOG_LEVEL wins, then the test level, then QUIRE_DEBUG, then the fallback
 */
export function resolveLogLevel(fallback: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (isTestRun()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.QUIRE_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  /**
   * Create a service-specific logger
   */
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const level = resolveLogLevel(loggingConfig.services[serviceName].level);

    return winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      // Tests run without a console transport unless TEST_LOG_LEVEL asks for one
      silent: isTestRun() && !process.env.TEST_LOG_LEVEL,
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
        })
      ]
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const templateLogger = createServiceLogger('template');
export const repositoryLogger = createServiceLogger('repository');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

/**
 * Raise or lower every service logger at once (CLI --debug)
 */
export function setLogLevel(level: string): void {
  for (const logger of [templateLogger, repositoryLogger, configLogger, cliLogger]) {
    logger.level = level;
    logger.transports.forEach(transport => {
      transport.level = level;
    });
  }
}
