import winston from 'winston';
import { loggingConfig, type LoggedService } from '@core/config/logging';

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggedService): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const ALL_LEVELS = Object.keys(loggingConfig.levels);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  })
);

/**
 * Resolve the level for a service from the environment.
 * LOG_LEVEL wins, then the test level, then debug mode, then the service default.
 */
export function resolveLogLevel(serviceName: LoggedService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.TEXAST_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<LoggedService, winston.Logger>();

  /**
   * Create (or reuse) the logger for a service.
   * Console output goes to stderr so command output on stdout stays clean.
   */
  createServiceLogger(serviceName: LoggedService): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const logger = winston.createLogger({
      level: resolveLogLevel(serviceName),
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ALL_LEVELS
        })
      ]
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Change the level of every logger created so far
   */
  setLevel(level: string): void {
    for (const logger of this.loggers.values()) {
      logger.level = level;
      logger.transports.forEach(transport => {
        transport.level = level;
      });
    }
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggedService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const lexerLogger = createServiceLogger('lexer');
export const parserLogger = createServiceLogger('parser');
export const registryLogger = createServiceLogger('registry');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

export default parserLogger;
