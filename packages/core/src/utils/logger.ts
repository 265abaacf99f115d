import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';

/**
 * Logger configuration and setup for taxindex
 *
 * - Structured JSON on stderr (or LOG_OUTPUT), so stdout stays free for id lists
 * - Pretty-printed output in development
 * - Quiet (warn and above) under test; CLI_LOG_LEVEL in CLI mode
 */

export type { Logger } from 'pino';

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // pino refuses a destination stream next to a transport
    this.mainLogger = options.transport ? pino(options) : pino(options, pino.destination(this.destination()));
  }

  /**
   * Resolve the effective level for the current context
   */
  resolveLevel(): string {
    if (this.appConfig.NODE_ENV === 'test') {
      return 'warn';
    }
    return this.appConfig.CLI_MODE ? this.appConfig.CLI_LOG_LEVEL : this.appConfig.LOG_LEVEL;
  }

  private destination(): string | number {
    return this.appConfig.LOG_OUTPUT ?? 2; // stderr
  }

  private createLoggerOptions(): LoggerOptions {
    const baseOptions: LoggerOptions = {
      level: this.resolveLevel(),
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (this.appConfig.NODE_ENV === 'development' && !this.appConfig.CLI_MODE) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: this.destination(),
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Main application logger instance
 */
export const logger = defaultFactory.getLogger();

/**
 * Create a module-specific logger from the default factory
 */
export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Performance timing utility
 *
 * @returns Function to call when the operation completes
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const start = process.hrtime.bigint();

  return (result: Record<string, unknown> = {}) => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;

    logger.info(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}
