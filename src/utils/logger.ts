import { destination, pino, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';
import { cfg, type AppConfig } from '../config/index.js';

/**
 * Logger configuration and setup for rowtree
 *
 * Structured JSON on stderr, pretty-printed in development and quiet under test.
 */

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // pino rejects a destination stream alongside a transport
    this.mainLogger = options.transport ? pino(options) : pino(options, destination(2));
  }

  /**
   * Create logger options based on environment
   */
  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    const baseOptions: LoggerOptions = {
      level: isTest ? 'warn' : this.appConfig.LOG_LEVEL,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: 2, // stderr
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

/**
 * Create a new logger factory with custom configuration
 */
export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Create a module-specific logger
 *
 * @example
 * ```typescript
 * const logger = createModuleLogger('TreeAssembler');
 * logger.debug({ roots: 3 }, 'Assembling tree');
 * ```
 */
export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Performance timing utility. Tree operations run on hot paths, so the
 * summary goes out at debug level.
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

    logger.debug(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Error logging utility with stack trace handling
 *
 * @param context - Additional context about the error
 */
export function logError(
  logger: Logger,
  error: Error | string,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const errorInfo: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if ('cause' in error && error.cause !== undefined) {
    errorInfo.cause = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}
