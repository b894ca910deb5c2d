/**
 * @fileoverview Logger factory.
 * Creates configured winston loggers with structured fields, secret redaction
 * and console/file transports.
 */

import winston from 'winston';
import type { ChildLoggerContext, Logger, LoggerConfig } from './types.js';
import { prettyPrint, redactPII, standardFields } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Loggers are always passed to components through their constructor options;
 * nothing in the library holds a module-level logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', filePath: './logs/marketsync.log' });
 * const storeLogger = logger.child({ component: 'local-store', assetClass: 'equity' });
 * storeLogger.info('Bars upserted', { symbol: '000001', count: 3 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Redaction first, output format last
  const logFormat = winston.format.combine(
    redactPII(),
    standardFields,
    json ? winston.format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level }));
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (config.transports) {
    transports.push(...config.transports);
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * A logger that writes nothing. Default for components constructed without one.
 */
export function createNullLogger(): Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}
