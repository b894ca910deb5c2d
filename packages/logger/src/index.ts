/**
 * @fileoverview Public API exports for @marketsync/logger
 */

export { createLogger, createChildLogger, createNullLogger } from './createLogger.js';
export { redactPII, redactValue, isSensitiveFieldName, standardFields, prettyPrint } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
