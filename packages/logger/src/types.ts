/**
 * @fileoverview Type definitions for the structured logger.
 */

import type { Logger as WinstonLogger } from 'winston';
import type winston from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/marketsync.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of the pretty one-line format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also write to this file */
  filePath?: string;

  /** @default true */
  console?: boolean;

  /** Drop every entry; used by tests */
  silent?: boolean;

  /** Extra transports (e.g. a stream transport in tests) */
  transports?: winston.transport[];
}

/**
 * Context fields attached to every entry of a child logger.
 *
 * @example
 * ```typescript
 * const engineLogger = logger.child({ component: 'sync-engine', assetClass: 'equity' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  assetClass?: string;
  provider?: string;
  symbol?: string;
  operation?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
