/**
 * @fileoverview Type definitions for the tseries logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
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
 *   filePath: './logs/tseries.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON (true) or human-readable pretty-print (false).
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path; logs are written there in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Winston's logger: info(), warn(), error(), debug(), child().
 */
export type Logger = WinstonLogger;
