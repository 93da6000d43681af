/**
 * @fileoverview Logger factory.
 * Creates configured winston logger instances with structured fields,
 * secret redaction and console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Secret-looking fields (apikey, token, password, ...) are redacted first
 * - ISO timestamps and error stacks are added to every entry
 * - JSON output in production, pretty-print elsewhere
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Time series fetched', { symbol: 'SPY', count: 30 });
 * ```
 *
 * @example
 * ```typescript
 * const providerLogger = createLogger({ level: 'debug' }).child({ component: 'provider' });
 * providerLogger.debug('Request issued', { symbol: 'SPY', interval: '5min' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Order matters: redact, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston warns on a logger with no transports; a silent console keeps it quiet
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Exceptions are handled in errorHandler.ts
    exitOnError: false,
  });
}
