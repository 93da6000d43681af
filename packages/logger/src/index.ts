/**
 * @fileoverview Public API exports for @tseries/logger
 * Structured logging and process error handling
 */

export { createLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { redactValue, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { PerfTimer } from './perf-timer.js';
