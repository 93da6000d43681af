/**
 * Main exports for @tseries/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, toProviderOptions } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config } from './config/schema.js';

// Command exports
export {
  TimeSeriesCommand,
  describeFailure,
  toTimeSeriesInput,
} from './commands/time-series.command.js';
export type {
  TimeSeriesCommandOptions,
  TimeSeriesCommandConfig,
} from './commands/time-series.command.js';
export type { Command, CommandResult, SeriesSource } from './commands/types.js';

// Formatter exports
export {
  formatSeries,
  formatTable,
  formatCsv,
  formatJson,
  formatMeta,
  formatRaw,
  toRows,
} from './formatters/series-formatter.js';
export type { OutputStyle, RenderableSeries, SeriesRow } from './formatters/series-formatter.js';

// Program exports
export { createProgram, PROGRAM_NAME, PROGRAM_VERSION } from './program.js';
export type { ProgramDependencies } from './program.js';
