/**
 * Time series command implementation
 */

import {
  InvalidArgumentError,
  isNormalizedSeries,
  isSeriesError,
  isTimeIndexedSeries,
  type TimeSeriesInput,
  type TimeSeriesResult,
} from '@tseries/contracts';
import { startTimer, type Logger } from '@tseries/logger';
import {
  formatMeta,
  formatRaw,
  formatSeries,
  type OutputStyle,
} from '../formatters/series-formatter.js';
import type { Command, CommandResult, SeriesSource } from './types.js';

const OUTPUT_STYLES: readonly OutputStyle[] = ['table', 'csv', 'json'];

/**
 * Options as they arrive from the command line; numbers are still text
 */
export interface TimeSeriesCommandOptions {
  interval: string;
  format?: string;
  output?: string;
  outputsize?: string;
  exchange?: string;
  country?: string;
  type?: string;
  dp?: string;
  order?: string;
  timezone?: string;
  start?: string;
  end?: string;
  previousClose?: boolean;
  apikey?: string;
  meta?: boolean;
}

export interface TimeSeriesCommandConfig {
  source: SeriesSource;
  logger: Logger;
}

/**
 * Fetches one series and renders it
 */
export class TimeSeriesCommand implements Command<TimeSeriesCommandOptions> {
  name = 'time-series';
  description = 'Fetch a time series for one symbol';

  private source: SeriesSource;
  private logger: Logger;

  constructor(config: TimeSeriesCommandConfig) {
    this.source = config.source;
    this.logger = config.logger;
  }

  async execute(args: string[], options: TimeSeriesCommandOptions): Promise<CommandResult> {
    const timer = startTimer();

    try {
      const input = toTimeSeriesInput(args[0] ?? '', options);
      const style = parseOutputStyle(options.output);

      this.logger.info('Executing time series command', {
        symbol: input.symbol,
        interval: input.interval,
        format: input.format,
        output: style,
      });

      const result = await this.source.timeSeries(input);
      const output = render(result, style, options.meta === true);

      return {
        success: true,
        output,
        duration: timer.stop(),
        metadata: {
          symbol: input.symbol,
          interval: input.interval,
          format: resultFormat(result),
          rows: rowCount(result),
        },
      };
    } catch (error) {
      const duration = timer.stop();
      const failure = describeFailure(error);

      this.logger.debug('Time series command failed', {
        error_code: failure.code,
        duration_ms: duration,
        error,
      });

      return {
        success: false,
        output: failure.text,
        error: error instanceof Error ? error : new Error(failure.message),
        duration,
      };
    }
  }
}

/**
 * `[CODE] message` line for a failure; errors outside the taxonomy are UNEXPECTED_ERROR
 */
export function describeFailure(error: unknown): { code: string; message: string; text: string } {
  const code = isSeriesError(error) ? error.code : 'UNEXPECTED_ERROR';
  const message = error instanceof Error ? error.message : String(error);
  return { code, message, text: `[${code}] ${message}` };
}

/**
 * Maps command-line options to request parameters
 */
export function toTimeSeriesInput(symbol: string, options: TimeSeriesCommandOptions): TimeSeriesInput {
  return {
    symbol,
    interval: options.interval,
    format: options.format,
    exchange: options.exchange,
    country: options.country,
    type: options.type,
    outputsize: toInteger(options.outputsize),
    dp: toInteger(options.dp),
    order: options.order,
    timezone: options.timezone,
    startDate: options.start,
    endDate: options.end,
    previousClose: options.previousClose,
    apikey: options.apikey,
  };
}

function parseOutputStyle(value: string | undefined): OutputStyle {
  if (value === undefined) {
    return 'table';
  }
  const style = OUTPUT_STYLES.find((candidate) => candidate === value);
  if (!style) {
    throw new InvalidArgumentError(`Invalid output style: ${value}`, {
      parameter: 'output',
      value,
      allowed: OUTPUT_STYLES,
    });
  }
  return style;
}

function render(result: TimeSeriesResult, style: OutputStyle, withMeta: boolean): string {
  if (isNormalizedSeries(result) || isTimeIndexedSeries(result)) {
    const body = formatSeries(result, style);
    return withMeta && style !== 'json' ? `${formatMeta(result)}\n\n${body}` : body;
  }
  return formatRaw(result);
}

function resultFormat(result: TimeSeriesResult): string {
  if (isNormalizedSeries(result)) return 'tabular';
  if (isTimeIndexedSeries(result)) return 'time-indexed';
  return 'raw';
}

function rowCount(result: TimeSeriesResult): number {
  if (isNormalizedSeries(result)) return result.rowCount;
  if (isTimeIndexedSeries(result)) return result.matrix.length;
  return Array.isArray(result.values) ? result.values.length : 0;
}

/**
 * Decimal digits only; anything else becomes NaN and fails range validation
 */
function toInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return /^\d+$/.test(value) ? Number(value) : Number.NaN;
}
