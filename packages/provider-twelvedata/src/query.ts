/**
 * @fileoverview Query building for the `time_series` endpoint.
 *
 * Validates request parameters against their enumerations and ranges, then
 * serializes them into a URL. Optional parameters reach the query string
 * only when they differ from the API's defaults.
 *
 * @module @tseries/provider-twelvedata/query
 */

import {
  ConfigurationError,
  InvalidArgumentError,
  OutputFormat,
  SortOrder,
  getAllIntervals,
  getAllOutputFormats,
  getAllSecurityTypes,
  getAllSortOrders,
  isValidInterval,
  isValidOutputFormat,
  isValidSecurityType,
  isValidSortOrder,
  type TimeSeriesInput,
} from '@tseries/contracts';
import { canonicalTimezone, normalizeDateBound } from './temporal.js';
import type { TimeSeriesQuery } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.twelvedata.com/time_series';

/**
 * Values the API assumes when a parameter is absent.
 */
export const QUERY_DEFAULTS = {
  outputsize: 30,
  dp: 5,
  order: SortOrder.Asc,
  format: OutputFormat.Tabular,
} as const;

export const OUTPUT_SIZE_RANGE = { min: 1, max: 5000 } as const;
export const DECIMAL_PLACES_RANGE = { min: 0, max: 11 } as const;

/**
 * Timezone sentinels accepted besides IANA names.
 */
export const TIMEZONE_SENTINELS: readonly string[] = ['Exchange', 'UTC'];

/**
 * Every key this module can emit, in emission order.
 */
export const QUERY_KEYS = [
  'symbol',
  'interval',
  'exchange',
  'country',
  'type',
  'outputsize',
  'dp',
  'order',
  'timezone',
  'start_date',
  'end_date',
  'previous_close',
  'apikey',
] as const;

/**
 * Validates raw request parameters.
 *
 * Enumerations are matched exactly; ranges are inclusive. Empty `exchange`
 * and `country` strings count as unset.
 *
 * @throws {InvalidArgumentError} On the first parameter outside its domain
 *
 * @example
 * ```typescript
 * const query = validateTimeSeriesInput({ symbol: 'SPY', interval: '5min', outputsize: 3 });
 * query.interval; // Interval.M5
 * query.format;   // OutputFormat.Tabular
 * ```
 */
export function validateTimeSeriesInput(input: TimeSeriesInput): TimeSeriesQuery {
  const symbol = typeof input.symbol === 'string' ? input.symbol.trim() : '';
  if (!symbol) {
    throw new InvalidArgumentError('Invalid symbol: must be a non-empty string', {
      parameter: 'symbol',
      value: input.symbol,
    });
  }

  if (!isValidInterval(input.interval)) {
    throw new InvalidArgumentError(`Invalid interval: ${input.interval}`, {
      parameter: 'interval',
      value: input.interval,
      allowed: getAllIntervals(),
    });
  }

  const format = input.format ?? QUERY_DEFAULTS.format;
  if (!isValidOutputFormat(format)) {
    throw new InvalidArgumentError(`Invalid output format: ${format}`, {
      parameter: 'format',
      value: format,
      allowed: getAllOutputFormats(),
    });
  }

  const query: TimeSeriesQuery = {
    symbol,
    interval: input.interval,
    format,
    previousClose: input.previousClose === true,
  };

  const exchange = input.exchange?.trim();
  if (exchange) {
    query.exchange = exchange;
  }

  const country = input.country?.trim();
  if (country) {
    query.country = country;
  }

  if (input.type !== undefined) {
    if (!isValidSecurityType(input.type)) {
      throw new InvalidArgumentError(`Invalid security type: ${input.type}`, {
        parameter: 'type',
        value: input.type,
        allowed: getAllSecurityTypes(),
      });
    }
    query.type = input.type;
  }

  if (input.outputsize !== undefined) {
    query.outputsize = checkIntegerRange('outputsize', input.outputsize, OUTPUT_SIZE_RANGE);
  }

  if (input.dp !== undefined) {
    query.dp = checkIntegerRange('dp', input.dp, DECIMAL_PLACES_RANGE);
  }

  if (input.order !== undefined) {
    if (!isValidSortOrder(input.order)) {
      throw new InvalidArgumentError(`Invalid sort order: ${input.order}`, {
        parameter: 'order',
        value: input.order,
        allowed: getAllSortOrders(),
      });
    }
    query.order = input.order;
  }

  if (input.timezone !== undefined) {
    const requested = input.timezone.trim();
    const timezone = TIMEZONE_SENTINELS.includes(requested) ? requested : canonicalTimezone(requested);
    if (!timezone) {
      throw new InvalidArgumentError(`Invalid timezone: ${input.timezone}`, {
        parameter: 'timezone',
        value: input.timezone,
      });
    }
    // Sent and reported in the database spelling, whatever case was given
    query.timezone = timezone;
  }

  const start = input.startDate !== undefined ? checkDateBound('start_date', input.startDate) : undefined;
  const end = input.endDate !== undefined ? checkDateBound('end_date', input.endDate) : undefined;

  if (start && end && start.epochMs > end.epochMs) {
    throw new InvalidArgumentError('Invalid date range: start_date must be <= end_date', {
      parameter: 'start_date',
      value: start.value,
      endDate: end.value,
    });
  }

  if (start) {
    query.startDate = start.value;
  }
  if (end) {
    query.endDate = end.value;
  }

  return query;
}

/**
 * Serializes a validated query into search parameters.
 *
 * @example
 * ```typescript
 * toSearchParams({ symbol: 'SPY', interval: Interval.M5, format: OutputFormat.Tabular,
 *                  outputsize: 3, previousClose: false }, 'test-key').toString();
 * // 'symbol=SPY&interval=5min&outputsize=3&apikey=test-key'
 * ```
 */
export function toSearchParams(query: TimeSeriesQuery, apiKey: string): URLSearchParams {
  const params = new URLSearchParams();

  params.set('symbol', query.symbol);
  params.set('interval', query.interval);

  if (query.exchange) params.set('exchange', query.exchange);
  if (query.country) params.set('country', query.country);
  if (query.type) params.set('type', query.type);

  if (query.outputsize !== undefined && query.outputsize !== QUERY_DEFAULTS.outputsize) {
    params.set('outputsize', String(query.outputsize));
  }
  if (query.dp !== undefined && query.dp !== QUERY_DEFAULTS.dp) {
    params.set('dp', String(query.dp));
  }
  if (query.order !== undefined && query.order !== QUERY_DEFAULTS.order) {
    params.set('order', query.order);
  }

  if (query.timezone) params.set('timezone', query.timezone);
  if (query.startDate) params.set('start_date', query.startDate);
  if (query.endDate) params.set('end_date', query.endDate);
  if (query.previousClose) params.set('previous_close', 'true');

  params.set('apikey', apiKey);

  return params;
}

/**
 * Builds the complete request URL.
 *
 * @throws {ConfigurationError} If the API key is empty
 *
 * @example
 * ```typescript
 * const query = validateTimeSeriesInput({ symbol: 'AAPL', interval: '1day' });
 * buildTimeSeriesUrl(query, 'test-key');
 * // 'https://api.twelvedata.com/time_series?symbol=AAPL&interval=1day&apikey=test-key'
 * ```
 */
export function buildTimeSeriesUrl(
  query: TimeSeriesQuery,
  apiKey: string,
  baseUrl: string = DEFAULT_BASE_URL
): string {
  if (!apiKey.trim()) {
    throw new ConfigurationError('No query without an API key');
  }
  return `${baseUrl}?${toSearchParams(query, apiKey).toString()}`;
}

function checkIntegerRange(
  parameter: string,
  value: number,
  range: { readonly min: number; readonly max: number }
): number {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidArgumentError(
      `Invalid ${parameter}: must be an integer between ${range.min} and ${range.max}`,
      { parameter, value, min: range.min, max: range.max }
    );
  }
  return value;
}

function checkDateBound(parameter: string, value: string): { value: string; epochMs: number } {
  const bound = normalizeDateBound(value);
  if (!bound) {
    throw new InvalidArgumentError(
      `Invalid ${parameter}: expected ISO 8601 date (YYYY-MM-DD) or date-time (YYYY-MM-DDTHH:mm[:ss])`,
      { parameter, value }
    );
  }
  return bound;
}
