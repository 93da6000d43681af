/**
 * @fileoverview Request and response data types for time-series queries.
 *
 * Covers the request parameters, the raw JSON envelope returned by the API
 * and the two normalized representations (tabular and time-indexed).
 *
 * @module @tseries/contracts/series
 */

import type { Interval } from './intervals.js';

/**
 * Parameters of a single time-series request.
 *
 * Enumerated fields are typed as strings because they also arrive from
 * untyped sources (command line, environment); they are validated before
 * any request is built.
 *
 * @example
 * ```typescript
 * const input: TimeSeriesInput = {
 *   symbol: 'SPY',
 *   interval: '5min',
 *   outputsize: 3,
 *   timezone: 'America/New_York',
 * };
 * ```
 */
export interface TimeSeriesInput {
  /** Instrument symbol, e.g. `AAPL`, `EUR/USD` */
  symbol: string;
  /** Sampling interval token, e.g. `5min`, `1day` */
  interval: string;
  /** Output representation, defaults to `tabular` */
  format?: string;
  exchange?: string;
  country?: string;
  /** Security type: Stock, Index, ETF or REIT */
  type?: string;
  /** Number of data points, 1 to 5000 */
  outputsize?: number;
  /** Decimal places, 0 to 11 */
  dp?: number;
  /** ASC or DESC */
  order?: string;
  /** `Exchange`, `UTC` or an IANA zone name */
  timezone?: string;
  /** ISO 8601 date or date-time */
  startDate?: string;
  /** ISO 8601 date or date-time */
  endDate?: string;
  previousClose?: boolean;
  /** Per-call API key override */
  apikey?: string;
}

/**
 * Scalar metadata value, copied verbatim from the response.
 */
export type MetaValue = string | number | boolean | null;

/**
 * Descriptive fields returned alongside a series (symbol, currency,
 * exchange, exchange_timezone, ...).
 */
export type SeriesMetadata = Record<string, MetaValue>;

/**
 * One record of the `values` array: column name to string value.
 * The first column is the `datetime` column.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Parsed JSON body of the `time_series` endpoint, exactly as received.
 *
 * Only `status` is checked. `meta`, `values` and any other field keep
 * whatever shape the API sent; normalization reads `values` (never the
 * legacy singular `value`) and requires it to be an array of records.
 */
export interface RawResponse {
  /** "ok" for a successful response */
  status: string;
  [key: string]: unknown;
}

/**
 * Calendar date with no time-of-day component.
 */
export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  /** `YYYY-MM-DD` */
  readonly iso: string;
}

/**
 * Instant bound to a time zone.
 */
export interface ZonedDateTime {
  /** Milliseconds since the Unix epoch */
  readonly epochMs: number;
  /** IANA zone name the wall-clock time belongs to */
  readonly timezone: string;
  /** UTC offset in effect at this instant, in minutes */
  readonly offsetMinutes: number;
  /** Wall-clock time with offset, e.g. `2020-12-31T15:55:00-05:00` */
  readonly iso: string;
}

/**
 * Parsed first column of a series.
 */
export type TemporalColumn =
  | { kind: 'date'; name: string; values: CalendarDate[] }
  | { kind: 'zoned'; name: string; timezone: string; values: ZonedDateTime[] };

export type TemporalValue = CalendarDate | ZonedDateTime;

export interface NumericColumn {
  name: string;
  values: number[];
}

/**
 * Row-ordered columnar table.
 *
 * @invariant every column has `rowCount` values
 * @invariant row order equals the order of the response's `values`
 */
export interface NormalizedSeries {
  format: 'tabular';
  interval: Interval;
  time: TemporalColumn;
  columns: NumericColumn[];
  rowCount: number;
  meta: SeriesMetadata;
  /** When the response was normalized */
  accessed: Date;
}

/**
 * Series keyed by its temporal column.
 *
 * @invariant `matrix.length === index.values.length`
 * @invariant every matrix row has `columns.length` entries
 */
export interface TimeIndexedSeries {
  format: 'time-indexed';
  interval: Interval;
  index: TemporalColumn;
  columns: string[];
  matrix: number[][];
  meta: SeriesMetadata;
  accessed: Date;
}

/**
 * Any value a time-series request can return.
 */
export type TimeSeriesResult = RawResponse | NormalizedSeries | TimeIndexedSeries;

/**
 * Narrows a result to the tabular representation.
 */
export function isNormalizedSeries(result: TimeSeriesResult): result is NormalizedSeries {
  return result.format === 'tabular' && 'columns' in result && 'rowCount' in result;
}

/**
 * Narrows a result to the time-indexed representation.
 */
export function isTimeIndexedSeries(result: TimeSeriesResult): result is TimeIndexedSeries {
  return result.format === 'time-indexed' && 'matrix' in result && 'index' in result;
}
