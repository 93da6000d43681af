/**
 * @fileoverview Response normalization for the `time_series` endpoint.
 *
 * Turns a parsed JSON body into the requested representation. Steps run in
 * order and any failure aborts the rest:
 * 1. status check (RemoteApiError on anything but "ok")
 * 2. raw format short-circuit
 * 3. temporal parsing of the first column
 * 4. numeric coercion of every other column
 * 5. metadata and `accessed` attachment
 * 6. tabular or time-indexed output
 *
 * There is no partial result: one bad cell fails the whole call.
 *
 * @module @tseries/provider-twelvedata/normalizer
 */

import type { Logger } from '@tseries/logger';
import {
  MalformedDataError,
  OutputFormat,
  UnsupportedFormatError,
  isSubDailyInterval,
  type NormalizedSeries,
  type NumericColumn,
  type RawRecord,
  type RawResponse,
  type TemporalColumn,
  type TimeSeriesResult,
  type CalendarDate,
  type Interval,
  type SeriesMetadata,
  type ZonedDateTime,
} from '@tseries/contracts';
import { mapTwelveDataError } from './errors.js';
import { describeIssues, envelopeSchema, rawResponseSchema } from './schema.js';
import { canonicalTimezone, hostTimezone, parseCalendarDate, parseZonedDateTime } from './temporal.js';
import { nativeTimeIndex, type TimeIndexCapability } from './time-index.js';
import type { UnsupportedFormatPolicy } from './types.js';

/**
 * Metadata key naming the zone of intraday values.
 */
export const EXCHANGE_TIMEZONE_KEY = 'exchange_timezone';

/**
 * @property interval - Interval the series was requested with
 * @property format - Requested output representation
 * @property requestedTimezone - `timezone` query parameter, if any; an IANA
 *   name (or UTC) overrides the exchange zone because the API then reports
 *   values in that zone
 * @property defaultTimezone - Zone used when neither of the above applies
 *   (default: host zone)
 */
export interface NormalizeOptions {
  interval: Interval;
  format: OutputFormat;
  requestedTimezone?: string;
  defaultTimezone?: string;
  timeIndex?: TimeIndexCapability;
  unsupportedFormat?: UnsupportedFormatPolicy;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Normalizes a parsed response body.
 *
 * @throws {RemoteApiError} If `status` is not "ok"
 * @throws {MalformedDataError} If the body, a date/time or a number does not parse
 * @throws {UnsupportedFormatError} If time-indexed output is unavailable and the policy is `error`
 *
 * @example
 * ```typescript
 * const series = normalizeTimeSeries(body, {
 *   interval: Interval.M5,
 *   format: OutputFormat.Tabular,
 * });
 * ```
 */
export function normalizeTimeSeries(body: unknown, options: NormalizeOptions): TimeSeriesResult {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new MalformedDataError(
      `Response is not a time series envelope: ${describeIssues(envelope.error)}`
    );
  }
  if (envelope.data.status !== 'ok') {
    throw mapTwelveDataError(envelope.data);
  }

  if (options.format === OutputFormat.Raw) {
    const raw: RawResponse = envelope.data;
    return raw;
  }

  const parsed = rawResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedDataError(`Malformed time series response: ${describeIssues(parsed.error)}`);
  }
  const response = parsed.data;

  const records = response.values;
  if (!records) {
    throw new MalformedDataError('Response is missing the values array');
  }

  const meta: SeriesMetadata = { ...response.meta };
  const [timeColumnName, ...numericColumnNames] = columnNames(records);

  const time = isSubDailyInterval(options.interval)
    ? parseZonedColumn(records, timeColumnName, resolveSeriesTimezone(meta, options))
    : parseDateColumn(records, timeColumnName);

  const columns = numericColumnNames.map((name) => parseNumericColumn(records, name));

  const series: NormalizedSeries = {
    format: 'tabular',
    interval: options.interval,
    time,
    columns,
    rowCount: records.length,
    meta,
    accessed: (options.now ?? (() => new Date()))(),
  };

  if (options.format !== OutputFormat.TimeIndexed) {
    return series;
  }

  const capability = options.timeIndex ?? nativeTimeIndex;
  if (capability.available) {
    return capability.toTimeIndexed(series);
  }

  if (options.unsupportedFormat === 'error') {
    throw new UnsupportedFormatError(
      `Time-indexed output requested but the "${capability.name}" time index is unavailable`,
      { format: OutputFormat.TimeIndexed, capability: capability.name }
    );
  }

  options.logger?.warn('Time-indexed representation unavailable, returning tabular series', {
    operation: 'normalize',
    result: 'fallback',
    capability: capability.name,
  });
  return series;
}

/**
 * Zone for intraday values: an explicit IANA `timezone` request parameter,
 * else `meta.exchange_timezone`, else the configured default, else the host.
 *
 * @throws {MalformedDataError} If the chosen zone is not a known IANA name
 */
export function resolveSeriesTimezone(
  meta: Record<string, unknown>,
  options: Pick<NormalizeOptions, 'requestedTimezone' | 'defaultTimezone'>
): string {
  const requested = options.requestedTimezone;
  const exchangeZone = meta[EXCHANGE_TIMEZONE_KEY];

  let zone: string;
  if (requested && requested !== 'Exchange') {
    zone = requested;
  } else if (typeof exchangeZone === 'string' && exchangeZone !== '') {
    zone = exchangeZone;
  } else {
    zone = options.defaultTimezone ?? hostTimezone();
  }

  const canonical = canonicalTimezone(zone);
  if (!canonical) {
    throw new MalformedDataError(`Unknown timezone in response: ${zone}`, {
      column: EXCHANGE_TIMEZONE_KEY,
      value: zone,
    });
  }
  return canonical;
}

/**
 * Column names from the first record. The first is the temporal column;
 * an empty series still has a `datetime` column.
 */
function columnNames(records: RawRecord[]): [string, ...string[]] {
  const first = records[0];
  if (!first) {
    return ['datetime'];
  }

  const [timeColumn, ...rest] = Object.keys(first);
  if (!timeColumn) {
    throw new MalformedDataError('First record has no columns', { row: 0 });
  }
  return [timeColumn, ...rest];
}

function parseDateColumn(records: RawRecord[], name: string): TemporalColumn {
  const values: CalendarDate[] = records.map((record, row) => {
    const cell = readTextCell(record, name, row);
    const date = parseCalendarDate(cell);
    if (!date) {
      throw new MalformedDataError(`Invalid date "${cell}" in row ${row}`, {
        row,
        column: name,
        value: cell,
      });
    }
    return date;
  });

  return { kind: 'date', name, values };
}

function parseZonedColumn(records: RawRecord[], name: string, timezone: string): TemporalColumn {
  const values: ZonedDateTime[] = records.map((record, row) => {
    const cell = readTextCell(record, name, row);
    const dateTime = parseZonedDateTime(cell, timezone);
    if (!dateTime) {
      throw new MalformedDataError(`Invalid date-time "${cell}" in row ${row}`, {
        row,
        column: name,
        value: cell,
      });
    }
    return dateTime;
  });

  return { kind: 'zoned', name, timezone, values };
}

function parseNumericColumn(records: RawRecord[], name: string): NumericColumn {
  const values = records.map((record, row) => {
    const cell = record[name];
    const value = toFloat(cell);
    if (value === null) {
      throw new MalformedDataError(`Invalid number in row ${row}, column "${name}"`, {
        row,
        column: name,
        value: cell,
      });
    }
    return value;
  });

  return { name, values };
}

function readTextCell(record: RawRecord, column: string, row: number): string {
  const cell = record[column];
  if (typeof cell !== 'string') {
    throw new MalformedDataError(`Missing or non-text value in row ${row}, column "${column}"`, {
      row,
      column,
      value: cell,
    });
  }
  return cell.trim();
}

/**
 * Strict float parsing: '366.1' and 366.1 parse, '' and '12abc' do not.
 */
function toFloat(cell: unknown): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell !== 'string' || cell.trim() === '') {
    return null;
  }
  const value = Number(cell.trim());
  return Number.isFinite(value) ? value : null;
}
