/**
 * @fileoverview Date and zoned date-time parsing, backed by moment-timezone.
 *
 * Daily and coarser series carry calendar dates (`2020-12-31`); intraday
 * series carry wall-clock times (`2020-12-31 15:55:00`) that only become
 * instants once a zone is attached.
 *
 * @module @tseries/provider-twelvedata/temporal
 */

import moment from 'moment-timezone';
import type { CalendarDate, ZonedDateTime } from '@tseries/contracts';

const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Output layout for zoned values; the offset is always numeric (`+00:00`, never `Z`).
 */
const ZONED_ISO_FORMAT = 'YYYY-MM-DDTHH:mm:ssZ';

const WALL_CLOCK_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Accepted wall-clock layouts, tried in order with strict matching.
 * A bare date is midnight in the zone.
 */
const DATETIME_FORMATS = [
  WALL_CLOCK_FORMAT,
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DDTHH:mm',
  DATE_FORMAT,
];

/**
 * Returns true for zone names in the IANA database (`America/New_York`, `UTC`).
 */
export function isKnownTimezone(name: string): boolean {
  return moment.tz.zone(name) !== null;
}

/**
 * Database spelling of a zone name; lookups ignore case.
 *
 * @returns The canonical name, or null for an unknown zone
 *
 * @example
 * ```typescript
 * canonicalTimezone('america/new_york'); // 'America/New_York'
 * ```
 */
export function canonicalTimezone(name: string): string | null {
  return moment.tz.zone(name)?.name ?? null;
}

/**
 * Best guess of the host's zone.
 */
export function hostTimezone(): string {
  return moment.tz.guess();
}

/**
 * Parses a strict `YYYY-MM-DD` calendar date.
 *
 * @returns The date, or null if the value is not a real calendar date
 *
 * @example
 * ```typescript
 * parseCalendarDate('2020-12-31'); // { year: 2020, month: 12, day: 31, iso: '2020-12-31' }
 * parseCalendarDate('2020-02-30'); // null
 * ```
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const parsed = moment.utc(value, DATE_FORMAT, true);
  if (!parsed.isValid()) {
    return null;
  }

  return {
    year: parsed.year(),
    month: parsed.month() + 1,
    day: parsed.date(),
    iso: parsed.format(DATE_FORMAT),
  };
}

/**
 * Parses a wall-clock date-time as local time in `timezone`.
 *
 * A wall time skipped by a daylight-saving transition does not exist in the
 * zone and is rejected rather than shifted.
 *
 * @returns The instant, or null if the value does not match a known layout
 *   or does not exist in the zone
 *
 * @example
 * ```typescript
 * parseZonedDateTime('2020-12-31 15:55:00', 'America/New_York');
 * // { epochMs: 1609448100000, timezone: 'America/New_York', offsetMinutes: -300,
 * //   iso: '2020-12-31T15:55:00-05:00' }
 * ```
 */
export function parseZonedDateTime(value: string, timezone: string): ZonedDateTime | null {
  const parsed = moment.tz(value, DATETIME_FORMATS, true, timezone);
  if (!parsed.isValid() || parsed.format(WALL_CLOCK_FORMAT) !== toWallClock(value)) {
    return null;
  }

  return {
    epochMs: parsed.valueOf(),
    timezone,
    // moment reports UTC as -0
    offsetMinutes: parsed.utcOffset() || 0,
    iso: parsed.format(ZONED_ISO_FORMAT),
  };
}

/**
 * Any accepted layout spelled as `YYYY-MM-DD HH:mm:ss`.
 */
function toWallClock(value: string): string {
  const spaced = value.replace('T', ' ');
  if (spaced.length === DATE_FORMAT.length) {
    return `${spaced} 00:00:00`;
  }
  if (spaced.length === 'YYYY-MM-DD HH:mm'.length) {
    return `${spaced}:00`;
  }
  return spaced;
}

/**
 * Validates an ISO 8601 bound for `start_date`/`end_date` and normalizes a
 * space separator to `T`.
 *
 * @returns `{ value, epochMs }` (epochMs read as UTC, for ordering only), or null
 *
 * @example
 * ```typescript
 * normalizeDateBound('2021-01-04 09:30'); // { value: '2021-01-04T09:30', epochMs: ... }
 * normalizeDateBound('04/01/2021');       // null
 * ```
 */
export function normalizeDateBound(value: string): { value: string; epochMs: number } | null {
  const trimmed = value.trim();
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?))?$/.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, datePart, timePart] = match;
  if (!datePart) {
    return null;
  }
  const normalized = timePart ? `${datePart}T${timePart}` : datePart;
  const parsed = moment.utc(normalized, [DATE_FORMAT, 'YYYY-MM-DDTHH:mm', 'YYYY-MM-DDTHH:mm:ss'], true);
  if (!parsed.isValid()) {
    return null;
  }

  return { value: normalized, epochMs: parsed.valueOf() };
}
