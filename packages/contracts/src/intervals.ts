/**
 * @fileoverview Interval enumeration and utilities for the time-series API.
 *
 * Intervals are the sampling granularities accepted by the `time_series`
 * endpoint. Values are the exact tokens sent on the wire.
 *
 * @module @tseries/contracts/intervals
 */

/**
 * Supported sampling intervals.
 *
 * @invariant String values match the API's query tokens
 */
export enum Interval {
  M1 = '1min',
  M5 = '5min',
  M15 = '15min',
  M30 = '30min',
  M45 = '45min',
  H1 = '1h',
  H2 = '2h',
  H4 = '4h',
  D1 = '1day',
  W1 = '1week',
  MO1 = '1month',
}

const ALL_INTERVALS: readonly Interval[] = Object.values(Interval);

/**
 * Validates whether a string is a supported interval token.
 *
 * Membership is exact: no prefix or case-insensitive matching.
 *
 * @example
 * ```typescript
 * isValidInterval('5min')  // true
 * isValidInterval('5m')    // false
 * ```
 */
export function isValidInterval(value: string): value is Interval {
  return ALL_INTERVALS.some((interval) => interval === value);
}

const SUB_DAILY_INTERVALS: readonly Interval[] = [
  Interval.M1,
  Interval.M5,
  Interval.M15,
  Interval.M30,
  Interval.M45,
  Interval.H1,
  Interval.H2,
  Interval.H4,
];

/**
 * Returns true for the minute and hour granularities.
 *
 * Sub-daily series carry a time of day and are parsed as zoned date-times;
 * 1day, 1week and 1month are parsed as calendar dates.
 */
export function isSubDailyInterval(interval: Interval): boolean {
  return SUB_DAILY_INTERVALS.includes(interval);
}

/**
 * All intervals, smallest first.
 */
export function getAllIntervals(): Interval[] {
  return [...ALL_INTERVALS];
}
