/**
 * @fileoverview Tests for query validation and URL building.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  Interval,
  InvalidArgumentError,
  OutputFormat,
  SecurityType,
  SortOrder,
  getAllIntervals,
} from '@tseries/contracts';
import {
  QUERY_KEYS,
  buildTimeSeriesUrl,
  toSearchParams,
  validateTimeSeriesInput,
} from '../src/query.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('validateTimeSeriesInput', () => {
  it('should accept the required parameters and apply defaults', () => {
    const query = validateTimeSeriesInput({ symbol: ' SPY ', interval: '5min' });

    expect(query).toEqual({
      symbol: 'SPY',
      interval: Interval.M5,
      format: OutputFormat.Tabular,
      previousClose: false,
    });
  });

  it('should accept every optional parameter', () => {
    const query = validateTimeSeriesInput({
      symbol: 'SPY',
      interval: '1day',
      format: 'time-indexed',
      exchange: 'NYSE',
      country: 'United States',
      type: 'ETF',
      outputsize: 100,
      dp: 2,
      order: 'DESC',
      timezone: 'America/New_York',
      startDate: '2021-01-04 09:30',
      endDate: '2021-01-05',
      previousClose: true,
    });

    expect(query).toEqual({
      symbol: 'SPY',
      interval: Interval.D1,
      format: OutputFormat.TimeIndexed,
      exchange: 'NYSE',
      country: 'United States',
      type: SecurityType.ETF,
      outputsize: 100,
      dp: 2,
      order: SortOrder.Desc,
      timezone: 'America/New_York',
      startDate: '2021-01-04T09:30',
      endDate: '2021-01-05',
      previousClose: true,
    });
  });

  it('should treat empty exchange and country as unset', () => {
    const query = validateTimeSeriesInput({
      symbol: 'SPY',
      interval: '1day',
      exchange: '',
      country: '  ',
    });

    expect(query.exchange).toBeUndefined();
    expect(query.country).toBeUndefined();
  });

  it('should reject an empty symbol', () => {
    expect(() => validateTimeSeriesInput({ symbol: '   ', interval: '1day' })).toThrow(
      InvalidArgumentError
    );
  });

  it('should reject an unknown interval and list the allowed ones', () => {
    const error = captureError(() => validateTimeSeriesInput({ symbol: 'SPY', interval: '5m' }));

    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toMatchObject({
      code: 'INVALID_ARGUMENT',
      data: { parameter: 'interval', value: '5m', allowed: getAllIntervals() },
    });
  });

  it('should match enumerations exactly', () => {
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', type: 'stock' })
    ).toThrow(InvalidArgumentError);
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', order: 'asc' })
    ).toThrow(InvalidArgumentError);
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1DAY' })
    ).toThrow(InvalidArgumentError);
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', format: 'indexed' })
    ).toThrow(InvalidArgumentError);
  });

  it('should accept outputsize at both ends of its range', () => {
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', outputsize: 1 }).outputsize).toBe(1);
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', outputsize: 5000 }).outputsize).toBe(
      5000
    );
  });

  it('should reject outputsize outside its range', () => {
    for (const outputsize of [0, 5001, 2.5, -1]) {
      expect(() => validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', outputsize })).toThrow(
        InvalidArgumentError
      );
    }
  });

  it('should check dp against 0..11', () => {
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', dp: 0 }).dp).toBe(0);
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', dp: 11 }).dp).toBe(11);
    expect(() => validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', dp: 12 })).toThrow(
      InvalidArgumentError
    );
  });

  it('should accept timezone sentinels and IANA names only', () => {
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1h', timezone: 'Exchange' }).timezone).toBe(
      'Exchange'
    );
    expect(validateTimeSeriesInput({ symbol: 'SPY', interval: '1h', timezone: 'UTC' }).timezone).toBe('UTC');
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1h', timezone: 'Mars/Olympus' })
    ).toThrow(InvalidArgumentError);
  });

  it('should send IANA names in their database spelling', () => {
    const query = validateTimeSeriesInput({ symbol: 'SPY', interval: '1h', timezone: 'america/new_york' });

    expect(query.timezone).toBe('America/New_York');
    expect(toSearchParams(query).get('timezone')).toBe('America/New_York');
  });

  it('should reject malformed date bounds', () => {
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', startDate: '04/01/2021' })
    ).toThrow(InvalidArgumentError);
    expect(() =>
      validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', endDate: '2021-02-30' })
    ).toThrow(InvalidArgumentError);
  });

  it('should reject a start date after the end date', () => {
    const error = captureError(() =>
      validateTimeSeriesInput({
        symbol: 'SPY',
        interval: '1day',
        startDate: '2021-01-05',
        endDate: '2021-01-04',
      })
    );

    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toMatchObject({ data: { parameter: 'start_date', value: '2021-01-05' } });
  });
});

describe('toSearchParams', () => {
  it('should append only parameters that differ from their defaults', () => {
    const query = validateTimeSeriesInput({ symbol: 'SPY', interval: '5min', outputsize: 3 });

    expect(toSearchParams(query, 'test-key').toString()).toBe(
      'symbol=SPY&interval=5min&outputsize=3&apikey=test-key'
    );
  });

  it('should omit parameters set to their default values', () => {
    const query = validateTimeSeriesInput({
      symbol: 'SPY',
      interval: '5min',
      outputsize: 30,
      dp: 5,
      order: 'ASC',
      previousClose: false,
    });

    expect(toSearchParams(query, 'test-key').toString()).toBe(
      'symbol=SPY&interval=5min&apikey=test-key'
    );
  });

  it('should emit keys in a fixed order', () => {
    const query = validateTimeSeriesInput({
      symbol: 'SPY',
      interval: '1day',
      previousClose: true,
      endDate: '2021-01-05',
      startDate: '2021-01-04',
      timezone: 'UTC',
      order: 'DESC',
      dp: 2,
      outputsize: 100,
      type: 'ETF',
      country: 'United States',
      exchange: 'NYSE',
    });

    expect(Array.from(toSearchParams(query, 'test-key').keys())).toEqual([...QUERY_KEYS]);
  });

  it('should send previous_close as the literal true', () => {
    const query = validateTimeSeriesInput({ symbol: 'SPY', interval: '1day', previousClose: true });

    expect(toSearchParams(query, 'test-key').get('previous_close')).toBe('true');
  });

  it('should only emit known keys for every interval', () => {
    for (const interval of getAllIntervals()) {
      const query = validateTimeSeriesInput({ symbol: 'SPY', interval });
      const keys = Array.from(toSearchParams(query, 'test-key').keys());

      expect(keys).toEqual(['symbol', 'interval', 'apikey']);
      expect(keys.every((key) => QUERY_KEYS.some((known) => known === key))).toBe(true);
    }
  });
});

describe('buildTimeSeriesUrl', () => {
  it('should build the full request URL', () => {
    const query = validateTimeSeriesInput({ symbol: 'AAPL', interval: '1day' });

    expect(buildTimeSeriesUrl(query, 'test-key')).toBe(
      'https://api.twelvedata.com/time_series?symbol=AAPL&interval=1day&apikey=test-key'
    );
  });

  it('should encode currency pair symbols', () => {
    const query = validateTimeSeriesInput({ symbol: 'EUR/USD', interval: '1h' });

    expect(buildTimeSeriesUrl(query, 'test-key', 'http://localhost/time_series')).toBe(
      'http://localhost/time_series?symbol=EUR%2FUSD&interval=1h&apikey=test-key'
    );
  });

  it('should refuse to build a URL without an API key', () => {
    const query = validateTimeSeriesInput({ symbol: 'AAPL', interval: '1day' });

    expect(() => buildTimeSeriesUrl(query, '')).toThrow(ConfigurationError);
  });
});
