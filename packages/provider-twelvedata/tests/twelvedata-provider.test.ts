/**
 * @fileoverview Tests for the Twelve Data provider.
 *
 * End-to-end through query building, fetching (injected fetcher or
 * fixtures) and normalization.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  InvalidArgumentError,
  OutputFormat,
  RemoteApiError,
  TransportError,
  UnsupportedFormatError,
  isTimeIndexedSeries,
} from '@tseries/contracts';
import { TwelveDataProvider, createProvider, unavailableTimeIndex } from '../src/index.js';

const FIXTURES = fileURLToPath(new URL('./__fixtures__', import.meta.url));

describe('TwelveDataProvider', () => {
  let configDir: string;

  beforeEach(() => {
    // Empty config dir and environment keep the host's key out of the tests
    configDir = mkdtempSync(join(tmpdir(), 'tseries-provider-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  describe('with fixtures', () => {
    it('should return three New York rows for SPY 5min', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
      });

      const series = await provider.timeSeries({ symbol: 'SPY', interval: '5min', outputsize: 3 });

      expect(series.rowCount).toBe(3);
      expect(series.meta['exchange_timezone']).toBe('America/New_York');
      expect(series.time.kind).toBe('zoned');
      expect(series.time.values.map((value) => value.iso)).toEqual([
        '2020-12-31T15:55:00-05:00',
        '2020-12-31T15:50:00-05:00',
        '2020-12-31T15:45:00-05:00',
      ]);
      for (const column of series.columns) {
        expect(column.values).toHaveLength(3);
        expect(column.values.every((value) => Number.isFinite(value))).toBe(true);
      }
    });

    it('should return calendar dates for a daily series', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
      });

      const series = await provider.timeSeries({ symbol: 'AAPL', interval: '1day' });

      expect(series.time).toEqual({
        kind: 'date',
        name: 'datetime',
        values: [
          { year: 2021, month: 1, day: 5, iso: '2021-01-05' },
          { year: 2021, month: 1, day: 4, iso: '2021-01-04' },
        ],
      });
    });

    it('should raise TransportError when no fixture matches', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
      });

      await expect(provider.timeSeries({ symbol: 'MSFT', interval: '1day' })).rejects.toBeInstanceOf(
        TransportError
      );
    });
  });

  describe('with an injected fetcher', () => {
    it('should request the URL built from the parameters', async () => {
      const fetcher = vi.fn(async (_url: string): Promise<unknown> => ({
        status: 'ok',
        meta: {},
        values: [],
      }));
      const provider = createProvider({ apiKey: 'test-key', configDir, env: {}, fetcher });

      await provider.timeSeries({ symbol: 'SPY', interval: '5min', outputsize: 3, order: 'DESC' });

      expect(fetcher).toHaveBeenCalledTimes(1);
      expect(fetcher.mock.calls[0]?.[0]).toBe(
        'https://api.twelvedata.com/time_series?symbol=SPY&interval=5min&outputsize=3&order=DESC&apikey=test-key'
      );
    });

    it('should let a per-call apikey override the configured key', async () => {
      const fetcher = vi.fn(async (_url: string): Promise<unknown> => ({
        status: 'ok',
        meta: {},
        values: [],
      }));
      const provider = createProvider({ apiKey: 'test-key', configDir, env: {}, fetcher });

      await provider.timeSeries({ symbol: 'SPY', interval: '1day', apikey: 'other-key' });

      expect(fetcher.mock.calls[0]?.[0]).toBe(
        'https://api.twelvedata.com/time_series?symbol=SPY&interval=1day&apikey=other-key'
      );
    });

    it('should return the raw body unchanged', async () => {
      const body = {
        meta: { symbol: 'AAPL', interval: '1day' },
        values: [{ datetime: '2021-01-05', close: '131.00999' }],
        status: 'ok',
      };
      const provider = createProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fetcher: async () => body,
      });

      const raw = await provider.timeSeries({ symbol: 'AAPL', interval: '1day', format: 'raw' });

      expect(raw).toEqual(body);
      expect(raw.status).toBe('ok');
    });

    it('should raise RemoteApiError with the API message', async () => {
      const provider = createProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fetcher: async () => ({ code: 401, message: 'Invalid API key', status: 'error' }),
      });

      const promise = provider.timeSeries({ symbol: 'AAPL', interval: '1day' });

      await expect(promise).rejects.toBeInstanceOf(RemoteApiError);
      await expect(promise).rejects.toThrow('Invalid API key');
    });

    it('should validate parameters before fetching', async () => {
      const fetcher = vi.fn(async (_url: string): Promise<unknown> => ({ status: 'ok', values: [] }));
      const provider = createProvider({ apiKey: 'test-key', configDir, env: {}, fetcher });

      await expect(provider.timeSeries({ symbol: 'SPY', interval: '2min' })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      await expect(
        provider.timeSeries({ symbol: 'SPY', interval: '1day', outputsize: 5001 })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(fetcher).not.toHaveBeenCalled();
    });

    it('should raise ConfigurationError without a key and never fetch', async () => {
      const fetcher = vi.fn(async (_url: string): Promise<unknown> => ({ status: 'ok', values: [] }));
      const provider = createProvider({ configDir, env: {}, fetcher });

      expect(provider.apiKeySource).toBe('none');
      await expect(provider.timeSeries({ symbol: 'SPY', interval: '1day' })).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect(fetcher).not.toHaveBeenCalled();
    });

    it('should read the key from the environment', () => {
      const provider = createProvider({
        configDir,
        env: { TWELVEDATA_API_KEY: 'env-key' },
        fetcher: async () => ({ status: 'ok', values: [] }),
      });

      expect(provider.apiKeySource).toBe('env');
      expect(provider.buildUrl({ symbol: 'SPY', interval: '1week' })).toBe(
        'https://api.twelvedata.com/time_series?symbol=SPY&interval=1week&apikey=env-key'
      );
    });

    it('should stamp accessed with the configured clock', async () => {
      const accessed = new Date('2021-01-06T12:00:00.000Z');
      const provider = createProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        now: () => accessed,
        fetcher: async () => ({ status: 'ok', meta: { symbol: 'SPY' }, values: [] }),
      });

      const series = await provider.timeSeries({ symbol: 'SPY', interval: '1day' });

      expect(series.accessed).toBe(accessed);
      expect(series.meta).toEqual({ symbol: 'SPY' });
    });
  });

  describe('time-indexed output', () => {
    it('should return a time-indexed series by default', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
      });

      const result = await provider.timeSeries({
        symbol: 'AAPL',
        interval: '1day',
        format: OutputFormat.TimeIndexed,
      });

      expect(isTimeIndexedSeries(result)).toBe(true);
    });

    it('should fall back to tabular when the index is unavailable', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
        timeIndex: unavailableTimeIndex,
      });

      const result = await provider.timeSeries({
        symbol: 'AAPL',
        interval: '1day',
        format: 'time-indexed',
      });

      expect(result.format).toBe('tabular');
    });

    it('should raise UnsupportedFormatError under the error policy', async () => {
      const provider = new TwelveDataProvider({
        apiKey: 'test-key',
        configDir,
        env: {},
        fixturePath: FIXTURES,
        timeIndex: unavailableTimeIndex,
        unsupportedFormat: 'error',
      });

      await expect(
        provider.timeSeries({ symbol: 'AAPL', interval: '1day', format: 'time-indexed' })
      ).rejects.toBeInstanceOf(UnsupportedFormatError);
    });
  });
});
