/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@tseries/contracts';
import {
  DEFAULT_BASE_URL,
  nativeTimeIndex,
  unavailableTimeIndex,
} from '@tseries/provider-twelvedata';
import { loadConfig, toProviderOptions } from '../src/config/index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      logging: { level: 'warn', format: 'pretty' },
      provider: {
        baseUrl: DEFAULT_BASE_URL,
        timeout: 30000,
        timeIndex: 'native',
        unsupportedFormat: 'fallback',
      },
    });
  });

  it('should map environment variables onto config paths', () => {
    const config = loadConfig({
      TSERIES_LOG_LEVEL: 'debug',
      TSERIES_LOG_FORMAT: 'json',
      TSERIES_TIMEOUT: '5000',
      TSERIES_DEFAULT_TIMEZONE: 'Europe/London',
      TSERIES_FIXTURES: '/tmp/fixtures',
      TSERIES_UNSUPPORTED_FORMAT: 'error',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.logging.format).toBe('json');
    expect(config.provider.timeout).toBe(5000);
    expect(config.provider.defaultTimezone).toBe('Europe/London');
    expect(config.provider.fixturePath).toBe('/tmp/fixtures');
    expect(config.provider.unsupportedFormat).toBe('error');
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ TSERIES_LOG_LEVEL: '' }).logging.level).toBe('warn');
  });

  it('should list every invalid path', () => {
    const error = captureError(() =>
      loadConfig({ TSERIES_TIMEOUT: 'soon', TSERIES_TIME_INDEX: 'indexed' })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ data: { paths: ['provider.timeout', 'provider.timeIndex'] } });
  });

  it('should reject an unknown default timezone', () => {
    expect(() => loadConfig({ TSERIES_DEFAULT_TIMEZONE: 'Mars/Olympus' })).toThrow(
      ConfigurationError
    );
  });

  it('should reject a base URL that is not a URL', () => {
    expect(() => loadConfig({ TSERIES_BASE_URL: 'not a url' })).toThrow(ConfigurationError);
  });
});

describe('toProviderOptions', () => {
  it('should select the configured time index capability', () => {
    expect(toProviderOptions(loadConfig({})).timeIndex).toBe(nativeTimeIndex);
    expect(toProviderOptions(loadConfig({ TSERIES_TIME_INDEX: 'unavailable' })).timeIndex).toBe(
      unavailableTimeIndex
    );
  });

  it('should carry provider settings over', () => {
    const options = toProviderOptions(
      loadConfig({ TSERIES_BASE_URL: 'http://localhost:8080/time_series', TSERIES_TIMEOUT: '1000' })
    );

    expect(options.baseUrl).toBe('http://localhost:8080/time_series');
    expect(options.timeout).toBe(1000);
    expect(options.unsupportedFormat).toBe('fallback');
  });
});
