/**
 * @fileoverview Twelve Data `time_series` provider.
 *
 * Composes query building, fetching and normalization:
 * input parameters -> URL -> JsonFetcher -> JSON body -> output value.
 *
 * One fetch per call; nothing is retried, cached or paginated. The only
 * state a provider holds is the API key resolved at construction.
 *
 * @module @tseries/provider-twelvedata
 * @example
 * ```typescript
 * import { TwelveDataProvider } from '@tseries/provider-twelvedata';
 *
 * const provider = new TwelveDataProvider({ apiKey: 'test-key' });
 * const series = await provider.timeSeries({ symbol: 'SPY', interval: '5min', outputsize: 3 });
 * ```
 */

import {
  OutputFormat,
  isNormalizedSeries,
  isTimeIndexedSeries,
  type NormalizedSeries,
  type RawResponse,
  type TimeIndexedSeries,
  type TimeSeriesInput,
  type TimeSeriesResult,
} from '@tseries/contracts';
import { createLogger, measureAsync, type Logger } from '@tseries/logger';
import { createFixtureFetcher, createHttpFetcher } from './client.js';
import { resolveApiKey, selectApiKey } from './config.js';
import { normalizeTimeSeries } from './normalizer.js';
import { DEFAULT_BASE_URL, buildTimeSeriesUrl, validateTimeSeriesInput } from './query.js';
import { nativeTimeIndex, type TimeIndexCapability } from './time-index.js';
import type {
  ApiKeySource,
  JsonFetcher,
  TwelveDataProviderOptions,
  UnsupportedFormatPolicy,
} from './types.js';

/**
 * Client of the `time_series` endpoint.
 *
 * The fetcher is chosen once: an explicit `fetcher`, else a fixture
 * directory, else live HTTP.
 *
 * @example
 * ```typescript
 * // Live requests, key from ~/.config/tseries/apikey or TWELVEDATA_API_KEY
 * const provider = new TwelveDataProvider();
 *
 * // Offline
 * const offline = new TwelveDataProvider({ apiKey: 'test-key', fixturePath: './__fixtures__' });
 * ```
 */
export class TwelveDataProvider {
  /**
   * Where the cached API key came from.
   */
  readonly apiKeySource: ApiKeySource;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetcher: JsonFetcher;
  private readonly timeIndex: TimeIndexCapability;
  private readonly unsupportedFormat: UnsupportedFormatPolicy;
  private readonly defaultTimezone?: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If the key file exists but cannot be read
   */
  constructor(options: TwelveDataProviderOptions = {}) {
    const resolved = resolveApiKey({
      apiKey: options.apiKey,
      configDir: options.configDir,
      env: options.env,
    });
    this.apiKey = resolved.key;
    this.apiKeySource = resolved.source;

    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetcher = selectFetcher(options);
    this.timeIndex = options.timeIndex ?? nativeTimeIndex;
    this.unsupportedFormat = options.unsupportedFormat ?? 'fallback';
    this.defaultTimezone = options.defaultTimezone;
    this.now = options.now ?? (() => new Date());

    const parent = options.logger ?? createLogger({ level: 'warn', console: false });
    this.logger = parent.child({ component: 'provider-twelvedata' });
  }

  /**
   * Validates `input` and builds the request URL without fetching it.
   *
   * @throws {InvalidArgumentError} If a parameter is outside its domain
   * @throws {ConfigurationError} If no API key is available
   */
  buildUrl(input: TimeSeriesInput): string {
    const query = validateTimeSeriesInput(input);
    return buildTimeSeriesUrl(query, selectApiKey(input.apikey, this.apiKey), this.baseUrl);
  }

  /**
   * Fetches one time series.
   *
   * The return type follows `format`: the parsed body for `raw`, a
   * NormalizedSeries for `tabular` (default), a TimeIndexedSeries for
   * `time-indexed` (or the tabular series when the time index is
   * unavailable and the policy is `fallback`).
   *
   * @throws {InvalidArgumentError} Before any request, for bad parameters
   * @throws {ConfigurationError} Before any request, when no API key is available
   * @throws {TransportError} If the fetch fails
   * @throws {RemoteApiError} If the API reports an error
   * @throws {MalformedDataError} If the body does not parse
   * @throws {UnsupportedFormatError} If time-indexed output is unavailable and the policy is `error`
   *
   * @example
   * ```typescript
   * const raw = await provider.timeSeries({ symbol: 'AAPL', interval: '1day', format: 'raw' });
   * raw.status; // 'ok'
   * ```
   */
  timeSeries(
    input: TimeSeriesInput & { format: 'raw' | OutputFormat.Raw }
  ): Promise<RawResponse>;
  timeSeries(
    input: TimeSeriesInput & { format: 'time-indexed' | OutputFormat.TimeIndexed }
  ): Promise<TimeIndexedSeries | NormalizedSeries>;
  timeSeries(
    input: TimeSeriesInput & { format?: 'tabular' | OutputFormat.Tabular }
  ): Promise<NormalizedSeries>;
  timeSeries(input: TimeSeriesInput): Promise<TimeSeriesResult>;
  async timeSeries(input: TimeSeriesInput): Promise<TimeSeriesResult> {
    const query = validateTimeSeriesInput(input);
    const url = buildTimeSeriesUrl(query, selectApiKey(input.apikey, this.apiKey), this.baseUrl);

    const log = this.logger.child({ symbol: query.symbol, interval: query.interval });
    log.debug('Requesting time series', { operation: 'fetch', format: query.format });

    let body: unknown;
    try {
      const measured = await measureAsync(() => this.fetcher(url));
      body = measured.result;
      log.debug('Response received', { operation: 'fetch', duration_ms: measured.duration_ms });
    } catch (error) {
      log.debug('Request failed', {
        operation: 'fetch',
        result: 'error',
        error_code: errorCode(error),
      });
      throw error;
    }

    const result = normalizeTimeSeries(body, {
      interval: query.interval,
      format: query.format,
      requestedTimezone: query.timezone,
      defaultTimezone: this.defaultTimezone,
      timeIndex: this.timeIndex,
      unsupportedFormat: this.unsupportedFormat,
      now: this.now,
      logger: log,
    });

    if (isNormalizedSeries(result)) {
      log.debug('Time series normalized', { operation: 'normalize', count: result.rowCount });
    } else if (isTimeIndexedSeries(result)) {
      log.debug('Time series normalized', { operation: 'normalize', count: result.matrix.length });
    }

    return result;
  }
}

/**
 * Creates a provider.
 *
 * @example
 * ```typescript
 * const provider = createProvider({ fetcher: async () => ({ status: 'ok', meta: {}, values: [] }) });
 * ```
 */
export function createProvider(options: TwelveDataProviderOptions = {}): TwelveDataProvider {
  return new TwelveDataProvider(options);
}

function selectFetcher(options: TwelveDataProviderOptions): JsonFetcher {
  if (options.fetcher) {
    return options.fetcher;
  }
  if (options.fixturePath) {
    return createFixtureFetcher(options.fixturePath);
  }
  return createHttpFetcher({ timeout: options.timeout });
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN';
}

// Types
export type {
  TwelveDataProviderOptions,
  JsonFetcher,
  UnsupportedFormatPolicy,
  TimeSeriesQuery,
  ApiKeySource,
  ResolvedApiKey,
} from './types.js';

// Query building
export {
  DEFAULT_BASE_URL,
  QUERY_DEFAULTS,
  QUERY_KEYS,
  OUTPUT_SIZE_RANGE,
  DECIMAL_PLACES_RANGE,
  TIMEZONE_SENTINELS,
  validateTimeSeriesInput,
  toSearchParams,
  buildTimeSeriesUrl,
} from './query.js';

// Fetching
export { DEFAULT_TIMEOUT_MS, createHttpFetcher, createFixtureFetcher, fixtureFileName } from './client.js';

// Configuration
export {
  API_KEY_ENV_VAR,
  API_KEY_FILE_NAME,
  defaultConfigDir,
  readApiKeyFile,
  resolveApiKey,
  selectApiKey,
} from './config.js';

// Normalization
export {
  EXCHANGE_TIMEZONE_KEY,
  normalizeTimeSeries,
  resolveSeriesTimezone,
  type NormalizeOptions,
} from './normalizer.js';
export {
  nativeTimeIndex,
  unavailableTimeIndex,
  selectTimeIndexCapability,
  type TimeIndexCapability,
  type TimeIndexCapabilityName,
} from './time-index.js';
export {
  isKnownTimezone,
  canonicalTimezone,
  hostTimezone,
  parseCalendarDate,
  parseZonedDateTime,
} from './temporal.js';
export { isErrorEnvelope, mapTwelveDataError } from './errors.js';
