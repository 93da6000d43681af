/**
 * @fileoverview Type definitions for the Twelve Data provider.
 *
 * @module @tseries/provider-twelvedata/types
 */

import type { Logger } from '@tseries/logger';
import type {
  Interval,
  OutputFormat,
  SecurityType,
  SortOrder,
} from '@tseries/contracts';
import type { TimeIndexCapability } from './time-index.js';

/**
 * Network + JSON primitive: takes a full request URL, resolves to the parsed
 * JSON body.
 *
 * @example
 * ```typescript
 * const fetcher: JsonFetcher = async () => ({ status: 'ok', meta: {}, values: [] });
 * ```
 */
export type JsonFetcher = (url: string) => Promise<unknown>;

/**
 * What to do when the time-indexed representation is requested but the
 * configured capability does not provide it.
 *
 * - `fallback`: log a warning and return the tabular series
 * - `error`: raise UnsupportedFormatError
 */
export type UnsupportedFormatPolicy = 'fallback' | 'error';

/**
 * Provider configuration, constructed once and passed to the provider.
 *
 * @property apiKey - Explicit API key; takes precedence over file and environment
 * @property configDir - Directory holding the `apikey` file
 * @property env - Environment to read `TWELVEDATA_API_KEY` from (default: process.env)
 * @property baseUrl - Endpoint URL (default: https://api.twelvedata.com/time_series)
 * @property timeout - HTTP timeout in milliseconds (default: 30000)
 * @property fetcher - Custom fetch primitive; overrides fixturePath and timeout
 * @property fixturePath - Directory of `<symbol>-<interval>.json` fixtures
 * @property defaultTimezone - Zone for sub-daily values when the response names none
 * @property timeIndex - Time-indexed representation capability (default: native)
 * @property unsupportedFormat - Policy when the capability is unavailable (default: fallback)
 * @property logger - Parent logger; a child with component=provider-twelvedata is used
 * @property now - Clock for the `accessed` stamp
 */
export interface TwelveDataProviderOptions {
  apiKey?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  baseUrl?: string;
  timeout?: number;
  fetcher?: JsonFetcher;
  fixturePath?: string;
  defaultTimezone?: string;
  timeIndex?: TimeIndexCapability;
  unsupportedFormat?: UnsupportedFormatPolicy;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Validated request, ready to be serialized.
 *
 * Optional members are present only when the caller set them; whether they
 * reach the query string depends on their defaults.
 */
export interface TimeSeriesQuery {
  symbol: string;
  interval: Interval;
  format: OutputFormat;
  exchange?: string;
  country?: string;
  type?: SecurityType;
  outputsize?: number;
  dp?: number;
  order?: SortOrder;
  timezone?: string;
  startDate?: string;
  endDate?: string;
  previousClose: boolean;
}

/**
 * Where the provider's API key came from.
 */
export type ApiKeySource = 'explicit' | 'file' | 'env' | 'none';

export interface ResolvedApiKey {
  key: string;
  source: ApiKeySource;
}
