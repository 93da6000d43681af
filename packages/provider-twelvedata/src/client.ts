/**
 * @fileoverview JsonFetcher implementations: live HTTP and fixture files.
 *
 * A fetcher takes a complete request URL and resolves to the parsed JSON
 * body. It never interprets the body; status handling belongs to the
 * normalizer.
 *
 * @module @tseries/provider-twelvedata/client
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { TransportError } from '@tseries/contracts';
import { isErrorEnvelope } from './errors.js';
import type { JsonFetcher } from './types.js';

/**
 * Default HTTP timeout (30 seconds).
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Creates a fetcher backed by the global `fetch`, with an abort timeout.
 *
 * A non-2xx reply whose body is an error envelope is returned as-is so the
 * API's own message reaches the caller; any other non-2xx reply, a body
 * that is not JSON, a network failure or a timeout is a TransportError.
 *
 * @example
 * ```typescript
 * const fetcher = createHttpFetcher({ timeout: 10000 });
 * const body = await fetcher('https://api.twelvedata.com/time_series?symbol=SPY&interval=1day&apikey=test-key');
 * ```
 */
export function createHttpFetcher(options: { timeout?: number } = {}): JsonFetcher {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;

  return async (url: string): Promise<unknown> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { signal: controller.signal });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${timeout}ms`, { timeout });
      }
      throw new TransportError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const body = parseJson(text);

    if (!response.ok) {
      if (body.ok && isErrorEnvelope(body.value)) {
        return body.value;
      }
      throw new TransportError(`HTTP ${response.status} ${response.statusText}`.trim(), {
        statusCode: response.status,
      });
    }

    if (!body.ok) {
      throw new TransportError(`Response body is not valid JSON: ${body.reason}`, {
        statusCode: response.status,
      });
    }

    return body.value;
  };
}

/**
 * Creates a fetcher that answers from `<dir>/<symbol>-<interval>.json`.
 *
 * Symbol and interval are read back from the request URL; a `/` in the
 * symbol (currency pairs) becomes `_` in the file name.
 *
 * @example
 * ```typescript
 * const fetcher = createFixtureFetcher('/path/to/__fixtures__');
 * // ...?symbol=EUR/USD&interval=1h  ->  /path/to/__fixtures__/EUR_USD-1h.json
 * ```
 */
export function createFixtureFetcher(dir: string): JsonFetcher {
  return async (url: string): Promise<unknown> => {
    const file = join(dir, fixtureFileName(url));

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      throw new TransportError(`Failed to load fixture: ${file}`, {
        fixture: file,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const body = parseJson(content);
    if (!body.ok) {
      throw new TransportError(`Fixture is not valid JSON: ${file}`, {
        fixture: file,
        cause: body.reason,
      });
    }
    return body.value;
  };
}

/**
 * Fixture file name for a request URL.
 */
export function fixtureFileName(url: string): string {
  const params = new URL(url).searchParams;
  const symbol = (params.get('symbol') ?? '').replace(/\//g, '_');
  const interval = params.get('interval') ?? '';
  return `${symbol}-${interval}.json`;
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

function parseJson(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}
