/**
 * @fileoverview Error mapping for Twelve Data responses.
 *
 * The error classes themselves live in @tseries/contracts; this module
 * turns response envelopes into them.
 *
 * @module @tseries/provider-twelvedata/errors
 */

import { RemoteApiError } from '@tseries/contracts';
import { envelopeSchema, type ResponseEnvelope } from './schema.js';

const UNKNOWN_ERROR_MESSAGE = 'Unknown error from time series API';

/**
 * Returns true when `body` is an error envelope (`status` other than "ok").
 *
 * Used by the HTTP fetcher to pass API errors sent with a non-2xx status
 * through to the normalizer.
 *
 * @example
 * ```typescript
 * isErrorEnvelope({ status: 'error', code: 401, message: 'Invalid API key' }); // true
 * isErrorEnvelope({ status: 'ok', values: [] }); // false
 * ```
 */
export function isErrorEnvelope(body: unknown): boolean {
  const result = envelopeSchema.safeParse(body);
  return result.success && result.data.status !== 'ok';
}

/**
 * Maps an error envelope to a RemoteApiError.
 *
 * The API's message is kept verbatim; a numeric `code` is carried in the
 * error data.
 *
 * @example
 * ```typescript
 * const error = mapTwelveDataError({ status: 'error', code: 401, message: 'Invalid API key' });
 * error.message; // 'Invalid API key'
 * error.data;    // { status: 'error', code: 401 }
 * ```
 */
export function mapTwelveDataError(envelope: ResponseEnvelope): RemoteApiError {
  const message = typeof envelope.message === 'string' ? envelope.message : UNKNOWN_ERROR_MESSAGE;

  if (typeof envelope.code === 'number') {
    return new RemoteApiError(message, { status: envelope.status, code: envelope.code });
  }

  return new RemoteApiError(message, { status: envelope.status });
}
