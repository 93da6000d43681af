/**
 * @fileoverview Error taxonomy for time-series requests.
 *
 * Every failure surfaced to callers is a SeriesError subclass carrying:
 * - a machine-readable code
 * - a structured data payload
 * - an ISO timestamp
 *
 * None of these errors are retried internally; each aborts the call.
 *
 * @module @tseries/contracts/errors
 */

/**
 * Base error class for all time-series errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SeriesError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SeriesError extends Error {
  /**
   * Machine-readable error code (e.g. 'REMOTE_API_ERROR').
   */
  readonly code: string;

  /**
   * Structured context for debugging.
   */
  readonly data?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SeriesError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * A parameter value is outside its enumeration or range.
 * Raised before any network call.
 *
 * @example
 * ```typescript
 * throw new InvalidArgumentError('outputsize must be an integer between 1 and 5000', {
 *   parameter: 'outputsize',
 *   value: 0,
 * });
 * ```
 */
export class InvalidArgumentError extends SeriesError {
  constructor(
    message: string,
    data: {
      parameter: string;
      value: unknown;
      allowed?: readonly string[];
      [key: string]: unknown;
    }
  ) {
    super('INVALID_ARGUMENT', message, data);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * No API key could be resolved, or the configuration itself is invalid.
 */
export class ConfigurationError extends SeriesError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, data);
    this.name = 'ConfigurationError';
  }
}

/**
 * The API answered with a status other than "ok".
 *
 * The message is the API's own text, unchanged.
 */
export class RemoteApiError extends SeriesError {
  constructor(
    message: string,
    data: {
      status: string;
      code?: number;
      [key: string]: unknown;
    }
  ) {
    super('REMOTE_API_ERROR', message, data);
    this.name = 'RemoteApiError';
  }
}

/**
 * A value expected to parse as a number, date or date-time did not,
 * or the response envelope has the wrong shape.
 */
export class MalformedDataError extends SeriesError {
  constructor(
    message: string,
    data?: {
      row?: number;
      column?: string;
      value?: unknown;
      [key: string]: unknown;
    }
  ) {
    super('MALFORMED_DATA', message, data);
    this.name = 'MalformedDataError';
  }
}

/**
 * The requested output representation is not available in this setup.
 */
export class UnsupportedFormatError extends SeriesError {
  constructor(message: string, data: { format: string; [key: string]: unknown }) {
    super('UNSUPPORTED_FORMAT', message, data);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * The fetch collaborator failed: timeout, network failure, a non-2xx reply
 * without an error envelope, a body that is not JSON, or a missing fixture.
 */
export class TransportError extends SeriesError {
  constructor(
    message: string,
    data?: {
      statusCode?: number;
      timeout?: number;
      [key: string]: unknown;
    }
  ) {
    super('TRANSPORT_ERROR', message, data);
    this.name = 'TransportError';
  }
}

/**
 * Type guard for any SeriesError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isSeriesError(err)) {
 *     console.error(`[${err.code}] ${err.message}`);
 *   }
 * }
 * ```
 */
export function isSeriesError(error: unknown): error is SeriesError {
  return error instanceof SeriesError;
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isRemoteApiError(error: unknown): error is RemoteApiError {
  return error instanceof RemoteApiError;
}

export function isMalformedDataError(error: unknown): error is MalformedDataError {
  return error instanceof MalformedDataError;
}

export function isUnsupportedFormatError(error: unknown): error is UnsupportedFormatError {
  return error instanceof UnsupportedFormatError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
