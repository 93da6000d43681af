/**
 * @fileoverview Time-indexed representation capability.
 *
 * The time-indexed output is optional. Which variant a provider uses is
 * fixed when it is constructed, not probed per call:
 * - `nativeTimeIndex` reshapes a tabular series into index + value matrix
 * - `unavailableTimeIndex` provides nothing; the provider then falls back to
 *   tabular output or raises, depending on its UnsupportedFormatPolicy
 *
 * @module @tseries/provider-twelvedata/time-index
 */

import {
  OutputFormat,
  UnsupportedFormatError,
  type NormalizedSeries,
  type TimeIndexedSeries,
} from '@tseries/contracts';

export interface TimeIndexCapability {
  readonly name: string;
  readonly available: boolean;
  toTimeIndexed(series: NormalizedSeries): TimeIndexedSeries;
}

/**
 * Builds the time-indexed series from the tabular one.
 *
 * The temporal column becomes the index; row order is preserved, so the
 * index follows the order requested from the API.
 */
export const nativeTimeIndex: TimeIndexCapability = {
  name: 'native',
  available: true,
  toTimeIndexed(series: NormalizedSeries): TimeIndexedSeries {
    const matrix: number[][] = [];
    for (let row = 0; row < series.rowCount; row++) {
      matrix.push(series.columns.map((column) => column.values[row] ?? Number.NaN));
    }

    return {
      format: 'time-indexed',
      interval: series.interval,
      index: series.time,
      columns: series.columns.map((column) => column.name),
      matrix,
      meta: series.meta,
      accessed: series.accessed,
    };
  },
};

export const unavailableTimeIndex: TimeIndexCapability = {
  name: 'unavailable',
  available: false,
  toTimeIndexed(): TimeIndexedSeries {
    throw new UnsupportedFormatError('Time-indexed representation is not available', {
      format: OutputFormat.TimeIndexed,
    });
  },
};

export type TimeIndexCapabilityName = 'native' | 'unavailable';

/**
 * Looks up a capability by its configuration name.
 */
export function selectTimeIndexCapability(name: TimeIndexCapabilityName): TimeIndexCapability {
  return name === 'native' ? nativeTimeIndex : unavailableTimeIndex;
}
