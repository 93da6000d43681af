/**
 * @fileoverview Main entry point for @tseries/contracts.
 *
 * Shared enumerations, series data types and the error taxonomy.
 *
 * @module @tseries/contracts
 */

// Intervals
export {
  Interval,
  isValidInterval,
  isSubDailyInterval,
  getAllIntervals,
} from './intervals.js';

// Request options
export {
  OutputFormat,
  SecurityType,
  SortOrder,
  isValidOutputFormat,
  isValidSecurityType,
  isValidSortOrder,
  getAllOutputFormats,
  getAllSecurityTypes,
  getAllSortOrders,
} from './options.js';

// Series types
export type {
  TimeSeriesInput,
  MetaValue,
  SeriesMetadata,
  RawRecord,
  RawResponse,
  CalendarDate,
  ZonedDateTime,
  TemporalColumn,
  TemporalValue,
  NumericColumn,
  NormalizedSeries,
  TimeIndexedSeries,
  TimeSeriesResult,
} from './series.js';
export { isNormalizedSeries, isTimeIndexedSeries } from './series.js';

// Error classes and guards
export {
  SeriesError,
  InvalidArgumentError,
  ConfigurationError,
  RemoteApiError,
  MalformedDataError,
  UnsupportedFormatError,
  TransportError,
  isSeriesError,
  isInvalidArgumentError,
  isConfigurationError,
  isRemoteApiError,
  isMalformedDataError,
  isUnsupportedFormatError,
  isTransportError,
} from './errors.js';
