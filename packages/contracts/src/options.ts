/**
 * @fileoverview Request option enumerations: output format, security type and
 * sort order.
 *
 * @module @tseries/contracts/options
 */

/**
 * Shape of the value returned by a time-series request.
 */
export enum OutputFormat {
  /** Row-ordered columnar table */
  Tabular = 'tabular',
  /** Temporal index plus a numeric value matrix */
  TimeIndexed = 'time-indexed',
  /** The parsed JSON body, untouched */
  Raw = 'raw',
}

/**
 * Security types understood by the `type` query parameter.
 */
export enum SecurityType {
  Stock = 'Stock',
  Index = 'Index',
  ETF = 'ETF',
  REIT = 'REIT',
}

export enum SortOrder {
  Asc = 'ASC',
  Desc = 'DESC',
}

const OUTPUT_FORMATS: readonly OutputFormat[] = Object.values(OutputFormat);
const SECURITY_TYPES: readonly SecurityType[] = Object.values(SecurityType);
const SORT_ORDERS: readonly SortOrder[] = Object.values(SortOrder);

export function isValidOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function isValidSecurityType(value: string): value is SecurityType {
  return SECURITY_TYPES.some((type) => type === value);
}

export function isValidSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export function getAllOutputFormats(): OutputFormat[] {
  return [...OUTPUT_FORMATS];
}

export function getAllSecurityTypes(): SecurityType[] {
  return [...SECURITY_TYPES];
}

export function getAllSortOrders(): SortOrder[] {
  return [...SORT_ORDERS];
}
