/**
 * Time series formatter
 * Renders tabular and time-indexed series as a text table, CSV or JSON
 */

import type {
  NormalizedSeries,
  RawResponse,
  TemporalColumn,
  TimeIndexedSeries,
} from '@tseries/contracts';

export type OutputStyle = 'table' | 'csv' | 'json';

export type RenderableSeries = NormalizedSeries | TimeIndexedSeries;

/**
 * One output row: the temporal column as its ISO text, then every numeric column.
 */
export type SeriesRow = Record<string, string | number>;

/**
 * Format a series in the requested style
 */
export function formatSeries(series: RenderableSeries, style: OutputStyle = 'table'): string {
  switch (style) {
    case 'csv':
      return formatCsv(series);
    case 'json':
      return formatJson(series);
    case 'table':
    default:
      return formatTable(series);
  }
}

/**
 * Row objects in series order
 */
export function toRows(series: RenderableSeries): SeriesRow[] {
  const { timeName, labels, names, cell } = view(series);

  return labels.map((label, row) => {
    const entry: SeriesRow = { [timeName]: label };
    names.forEach((name, column) => {
      entry[name] = cell(row, column);
    });
    return entry;
  });
}

/**
 * Box-drawn text table; numbers are right-aligned
 */
export function formatTable(series: RenderableSeries): string {
  const { timeName, labels, names, cell } = view(series);
  const header = [timeName, ...names];
  const body = labels.map((label, row) => [
    label,
    ...names.map((_, column) => formatNumber(cell(row, column))),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map((cells) => (cells[column] ?? '').length))
  );

  const rule = (left: string, join: string, right: string): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(join) + right;

  const line = (cells: string[], alignNumbers: boolean): string =>
    '│' +
    cells
      .map((text, column) => {
        const width = widths[column] ?? text.length;
        const padded = alignNumbers && column > 0 ? text.padStart(width) : text.padEnd(width);
        return ` ${padded} `;
      })
      .join('│') +
    '│';

  const lines: string[] = [];
  lines.push(rule('┌', '┬', '┐'));
  lines.push(line(header, false));
  lines.push(rule('├', '┼', '┤'));
  for (const cells of body) {
    lines.push(line(cells, true));
  }
  lines.push(rule('└', '┴', '┘'));

  return lines.join('\n');
}

/**
 * CSV with a header row
 */
export function formatCsv(series: RenderableSeries): string {
  const { timeName, labels, names, cell } = view(series);

  const lines = [[timeName, ...names].map(escapeCsv).join(',')];
  labels.forEach((label, row) => {
    const cells = [label, ...names.map((_, column) => formatNumber(cell(row, column)))];
    lines.push(cells.map(escapeCsv).join(','));
  });

  return lines.join('\n');
}

/**
 * Pretty-printed JSON: metadata, access time and rows
 */
export function formatJson(series: RenderableSeries): string {
  return JSON.stringify(
    {
      format: series.format,
      interval: series.interval,
      meta: series.meta,
      accessed: series.accessed.toISOString(),
      rows: toRows(series),
    },
    null,
    2
  );
}

/**
 * Pretty-printed raw response
 */
export function formatRaw(response: RawResponse): string {
  return JSON.stringify(response, null, 2);
}

/**
 * Metadata block, one `key: value` line per entry, then the access time
 */
export function formatMeta(series: RenderableSeries): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(series.meta)) {
    lines.push(`${key}: ${value === null ? 'null' : String(value)}`);
  }
  lines.push(`accessed: ${series.accessed.toISOString()}`);

  return lines.join('\n');
}

interface SeriesView {
  timeName: string;
  labels: string[];
  names: string[];
  cell(row: number, column: number): number;
}

function view(series: RenderableSeries): SeriesView {
  if (series.format === 'tabular') {
    const columns = series.columns;
    return {
      timeName: series.time.name,
      labels: temporalLabels(series.time),
      names: columns.map((column) => column.name),
      cell: (row, column) => columns[column]?.values[row] ?? Number.NaN,
    };
  }

  const matrix = series.matrix;
  return {
    timeName: series.index.name,
    labels: temporalLabels(series.index),
    names: series.columns,
    cell: (row, column) => matrix[row]?.[column] ?? Number.NaN,
  };
}

function temporalLabels(column: TemporalColumn): string[] {
  return column.kind === 'date'
    ? column.values.map((value) => value.iso)
    : column.values.map((value) => value.iso);
}

function formatNumber(value: number): string {
  return Number.isNaN(value) ? 'NA' : String(value);
}

function escapeCsv(field: string): string {
  if (/[",\n\r]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
