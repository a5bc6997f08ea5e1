/**
 * Output Formatting for CLI Commands
 *
 * Table output for humans, json / ndjson / csv for datasets. Resolved
 * records are flattened so passthrough attributes become ordinary columns.
 *
 * @module cli/lib/output
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ResolvedCountyRecord, UnresolvedRecord } from '../../core/types.js';

export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table and csv output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
}

type Row = Readonly<Record<string, unknown>>;

const cellText = (value: unknown): string =>
  value === null || value === undefined ? '' : String(value);

const toRow = (item: object): Row => Object.fromEntries(Object.entries(item));

// ============================================================================
// Formatters
// ============================================================================

/**
 * Format data as a fixed-width table
 */
export function formatTable(items: readonly object[], columns: readonly TableColumn[]): string {
  if (items.length === 0) {
    return 'No entries found.';
  }

  const data = items.map(toRow);

  const widths = columns.map(
    (col) =>
      col.width ?? Math.max(col.header.length, ...data.map((row) => cellText(row[col.key]).length))
  );

  const renderRow = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => {
        const width = widths[i] ?? cell.length;
        const truncated = cell.length > width ? `${cell.slice(0, width - 1)}~` : cell;
        return columns[i]?.align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
      })
      .join(' | ');

  const header = renderRow(columns.map((col) => col.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const rows = data.map((row) => renderRow(columns.map((col) => cellText(row[col.key]))));

  return [header, separator, ...rows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data as CSV; missing values are empty cells
 */
export function formatCsv(items: readonly object[], columns: readonly TableColumn[]): string {
  const header = columns.map((col) => escapeCsv(col.header)).join(',');
  const rows = items.map(toRow).map((row) =>
    columns.map((col) => escapeCsv(cellText(row[col.key]))).join(',')
  );
  return [header, ...rows].join('\n');
}

/**
 * Format data in the specified format
 */
export function formatOutput(
  data: readonly object[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

// ============================================================================
// Dataset Rows
// ============================================================================

export const RESOLVED_COLUMNS: readonly TableColumn[] = [
  { key: 'Storm', header: 'Storm' },
  { key: 'Event Name', header: 'Event Name' },
  { key: 'State', header: 'State' },
  { key: 'County', header: 'County' },
  { key: 'County FIPS', header: 'County FIPS' },
  { key: 'Year', header: 'Year', align: 'right' },
  { key: 'FIPS Source', header: 'FIPS Source' },
];

export const UNRESOLVED_SUMMARY_COLUMNS: readonly TableColumn[] = [
  { key: 'state', header: 'ST', width: 2 },
  { key: 'countyName', header: 'County', width: 30 },
  { key: 'reason', header: 'Reason', width: 20 },
  { key: 'count', header: 'Rows', width: 5, align: 'right' },
];

/**
 * Keys of the interpreted columns; source columns never overwrite them
 */
export const DATASET_KEYS: ReadonlySet<string> = new Set([
  ...RESOLVED_COLUMNS.map((col) => col.key),
  'Reason',
]);

/**
 * Add columns to a row, skipping dataset keys and keys the row already has
 */
export function appendColumns(row: Row, extra: Readonly<Record<string, unknown>>): Row {
  const result: Record<string, unknown> = { ...row };
  for (const [key, value] of Object.entries(extra)) {
    if (!DATASET_KEYS.has(key) && !(key in result)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Flatten a resolved record into one output row
 *
 * Passthrough attributes come after the interpreted columns.
 */
export function toDatasetRow(record: ResolvedCountyRecord | UnresolvedRecord): Row {
  const base: Row = {
    Storm: record.storm,
    'Event Name': record.eventName,
    State: record.state,
    County: record.countyName,
    'County FIPS': record.countyFips,
    Year: record.year,
    ...('fipsSource' in record ? { 'FIPS Source': record.fipsSource } : {}),
    ...('reason' in record ? { Reason: record.reason } : {}),
  };
  return appendColumns(base, record.attributes);
}

/**
 * Columns for `extra` keys not already present, in first-seen order
 */
export function extendColumns(
  columns: readonly TableColumn[],
  extras: readonly Readonly<Record<string, unknown>>[]
): TableColumn[] {
  const result = [...columns];
  const seen = new Set([...DATASET_KEYS, ...columns.map((col) => col.key)]);

  for (const extra of extras) {
    for (const key of Object.keys(extra)) {
      if (!seen.has(key)) {
        seen.add(key);
        result.push({ key, header: key });
      }
    }
  }

  return result;
}

/**
 * Interpreted columns plus every attribute column, in first-seen order
 */
export function datasetColumns(
  records: readonly (ResolvedCountyRecord | UnresolvedRecord)[],
  base: readonly TableColumn[] = RESOLVED_COLUMNS
): TableColumn[] {
  return extendColumns(base, records.map((record) => record.attributes));
}

// ============================================================================
// Printing
// ============================================================================

export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Write formatted output to a file, creating its directory
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
}
