/**
 * Evacuation Order File Loader
 *
 * Reads the pipe-delimited evacuation-order database export into
 * RawAlertRecords.
 *
 * FORMAT:
 * - Delimiter `|`, double-quoted fields, UTF-8 (all configurable)
 * - Header row with at least: Event Name | State | County | County FIPS | Year
 * - Empty cells and `NA` are missing values (null)
 *
 * Rows that fail validation are returned as issues next to the good records;
 * only an unreadable file or missing required columns throw.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { AlertFileError, errorMessage } from '../core/errors.js';
import type { PassthroughAttributes, RawAlertRecord } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Source column names for the fields the pipeline interprets
 */
export interface AlertColumnMap {
  readonly eventName: string;
  readonly state: string;
  readonly county: string;
  readonly countyFips: string;
  readonly year: string;
}

export interface AlertFileOptions {
  readonly delimiter?: string;
  readonly encoding?: BufferEncoding;
  readonly columns?: Partial<AlertColumnMap>;
}

export interface AlertRowIssue {
  /** 1-based line number in the file, header included */
  readonly line: number;
  readonly message: string;
}

export interface AlertLoadResult {
  readonly records: readonly RawAlertRecord[];
  readonly issues: readonly AlertRowIssue[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ALERT_COLUMNS: AlertColumnMap = {
  eventName: 'Event Name',
  state: 'State',
  county: 'County',
  countyFips: 'County FIPS',
  year: 'Year',
};

export const DEFAULT_DELIMITER = '|';

const MISSING_VALUES: ReadonlySet<string> = new Set(['', 'NA']);

const TableSchema = z.array(z.record(z.string(), z.string()));

const AlertFieldsSchema = z.object({
  eventName: z.string({ required_error: 'event name is missing' }).min(1),
  state: z
    .string({ required_error: 'state is missing' })
    .regex(/^[A-Z]{2}$/, 'state must be a two-letter abbreviation'),
  countyText: z.string().nullable(),
  countyFips: z.string().nullable(),
  year: z.coerce.number({ invalid_type_error: 'year must be a number' }).int('year must be an integer'),
});

// ============================================================================
// Parsing
// ============================================================================

function missingToNull(value: string | undefined): string | null {
  if (value === undefined) return null;
  return MISSING_VALUES.has(value.trim()) ? null : value;
}

/**
 * Parse alert-file text into records
 *
 * @param source - Path or label used in error messages
 * @throws AlertFileError when the text is not a table or lacks required columns
 */
export function parseAlertRecords(
  text: string,
  options: AlertFileOptions = {},
  source = '<inline>'
): AlertLoadResult {
  const columns: AlertColumnMap = { ...DEFAULT_ALERT_COLUMNS, ...options.columns };

  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: true,
      delimiter: options.delimiter ?? DEFAULT_DELIMITER,
      quote: '"',
      // county text such as `Yadkin ("the Emergency Area")` quotes mid-field
      relax_quotes: true,
      bom: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new AlertFileError(`Cannot parse alert file: ${errorMessage(error)}`, source, {
      cause: error,
    });
  }

  const table = TableSchema.safeParse(parsed);
  if (!table.success) {
    throw new AlertFileError('Alert file did not parse into rows of text cells', source);
  }

  const firstRow = table.data[0];
  if (firstRow) {
    const missing = Object.values(columns).filter((column) => !(column in firstRow));
    if (missing.length > 0) {
      throw new AlertFileError(`Alert file is missing columns: ${missing.join(', ')}`, source);
    }
  }

  const interpreted = new Set<string>(Object.values(columns));
  const records: RawAlertRecord[] = [];
  const issues: AlertRowIssue[] = [];

  table.data.forEach((row, index) => {
    const line = index + 2;
    const fields = AlertFieldsSchema.safeParse({
      eventName: missingToNull(row[columns.eventName]) ?? undefined,
      state: missingToNull(row[columns.state])?.trim() ?? undefined,
      countyText: missingToNull(row[columns.county]),
      countyFips: missingToNull(row[columns.countyFips])?.trim() ?? null,
      year: missingToNull(row[columns.year]) ?? undefined,
    });

    if (!fields.success) {
      issues.push({
        line,
        message: fields.error.issues.map((issue) => issue.message).join('; '),
      });
      return;
    }

    const attributes: Record<string, string | null> = {};
    for (const [column, value] of Object.entries(row)) {
      if (!interpreted.has(column)) {
        attributes[column] = missingToNull(value);
      }
    }

    records.push({
      eventName: fields.data.eventName,
      state: fields.data.state,
      countyText: fields.data.countyText,
      countyFips: fields.data.countyFips,
      year: fields.data.year,
      attributes: Object.freeze(attributes) satisfies PassthroughAttributes,
    });
  });

  return { records, issues };
}

/**
 * Read and parse an alert file
 *
 * @throws AlertFileError when the file cannot be read or parsed
 */
export async function loadAlertRecords(
  path: string,
  options: AlertFileOptions = {}
): Promise<AlertLoadResult> {
  let text: string;
  try {
    text = await readFile(path, { encoding: options.encoding ?? 'utf-8' });
  } catch (error) {
    throw new AlertFileError(`Cannot read alert file: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  return parseAlertRecords(text, options, path);
}
