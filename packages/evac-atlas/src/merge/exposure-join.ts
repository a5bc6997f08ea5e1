/**
 * Exposure Join
 *
 * Inner join of resolved evacuation records with storm exposure rows on
 * (storm, county FIPS, year). Exposure data keys storms as "Name-YYYY" and
 * carries the county FIPS in its first column.
 *
 * Exposure rows are first restricted to years that appear in the evacuation
 * data; rows for other storms or counties simply do not match.
 *
 * Treatment-effect tables share the exposure layout and are joined onto the
 * merged records the same way.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { AlertFileError, errorMessage } from '../core/errors.js';
import { parseStormId } from '../core/storm-names.js';
import type { PassthroughAttributes, ResolvedCountyRecord } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ExposureRow {
  readonly fips: string;
  readonly storm: string;
  readonly year: number;
  readonly stormId: string;
  readonly attributes: PassthroughAttributes;
}

export interface MergedRecord extends ResolvedCountyRecord {
  readonly exposure: PassthroughAttributes;
  /** Treatment-effect columns, once joined */
  readonly effects?: PassthroughAttributes;
}

/**
 * Anything carrying the (storm, county FIPS, year) join key
 */
export interface StormCountyYear {
  readonly storm: string;
  readonly countyFips: string;
  readonly year: number;
}

export interface JoinResult<T> {
  readonly merged: readonly T[];
  /** Left-hand records with no matching row */
  readonly unmatched: number;
  /** Right-hand rows left after the year filter */
  readonly exposureRowsConsidered: number;
}

export type ExposureJoinResult = JoinResult<MergedRecord>;

export interface ExposureParseResult {
  readonly rows: readonly ExposureRow[];
  /** Rows whose storm id or FIPS could not be read */
  readonly skipped: number;
}

const TableSchema = z.array(z.record(z.string(), z.string()));

const STORM_ID_COLUMN = 'storm_id';

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse comma-delimited exposure data
 *
 * @throws AlertFileError when the text is not a table or has no storm_id column
 */
export function parseExposureRows(text: string, source = '<inline>'): ExposureParseResult {
  let parsed: unknown;
  try {
    parsed = parse(text, { columns: true, bom: true, skip_empty_lines: true });
  } catch (error) {
    throw new AlertFileError(`Cannot parse exposure file: ${errorMessage(error)}`, source, {
      cause: error,
    });
  }

  const table = TableSchema.safeParse(parsed);
  if (!table.success) {
    throw new AlertFileError('Exposure file did not parse into rows of text cells', source);
  }

  const rows: ExposureRow[] = [];
  let skipped = 0;

  for (const row of table.data) {
    const [fipsColumn] = Object.keys(row);
    const stormIdValue = row[STORM_ID_COLUMN];
    if (fipsColumn === undefined || stormIdValue === undefined) {
      throw new AlertFileError(`Exposure file needs a FIPS column and a ${STORM_ID_COLUMN} column`, source);
    }

    const stormId = parseStormId(stormIdValue);
    const fips = row[fipsColumn]?.trim().padStart(5, '0') ?? '';
    if (!stormId || !/^\d{5}$/.test(fips)) {
      skipped++;
      continue;
    }

    const attributes: Record<string, string | null> = {};
    for (const [column, value] of Object.entries(row)) {
      if (column !== fipsColumn && column !== STORM_ID_COLUMN) {
        attributes[column] = value === '' || value === 'NA' ? null : value;
      }
    }

    rows.push({
      fips,
      storm: stormId.storm,
      year: stormId.year,
      stormId: stormIdValue,
      attributes: Object.freeze(attributes),
    });
  }

  return { rows, skipped };
}

/**
 * Read and parse an exposure file
 */
export async function loadExposureRows(path: string): Promise<ExposureParseResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new AlertFileError(`Cannot read exposure file: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }
  return parseExposureRows(text, path);
}

// ============================================================================
// Join
// ============================================================================

const joinKey = (storm: string, fips: string, year: number): string => `${storm}|${fips}|${year}`;

/**
 * Inner join on (storm, FIPS, year), restricting `rows` to the years of `records`
 *
 * A record matching several rows yields one combined record per match.
 */
export function innerJoinOnStormCountyYear<R extends StormCountyYear, T>(
  records: readonly R[],
  rows: readonly ExposureRow[],
  combine: (record: R, row: ExposureRow) => T
): JoinResult<T> {
  const years = new Set(records.map((record) => record.year));
  const index = new Map<string, ExposureRow[]>();
  let considered = 0;

  for (const row of rows) {
    if (!years.has(row.year)) continue;
    considered++;
    const key = joinKey(row.storm, row.fips, row.year);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  const merged: T[] = [];
  let unmatched = 0;

  for (const record of records) {
    const matches = index.get(joinKey(record.storm, record.countyFips, record.year));
    if (!matches) {
      unmatched++;
      continue;
    }
    for (const match of matches) {
      merged.push(combine(record, match));
    }
  }

  return { merged, unmatched, exposureRowsConsidered: considered };
}

/**
 * Join resolved evacuation records with storm exposure rows
 */
export function joinOnStormCountyYear(
  resolved: readonly ResolvedCountyRecord[],
  exposure: readonly ExposureRow[]
): ExposureJoinResult {
  return innerJoinOnStormCountyYear(resolved, exposure, (record, row) => ({
    ...record,
    exposure: row.attributes,
  }));
}

/**
 * Join merged records with per-county treatment effects
 *
 * Effects files use the exposure layout: FIPS first, a `storm_id` column.
 */
export function joinTreatmentEffects(
  merged: readonly MergedRecord[],
  effects: readonly ExposureRow[]
): ExposureJoinResult {
  return innerJoinOnStormCountyYear(merged, effects, (record, row) => ({
    ...record,
    effects: row.attributes,
  }));
}
