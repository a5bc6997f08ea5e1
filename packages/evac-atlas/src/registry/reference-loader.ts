/**
 * County Reference Loader
 *
 * Reads the census county table (tidycensus `fips_codes` shape) and turns it
 * into registry entries.
 *
 * FILE FORMAT (JSON array):
 *   { "state": "GA", "stateCode": "13", "stateName": "Georgia",
 *     "countyCode": "029", "county": "Bryan County" }
 *
 * FIPS = stateCode + countyCode, always 5 digits.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { ReferenceLoadError, errorMessage } from '../core/errors.js';
import type { ReferenceEntry } from '../core/types.js';
import { canonicalReferenceName } from './county-names.js';

/**
 * Bundled census county table
 */
export const DEFAULT_REFERENCE_PATH = fileURLToPath(
  new URL('../../data/county-fips.json', import.meta.url)
);

export const CensusCountyRowSchema = z.object({
  state: z.string().regex(/^[A-Z]{2}$/, 'state must be a two-letter abbreviation'),
  stateCode: z.string().regex(/^\d{2}$/, 'stateCode must be 2 digits'),
  stateName: z.string().min(1),
  countyCode: z.string().regex(/^\d{3}$/, 'countyCode must be 3 digits'),
  county: z.string().min(1),
});

export type CensusCountyRow = z.infer<typeof CensusCountyRowSchema>;

const CensusCountyTableSchema = z.array(CensusCountyRowSchema);

/**
 * Convert validated census rows to registry entries
 */
export function toReferenceEntries(rows: readonly CensusCountyRow[]): ReferenceEntry[] {
  return rows.map((row) => ({
    state: row.state,
    countyName: canonicalReferenceName(row.county),
    fips: `${row.stateCode}${row.countyCode}`,
  }));
}

/**
 * Validate an already-parsed census table
 *
 * @throws ReferenceLoadError when the table is malformed or empty
 */
export function parseReferenceTable(data: unknown, source: string): ReferenceEntry[] {
  const parsed = CensusCountyTableSchema.safeParse(data);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ReferenceLoadError('Reference table failed validation', source, issues);
  }

  if (parsed.data.length === 0) {
    throw new ReferenceLoadError('Reference table is empty', source);
  }

  return toReferenceEntries(parsed.data);
}

/**
 * Load registry entries from a census county table on disk
 *
 * @throws ReferenceLoadError when the file is missing, not JSON, or malformed
 */
export async function loadReferenceEntries(
  path: string = DEFAULT_REFERENCE_PATH
): Promise<ReferenceEntry[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ReferenceLoadError(`Cannot read reference file: ${errorMessage(error)}`, path, [], {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ReferenceLoadError(`Reference file is not valid JSON: ${errorMessage(error)}`, path, [], {
      cause: error,
    });
  }

  return parseReferenceTable(data, path);
}
