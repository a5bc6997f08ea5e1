/**
 * County Name Normalizer
 *
 * Splits one alert's free-text county list into candidate county rows.
 *
 * PIPELINE (per record):
 * 1. Protect names containing a connector ("King and Queen")
 * 2. Rewrite connectors (" and ", "&", ";") to commas
 * 3. Split on commas, trim, restore protected names
 * 4. Drop fragments on the rejection list
 * 5. Apply fragment corrections; split again where a correction added a comma
 * 6. Strip one trailing period
 * 7. One row per surviving fragment
 *
 * A record with no county text yields a single entire-state row. Fragments no
 * table knows about pass through untouched and surface later as unresolved.
 */

import type { CandidateCountyRow, RawAlertRecord, RejectedFragment } from '../core/types.js';
import {
  CONNECTOR_PATTERNS,
  FRAGMENT_CORRECTIONS,
  FRAGMENT_SEPARATOR,
  PROTECTED_NAMES,
  REJECTED_FRAGMENTS,
  TRAILING_PERIOD,
  applyReplacements,
} from './correction-tables.js';

// =============================================================================
// Types
// =============================================================================

export interface NormalizedAlert {
  readonly rows: readonly CandidateCountyRow[];
  readonly rejected: readonly RejectedFragment[];
}

// =============================================================================
// Fragment Splitting
// =============================================================================

const placeholderFor = (index: number): string => `__PROTECTED_${index}__`;

/**
 * Split a county list into trimmed fragments (steps 1–3)
 *
 * @example splitCountyText('Bryan, Camden and Chatham') // ['Bryan', 'Camden', 'Chatham']
 */
export function splitCountyText(text: string): string[] {
  let working = text;

  PROTECTED_NAMES.forEach((name, index) => {
    working = working.replaceAll(name.literal, placeholderFor(index));
  });

  for (const connector of CONNECTOR_PATTERNS) {
    working = working.replace(connector, ', ');
  }

  return working.split(FRAGMENT_SEPARATOR).map((fragment) => {
    let restored = fragment.trim();
    PROTECTED_NAMES.forEach((name, index) => {
      restored = restored.replaceAll(placeholderFor(index), name.restoreAs);
    });
    return restored;
  });
}

/**
 * Run the fragment-correction table, re-splitting on any comma it introduced
 */
export function correctFragment(fragment: string): string[] {
  const corrected = applyReplacements(fragment, FRAGMENT_CORRECTIONS);
  if (corrected === fragment) {
    return [fragment];
  }
  return corrected.split(FRAGMENT_SEPARATOR).map((part) => part.trim());
}

export function isRejectedFragment(fragment: string): boolean {
  return REJECTED_FRAGMENTS.has(fragment);
}

/**
 * Clean a county list into its final fragments, reporting rejected ones
 */
export function extractCountyNames(text: string): { names: string[]; rejected: string[] } {
  const names: string[] = [];
  const rejected: string[] = [];

  for (const fragment of splitCountyText(text)) {
    if (isRejectedFragment(fragment)) {
      rejected.push(fragment);
      continue;
    }

    for (const part of correctFragment(fragment)) {
      const name = part.replace(TRAILING_PERIOD, '').trim();
      if (isRejectedFragment(part) || isRejectedFragment(name)) {
        rejected.push(part);
        continue;
      }
      names.push(name);
    }
  }

  return { names, rejected };
}

// =============================================================================
// Record Normalization
// =============================================================================

/**
 * Expand one alert record into candidate county rows
 */
export function normalizeAlert(record: RawAlertRecord): NormalizedAlert {
  const base = {
    eventName: record.eventName,
    state: record.state,
    countyFips: record.countyFips,
    year: record.year,
    attributes: record.attributes,
    sourceText: record.countyText,
    origin: 'source' as const,
  };

  if (record.countyText === null) {
    return { rows: [{ ...base, countyName: null }], rejected: [] };
  }

  const sourceText = record.countyText;
  const { names, rejected } = extractCountyNames(sourceText);

  return {
    rows: names.map((countyName) => ({ ...base, countyName })),
    rejected: rejected.map((fragment) => ({
      eventName: record.eventName,
      state: record.state,
      year: record.year,
      fragment,
      sourceText,
    })),
  };
}

/**
 * Normalize every record, concatenating rows in input order
 */
export function normalizeAlerts(records: readonly RawAlertRecord[]): NormalizedAlert {
  const rows: CandidateCountyRow[] = [];
  const rejected: RejectedFragment[] = [];

  for (const record of records) {
    const result = normalizeAlert(record);
    rows.push(...result.rows);
    rejected.push(...result.rejected);
  }

  return { rows, rejected };
}
