/**
 * State-Level Order Expansion
 *
 * Replaces every state-level row ("Entire State", "All counties", a missing
 * county, ...) with one row per county the registry knows for that state.
 *
 * GUARANTEES:
 * - A state-level row for a state with k registry counties becomes exactly k rows
 * - Non-geographic attributes are copied unchanged onto every expanded row
 * - A state-level row for an unknown state is forwarded as-is and reported,
 *   never dropped; it fails resolution downstream
 *
 * Output order: county-specific rows first, then expansions.
 */

import type { CandidateCountyRow, UnknownStateDiagnostic } from '../core/types.js';
import { silentLogger, type Logger } from '../core/utils/logger.js';
import type { ReferenceRegistry } from '../registry/reference-registry.js';
import { STATE_LEVEL_SENTINELS } from '../normalization/correction-tables.js';

export interface StateExpansionResult {
  readonly rows: readonly CandidateCountyRow[];
  /** Number of state-level rows that were expanded */
  readonly expandedOrders: number;
  readonly unknownStates: readonly UnknownStateDiagnostic[];
}

/**
 * True for the entire-state marker and the state-level vocabulary
 */
export function isStateLevelName(countyName: string | null): boolean {
  return countyName === null || STATE_LEVEL_SENTINELS.has(countyName);
}

/**
 * One row per county in the row's state
 *
 * The source FIPS is cleared: a code supplied for a whole-state order cannot
 * identify each of its counties.
 */
export function expandStateLevelRow(
  row: CandidateCountyRow,
  registry: ReferenceRegistry
): CandidateCountyRow[] {
  return registry.allCountiesOf(row.state).map((countyName) => ({
    ...row,
    countyName,
    countyFips: null,
    origin: 'state-expansion' as const,
  }));
}

/**
 * Expand all state-level rows
 */
export function expandStateLevelRows(
  rows: readonly CandidateCountyRow[],
  registry: ReferenceRegistry,
  logger: Logger = silentLogger
): StateExpansionResult {
  const specific: CandidateCountyRow[] = [];
  const expanded: CandidateCountyRow[] = [];
  const unknownStates: UnknownStateDiagnostic[] = [];
  let expandedOrders = 0;

  for (const row of rows) {
    if (!isStateLevelName(row.countyName)) {
      specific.push(row);
      continue;
    }

    if (!registry.hasState(row.state)) {
      unknownStates.push({
        state: row.state,
        eventName: row.eventName,
        year: row.year,
        countyName: row.countyName,
      });
      logger.warn('State-level order for unknown state forwarded unexpanded', {
        state: row.state,
        eventName: row.eventName,
        year: row.year,
      });
      expanded.push(row);
      continue;
    }

    expandedOrders++;
    expanded.push(...expandStateLevelRow(row, registry));
  }

  logger.debug('State-level orders expanded', {
    specificRows: specific.length,
    expandedOrders,
    expandedRows: expanded.length,
    unknownStates: unknownStates.length,
  });

  return { rows: [...specific, ...expanded], expandedOrders, unknownStates };
}
