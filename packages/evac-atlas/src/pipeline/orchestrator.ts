/**
 * Resolution Pipeline
 *
 * normalize → expand → resolve over a whole batch of alert records.
 *
 * FAILURE MODEL:
 * - Per-row problems are data: rejected fragments, unknown states and
 *   unresolved names are collected in the result, never thrown
 * - An unexpected exception while resolving one row becomes a `row-error`
 *   unresolved record; the batch carries on
 * - Only building the registry can fail the run, and that happens before
 *   this module is reached
 */

import type {
  RawAlertRecord,
  RejectedFragment,
  ResolvedCountyRecord,
  UnknownStateDiagnostic,
  UnresolvedRecord,
  UnresolvedSummaryEntry,
} from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { stormName } from '../core/storm-names.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ReferenceRegistry } from '../registry/reference-registry.js';
import { normalizeAlerts } from '../normalization/name-normalizer.js';
import { expandStateLevelRows } from '../expansion/state-expander.js';
import { createResolver } from '../resolution/resolver.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  readonly registry: ReferenceRegistry;
  readonly logger?: Logger;
}

export interface PipelineStats {
  readonly rawRecords: number;
  /** Rows out of the normalizer */
  readonly candidateRows: number;
  readonly rejectedFragments: number;
  /** State-level rows replaced by per-county rows */
  readonly expandedOrders: number;
  /** Rows entering the resolver */
  readonly resolverInputs: number;
  readonly resolved: number;
  readonly unresolved: number;
}

export interface PipelineResult {
  readonly resolved: readonly ResolvedCountyRecord[];
  readonly unresolved: readonly UnresolvedRecord[];
  readonly rejected: readonly RejectedFragment[];
  readonly unknownStates: readonly UnknownStateDiagnostic[];
  readonly unresolvedSummary: readonly UnresolvedSummaryEntry[];
  readonly stats: PipelineStats;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Resolve a batch of alert records to county-level records
 */
export function runResolutionPipeline(
  records: readonly RawAlertRecord[],
  options: PipelineOptions
): PipelineResult {
  const { registry } = options;
  const logger = options.logger ?? createLogger({ module: 'pipeline' });
  const resolver = createResolver(registry, { logger });

  const normalized = normalizeAlerts(records);
  const expansion = expandStateLevelRows(normalized.rows, registry, logger);

  const resolved: ResolvedCountyRecord[] = [];
  const unresolved: UnresolvedRecord[] = [];

  for (const row of expansion.rows) {
    try {
      const outcome = resolver.resolve(row);
      if (outcome.status === 'resolved') {
        resolved.push(outcome.record);
      } else {
        unresolved.push(outcome.record);
      }
    } catch (error) {
      logger.error('Row failed during resolution', {
        state: row.state,
        countyName: row.countyName,
        eventName: row.eventName,
        error: errorMessage(error),
      });
      unresolved.push({
        ...row,
        originalCountyName: row.countyName,
        storm: stormName(row.eventName),
        reason: 'row-error',
        detail: errorMessage(error),
      });
    }
  }

  const stats: PipelineStats = {
    rawRecords: records.length,
    candidateRows: normalized.rows.length,
    rejectedFragments: normalized.rejected.length,
    expandedOrders: expansion.expandedOrders,
    resolverInputs: expansion.rows.length,
    resolved: resolved.length,
    unresolved: unresolved.length,
  };

  const unresolvedSummary = summarizeUnresolved(unresolved);

  logger.info('Resolution pipeline complete', { ...stats });
  if (unresolvedSummary.length > 0) {
    logger.warn('Unresolved county names remain', {
      distinctNames: unresolvedSummary.length,
      top: unresolvedSummary.slice(0, 5).map((entry) => `${entry.state}/${entry.countyName ?? '-'}`),
    });
  }

  return {
    resolved,
    unresolved,
    rejected: normalized.rejected,
    unknownStates: expansion.unknownStates,
    unresolvedSummary,
    stats,
  };
}

/**
 * Group unresolved rows by (state, cleaned name, reason), most frequent first
 */
export function summarizeUnresolved(
  unresolved: readonly UnresolvedRecord[]
): UnresolvedSummaryEntry[] {
  const groups = new Map<string, UnresolvedSummaryEntry>();

  for (const record of unresolved) {
    const key = `${record.state}\u0000${record.countyName ?? ''}\u0000${record.reason}`;
    const existing = groups.get(key);
    groups.set(key, {
      state: record.state,
      countyName: record.countyName,
      reason: record.reason,
      count: (existing?.count ?? 0) + 1,
    });
  }

  return [...groups.values()].sort(
    (a, b) =>
      b.count - a.count ||
      a.state.localeCompare(b.state) ||
      (a.countyName ?? '').localeCompare(b.countyName ?? '')
  );
}

/**
 * Clean dataset: resolved records only
 *
 * Dropping unresolved rows is an explicit, logged step so the loss is
 * always visible in the run output.
 */
export function finalizeDataset(
  result: PipelineResult,
  logger: Logger = createLogger({ module: 'pipeline' })
): readonly ResolvedCountyRecord[] {
  if (result.unresolved.length > 0) {
    logger.warn('Dropping unresolved rows from final dataset', {
      dropped: result.unresolved.length,
      kept: result.resolved.length,
      names: result.unresolvedSummary.map((entry) => `${entry.state}/${entry.countyName ?? '-'}`),
    });
  }
  return result.resolved;
}
