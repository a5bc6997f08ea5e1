/**
 * Evac Atlas
 *
 * County-level resolution of hurricane evacuation orders: free-text county
 * lists and state-wide orders become one FIPS-coded record per county.
 *
 * @example
 * ```typescript
 * import { ReferenceRegistry, loadAlertRecords, runResolutionPipeline } from '@hurricane-evac/evac-atlas';
 *
 * const registry = await ReferenceRegistry.load();
 * const { records } = await loadAlertRecords('orders.psv');
 * const result = runResolutionPipeline(records, { registry });
 * ```
 */

// Core
export type {
  PassthroughAttributes,
  RawAlertRecord,
  RowOrigin,
  CandidateCountyRow,
  FipsSource,
  ResolvedCountyRecord,
  UnresolvedReason,
  UnresolvedRecord,
  ResolutionOutcome,
  ReferenceEntry,
  RejectedFragment,
  UnknownStateDiagnostic,
  UnresolvedSummaryEntry,
} from './core/types.js';
export { ReferenceLoadError, AlertFileError, ConfigError, errorMessage } from './core/errors.js';
export { logger, createLogger, silentLogger, parseLogLevel } from './core/utils/logger.js';
export type { Logger, LogLevel, LogMetadata } from './core/utils/logger.js';
export { stormName, parseStormId, type StormId } from './core/storm-names.js';

// Reference registry
export { ReferenceRegistry, type ReferenceRegistryOptions } from './registry/reference-registry.js';
export {
  DEFAULT_REFERENCE_PATH,
  loadReferenceEntries,
  parseReferenceTable,
  toReferenceEntries,
  type CensusCountyRow,
} from './registry/reference-loader.js';
export { titleCaseName, canonicalReferenceName } from './registry/county-names.js';

// Pipeline stages
export {
  normalizeAlert,
  normalizeAlerts,
  extractCountyNames,
  splitCountyText,
  type NormalizedAlert,
} from './normalization/name-normalizer.js';
export {
  expandStateLevelRows,
  expandStateLevelRow,
  isStateLevelName,
  type StateExpansionResult,
} from './expansion/state-expander.js';
export {
  createResolver,
  cleanCountyName,
  isValidFips,
  type CountyResolver,
  type ResolverOptions,
} from './resolution/resolver.js';
export {
  runResolutionPipeline,
  summarizeUnresolved,
  finalizeDataset,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStats,
} from './pipeline/orchestrator.js';

// Input / output
export {
  loadAlertRecords,
  parseAlertRecords,
  DEFAULT_ALERT_COLUMNS,
  DEFAULT_DELIMITER,
  type AlertColumnMap,
  type AlertFileOptions,
  type AlertLoadResult,
  type AlertRowIssue,
} from './ingestion/alert-loader.js';
export {
  loadExposureRows,
  parseExposureRows,
  joinOnStormCountyYear,
  joinTreatmentEffects,
  innerJoinOnStormCountyYear,
  type ExposureRow,
  type MergedRecord,
  type ExposureJoinResult,
  type JoinResult,
  type StormCountyYear,
} from './merge/exposure-join.js';
