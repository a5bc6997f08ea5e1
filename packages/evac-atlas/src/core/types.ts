/**
 * Evac Atlas Core Types
 *
 * Record shapes flowing through the resolution pipeline:
 *
 *   RawAlertRecord ──normalize──▶ CandidateCountyRow ──expand──▶ CandidateCountyRow
 *                                                              ──resolve──▶ ResolvedCountyRecord
 *                                                                          | UnresolvedRecord
 *
 * Every stage returns new objects. Nothing here is mutated after construction.
 */

// ============================================================================
// Source Records
// ============================================================================

/**
 * Passthrough columns carried unchanged from the source file
 */
export type PassthroughAttributes = Readonly<Record<string, string | null>>;

/**
 * One evacuation-order row as read from the source file
 */
export interface RawAlertRecord {
  /** Storm name, usually prefixed "Hurricane " */
  readonly eventName: string;
  /** Two-letter USPS state abbreviation */
  readonly state: string;
  /** Free-text county list or state-level phrase; null means the whole state */
  readonly countyText: string | null;
  /** Pre-supplied county FIPS code, when the source has one */
  readonly countyFips: string | null;
  readonly year: number;
  readonly attributes: PassthroughAttributes;
}

// ============================================================================
// Pipeline Rows
// ============================================================================

/**
 * Where a candidate row came from
 *
 * - source: split out of the record's own county text
 * - state-expansion: produced by expanding a state-level order
 */
export type RowOrigin = 'source' | 'state-expansion';

/**
 * One (alert, county-name) pair
 *
 * `countyName === null` is the entire-state marker emitted for records with no
 * county text at all.
 */
export interface CandidateCountyRow {
  readonly eventName: string;
  readonly state: string;
  readonly countyName: string | null;
  readonly countyFips: string | null;
  readonly year: number;
  readonly attributes: PassthroughAttributes;
  /** County text of the record this row was split from */
  readonly sourceText: string | null;
  readonly origin: RowOrigin;
}

/**
 * How the FIPS code on a resolved record was obtained
 */
export type FipsSource = 'source' | 'registry';

/**
 * Terminal, clean county-level record
 */
export interface ResolvedCountyRecord extends CandidateCountyRow {
  readonly countyName: string;
  readonly countyFips: string;
  readonly fipsSource: FipsSource;
  /** Event name without the "Hurricane " prefix; join key for exposure data */
  readonly storm: string;
}

/**
 * Why a row could not be given a FIPS code
 */
export type UnresolvedReason = 'unresolved-geography' | 'unknown-state' | 'row-error';

/**
 * Row that failed resolution, kept for audit and correction-table maintenance
 */
export interface UnresolvedRecord extends CandidateCountyRow {
  /** Name after every cleaning pass (what was looked up) */
  readonly countyName: string | null;
  /** Name as it entered the resolver */
  readonly originalCountyName: string | null;
  readonly storm: string;
  readonly reason: UnresolvedReason;
  readonly detail?: string;
}

/**
 * Exactly one of these per row entering the resolver
 */
export type ResolutionOutcome =
  | { readonly status: 'resolved'; readonly record: ResolvedCountyRecord }
  | { readonly status: 'unresolved'; readonly record: UnresolvedRecord };

// ============================================================================
// Reference Data
// ============================================================================

/**
 * Authoritative (state, county) → FIPS triple
 *
 * `countyName` is title-cased with its County/Parish suffix removed, the same
 * form the resolver produces.
 */
export interface ReferenceEntry {
  readonly state: string;
  readonly countyName: string;
  readonly fips: string;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Fragment discarded by the normalizer's rejection list
 */
export interface RejectedFragment {
  readonly eventName: string;
  readonly state: string;
  readonly year: number;
  readonly fragment: string;
  readonly sourceText: string;
}

/**
 * State-level order for a state the registry does not know
 */
export interface UnknownStateDiagnostic {
  readonly state: string;
  readonly eventName: string;
  readonly year: number;
  readonly countyName: string | null;
}

/**
 * Unresolved names grouped for a human to extend the correction tables
 */
export interface UnresolvedSummaryEntry {
  readonly state: string;
  readonly countyName: string | null;
  readonly reason: UnresolvedReason;
  readonly count: number;
}
