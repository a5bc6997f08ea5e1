/**
 * County Correction Tables
 *
 * Every fix applied to free-text county lists lives here as data. The
 * normalizer and resolver walk these tables in order; extending coverage means
 * adding a row, not a branch.
 *
 * ORDER MATTERS: tables are applied top to bottom and later rows see the
 * output of earlier ones. Do not reorder.
 *
 * Names on the right-hand side use the registry spelling: title case, no
 * County/Parish suffix ("Mcintosh", "Isle Of Wight", "Suffolk City").
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Replacement callback, same contract as String.prototype.replace
 */
export type Replacer = (match: string, ...groups: string[]) => string;

/**
 * Substring or pattern replacement
 *
 * String `find` values replace every literal occurrence. RegExp `find` values
 * must carry the `g` flag to replace more than the first match.
 */
export interface Replacement {
  readonly find: string | RegExp;
  readonly replace: string | Replacer;
  /** States where this row must not apply (their registry spells it differently) */
  readonly exceptStates?: readonly string[];
}

/**
 * Multi-word county name containing a connector word
 */
export interface ProtectedName {
  readonly literal: string;
  /** Spelling restored after splitting */
  readonly restoreAs: string;
}

/**
 * Whole-name override for one state's local naming convention
 */
export interface SpecialCaseRule {
  readonly state: string;
  /** Tested against the full cleaned name; must not carry the `g` flag */
  readonly pattern: RegExp;
  readonly canonical: string;
}

// =============================================================================
// Normalizer Tables
// =============================================================================

/**
 * County names that would otherwise be split on their own " and "
 */
export const PROTECTED_NAMES: readonly ProtectedName[] = [
  { literal: 'King and Queen', restoreAs: 'King And Queen' }, // VA
];

/**
 * Connector words and symbols rewritten to a comma before splitting
 */
export const CONNECTOR_PATTERNS: readonly RegExp[] = [/\s+and\s+/g, /\s*&\s*/g, /\s*;\s*/g];

/**
 * Fragment separator
 */
export const FRAGMENT_SEPARATOR = /,\s*/;

/**
 * Fragments that name no county
 *
 * - "" comes from Oxford commas ("Bryan, and Camden")
 * - "92 counties" / "108 counties": GA orders from Hurricane Michael (2018)
 *   that never say which counties were meant
 */
export const REJECTED_FRAGMENTS: ReadonlySet<string> = new Set(['', '92 counties', '108 counties']);

/**
 * Malformed fragments seen in the source data
 *
 * A replacement containing a comma causes the fragment to be split again.
 */
export const FRAGMENT_CORRECTIONS: readonly Replacement[] = [
  { find: 'Coma!', replace: 'Comal' }, // TX
  { find: 'McIntosh Meriwether', replace: 'McIntosh, Meriwether' }, // GA, missing comma
  { find: 'East of I-95 in Bryan', replace: 'Bryan' }, // GA
  { find: 'Yadkin ("the Emergency Area")', replace: 'Yadkin' }, // NC
];

/**
 * Trailing punctuation left over from the source ("Worth.", "Citrus.")
 */
export const TRAILING_PERIOD = /\.$/;

// =============================================================================
// State-Level Vocabulary
// =============================================================================

/**
 * County text meaning "every county in the state"
 *
 * Matched exactly. A null county is also state-level.
 */
export const STATE_LEVEL_SENTINELS: ReadonlySet<string> = new Set([
  'Entire State',
  'Entire state',
  'All counties',
  'All Parishes',
  'All',
  'Statewide',
  'Entire parish',
  'Entire Parish',
  'All 67 counties',
  'Entire County',
]);

// =============================================================================
// Resolver Tables
// =============================================================================

/**
 * Trailing words removed before lookup, longest first
 */
export const COUNTY_SUFFIXES: readonly string[] = [
  'Counties',
  'counties',
  'County',
  'county',
  'Parish',
  'parish',
];

/**
 * Typos seen in the source data
 */
export const MISSPELLINGS: readonly Replacement[] = [
  { find: 'Miami-Dale', replace: 'Miami-Dade' },
  { find: 'Miami Dade', replace: 'Miami-Dade' },
  { find: 'Caidwell', replace: 'Caldwell' },
  { find: 'Berkely', replace: 'Berkeley' },
  { find: 'Bradroed', replace: 'Bradford' },
  { find: 'Olaloosa', replace: 'Okaloosa' },
  { find: 'Momoe', replace: 'Monroe' },
  { find: 'Wailer', replace: 'Waller' },
];

/**
 * "St Johns" → "St. Johns" (only before a capitalised word)
 */
export const ABBREVIATION_RULES: readonly Replacement[] = [
  { find: /\bSt\s(?=[A-Z])/g, replace: 'St. ' },
];

/**
 * Spelling variants collapsed to the registry's title-cased form
 */
export const SPELLING_CONVENTIONS: readonly Replacement[] = [
  { find: 'De Soto', replace: 'Desoto', exceptStates: ['LA'] }, // LA registry keeps "De Soto"
  { find: 'DeSoto', replace: 'Desoto' },
  { find: 'DeWitt', replace: 'Dewitt' },
  { find: 'De Kalb', replace: 'Dekalb' },
  { find: 'DeKalb', replace: 'Dekalb' },
  // McIntosh, McDuffie, McDowell, McMullen, ...
  { find: /\bMc([A-Z])/g, replace: (_match, initial = '') => `Mc${initial.toLowerCase()}` },
  { find: 'Isle of Wight', replace: 'Isle Of Wight' },
  { find: 'Mainland of Bryan', replace: 'Bryan' },
  { find: 'Prince Georges', replace: "Prince George's" },
  { find: 'Queen Annes', replace: "Queen Anne's" },
];

/**
 * Local naming conventions
 *
 * - LA: "St. Mary" parish (sources write "St Mary's", "St. Mary Parish")
 * - MD: "St. Mary's" county
 * - VA: independent cities the registry lists as "<Name> City"; anchored so
 *   Northampton and Southampton counties are left alone
 */
export const STATE_SPECIAL_CASES: readonly SpecialCaseRule[] = [
  { state: 'LA', pattern: /^St\.?\s*Mary/i, canonical: 'St. Mary' },
  { state: 'MD', pattern: /^St\.?\s*Mary'?s?/i, canonical: "St. Mary's" },
  { state: 'VA', pattern: /^(?:City of\s+)?Suffolk(?:\s+City)?$/i, canonical: 'Suffolk City' },
  { state: 'VA', pattern: /^(?:City of\s+)?Norfolk(?:\s+City)?$/i, canonical: 'Norfolk City' },
  { state: 'VA', pattern: /^(?:City of\s+)?Hampton(?:\s+City)?$/i, canonical: 'Hampton City' },
  {
    state: 'VA',
    pattern: /^(?:City of\s+)?Newport News(?:\s+City)?$/i,
    canonical: 'Newport News City',
  },
  {
    state: 'VA',
    pattern: /^(?:City of\s+)?Virginia Beach(?:\s+City)?$/i,
    canonical: 'Virginia Beach City',
  },
];

// =============================================================================
// Helpers
// =============================================================================

/**
 * Apply one replacement row to a string
 */
export function applyReplacement(value: string, row: Replacement): string {
  const { find, replace } = row;

  if (typeof find === 'string') {
    return typeof replace === 'string'
      ? value.replaceAll(find, replace)
      : value.replaceAll(find, (match) => replace(match));
  }

  return typeof replace === 'string'
    ? value.replace(find, replace)
    : value.replace(find, (match: string, ...rest: unknown[]) => {
        // capture groups come before the numeric match offset
        const offsetIndex = rest.findIndex((part) => typeof part === 'number');
        const groups = rest
          .slice(0, offsetIndex)
          .map((part) => (typeof part === 'string' ? part : ''));
        return replace(match, ...groups);
      });
}

/**
 * Apply a table of replacements in order, skipping rows excluded for `state`
 */
export function applyReplacements(
  value: string,
  table: readonly Replacement[],
  state?: string
): string {
  let result = value;
  for (const row of table) {
    if (state !== undefined && row.exceptStates?.includes(state)) continue;
    result = applyReplacement(result, row);
  }
  return result;
}
