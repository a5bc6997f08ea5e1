/**
 * County Resolver
 *
 * Attaches a FIPS code to one candidate row, or explains why it cannot.
 *
 * ATTEMPTS (in order):
 * 1. Trusted source FIPS: a 5-digit code already on the row is kept; the
 *    name is still cleaned but the registry is not consulted
 * 2. Strip County/Counties/Parish suffixes
 * 3. Misspelling table, "St " abbreviation rule, spelling conventions
 * 4. State special cases (VA independent cities, LA/MD St. Mary)
 * 5. Registry lookup
 * 6. Otherwise unresolved, carrying the fully cleaned name
 *
 * Steps 2–4 are idempotent: cleaning a cleaned name returns it unchanged, and
 * every registry name cleans to itself.
 */

import type {
  CandidateCountyRow,
  ResolutionOutcome,
  UnresolvedReason,
} from '../core/types.js';
import { stormName } from '../core/storm-names.js';
import { silentLogger, type Logger } from '../core/utils/logger.js';
import type { ReferenceRegistry } from '../registry/reference-registry.js';
import { isStateLevelName } from '../expansion/state-expander.js';
import {
  ABBREVIATION_RULES,
  COUNTY_SUFFIXES,
  MISSPELLINGS,
  SPELLING_CONVENTIONS,
  STATE_SPECIAL_CASES,
  applyReplacements,
} from '../normalization/correction-tables.js';

// =============================================================================
// Name Cleaning
// =============================================================================

const SUFFIX_PATTERN = new RegExp(`\\s+(?:${COUNTY_SUFFIXES.join('|')})$`);

const FIPS_PATTERN = /^\d{5}$/;

/**
 * Remove trailing County/Parish words until none remain
 *
 * @example stripCountySuffix('Washington County') // 'Washington'
 */
export function stripCountySuffix(name: string): string {
  let current = name.trim();
  for (;;) {
    const next = current.replace(SUFFIX_PATTERN, '');
    if (next === current) return current;
    current = next;
  }
}

/**
 * Apply the first matching state special case, if any
 */
export function applyStateSpecialCases(state: string, name: string): string {
  for (const rule of STATE_SPECIAL_CASES) {
    if (rule.state === state && rule.pattern.test(name)) {
      return rule.canonical;
    }
  }
  return name;
}

/**
 * Full cleaning pass (steps 2–4) producing the registry spelling
 *
 * @example cleanCountyName('VA', 'Suffolk')             // 'Suffolk City'
 * @example cleanCountyName('GA', 'McIntosh Counties')   // 'Mcintosh'
 */
export function cleanCountyName(state: string, name: string): string {
  let cleaned = stripCountySuffix(name);
  cleaned = applyReplacements(cleaned, MISSPELLINGS, state);
  cleaned = applyReplacements(cleaned, ABBREVIATION_RULES, state);
  cleaned = applyReplacements(cleaned, SPELLING_CONVENTIONS, state);
  return applyStateSpecialCases(state, cleaned);
}

/**
 * A source FIPS value the resolver will trust
 */
export function isValidFips(value: string | null): value is string {
  return value !== null && FIPS_PATTERN.test(value);
}

// =============================================================================
// Resolver
// =============================================================================

export interface CountyResolver {
  /** Resolve one row; always yields exactly one outcome */
  resolve(row: CandidateCountyRow): ResolutionOutcome;
  /** Resolve a bare (state, name) pair to a FIPS code */
  lookup(state: string, countyName: string): string | null;
}

export interface ResolverOptions {
  readonly logger?: Logger;
}

/**
 * Create a resolver bound to a registry
 */
export function createResolver(
  registry: ReferenceRegistry,
  options: ResolverOptions = {}
): CountyResolver {
  const logger = options.logger ?? silentLogger;

  const unresolved = (
    row: CandidateCountyRow,
    countyName: string | null,
    reason: UnresolvedReason
  ): ResolutionOutcome => ({
    status: 'unresolved',
    record: {
      ...row,
      countyName,
      originalCountyName: row.countyName,
      storm: stormName(row.eventName),
      reason,
    },
  });

  const lookup = (state: string, countyName: string): string | null =>
    registry.lookup(state, cleanCountyName(state, countyName));

  const resolve = (row: CandidateCountyRow): ResolutionOutcome => {
    if (row.countyName === null || isStateLevelName(row.countyName)) {
      return unresolved(row, row.countyName, 'unknown-state');
    }

    const cleaned = cleanCountyName(row.state, row.countyName);
    const sourceFips = row.countyFips?.trim() ?? null;

    if (isValidFips(sourceFips)) {
      return {
        status: 'resolved',
        record: {
          ...row,
          countyName: cleaned,
          countyFips: sourceFips,
          fipsSource: 'source',
          storm: stormName(row.eventName),
        },
      };
    }

    if (sourceFips) {
      logger.debug('Ignoring malformed source FIPS', {
        state: row.state,
        countyName: row.countyName,
        countyFips: sourceFips,
      });
    }

    const fips = registry.lookup(row.state, cleaned);
    if (fips === null) {
      return unresolved(
        row,
        cleaned,
        registry.hasState(row.state) ? 'unresolved-geography' : 'unknown-state'
      );
    }

    return {
      status: 'resolved',
      record: {
        ...row,
        countyName: cleaned,
        countyFips: fips,
        fipsSource: 'registry',
        storm: stormName(row.eventName),
      },
    };
  };

  return { resolve, lookup };
}
