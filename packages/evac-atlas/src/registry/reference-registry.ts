/**
 * Reference Registry
 *
 * Immutable index over the authoritative state → county → FIPS table.
 * Built once and passed explicitly into the pipeline; there is no
 * process-wide instance.
 *
 * DUPLICATE POLICY: first-wins. A later entry repeating an existing
 * (state, countyName) key or an existing FIPS code is dropped and kept in
 * `duplicates` for inspection.
 */

import type { ReferenceEntry } from '../core/types.js';
import { silentLogger, type Logger } from '../core/utils/logger.js';
import { DEFAULT_REFERENCE_PATH, loadReferenceEntries } from './reference-loader.js';

export interface ReferenceRegistryOptions {
  readonly logger?: Logger;
}

export class ReferenceRegistry {
  private readonly byState: ReadonlyMap<string, ReadonlyMap<string, string>>;
  private readonly countiesByState: ReadonlyMap<string, readonly string[]>;

  /** Entries kept in the index, in source order */
  readonly entries: readonly ReferenceEntry[];

  /** Entries dropped by the first-wins duplicate policy */
  readonly duplicates: readonly ReferenceEntry[];

  private constructor(entries: readonly ReferenceEntry[], logger: Logger) {
    const byState = new Map<string, Map<string, string>>();
    const seenFips = new Set<string>();
    const kept: ReferenceEntry[] = [];
    const duplicates: ReferenceEntry[] = [];

    for (const entry of entries) {
      let counties = byState.get(entry.state);
      if (!counties) {
        counties = new Map<string, string>();
        byState.set(entry.state, counties);
      }

      if (counties.has(entry.countyName) || seenFips.has(entry.fips)) {
        duplicates.push(entry);
        logger.warn('Duplicate reference entry dropped', {
          state: entry.state,
          countyName: entry.countyName,
          fips: entry.fips,
          keptFips: counties.get(entry.countyName) ?? null,
        });
        continue;
      }

      counties.set(entry.countyName, entry.fips);
      seenFips.add(entry.fips);
      kept.push(Object.freeze({ ...entry }));
    }

    const countiesByState = new Map<string, readonly string[]>();
    for (const [state, counties] of byState) {
      countiesByState.set(state, Object.freeze([...counties.keys()]));
    }

    this.byState = byState;
    this.countiesByState = countiesByState;
    this.entries = Object.freeze(kept);
    this.duplicates = Object.freeze(duplicates);
  }

  /**
   * Build a registry from entries already in canonical form
   */
  static fromEntries(
    entries: readonly ReferenceEntry[],
    options: ReferenceRegistryOptions = {}
  ): ReferenceRegistry {
    return new ReferenceRegistry(entries, options.logger ?? silentLogger);
  }

  /**
   * Load the census county table and index it
   *
   * @throws ReferenceLoadError when the table cannot be read or validated
   */
  static async load(
    path: string = DEFAULT_REFERENCE_PATH,
    options: ReferenceRegistryOptions = {}
  ): Promise<ReferenceRegistry> {
    const entries = await loadReferenceEntries(path);
    const registry = ReferenceRegistry.fromEntries(entries, options);

    options.logger?.info('Reference registry loaded', {
      source: path,
      states: registry.stateCount,
      counties: registry.size,
      duplicates: registry.duplicates.length,
    });

    return registry;
  }

  /**
   * FIPS code for a (state, canonical county name) pair, or null
   */
  lookup(state: string, countyName: string): string | null {
    return this.byState.get(state)?.get(countyName) ?? null;
  }

  /**
   * Canonical names of every county in a state, in reference order
   *
   * Empty for a state the registry does not know.
   */
  allCountiesOf(state: string): readonly string[] {
    return this.countiesByState.get(state) ?? [];
  }

  hasState(state: string): boolean {
    return this.countiesByState.has(state);
  }

  get states(): readonly string[] {
    return [...this.countiesByState.keys()];
  }

  get stateCount(): number {
    return this.countiesByState.size;
  }

  get size(): number {
    return this.entries.length;
  }
}
