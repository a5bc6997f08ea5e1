/**
 * Storm naming shared by the evacuation and exposure datasets
 *
 * Evacuation orders say "Hurricane Irma"; exposure data keys storms as
 * "Irma-2017". Both reduce to (storm, year).
 */

const HURRICANE_PREFIX = /^Hurricane\s+/;

/**
 * Storm name used as a join key
 *
 * @example stormName('Hurricane Irma') // 'Irma'
 */
export function stormName(eventName: string): string {
  return eventName.trim().replace(HURRICANE_PREFIX, '');
}

export interface StormId {
  readonly storm: string;
  readonly year: number;
}

/**
 * Split an exposure storm id ("Arthur-2014") into storm and year
 *
 * Returns null for ids without a trailing 4-digit year.
 */
export function parseStormId(stormId: string): StormId | null {
  const match = /^(.+)-(\d{4})$/.exec(stormId.trim());
  if (!match) return null;

  const [, storm, year] = match;
  if (storm === undefined || year === undefined) return null;

  return { storm, year: Number.parseInt(year, 10) };
}
