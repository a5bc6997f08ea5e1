/**
 * Tests for the storm exposure join
 */

import { describe, it, expect } from 'vitest';

import { AlertFileError } from '../core/errors.js';
import {
  joinOnStormCountyYear,
  joinTreatmentEffects,
  loadExposureRows,
  parseExposureRows,
} from './exposure-join.js';
import { fixturePath, resolvedRecord } from '../__tests__/helpers.js';

describe('parseExposureRows', () => {
  it('should key rows by padded FIPS, storm and year', () => {
    const { rows, skipped } = parseExposureRows(
      ['fips,storm_id,vmax_sust', '1001,Matthew-2016,10.5', '13029,Matthew-2016,NA'].join('\n')
    );

    expect(skipped).toBe(0);
    expect(rows).toEqual([
      { fips: '01001', storm: 'Matthew', year: 2016, stormId: 'Matthew-2016', attributes: { vmax_sust: '10.5' } },
      { fips: '13029', storm: 'Matthew', year: 2016, stormId: 'Matthew-2016', attributes: { vmax_sust: null } },
    ]);
  });

  it('should skip rows without a usable storm id or FIPS', () => {
    const { rows, skipped } = parseExposureRows(
      ['fips,storm_id', 'bad,Matthew-2016', '13029,Matthew', '13029,Irma-2017'].join('\n')
    );

    expect(rows.map((row) => row.stormId)).toEqual(['Irma-2017']);
    expect(skipped).toBe(2);
  });

  it('should require a storm_id column', () => {
    expect(() => parseExposureRows(['fips,storm', '13029,Matthew-2016'].join('\n'))).toThrow(AlertFileError);
  });
});

describe('joinOnStormCountyYear', () => {
  it('should inner-join on storm, FIPS and year', async () => {
    const { rows } = await loadExposureRows(fixturePath('exposure.csv'));
    const resolved = [
      resolvedRecord({ countyName: 'Bryan', countyFips: '13029' }),
      resolvedRecord({ countyName: 'Chatham', countyFips: '13051' }),
      resolvedRecord({ countyName: 'Glynn', countyFips: '13127' }),
    ];

    const result = joinOnStormCountyYear(resolved, rows);

    expect(result.merged.map((record) => [record.countyName, record.exposure['vmax_sust']])).toEqual([
      ['Bryan', '31.4'],
      ['Chatham', '33.0'],
    ]);
    expect(result.unmatched).toBe(1);
    // only the four Matthew-2016 rows share a year with the evacuations
    expect(result.exposureRowsConsidered).toBe(4);
  });

  it('should not match the same county in another storm year', () => {
    const { rows } = parseExposureRows(['fips,storm_id,wind', '13029,Matthew-2017,1'].join('\n'));
    const result = joinOnStormCountyYear([resolvedRecord()], rows);

    expect(result.merged).toEqual([]);
    expect(result.unmatched).toBe(1);
    expect(result.exposureRowsConsidered).toBe(0);
  });
});

describe('joinTreatmentEffects', () => {
  it('should join merged records with effects in the exposure layout', async () => {
    const exposure = await loadExposureRows(fixturePath('exposure.csv'));
    const effects = await loadExposureRows(fixturePath('effects.csv'));
    const merged = joinOnStormCountyYear(
      [
        resolvedRecord({ countyName: 'Bryan', countyFips: '13029' }),
        resolvedRecord({ countyName: 'Chatham', countyFips: '13051' }),
      ],
      exposure.rows
    ).merged;

    const result = joinTreatmentEffects(merged, effects.rows);

    expect(result.merged).toEqual([
      expect.objectContaining({
        countyName: 'Bryan',
        exposure: { vmax_sust: '31.4' },
        effects: { trt_effect: '-0.12' },
      }),
    ]);
    expect(result.unmatched).toBe(1);
    // the Irma-2017 row falls outside the evacuation years
    expect(result.exposureRowsConsidered).toBe(2);
  });
});
