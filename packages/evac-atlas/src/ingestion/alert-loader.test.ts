/**
 * Tests for the evacuation-order file loader
 */

import { describe, it, expect } from 'vitest';

import { AlertFileError } from '../core/errors.js';
import { loadAlertRecords, parseAlertRecords } from './alert-loader.js';
import { fixturePath } from '../__tests__/helpers.js';

const HEADER = 'Event Name|State|County|County FIPS|Year|Order Type';

describe('parseAlertRecords', () => {
  it('should read interpreted columns and keep the rest as attributes', () => {
    const { records, issues } = parseAlertRecords(
      [HEADER, 'Hurricane Matthew|GA|Bryan, Camden|NA|2016|Mandatory'].join('\n')
    );

    expect(issues).toEqual([]);
    expect(records).toEqual([
      {
        eventName: 'Hurricane Matthew',
        state: 'GA',
        countyText: 'Bryan, Camden',
        countyFips: null,
        year: 2016,
        attributes: { 'Order Type': 'Mandatory' },
      },
    ]);
  });

  it('should turn empty cells and NA into null', () => {
    const { records } = parseAlertRecords(
      [HEADER, 'Hurricane Florence|DE||10001|2018|', 'Hurricane Florence|NC|NA| 37055 |2018|NA'].join('\n')
    );

    expect(records.map((record) => [record.countyText, record.countyFips, record.attributes['Order Type']])).toEqual([
      [null, '10001', null],
      [null, '37055', null],
    ]);
  });

  it('should handle quoted fields and quotes inside county text', () => {
    const { records } = parseAlertRecords(
      [
        HEADER,
        'Hurricane Irma|FL|"Lee|Collier"|NA|2017|Mandatory',
        'Hurricane Florence|NC|Yadkin ("the Emergency Area")|NA|2018|Mandatory',
      ].join('\n')
    );

    expect(records.map((record) => record.countyText)).toEqual([
      'Lee|Collier',
      'Yadkin ("the Emergency Area")',
    ]);
  });

  it('should collect invalid rows as issues with their line numbers', () => {
    const { records, issues } = parseAlertRecords(
      [
        HEADER,
        'Hurricane Irma|FLA|Monroe|NA|2017|Voluntary',
        'Hurricane Irma|FL|Monroe|NA|twenty|Voluntary',
        'Hurricane Irma|FL|Monroe|12087|2017|Voluntary',
      ].join('\n')
    );

    expect(records).toHaveLength(1);
    expect(issues).toEqual([
      { line: 2, message: 'state must be a two-letter abbreviation' },
      { line: 3, message: 'year must be a number' },
    ]);
  });

  it('should honour a custom delimiter and column map', () => {
    const { records } = parseAlertRecords(
      ['storm,st,counties,fips,yr', 'Hurricane Harvey,TX,Comal,NA,2017'].join('\n'),
      {
        delimiter: ',',
        columns: { eventName: 'storm', state: 'st', county: 'counties', countyFips: 'fips', year: 'yr' },
      }
    );

    expect(records[0]).toMatchObject({ eventName: 'Hurricane Harvey', state: 'TX', countyText: 'Comal', year: 2017 });
  });

  it('should throw AlertFileError when required columns are missing', () => {
    expect(() =>
      parseAlertRecords(['Event Name|State|County|Year', 'Hurricane Irma|FL|Monroe|2017'].join('\n'), {}, 'orders.psv')
    ).toThrow('Alert file is missing columns: County FIPS');
  });
});

describe('loadAlertRecords', () => {
  it('should load the fixture file', async () => {
    const { records, issues } = await loadAlertRecords(fixturePath('alerts.psv'));

    expect(issues).toEqual([]);
    expect(records).toHaveLength(7);
    expect(records[1]).toMatchObject({ state: 'DE', countyText: 'Entire State', year: 2018 });
  });

  it('should wrap read failures in AlertFileError', async () => {
    await expect(loadAlertRecords(fixturePath('missing.psv'))).rejects.toBeInstanceOf(AlertFileError);
  });
});
