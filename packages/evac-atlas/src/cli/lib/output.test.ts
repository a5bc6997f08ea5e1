/**
 * Tests for CLI output formatting
 */

import { describe, it, expect } from 'vitest';

import {
  RESOLVED_COLUMNS,
  appendColumns,
  datasetColumns,
  formatCsv,
  formatNdjson,
  formatTable,
  toDatasetRow,
} from './output.js';
import { resolvedRecord } from '../../__tests__/helpers.js';

describe('formatTable', () => {
  it('should pad columns and right-align where asked', () => {
    const table = formatTable(
      [{ state: 'GA', count: 3 }],
      [
        { key: 'state', header: 'ST' },
        { key: 'count', header: 'Rows', align: 'right' },
      ]
    );

    expect(table).toBe(['ST | Rows', '---+-----', 'GA |    3'].join('\n'));
  });

  it('should truncate cells wider than a fixed width', () => {
    const table = formatTable([{ name: 'Newport News City' }], [{ key: 'name', header: 'County', width: 8 }]);

    expect(table.split('\n')[2]).toBe('Newport~');
  });

  it('should say so when there is nothing to show', () => {
    expect(formatTable([], [{ key: 'state', header: 'ST' }])).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('should quote cells with commas and quotes and leave nulls empty', () => {
    const csv = formatCsv(
      [{ county: 'Bryan, Camden', note: 'said "now"', fips: null }],
      [
        { key: 'county', header: 'County' },
        { key: 'note', header: 'Note' },
        { key: 'fips', header: 'FIPS' },
      ]
    );

    expect(csv).toBe(['County,Note,FIPS', '"Bryan, Camden","said ""now""",'].join('\n'));
  });
});

describe('formatNdjson', () => {
  it('should write one JSON object per line', () => {
    expect(formatNdjson([{ a: 1 }, { a: 2 }])).toBe('{"a":1}\n{"a":2}');
  });
});

describe('dataset rows', () => {
  it('should flatten a resolved record with its attributes last', () => {
    expect(toDatasetRow(resolvedRecord())).toEqual({
      Storm: 'Matthew',
      'Event Name': 'Hurricane Matthew',
      State: 'GA',
      County: 'Bryan',
      'County FIPS': '13029',
      Year: 2016,
      'FIPS Source': 'registry',
      'Order Type': 'Mandatory',
    });
  });

  it('should add attribute columns in first-seen order', () => {
    const columns = datasetColumns([
      resolvedRecord({ attributes: { 'Order Type': 'Mandatory' } }),
      resolvedRecord({ attributes: { Notes: null, 'Order Type': null } }),
    ]);

    expect(columns.map((col) => col.key)).toEqual([...RESOLVED_COLUMNS.map((col) => col.key), 'Order Type', 'Notes']);
  });

  it('should not let source columns overwrite interpreted ones', () => {
    const row = toDatasetRow(
      resolvedRecord({
        attributes: { Storm: 'Unnamed', 'FIPS Source': 'manual', Reason: 'n/a', 'Order Type': 'Mandatory' },
      })
    );

    expect(row).toEqual({
      Storm: 'Matthew',
      'Event Name': 'Hurricane Matthew',
      State: 'GA',
      County: 'Bryan',
      'County FIPS': '13029',
      Year: 2016,
      'FIPS Source': 'registry',
      'Order Type': 'Mandatory',
    });
    expect(
      datasetColumns([resolvedRecord({ attributes: { Reason: 'n/a', County: 'x' } })]).map((col) => col.key)
    ).toEqual(RESOLVED_COLUMNS.map((col) => col.key));
  });

  it('should append only columns a row does not have yet', () => {
    expect(appendColumns({ Storm: 'Matthew', wind: '1' }, { wind: '2', surge: '3', Year: 1999 })).toEqual({
      Storm: 'Matthew',
      wind: '1',
      surge: '3',
    });
  });
});
