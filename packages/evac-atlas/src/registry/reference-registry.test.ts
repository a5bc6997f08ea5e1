/**
 * Tests for the county Reference Registry
 */

import { describe, it, expect } from 'vitest';

import { ReferenceRegistry } from './reference-registry.js';
import { recordingLogger, testRegistry } from '../__tests__/helpers.js';

describe('ReferenceRegistry', () => {
  describe('lookup', () => {
    const registry = testRegistry();

    it('should return the FIPS code for a canonical name', () => {
      expect(registry.lookup('GA', 'Bryan')).toBe('13029');
      expect(registry.lookup('VA', 'Suffolk City')).toBe('51800');
    });

    it('should return null for names outside the registry', () => {
      expect(registry.lookup('GA', 'Atlantis')).toBeNull();
      expect(registry.lookup('GA', 'bryan')).toBeNull(); // keys are exact
      expect(registry.lookup('PR', 'San Juan')).toBeNull();
    });

    it('should not confuse same-named counties across states', () => {
      const shared = ReferenceRegistry.fromEntries([
        { state: 'DE', countyName: 'Kent', fips: '10001' },
        { state: 'MD', countyName: 'Kent', fips: '24029' },
      ]);
      expect(shared.lookup('DE', 'Kent')).toBe('10001');
      expect(shared.lookup('MD', 'Kent')).toBe('24029');
    });
  });

  describe('allCountiesOf', () => {
    const registry = testRegistry();

    it('should list counties in reference order', () => {
      expect(registry.allCountiesOf('DE')).toEqual(['Kent', 'New Castle', 'Sussex']);
    });

    it('should return an empty list for an unknown state', () => {
      expect(registry.allCountiesOf('PR')).toEqual([]);
      expect(registry.hasState('PR')).toBe(false);
      expect(registry.hasState('DE')).toBe(true);
    });
  });

  describe('duplicate policy', () => {
    it('should keep the first entry for a repeated key or FIPS code', () => {
      const logger = recordingLogger();
      const registry = ReferenceRegistry.fromEntries(
        [
          { state: 'GA', countyName: 'Bryan', fips: '13029' },
          { state: 'GA', countyName: 'Bryan', fips: '13999' },
          { state: 'GA', countyName: 'Camden', fips: '13029' },
          { state: 'GA', countyName: 'Chatham', fips: '13051' },
        ],
        { logger }
      );

      expect(registry.lookup('GA', 'Bryan')).toBe('13029');
      expect(registry.lookup('GA', 'Camden')).toBeNull();
      expect(registry.size).toBe(2);
      expect(registry.duplicates.map((entry) => entry.fips)).toEqual(['13999', '13029']);
      expect(logger.messages('warn')).toEqual([
        'Duplicate reference entry dropped',
        'Duplicate reference entry dropped',
      ]);
    });
  });

  describe('immutability', () => {
    it('should freeze entries and county lists', () => {
      const registry = testRegistry();
      expect(Object.isFrozen(registry.entries)).toBe(true);
      expect(Object.isFrozen(registry.entries[0])).toBe(true);
      expect(Object.isFrozen(registry.allCountiesOf('GA'))).toBe(true);
    });

    it('should copy entries rather than keep caller objects', () => {
      const entry = { state: 'GA', countyName: 'Bryan', fips: '13029' };
      const registry = ReferenceRegistry.fromEntries([entry]);
      entry.fips = '00000';
      expect(registry.entries[0]?.fips).toBe('13029');
      expect(registry.lookup('GA', 'Bryan')).toBe('13029');
    });
  });

  describe('bundled census table', () => {
    it('should load every state and DC', async () => {
      const logger = recordingLogger();
      const registry = await ReferenceRegistry.load(undefined, { logger });

      expect(registry.stateCount).toBe(51);
      expect(registry.size).toBe(3143);
      expect(registry.duplicates).toHaveLength(0);
      expect(logger.messages('info')).toEqual(['Reference registry loaded']);
    });

    it('should carry the county names the resolver produces', async () => {
      const registry = await ReferenceRegistry.load();

      expect(registry.allCountiesOf('FL')).toHaveLength(67);
      expect(registry.lookup('GA', 'Bryan')).toBe('13029');
      expect(registry.lookup('GA', 'Mcintosh')).toBe('13191');
      expect(registry.lookup('TX', 'Comal')).toBe('48091');
      expect(registry.lookup('VA', 'Suffolk City')).toBe('51800');
      expect(registry.lookup('VA', 'King And Queen')).toBe('51097');
      expect(registry.lookup('FL', 'Miami-Dade')).toBe('12086');
      expect(registry.lookup('MD', "St. Mary's")).toBe('24037');
      expect(registry.lookup('LA', 'St. Mary')).toBe('22101');
      expect(registry.lookup('DC', 'District Of Columbia')).toBe('11001');
      expect(registry.lookup('WV', 'Kanawha')).toBe('54039');
      expect(registry.lookup('WV', 'Gilmer')).toBe('54021');
      expect(registry.lookup('IA', "O'brien")).toBe('19141');
      expect(registry.lookup('CO', 'Broomfield')).toBe('08014');
      expect(registry.lookup('SD', 'Oglala Lakota')).toBe('46102');
    });

    it('should list every county of each state', async () => {
      const registry = await ReferenceRegistry.load();
      const counts = Object.fromEntries(
        ['AK', 'CO', 'FL', 'GA', 'IA', 'LA', 'MT', 'NC', 'SD', 'TX', 'VA', 'WV'].map((state) => [
          state,
          registry.allCountiesOf(state).length,
        ])
      );

      expect(counts).toEqual({
        AK: 30,
        CO: 64,
        FL: 67,
        GA: 159,
        IA: 99,
        LA: 64,
        MT: 56,
        NC: 100,
        SD: 66,
        TX: 254,
        VA: 133,
        WV: 55,
      });
    });

    it('should hold no clipped county names', async () => {
      const registry = await ReferenceRegistry.load();
      const clipped = registry.entries.filter(
        (entry) => entry.countyName.replace(/[^A-Za-z]/g, '').length < 2
      );

      expect(clipped).toEqual([]);
    });
  });
});
