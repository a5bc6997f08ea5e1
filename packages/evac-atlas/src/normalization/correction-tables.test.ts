/**
 * Tests for correction table helpers
 */

import { describe, it, expect } from 'vitest';

import { SPELLING_CONVENTIONS, applyReplacement, applyReplacements } from './correction-tables.js';

describe('applyReplacement', () => {
  it('should replace every literal occurrence', () => {
    expect(applyReplacement('Momoe and Momoe', { find: 'Momoe', replace: 'Monroe' })).toBe(
      'Monroe and Monroe'
    );
  });

  it('should pass capture groups to a replacer', () => {
    const row = {
      find: /\b(\w+) (\w+)$/g,
      replace: (_match: string, first = '', second = '') => `${second} ${first}`,
    };
    expect(applyReplacement('Newport News', row)).toBe('News Newport');
  });

  it('should lower-case the letter after Mc', () => {
    expect(applyReplacements('McIntosh', SPELLING_CONVENTIONS)).toBe('Mcintosh');
    expect(applyReplacements('McDuffie', SPELLING_CONVENTIONS)).toBe('Mcduffie');
    expect(applyReplacements('Mcintosh', SPELLING_CONVENTIONS)).toBe('Mcintosh');
  });
});

describe('applyReplacements', () => {
  it('should skip rows excluded for the state', () => {
    expect(applyReplacements('De Soto', SPELLING_CONVENTIONS, 'FL')).toBe('Desoto');
    expect(applyReplacements('De Soto', SPELLING_CONVENTIONS, 'LA')).toBe('De Soto');
  });

  it('should let later rows see earlier output', () => {
    const table = [
      { find: 'Dale', replace: 'Dade' },
      { find: 'Miami Dade', replace: 'Miami-Dade' },
    ];
    expect(applyReplacements('Miami Dale', table)).toBe('Miami-Dade');
  });
});
