import { describe, it, expect } from 'vitest';
import { canonicalStation, matchesName, nameKey, normalizeKey } from './keys';

describe('normalizeKey', () => {
  it('trims and lower-cases', () => {
    expect(normalizeKey('  1 Main St ')).toBe('1 main st');
  });

  it('returns undefined for blank or missing values', () => {
    expect(normalizeKey('')).toBeUndefined();
    expect(normalizeKey('   ')).toBeUndefined();
    expect(normalizeKey(null)).toBeUndefined();
    expect(normalizeKey(undefined)).toBeUndefined();
  });
});

describe('nameKey', () => {
  it('needs both names', () => {
    expect(nameKey('Milo', ' ')).toBeUndefined();
    expect(nameKey(' Milo ', 'GRANT')).toEqual({ firstName: 'milo', lastName: 'grant' });
  });

  it('matches entities whatever their casing', () => {
    const key = nameKey('milo', 'grant');
    expect(key).toBeDefined();
    if (key) {
      expect(matchesName({ firstName: 'Milo ', lastName: 'Grant' }, key)).toBe(true);
      expect(matchesName({ firstName: 'Mila', lastName: 'Grant' }, key)).toBe(false);
    }
  });
});

describe('canonicalStation', () => {
  it('drops leading zeros of digit strings', () => {
    expect(canonicalStation(' 01 ')).toBe('1');
    expect(canonicalStation('000')).toBe('0');
    expect(canonicalStation(12)).toBe('12');
  });

  it('only trims other values', () => {
    expect(canonicalStation(' 0A ')).toBe('0A');
  });
});
