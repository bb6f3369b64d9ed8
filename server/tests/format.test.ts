import { describe, it, expect } from 'vitest';
import { formatMinor, formatTimestamp, isDateOnly, normalizeName, resolveTimestamp } from '../src/format.js';

const NOW = new Date(2024, 0, 5, 9, 3, 7);

describe('normalizeName', () => {
  it('trims and capitalises', () => {
    expect(normalizeName('  aLICE ')).toBe('Alice');
    expect(normalizeName('main')).toBe('Main');
    expect(normalizeName('rainy day')).toBe('Rainy day');
  });

  it('keeps blank input blank', () => {
    expect(normalizeName('   ')).toBe('');
  });
});

describe('formatTimestamp', () => {
  it('pads every field', () => {
    expect(formatTimestamp(NOW)).toBe('2024-01-05 09:03:07');
  });
});

describe('isDateOnly', () => {
  it('accepts real calendar days', () => {
    expect(isDateOnly('2024-02-29')).toBe(true);
  });

  it('rejects impossible days and other shapes', () => {
    expect(isDateOnly('2023-02-29')).toBe(false);
    expect(isDateOnly('2024-13-01')).toBe(false);
    expect(isDateOnly('05/01/2024')).toBe(false);
    expect(isDateOnly('2024-01-05 10:00:00')).toBe(false);
  });
});

describe('resolveTimestamp', () => {
  it('uses now when nothing is given', () => {
    expect(resolveTimestamp(undefined, NOW)).toBe('2024-01-05 09:03:07');
    expect(resolveTimestamp(null, NOW)).toBe('2024-01-05 09:03:07');
    expect(resolveTimestamp('  ', NOW)).toBe('2024-01-05 09:03:07');
  });

  it('appends the current clock time to a bare date', () => {
    expect(resolveTimestamp('2023-12-31', NOW)).toBe('2023-12-31 09:03:07');
  });

  it('keeps a full timestamp as given', () => {
    expect(resolveTimestamp('2023-06-01 18:30:00', NOW)).toBe('2023-06-01 18:30:00');
  });

  it('returns null for anything else', () => {
    expect(resolveTimestamp('2023-02-30', NOW)).toBeNull();
    expect(resolveTimestamp('2023-06-01 24:00:00', NOW)).toBeNull();
    expect(resolveTimestamp('yesterday', NOW)).toBeNull();
  });
});

describe('formatMinor', () => {
  it('renders two decimals', () => {
    expect(formatMinor(1250)).toBe('12.50');
    expect(formatMinor(5)).toBe('0.05');
    expect(formatMinor(0)).toBe('0.00');
  });
});
