import { describe, it, expect } from 'vitest';
import { InvalidInputError, formatHoleCards, parseRange } from '../src/index.js';

describe('parseRange', () => {
  it.each([
    ['AA', 6],
    ['TT+', 30],
    ['22+', 78],
    ['AKs', 4],
    ['AKo', 12],
    ['AK', 16],
    ['ATs+', 16],
    ['A2s+', 48],
    ['QQ+, AKs', 22],
    ['ka', 16],
    ['kAs', 4]
  ])('expands %s to %i combos', (notation, count) => {
    expect(parseRange(notation)).toHaveLength(count);
  });

  it('keeps suitedness', () => {
    expect(parseRange('AKs').every(([a, b]) => a.suit === b.suit)).toBe(true);
    expect(parseRange('AKo').some(([a, b]) => a.suit === b.suit)).toBe(false);
  });

  it('reads an exact hand', () => {
    expect(parseRange('AhKh').map(formatHoleCards)).toEqual(['AhKh']);
  });

  it('drops duplicates in either card order', () => {
    expect(parseRange('AA, AA')).toHaveLength(6);
    expect(parseRange('AdAh, AA')).toHaveLength(6);
    expect(parseRange('KhAh AhKh')).toHaveLength(1);
  });

  it('rejects bad tokens', () => {
    expect(() => parseRange('')).toThrow('Range is empty');
    expect(() => parseRange('AAs')).toThrow('Pairs take no suitedness: AAs');
    expect(() => parseRange('XYZ')).toThrow('Invalid range token: XYZ');
    expect(() => parseRange('AhAh')).toThrow(InvalidInputError);
  });
});
