// tests/unit/format-rules.spec.ts
//
// Threshold format rules used by table transformers and aggregates.

import { describe, it, expect } from 'vitest';
import { formatNumber, formatWithRules, parseFormatRules } from '../../src';
import { formatWithSpec, parseFormatSpecifier } from '../../src/table/formatRules';

describe('Format rules – specifiers', () => {
  it('accepts plain and braced spellings', () => {
    expect(parseFormatSpecifier('.1f')).toBe('.1f');
    expect(parseFormatSpecifier('{:.2f}')).toBe('.2f');
    expect(parseFormatSpecifier(' {:d} ')).toBe('d');
  });

  it('returns null for unsupported specifiers', () => {
    expect(parseFormatSpecifier('abc')).toBeNull();
    expect(parseFormatSpecifier('{:>5}')).toBeNull();
    expect(parseFormatSpecifier('{}')).toBeNull();
  });
});

describe('Format rules – parsing', () => {
  const rules = parseFormatRules([
    { condition: 'x >= 100', format: '{:.1f}' },
    { condition: 'x => 10', format: '.2f' },
    { condition: 'x <> 5', format: '.0f' },
    { condition: 'x < 1', format: 'bad' },
    { condition: 'x =< -2.5', format: '{:.3f}' },
    { condition: 'x != 0' },
  ]);

  it('drops rules it cannot read and normalises the rest', () => {
    expect(rules.map(({ operator, threshold, spec }) => [operator, threshold, spec])).toEqual([
      ['>=', 100, '.1f'],
      ['>=', 10, '.2f'],
      ['<=', -2.5, '.3f'],
      ['!=', 0, '.1f'],
    ]);
  });

  it('uses the first matching rule', () => {
    expect(formatWithRules(150, rules)).toBe('150.0');
    expect(formatWithRules(50, rules)).toBe('50.00');
    expect(formatWithRules(-3, rules)).toBe('-3.000');
    expect(formatWithRules(5, rules)).toBe('5.0');
  });

  it('falls back to two decimals when nothing matches', () => {
    expect(formatWithRules(0, rules)).toBe('0.00');
    expect(formatWithRules(7, [])).toBe('7.00');
  });
});

describe('Format rules – formatNumber', () => {
  const rules = parseFormatRules([{ condition: 'x >= 100', format: '.1f' }]);

  it('prefers rules over decimals', () => {
    expect(formatNumber(150, { rules, decimal: 0 })).toBe('150.0');
    expect(formatNumber('12.345', { decimal: 1 })).toBe('12.3');
    expect(formatNumber(2.5, { rules: [], decimal: 0 })).toBe('2');
  });

  it('returns the plain string without options', () => {
    expect(formatNumber(7)).toBe('7');
    expect(formatNumber('7.50')).toBe('7.5');
  });

  it('passes non-numeric cells through', () => {
    expect(formatNumber('abc', { decimal: 2 })).toBe('abc');
    expect(formatNumber(null)).toBe('');
  });

  it('keeps the plain value when the specifier rejects it', () => {
    expect(formatWithSpec('n/a', '.1f')).toBe('n/a');
    expect(formatWithSpec(4.5, 'd')).toBe('4.5');
    expect(formatWithSpec('4', 'd')).toBe('4');
  });
});
