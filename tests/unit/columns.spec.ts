// tests/unit/columns.spec.ts
//
// Spreadsheet addressing and row formulas: column letters, `{row}`
// resolution and per-row evaluation.

import { describe, it, expect } from 'vitest';
import {
  columnIndexToLetters,
  columnLettersToIndex,
  createEvaluator,
  evaluateRowFormula,
  resolveRowFormula,
  RowFormula,
} from '../../src';

describe('Columns – letters and indices', () => {
  it('maps letters to zero-based indices', () => {
    expect(columnLettersToIndex('A')).toBe(0);
    expect(columnLettersToIndex('Z')).toBe(25);
    expect(columnLettersToIndex('AA')).toBe(26);
    expect(columnLettersToIndex('AZ')).toBe(51);
    expect(columnLettersToIndex('BA')).toBe(52);
    expect(columnLettersToIndex('aa')).toBe(26);
  });

  it('maps indices back to letters', () => {
    expect(columnIndexToLetters(0)).toBe('A');
    expect(columnIndexToLetters(25)).toBe('Z');
    expect(columnIndexToLetters(26)).toBe('AA');
    expect(columnIndexToLetters(701)).toBe('ZZ');
    expect(columnIndexToLetters(702)).toBe('AAA');
  });

  it('round-trips the first few hundred columns', () => {
    for (let index = 0; index < 800; index++) {
      expect(columnLettersToIndex(columnIndexToLetters(index))).toBe(index);
    }
  });

  it('rejects malformed input', () => {
    expect(() => columnLettersToIndex('A1')).toThrow(RangeError);
    expect(() => columnLettersToIndex('')).toThrow('invalid column letters ""');
    expect(() => columnIndexToLetters(-1)).toThrow(RangeError);
    expect(() => columnIndexToLetters(1.5)).toThrow(RangeError);
  });
});

describe('Columns – resolving row formulas', () => {
  it('binds cell references to the current row', () => {
    expect(resolveRowFormula('B{row}/A{row}*1000', 0, ['2', '8'])).toEqual({
      expression: 'B/A*1000',
      variables: { B: 8, A: 2 },
    });
  });

  it('binds non-numeric and missing cells to 0', () => {
    expect(resolveRowFormula('A{row} + C{row}', 0, ['n/a', '1'])).toEqual({
      expression: 'A + C',
      variables: { A: 0, C: 0 },
    });
  });

  it('replaces a bare {row} with the row index', () => {
    expect(resolveRowFormula('A{row} * {row}', 4, ['3']).expression).toBe('A * 4');
  });

  it('reaches columns past Z', () => {
    const row = Array.from({ length: 27 }, (_unused, i) => (i === 26 ? '5' : ''));
    expect(evaluateRowFormula('AA{row} * 2', 0, row)).toBe(10);
  });
});

describe('Columns – evaluating row formulas', () => {
  it('evaluates against one row', () => {
    expect(evaluateRowFormula('B{row}/A{row}*1000', 0, ['2', '8'])).toBe(4000);
  });

  it('returns per-row outcomes from a RowFormula', () => {
    const formula = new RowFormula('B{row}/A{row}');

    expect(formula.evaluate(0, ['2', '8'])).toEqual({ ok: true, value: 4 });
    expect(formula.evaluate(1, ['0', '3'])).toEqual({ ok: true, value: 0 });
    expect(formula.evaluate(2, [])).toEqual({ ok: true, value: 0 });
  });

  it('returns parse failures as data', () => {
    const outcome = new RowFormula('A{row}.x').evaluate(0, ['1']);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.code).toBe('E_DISALLOWED');
  });

  it('uses the evaluator it is given', () => {
    const outcome = new RowFormula('A{row} + A{row} + A{row}', createEvaluator({ maxOperations: 3 })).evaluate(
      0,
      ['1'],
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.code).toBe('E_COMPLEXITY');
  });
});
