// tests/integration/syntax-cases.spec.ts
//
// Integration tests for the formula and format-rule language.
//
// These tests focus on:
//  - End-to-end parse + validate + evaluate for every supported construct.
//  - Formulas as they appear in table configs, bound to spreadsheet rows.
//  - Basic negative cases, each with its error code.
//

import { describe, it, expect } from 'vitest';
import { createEvaluator, defaultEvaluator, RowFormula } from '../../src';
import type { Scope } from '../../src';

// -----------------------------------------------------------------------------
// Formulas
// -----------------------------------------------------------------------------

const FORMULA_CASES: Array<[string, Scope, number]> = [
  ['1e3 + 0.5', {}, 1000.5],
  ['2.5E-1 * 4', {}, 1],
  ['A*B - C/D', { A: 3, B: 4, C: 10, D: 5 }, 10],
  ['((A + B) * (C - D)) / 2', { A: 1, B: 2, C: 10, D: 4 }, 9],
  ['A // B * B + A % B', { A: 17, B: 5 }, 17],
  ['2 ** -1', {}, 0.5],
  ['-(-A) + +A', { A: 2 }, 4],
  ['A > B ? (C > D ? 1 : 2) : 3', { A: 2, B: 1, C: 0, D: 1 }, 2],
  ['A > 2 ? 10 : A > 1 ? 20 : 30', { A: 2 }, 20],
  ['round(B / A * 100, 1)', { A: 3, B: 1 }, 33.3],
  ['max(A, B, C) - min(A, B, C)', { A: 3, B: 9, C: 4 }, 6],
  ['abs(A - B) <= 0.5', { A: 1.2, B: 1 }, 1],
  ['int(A) + float(B)', { A: 7.9, B: 2 }, 9],
];

describe('Syntax – formulas', () => {
  it.each(FORMULA_CASES)('%s', (source, scope, expected) => {
    expect(defaultEvaluator.evaluateFormula(source, scope)).toBe(expected);
  });

  it('compiles once and evaluates per row', () => {
    const formula = new RowFormula('(B{row} - A{row}) / A{row} * 100');
    const rows = [
      ['200', '150'],
      ['100', '125'],
      ['0', '10'],
    ];

    expect(rows.map((row, index) => formula.evaluate(index, row))).toEqual([
      { ok: true, value: -25 },
      { ok: true, value: 25 },
      { ok: true, value: 0 },
    ]);
  });
});

// -----------------------------------------------------------------------------
// Format rules
// -----------------------------------------------------------------------------

const FORMAT_CASES: Array<[string, number, string]> = [
  ['v => v >= 1000 ? `${v / 1000:.2f} klm` : `${v:.0f} lm`', 1234, '1.23 klm'],
  ['v => v >= 1000 ? `${v / 1000:.2f} klm` : `${v:.0f} lm`', 812.4, '812 lm'],
  ["x => 'Class ' + (x >= 160 ? 'A' : 'B')", 170, 'Class A'],
  ['x => `${abs(x):d}`', -42, '42'],
  ['(x) => `${x:.1%} of target`', 0.5, '50.0% of target'],
  ['x => `${x:.2e} cd`', 12345, '1.23e+04 cd'],
  ['x => x', 3.5, '3.5'],
];

describe('Syntax – format rules', () => {
  it.each(FORMAT_CASES)('%s with %s', (source, value, expected) => {
    expect(defaultEvaluator.evaluateFormat(source, value)).toBe(expected);
  });
});

// -----------------------------------------------------------------------------
// Negative cases
// -----------------------------------------------------------------------------

const FORMULA_ERRORS: Array<[string, string]> = [
  ['A +* B', 'E_SYNTAX'],
  ['(A', 'E_SYNTAX'],
  ['A = 1', 'E_SYNTAX'],
  ['1 @ 2', 'E_SYNTAX'],
  ['1e', 'E_SYNTAX'],
  ['A[0]', 'E_DISALLOWED'],
  ['A.b', 'E_DISALLOWED'],
  ['foo(A)', 'E_DISALLOWED'],
  ['A && B', 'E_DISALLOWED'],
  ["'text'", 'E_DISALLOWED'],
  ['[A, B]', 'E_DISALLOWED'],
  ['constructor', 'E_DISALLOWED'],
  ['Z + 1', 'E_UNDEFINED'],
  ['(-8) ** 0.5', 'E_EXECUTION'],
];

describe('Syntax – negative cases', () => {
  it.each(FORMULA_ERRORS)('rejects %s with %s', (source, code) => {
    const result = defaultEvaluator.tryEvaluateFormula(source, { A: 1, B: 2 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(code);
  });

  it('reports limit violations as complexity errors', () => {
    const evaluator = createEvaluator({ maxExpressionLength: 5 });
    const result = evaluator.tryEvaluateFormula('A + B + 1', { A: 1, B: 2 });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('E_COMPLEXITY');
  });
});
