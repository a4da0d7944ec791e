// tests/security/dos-limits.spec.ts
//
// Resource limits for config-supplied expressions. Long sources, deep
// nesting, deep format-rule bodies and runaway evaluation are all rejected
// with a "too_complex" error instead of exhausting the stack or the CPU.

import { describe, it, expect } from 'vitest';
import {
  createEvaluator,
  DEFAULT_EVALUATOR_OPTIONS,
  evaluateRowFormula,
  isSafeEvalError,
  SafeEvalError,
} from '../../src';

function rejection(fn: () => unknown): SafeEvalError {
  try {
    fn();
  } catch (err) {
    if (isSafeEvalError(err)) return err;
    throw err;
  }
  throw new Error('expected a SafeEvalError');
}

function sumOf(term: string, count: number): string {
  return Array.from({ length: count }, () => term).join(' + ');
}

// -----------------------------------------------------------------------------
// Defaults
// -----------------------------------------------------------------------------

describe('Security – DoS limits: defaults', () => {
  it('ships the documented defaults', () => {
    expect(DEFAULT_EVALUATOR_OPTIONS).toEqual({
      maxExpressionLength: 2000,
      maxNestingDepth: 64,
      maxFormatDepth: 10,
      maxOperations: 10_000,
    });
  });

  it('falls back to defaults for unusable limits', () => {
    const evaluator = createEvaluator({ maxExpressionLength: -1, maxOperations: Number.NaN });
    expect(evaluator.options.maxExpressionLength).toBe(2000);
    expect(evaluator.options.maxOperations).toBe(10_000);
  });
});

// -----------------------------------------------------------------------------
// Source length
// -----------------------------------------------------------------------------

describe('Security – DoS limits: source length', () => {
  const evaluator = createEvaluator();

  it('rejects a formula longer than 2000 characters', () => {
    const source = `${'1 + '.repeat(600)}1`;
    expect(source.length).toBe(2401);

    const err = rejection(() => evaluator.evaluateFormula(source, {}));
    expect(err.kind).toBe('too_complex');
    expect(err.code).toBe('E_COMPLEXITY');
    expect(err.message).toBe('expression is longer than 2000 characters');
    expect(err.index).toBe(2000);
  });

  it('rejects an over-long format rule the same way', () => {
    const source = `x => \`${'a'.repeat(2000)}\``;
    expect(rejection(() => evaluator.evaluateFormat(source, 1)).kind).toBe('too_complex');
  });

  it('accepts a wide but shallow sum under the length limit', () => {
    const source = sumOf('A', 400);
    expect(source.length).toBe(1597);
    expect(evaluator.evaluateFormula(source, { A: 1 })).toBe(400);
  });

  it('honours a custom length limit', () => {
    const strict = createEvaluator({ maxExpressionLength: 10 });
    expect(strict.evaluateFormula('A + B', { A: 1, B: 2 })).toBe(3);
    expect(rejection(() => strict.evaluateFormula('A + B + C + D', { A: 1, B: 1, C: 1, D: 1 })).kind).toBe(
      'too_complex',
    );
  });

  it('applies the limit to row formulas after resolving cell references', () => {
    // Resolves to "A + A + ... + A", 2001 characters.
    const formula = `${'A{row} + '.repeat(500)}A{row}`;
    const err = rejection(() => evaluateRowFormula(formula, 0, ['1']));
    expect(err.code).toBe('E_COMPLEXITY');
  });
});

// -----------------------------------------------------------------------------
// Nesting depth
// -----------------------------------------------------------------------------

describe('Security – DoS limits: nesting depth', () => {
  const evaluator = createEvaluator();

  it('rejects 100 nested parentheses', () => {
    const source = `${'('.repeat(100)}1${')'.repeat(100)}`;
    const err = rejection(() => evaluator.evaluateFormula(source, {}));
    expect(err.kind).toBe('too_complex');
    expect(err.message).toBe('expression nesting exceeds 64 levels');
  });

  it('accepts moderate parenthesization', () => {
    const source = `${'('.repeat(10)}1${')'.repeat(10)}`;
    expect(evaluator.evaluateFormula(source, {})).toBe(1);
  });

  it('rejects long unary chains', () => {
    const err = rejection(() => evaluator.evaluateFormula(`${'-'.repeat(100)}1`, {}));
    expect(err.kind).toBe('too_complex');
  });

  it('rejects long power chains', () => {
    const source = `${'2 ** '.repeat(100)}1`;
    expect(rejection(() => evaluator.evaluateFormula(source, {})).kind).toBe('too_complex');
  });

  it('rejects deeply nested calls', () => {
    const source = `${'abs('.repeat(80)}1${')'.repeat(80)}`;
    expect(rejection(() => evaluator.evaluateFormula(source, {})).kind).toBe('too_complex');
  });

  it('honours a custom nesting limit', () => {
    const strict = createEvaluator({ maxNestingDepth: 3 });
    expect(strict.evaluateFormula('((1))', {})).toBe(1);
    expect(rejection(() => strict.evaluateFormula('(((1)))', {})).message).toBe(
      'expression nesting exceeds 3 levels',
    );
  });
});

// -----------------------------------------------------------------------------
// Format rule depth
// -----------------------------------------------------------------------------

describe('Security – DoS limits: format rule depth', () => {
  const evaluator = createEvaluator();

  it('accepts a format body of depth 10', () => {
    // Nine additions: the innermost operands sit at depth 10.
    const source = `x => ${'x + '.repeat(9)}x`;
    expect(evaluator.evaluateFormat(source, 1)).toBe('10');
  });

  it('rejects a format body deeper than 10', () => {
    const source = `x => ${'x + '.repeat(10)}x`;
    const err = rejection(() => evaluator.compileFormat(source));
    expect(err.kind).toBe('too_complex');
    expect(err.message).toBe('expression exceeds the maximum depth of 10');
  });

  it('does not apply the format depth limit to formulas', () => {
    expect(evaluator.evaluateFormula(sumOf('A', 30), { A: 2 })).toBe(60);
  });

  it('honours a custom format depth', () => {
    const strict = createEvaluator({ maxFormatDepth: 3 });
    expect(strict.isSafeFormat('x => x + x + x')).toBe(true);
    expect(strict.isSafeFormat('x => x + x + x + x')).toBe(false);
  });
});

// -----------------------------------------------------------------------------
// Evaluation budget
// -----------------------------------------------------------------------------

describe('Security – DoS limits: evaluation budget', () => {
  it('stops evaluation after maxOperations nodes', () => {
    const evaluator = createEvaluator({ maxOperations: 10 });

    // 6 identifiers and 5 additions: 11 nodes.
    const err = rejection(() => evaluator.evaluateFormula(sumOf('A', 6), { A: 1 }));
    expect(err.kind).toBe('too_complex');
    expect(err.message).toBe('maximum evaluation operations exceeded');

    expect(evaluator.evaluateFormula(sumOf('A', 5), { A: 1 })).toBe(5);
  });

  it('charges the budget in format mode too', () => {
    const evaluator = createEvaluator({ maxOperations: 2 });
    expect(rejection(() => evaluator.evaluateFormat('x => x + x', 1)).kind).toBe('too_complex');
  });

  it('reports the budget failure through tryEvaluateFormula', () => {
    const evaluator = createEvaluator({ maxOperations: 1 });
    const result = evaluator.tryEvaluateFormula('A + 1', { A: 1 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('E_COMPLEXITY');
  });
});
