/**
 * ReportCalc – Spreadsheet column addressing
 *
 * Letters ↔ zero-based index (base 26 without a zero digit: A = 0, Z = 25,
 * AA = 26) and resolution of row formulas such as `B{row}/A{row}*1000`
 * against one grid row.
 *
 * License: Apache-2.0
 */

import type { CompiledFormula, SafeEvaluator } from './engine';
import { defaultEvaluator } from './engine';
import { isSafeEvalError } from './errors';
import type { SafeEvalError } from './errors';
import type { Result } from './types';
import { fail, ok } from './types';
import { toFiniteNumber } from '../utils/numbers';

const LETTERS_PATTERN = /^[A-Z]+$/;
const CELL_REFERENCE_PATTERN = /([A-Z]+)\{row\}/g;
const ROW_PLACEHOLDER_PATTERN = /\{row\}/g;

/**
 * `"A"` → 0, `"Z"` → 25, `"AA"` → 26. Lowercase letters are accepted.
 */
export function columnLettersToIndex(letters: string): number {
  const upper = letters.toUpperCase();
  if (!LETTERS_PATTERN.test(upper)) {
    throw new RangeError(`invalid column letters "${letters}"`);
  }

  let index = 0;
  for (const ch of upper) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index - 1;
}

/**
 * Inverse of `columnLettersToIndex`.
 */
export function columnIndexToLetters(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`column index must be a non-negative integer, got ${index}`);
  }

  let n = index + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export interface ResolvedRowFormula {
  /** Formula with cell references reduced to bare letters. */
  expression: string;

  /** Letter → numeric cell value (0 when non-numeric or out of range). */
  variables: Record<string, number>;
}

/**
 * Rewrite `LETTERS{row}` references to bare letter variables bound to the
 * current row's cells; any other `{row}` becomes the zero-based row index.
 */
export function resolveRowFormula(
  formula: string,
  rowIndex: number,
  row: readonly unknown[],
): ResolvedRowFormula {
  const variables: Record<string, number> = {};

  const expression = formula
    .replace(CELL_REFERENCE_PATTERN, (_match, letters: string) => {
      const column = columnLettersToIndex(letters);
      variables[letters] = column < row.length ? toFiniteNumber(row[column]) ?? 0 : 0;
      return letters;
    })
    .replace(ROW_PLACEHOLDER_PATTERN, String(rowIndex));

  return { expression, variables };
}

/**
 * Evaluate a row formula in formula mode.
 *
 * ```ts
 * evaluateRowFormula('B{row}/A{row}*1000', 0, ['2', '8']); // 4000
 * ```
 */
export function evaluateRowFormula(
  formula: string,
  rowIndex: number,
  row: readonly unknown[],
  evaluator: SafeEvaluator = defaultEvaluator,
): number {
  const { expression, variables } = resolveRowFormula(formula, rowIndex, row);
  return evaluator.evaluateFormula(expression, variables);
}

/**
 * A row formula bound to an evaluator. Each distinct resolved expression is
 * compiled once; failures come back as data so one bad row does not stop
 * the others.
 */
export class RowFormula {
  private readonly cache = new Map<string, CompiledFormula>();

  constructor(
    private readonly formula: string,
    private readonly evaluator: SafeEvaluator = defaultEvaluator,
  ) {}

  evaluate(rowIndex: number, row: readonly unknown[]): Result<number, SafeEvalError> {
    const { expression, variables } = resolveRowFormula(this.formula, rowIndex, row);

    try {
      let compiled = this.cache.get(expression);
      if (!compiled) {
        compiled = this.evaluator.compileFormula(expression);
        this.cache.set(expression, compiled);
      }
      return ok(compiled.eval(variables));
    } catch (err) {
      if (isSafeEvalError(err)) return fail(err);
      throw err;
    }
  }
}
