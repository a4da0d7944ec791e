/**
 * ReportCalc – Grid helpers
 *
 * License: Apache-2.0
 */

import { toFiniteNumber } from '../utils/numbers';
import type { Cell, Grid, ReadonlyGrid } from './types';

export function copyGrid(grid: ReadonlyGrid): Grid {
  return grid.map((row) => [...row]);
}

export function widestRow(grid: ReadonlyGrid): number {
  return grid.reduce((width, row) => Math.max(width, row.length), 0);
}

/**
 * Pad `row` with "" until `column` is addressable.
 */
export function ensureColumn(row: Cell[], column: number): void {
  while (row.length <= column) row.push('');
}

export function isBlank(cell: Cell): boolean {
  return cell === null || String(cell).trim() === '';
}

/**
 * Finite numeric values of `column`, skipping rows that are too short and
 * cells that are not numeric.
 */
export function numericColumn(grid: ReadonlyGrid, column: number): number[] {
  const values: number[] = [];
  for (const row of grid) {
    if (column >= row.length) continue;
    const num = toFiniteNumber(row[column]);
    if (num !== null) values.push(num);
  }
  return values;
}

export function mean(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0) / values.length;
}

// Folded: spreading a large column into Math.max overflows the stack.
export function maximum(values: readonly number[]): number {
  return values.reduce((best, value) => Math.max(best, value), Number.NEGATIVE_INFINITY);
}

export function minimum(values: readonly number[]): number {
  return values.reduce((best, value) => Math.min(best, value), Number.POSITIVE_INFINITY);
}

/**
 * Any report value as a cell; objects and arrays become JSON text.
 */
export function toCell(value: unknown): Cell {
  if (value === undefined) return '';
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return JSON.stringify(value) ?? '';
}
