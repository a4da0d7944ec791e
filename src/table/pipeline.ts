/**
 * ReportCalc – Table transform pipeline
 *
 * Runs a list of transform steps over a grid in two phases:
 *
 *  1. Every non-aggregation step, in configured order, each on the output
 *     of the previous one. Column indices always refer to the grid as it
 *     enters the step.
 *  2. Every aggregation step (`calculate` with average/sum/max/min)
 *     against the phase-one grid. They share one trailing row, appended
 *     once, each writing its own column.
 *
 * The input grid is never modified. Per-cell failures (a formula that
 * does not evaluate, a value a format rule rejects) leave the cell as it
 * was and are logged.
 *
 *   transformTable(
 *     [['2', '8'], ['4', '2']],
 *     [
 *       { type: 'calculate', column: 2, operation: 'formula=B{row}/A{row}', decimal: 2 },
 *       { type: 'calculate', column: 1, operation: 'sum' },
 *     ],
 *   );
 *   // → [['2', '8', '4.00'], ['4', '2', '0.50'], ['', '10', '']]
 *
 * License: Apache-2.0
 */

import type { Logger } from 'pino';

import { RowFormula } from '../core/columns';
import { defaultEvaluator } from '../core/engine';
import type { SafeEvaluator } from '../core/engine';
import { isSafeEvalError } from '../core/errors';
import { createDefaultRegistries } from '../plugins';
import { componentLogger } from '../utils/logger';
import { toFiniteNumber } from '../utils/numbers';
import type { PlainObject } from '../utils/path';
import { formatNumber } from './formatRules';
import { copyGrid, ensureColumn, isBlank, maximum, mean, minimum, numericColumn, toCell, widestRow } from './grid';
import type { TransformerRegistry } from './transformers';
import { isAggregateStep } from './types';
import type {
  AddColumnStep,
  AggregateOperation,
  AggregateStep,
  CalculateStep,
  Cell,
  CustomTransformStep,
  FilterRowsStep,
  FormatColumnStep,
  Grid,
  NamedEntry,
  ReadonlyGrid,
  TableMetadata,
  TableTargets,
  TransformContext,
  TransformStep,
} from './types';

export interface TransformTableOptions {
  metadata?: TableMetadata;
  targets?: TableTargets;
  /** Report data custom transformers read from. */
  extractedData?: PlainObject;
  evaluator?: SafeEvaluator;
  /** Defaults to the built-in transformers. */
  transformers?: TransformerRegistry;
  logger?: Logger;
}

const FORMULA_PREFIX = 'formula=';

export function transformTable(
  grid: ReadonlyGrid,
  steps: readonly TransformStep[],
  options: TransformTableOptions = {},
): Grid {
  const context: TransformContext = {
    metadata: options.metadata,
    targets: options.targets,
    extractedData: options.extractedData ?? {},
    evaluator: options.evaluator ?? defaultEvaluator,
    logger: componentLogger('table-transformer', options.logger),
  };
  const transformers = options.transformers ?? createDefaultRegistries().transformers;

  let result = copyGrid(grid);
  const aggregates: AggregateStep[] = [];

  for (const step of steps) {
    if (isAggregateStep(step)) {
      aggregates.push(step);
      continue;
    }
    result = applyStep(result, step, context, transformers);
  }

  if (aggregates.length > 0 && result.length > 0) {
    result = applyAggregates(result, aggregates, context);
  }

  return result;
}

function applyStep(
  grid: Grid,
  step: TransformStep,
  context: TransformContext,
  transformers: TransformerRegistry,
): Grid {
  switch (step.type) {
    case 'skip_columns':
      return skipColumns(grid, step.columns);
    case 'add_column':
      return addColumn(grid, step, context);
    case 'calculate':
      return applyFormula(grid, step, context);
    case 'format_column':
      return formatColumn(grid, step, context);
    case 'reorder':
      return reorder(grid, step.order);
    case 'filter_rows':
      return filterRows(grid, step);
    case 'custom_transform':
      return customTransform(grid, step, context, transformers);
  }
}

/////////////////////////////
// Column layout           //
/////////////////////////////

function skipColumns(grid: Grid, columns: readonly number[]): Grid {
  if (columns.length === 0) return grid;

  const skipped = new Set(columns);
  return grid.map((row) => row.filter((_cell, index) => !skipped.has(index)));
}

function reorder(grid: Grid, order: readonly number[]): Grid {
  return grid.map((row) =>
    order.filter((index) => index >= 0 && index < row.length).map((index) => row[index] ?? ''),
  );
}

/**
 * Inserts one column. Only the first row receives the resolved value;
 * the others get "". Existing configurations depend on this.
 */
function addColumn(grid: Grid, step: AddColumnStep, context: TransformContext): Grid {
  const position = Math.max(0, step.position ?? 0);
  const source = step.source ?? '';

  return grid.map((row, rowIndex) => {
    const next = [...row];
    const value = rowIndex === 0 ? resolveColumnSource(source, rowIndex, context) : '';
    next.splice(Math.min(position, next.length), 0, value);
    return next;
  });
}

export function resolveColumnSource(
  source: string,
  rowIndex: number,
  context: Pick<TransformContext, 'metadata' | 'targets'>,
): Cell {
  if (source === 'row_index') return String(rowIndex + 1);

  const separator = source.indexOf(':');
  if (separator === -1) return '';

  const kind = source.slice(0, separator);
  const key = source.slice(separator + 1);

  switch (kind) {
    case 'metadata':
      return lookupEntry(context.metadata?.fields, key);
    case 'targets':
      return lookupEntry(context.targets?.targets, key);
    case 'value':
      return key;
    default:
      return '';
  }
}

function lookupEntry(entries: readonly NamedEntry[] | undefined, key: string): Cell {
  const entry = entries?.find((candidate) => candidate.name === key);
  return entry ? toCell(entry.value) : '';
}

/////////////////////////////
// Calculation             //
/////////////////////////////

function applyFormula(grid: Grid, step: CalculateStep, context: TransformContext): Grid {
  if (!step.operation.startsWith(FORMULA_PREFIX)) return grid;

  const formula = new RowFormula(step.operation.slice(FORMULA_PREFIX.length), context.evaluator);

  return grid.map((row, rowIndex) => {
    const outcome = formula.evaluate(rowIndex, row);
    if (!outcome.ok) {
      context.logger.debug(
        { row: rowIndex, column: step.column, code: outcome.error.code },
        `formula skipped: ${outcome.error.message}`,
      );
      return row;
    }

    const next = [...row];
    ensureColumn(next, step.column);
    next[step.column] = formatNumber(outcome.value, { decimal: step.decimal });
    return next;
  });
}

const STATISTICS: Record<AggregateOperation, (values: readonly number[]) => number> = {
  average: mean,
  sum: (values) => values.reduce((total, value) => total + value, 0),
  max: maximum,
  min: minimum,
};

function applyAggregates(
  grid: Grid,
  steps: readonly AggregateStep[],
  context: TransformContext,
): Grid {
  const aggregateRow: Cell[] = new Array<Cell>(widestRow(grid)).fill('');

  for (const step of steps) {
    const values = numericColumn(grid, step.column);
    if (values.length === 0) continue;

    const statistic = STATISTICS[step.operation](values);
    ensureColumn(aggregateRow, step.column);
    aggregateRow[step.column] = formatAggregate(statistic, step, context);
  }

  return [...grid, aggregateRow];
}

function formatAggregate(value: number, step: AggregateStep, context: TransformContext): string {
  if (step.decimal !== undefined || step.function === undefined) {
    return formatNumber(value, { decimal: step.decimal });
  }

  const outcome = context.evaluator.tryEvaluateFormat(step.function, value);
  if (outcome.ok) return outcome.value;

  context.logger.debug(
    { column: step.column, code: outcome.error.code },
    `aggregate format skipped: ${outcome.error.message}`,
  );
  return formatNumber(value);
}

/////////////////////////////
// Formatting & filtering  //
/////////////////////////////

function formatColumn(grid: Grid, step: FormatColumnStep, context: TransformContext): Grid {
  const { column } = step;

  if (step.function !== undefined) {
    let format: (value: number) => string;
    try {
      const compiled = context.evaluator.compileFormat(step.function);
      format = (value) => compiled.format(value);
    } catch (err) {
      if (!isSafeEvalError(err)) throw err;
      context.logger.warn(
        { column, code: err.code },
        `format_column skipped, invalid format function: ${err.message}`,
      );
      return grid;
    }

    return mapNumericCells(grid, column, (value) => {
      try {
        return format(value);
      } catch (err) {
        if (!isSafeEvalError(err)) throw err;
        context.logger.debug({ column, value, code: err.code }, `format failed: ${err.message}`);
        return formatNumber(value);
      }
    });
  }

  if (step.decimal !== undefined) {
    const decimal = step.decimal;
    return mapNumericCells(grid, column, (value) => formatNumber(value, { decimal }));
  }

  return grid;
}

function mapNumericCells(grid: Grid, column: number, map: (value: number) => Cell): Grid {
  return grid.map((row) => {
    if (column >= row.length) return row;

    const value = toFiniteNumber(row[column]);
    if (value === null) return row;

    const next = [...row];
    next[column] = map(value);
    return next;
  });
}

function filterRows(grid: Grid, step: FilterRowsStep): Grid {
  switch (step.condition) {
    case 'remove_empty':
    case 'remove_all_empty':
      return grid.filter((row) => row.some((cell) => !isBlank(cell)));
  }
}

function customTransform(
  grid: Grid,
  step: CustomTransformStep,
  context: TransformContext,
  transformers: TransformerRegistry,
): Grid {
  const { type: _type, transformer, ...params } = step;
  return transformers.run(transformer, grid, params, context);
}
