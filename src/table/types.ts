/**
 * ReportCalc – Table types
 *
 * Grids are row-major: `grid[row][column]`, rows of uneven length allowed.
 * Transform steps are a tagged union on `type`; each variant mirrors one
 * object of a table-transform config.
 *
 * License: Apache-2.0
 */

import type { Logger } from 'pino';

import type { SafeEvaluator } from '../core/engine';
import type { PlainObject } from '../utils/path';

export type Cell = string | number | boolean | null;
export type Row = Cell[];
export type Grid = Row[];
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<Cell>>;

/////////////////////////////
// Steps                   //
/////////////////////////////

export interface SkipColumnsStep {
  type: 'skip_columns';
  columns: number[];
}

/**
 * `source` is one of `row_index`, `metadata:<name>`, `targets:<name>` or
 * `value:<literal>`.
 */
export interface AddColumnStep {
  type: 'add_column';
  position?: number;
  source?: string;
}

export type AggregateOperation = 'average' | 'sum' | 'max' | 'min';
export type FormulaOperation = `formula=${string}`;
export type CalculateOperation = AggregateOperation | FormulaOperation;

export interface CalculateStep {
  type: 'calculate';
  column: number;
  operation: CalculateOperation;
  decimal?: number;
  /** Format rule applied to an aggregate when `decimal` is absent. */
  function?: string;
}

export interface FormatColumnStep {
  type: 'format_column';
  column: number;
  function?: string;
  decimal?: number;
}

export interface ReorderStep {
  type: 'reorder';
  order: number[];
}

export type FilterCondition = 'remove_empty' | 'remove_all_empty';

export interface FilterRowsStep {
  type: 'filter_rows';
  condition: FilterCondition;
}

/**
 * Every key besides `type` and `transformer` is handed to the transformer
 * as a parameter.
 */
export interface CustomTransformStep {
  type: 'custom_transform';
  transformer: string;
  [param: string]: unknown;
}

export type TransformStep =
  | SkipColumnsStep
  | AddColumnStep
  | CalculateStep
  | FormatColumnStep
  | ReorderStep
  | FilterRowsStep
  | CustomTransformStep;

export type AggregateStep = CalculateStep & { operation: AggregateOperation };

export const AGGREGATE_OPERATIONS: ReadonlySet<string> = new Set<AggregateOperation>([
  'average',
  'sum',
  'max',
  'min',
]);

export function isAggregateStep(step: TransformStep): step is AggregateStep {
  return step.type === 'calculate' && AGGREGATE_OPERATIONS.has(step.operation);
}

/////////////////////////////
// Context                 //
/////////////////////////////

/**
 * `{ name, value }` entries looked up by `add_column` sources.
 */
export interface NamedEntry {
  name?: unknown;
  value?: unknown;
}

export interface TableMetadata {
  fields?: NamedEntry[];
}

export interface TableTargets {
  targets?: NamedEntry[];
}

/**
 * What a step or custom transformer may read besides the grid itself.
 */
export interface TransformContext {
  metadata?: TableMetadata;
  targets?: TableTargets;
  extractedData: PlainObject;
  evaluator: SafeEvaluator;
  logger: Logger;
}
