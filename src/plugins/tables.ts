/**
 * ReportCalc – Table transformers plugin
 *
 * Built-in custom transformers for lighting test reports:
 *
 *  - photometric_data_transformer  per-column formulas, "Average" row,
 *                                  conditional formatting
 *  - life_table_transformer        same as photometric
 *  - beam_table_transformer        beam angle + peak intensity, 3×2 grid
 *  - eei_table_transformer         one row per model with efficacy, class
 *                                  and merge markers
 *  - zone_table_transformer        "0-<angle>°" rows from zone fields
 *
 * Used from a step such as:
 *
 *   {
 *     "type": "custom_transform",
 *     "transformer": "photometric_data_transformer",
 *     "calculate_columns": [5],
 *     "formulas": { "5": "D{row}/C{row}*100" },
 *     "average_columns": [2, 3, 4, 5],
 *     "format_rules": { "5": [{ "condition": "x >= 100", "format": "{:.1f}" }] }
 *   }
 *
 * License: Apache-2.0
 */

import { RowFormula } from '../core/columns';
import { toNumeric } from '../utils/numbers';
import { getPath, NOT_FOUND } from '../utils/path';
import { formatNumber, formatWithSpec, parseFormatRules, parseFormatSpecifier } from '../table/formatRules';
import type { FormatRuleConfig } from '../table/formatRules';
import { copyGrid, ensureColumn, mean, numericColumn, toCell, widestRow } from '../table/grid';
import {
  readNumber,
  readNumberList,
  readNumberMap,
  readOptionalNumber,
  readRuleMap,
  readString,
  readStringList,
  readStringMap,
} from '../table/params';
import type { TableTransformer, TransformerParams } from '../table/transformers';
import type { Cell, Grid, TransformContext } from '../table/types';
import type { Plugin } from './index';

/** Cell marker asking the document writer to merge vertically. */
export const MERGE_MARKER = '__MERGE__';

export const DEFAULT_EEI_THRESHOLDS: Readonly<Record<string, number>> = {
  'A++': 130,
  'A+': 110,
  A: 90,
  B: 70,
  C: 50,
  D: 30,
};

const DEFAULT_ZONE_ANGLES = [30, 60, 90, 120, 150, 180];

function readField(data: TransformContext['extractedData'], path: string): unknown {
  const value = getPath(data, path);
  return value === NOT_FOUND ? undefined : value;
}

/**
 * Format with a ".1f" or "{:.1f}" specifier, falling back to the value's
 * plain string when the specifier or the value is unusable.
 */
function formatField(value: unknown, format: string): string {
  const spec = parseFormatSpecifier(format);
  if (spec === null) return formatNumber(value);
  return formatWithSpec(value, spec);
}

function isEmptyReport(data: TransformContext['extractedData']): boolean {
  return Object.keys(data).length === 0;
}

/////////////////////////////
// Photometric / life      //
/////////////////////////////

export const photometricDataTransformer: TableTransformer = (grid, params, context) => {
  if (grid.length === 0) return [];

  const result = copyGrid(grid);
  applyColumnFormulas(result, params, context);

  const averageColumns = readNumberList(params, 'average_columns');
  const formatRules = readRuleMap(params, 'format_rules');
  const averageRules = readRuleMap(params, 'average_format_rules');

  let averageRow: Cell[] | null = null;
  if (averageColumns.length > 0) {
    averageRow = new Array<Cell>(Math.max(widestRow(result), 1)).fill('');
    averageRow[0] = 'Average';

    for (const column of averageColumns) {
      const values = numericColumn(result, column);
      if (values.length === 0) continue;

      ensureColumn(averageRow, column);
      averageRow[column] = formatNumberWithRules(
        mean(values),
        averageRules[String(column)] ?? formatRules[String(column)],
        2,
      );
    }
  }

  for (const [key, configs] of Object.entries(formatRules)) {
    const column = Number(key);
    if (!Number.isInteger(column) || column < 0) continue;

    const rules = parseFormatRules(configs);
    for (const row of result) {
      if (column < row.length) {
        row[column] = formatNumber(row[column], { rules });
      }
    }
  }

  return averageRow ? [...result, averageRow] : result;
};

/**
 * Formats with the rules when any are configured, else with `decimal`.
 */
function formatNumberWithRules(
  value: number,
  configs: FormatRuleConfig[] | undefined,
  decimal: number,
): string {
  if (configs === undefined) return formatNumber(value, { decimal });
  return formatNumber(value, { rules: parseFormatRules(configs) });
}

/**
 * `formulas` maps a column to a row formula; `{row}` outside a cell
 * reference is the 1-based row number. Failures leave the cell as is.
 */
function applyColumnFormulas(grid: Grid, params: TransformerParams, context: TransformContext): void {
  const formulas = readStringMap(params, 'formulas');

  for (const column of readNumberList(params, 'calculate_columns')) {
    const source = formulas[String(column)];
    if (source === undefined) continue;

    const formula = new RowFormula(source, context.evaluator);
    grid.forEach((row, rowIndex) => {
      const outcome = formula.evaluate(rowIndex + 1, row);
      if (!outcome.ok) {
        context.logger.warn(
          { row: rowIndex, column, code: outcome.error.code },
          `Formula calculation error: ${source}, ${outcome.error.message}`,
        );
        return;
      }
      ensureColumn(row, column);
      row[column] = outcome.value;
    });
  }
}

export const lifeTableTransformer: TableTransformer = (grid, params, context) =>
  photometricDataTransformer(grid, params, context);

/////////////////////////////
// Beam                    //
/////////////////////////////

export const beamTableTransformer: TableTransformer = (_grid, params, context) => {
  const data = context.extractedData;
  if (isEmptyReport(data)) return [];

  const beamAngle = readField(data, readString(params, 'beam_angle_field', 'beam_angle')) ?? '';
  const peakIntensity =
    readField(data, readString(params, 'peak_intensity_field', 'peak_intensity')) ?? '';

  return [
    ['', ''],
    ['', formatField(beamAngle, readString(params, 'beam_angle_format', '{:.1f}'))],
    ['', formatField(peakIntensity, readString(params, 'peak_intensity_format', '{:.0f}'))],
  ];
};

/////////////////////////////
// EEI                     //
/////////////////////////////

export function eeiClass(efficacy: number, thresholds: Readonly<Record<string, number>>): string {
  const ordered = Object.entries(thresholds).sort(([, a], [, b]) => b - a);
  for (const [label, min] of ordered) {
    if (efficacy >= min) return label;
  }
  return 'E';
}

export const eeiTableTransformer: TableTransformer = (_grid, params, context) => {
  const data = context.extractedData;
  if (isEmptyReport(data)) return [];

  const reference = readField(data, readString(params, 'photometric_data_ref', 'photometric_data'));
  const efficacyColumn = readNumber(params, 'efficacy_column', 5);
  const thresholds = readNumberMap(params, 'eei_thresholds', DEFAULT_EEI_THRESHOLDS);
  const mergeColumns = readNumberList(params, 'merge_columns', [3, 4]);
  const efficacyRules = readRuleMap(params, 'format_rules')['1'];

  const efficacies: number[] = [];
  if (Array.isArray(reference)) {
    for (const row of reference) {
      if (!Array.isArray(row) || row.length <= efficacyColumn) continue;
      const value = toNumeric(row[efficacyColumn]);
      if (value !== null) efficacies.push(value);
    }
  }

  const averageEfficacy = efficacies.length > 0 ? mean(efficacies) : 0;
  const label = eeiClass(averageEfficacy, thresholds);
  const efficacyText = formatNumberWithRules(averageEfficacy, efficacyRules, 1);

  const buildRow = (model: Cell): Cell[] => {
    const row: Cell[] = [model, efficacyText, label];
    for (const column of mergeColumns) {
      ensureColumn(row, column);
      row[column] = MERGE_MARKER;
    }
    return row;
  };

  const rows: Grid = [];
  for (const field of readStringList(params, 'model_fields')) {
    const model = readField(data, field);
    if (model) rows.push(buildRow(toCell(model)));
  }

  return rows.length > 0 ? rows : [buildRow('')];
};

/////////////////////////////
// Zones                   //
/////////////////////////////

export const zoneTableTransformer: TableTransformer = (_grid, params, context) => {
  const data = context.extractedData;
  if (isEmptyReport(data)) return [];

  const angles = readNumberList(params, 'zone_angles', DEFAULT_ZONE_ANGLES);
  const pattern = readString(params, 'zone_fields_pattern', 'zone_{angle}');
  const format = readString(params, 'format', '{:.1f}');
  const minAngle = readNumber(params, 'min_angle', 30);
  const override = readOptionalNumber(params, 'max_angle_override');

  const beamAngle = toNumeric(readField(data, readString(params, 'beam_angle_field', 'beam_angle'))) ?? 0;
  const maxAngle = override ? override : Math.max(beamAngle * 1.2, 180);

  const rows: Grid = [];
  for (const angle of angles) {
    if (angle < minAngle || angle > maxAngle) continue;

    const value = readField(data, pattern.replace('{angle}', String(angle)));
    if (value === undefined || value === null || value === '') continue;

    rows.push([`0-${angle}°`, formatField(value, format)]);
  }
  return rows;
};

/////////////////////////////
// Plugin                  //
/////////////////////////////

export const BUILTIN_TRANSFORMERS: ReadonlyArray<readonly [string, TableTransformer]> = [
  ['photometric_data_transformer', photometricDataTransformer],
  ['life_table_transformer', lifeTableTransformer],
  ['beam_table_transformer', beamTableTransformer],
  ['eei_table_transformer', eeiTableTransformer],
  ['zone_table_transformer', zoneTableTransformer],
];

export const tableTransformersPlugin: Plugin = (registries) => {
  for (const [name, transformer] of BUILTIN_TRANSFORMERS) {
    registries.transformers.register(name, transformer);
  }
  return registries;
};
