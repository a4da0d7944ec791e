/**
 * ReportCalc – Config schemas
 *
 * zod schemas for every JSON config the library consumes. The parse*
 * functions take untrusted input (usually `JSON.parse` output) and either
 * return typed config or throw a ConfigError listing each issue.
 *
 * License: Apache-2.0
 */

import { z } from 'zod';

import type { FieldMapping, FieldMappingConfig } from '../calculator/fieldCalculator';
import type { FormatRuleConfig } from '../table/formatRules';
import type { FormulaOperation, TransformStep } from '../table/types';

export class ConfigError extends Error {
  public override readonly name = 'ConfigError';
  public readonly code = 'E_CONFIG';

  constructor(
    public readonly configName: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(`Invalid ${configName}: ${formatIssues(issues)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, configName: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(configName, result.error.issues);
  }
  return result.data;
}

/////////////////////////////
// Field mappings          //
/////////////////////////////

export const fieldMappingSchema = z.object({
  template_field: z.string().min(1),
  source_field: z.string().min(1),
  type: z.string().optional(),
  function: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
});

export const fieldMappingConfigSchema = z.object({
  field_mappings: z.array(fieldMappingSchema),
});

export function parseFieldMappingConfig(input: unknown): FieldMappingConfig {
  const config = parseWith(fieldMappingConfigSchema, input, 'field mapping config');
  const mappings: FieldMapping[] = config.field_mappings;
  return { field_mappings: mappings };
}

/////////////////////////////
// Calculator              //
/////////////////////////////

export const calculatorConfigSchema = z.object({
  strict_mode: z.boolean().default(false),
  raise_on_error: z.boolean().default(false),
});

export interface CalculatorConfig {
  strictMode: boolean;
  raiseOnError: boolean;
}

export function parseCalculatorConfig(input: unknown): CalculatorConfig {
  const config = parseWith(calculatorConfigSchema, input ?? {}, 'calculator config');
  return { strictMode: config.strict_mode, raiseOnError: config.raise_on_error };
}

/////////////////////////////
// Table transforms        //
/////////////////////////////

const columnIndex = z.number().int().min(0);
const decimalPlaces = z.number().int().min(0).max(99);

const FORMULA_OPERATION_PATTERN = /^formula=.+/s;

const calculateOperation = z.union([
  z.enum(['average', 'sum', 'max', 'min']),
  z.custom<FormulaOperation>(
    (value) => typeof value === 'string' && FORMULA_OPERATION_PATTERN.test(value),
    { message: 'expected average, sum, max, min or formula=<expression>' },
  ),
]);

export const transformStepSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('skip_columns'),
    columns: z.array(columnIndex).default([]),
  }),
  z.object({
    type: z.literal('add_column'),
    position: columnIndex.optional(),
    source: z.string().optional(),
  }),
  z.object({
    type: z.literal('calculate'),
    column: columnIndex,
    operation: calculateOperation,
    decimal: decimalPlaces.optional(),
    function: z.string().min(1).optional(),
  }),
  z.object({
    type: z.literal('format_column'),
    column: columnIndex,
    function: z.string().min(1).optional(),
    decimal: decimalPlaces.optional(),
  }),
  z.object({
    type: z.literal('reorder'),
    order: z.array(columnIndex),
  }),
  z.object({
    type: z.literal('filter_rows'),
    condition: z.enum(['remove_empty', 'remove_all_empty']),
  }),
  z
    .object({
      type: z.literal('custom_transform'),
      transformer: z.string().min(1),
    })
    .passthrough(),
]);

export const transformStepsSchema = z.array(transformStepSchema);

export function parseTransformSteps(input: unknown): TransformStep[] {
  const steps: TransformStep[] = parseWith(transformStepsSchema, input, 'table transform config');
  return steps;
}

/////////////////////////////
// Format rules            //
/////////////////////////////

export const formatRuleConfigSchema = z.array(
  z.object({
    condition: z.string().min(1),
    format: z.string().min(1).optional(),
  }),
);

export function parseFormatRuleConfig(input: unknown): FormatRuleConfig[] {
  return parseWith(formatRuleConfigSchema, input, 'format rule config');
}
