/**
 * ReportCalc – Public entry point
 *
 * Computes the derived values of a test report:
 *  - field calculations (`FieldCalculator`) driven by field-mapping config
 *    and a function registry;
 *  - table transforms (`transformTable`) over grids extracted from
 *    spreadsheets, with custom transformers for whole-table layouts;
 *  - a safe expression evaluator for the formulas and format rules that
 *    config files carry.
 *
 * Typical usage:
 *
 *   import {
 *     calculateReport,
 *     parseFieldMappingConfig,
 *     parseTransformSteps,
 *     transformTable,
 *   } from 'reportcalc';
 *
 *   const { values } = calculateReport(report, parseFieldMappingConfig(mappingJson));
 *
 *   const grid = transformTable(report.extracted_data.photometric_data, parseTransformSteps(stepsJson), {
 *     extractedData: report.extracted_data,
 *   });
 *
 * License: Apache-2.0
 */

import { FieldCalculator } from './calculator/fieldCalculator';
import type {
  FieldCalculatorOptions,
  FieldMappingConfig,
  FieldValue,
  Report,
} from './calculator/fieldCalculator';

/////////////////////////////
// Safe evaluator          //
/////////////////////////////

export { createEvaluator, defaultEvaluator, normalizeOptions, DEFAULT_EVALUATOR_OPTIONS } from './core/engine';
export type {
  CompiledFormat,
  CompiledFormula,
  EvaluatorOptions,
  NormalizedEvaluatorOptions,
  SafeEvaluator,
} from './core/engine';

export {
  columnIndexToLetters,
  columnLettersToIndex,
  evaluateRowFormula,
  resolveRowFormula,
  RowFormula,
} from './core/columns';
export type { ResolvedRowFormula } from './core/columns';

export { formatValue, isValidFormatSpec } from './core/format';
export { parseFormat, parseFormula } from './core/parser';
export type { ParseMode, ParseOptions } from './core/parser';
export { tokenize } from './core/tokenizer';
export { traverse } from './core/ast';
export type {
  AnyAstNode,
  BinaryExpressionNode,
  CallExpressionNode,
  ComparisonExpressionNode,
  ConditionalExpressionNode,
  ExpressionNode,
  FormatFunctionNode,
  IdentifierNode,
  LiteralNode,
  TemplateLiteralNode,
  UnaryExpressionNode,
  Visitor,
} from './core/ast';
export type { AllowedFunctionName, Token, TokenType } from './core/tokens';
export { ALLOWED_FUNCTIONS } from './core/tokens';
export type { Result, Scope, Value } from './core/types';

export { DivisionByZeroError, SafeEvalError, isSafeEvalError } from './core/errors';
export type { SafeEvalErrorCode, SafeEvalErrorKind } from './core/errors';

export { validateAst } from './utils/validation';
export type {
  ExpressionValidationIssue,
  ExpressionValidationOptions,
  ExpressionValidationResult,
  ExpressionValidationStats,
} from './utils/validation';

/////////////////////////////
// Calculator              //
/////////////////////////////

export { FieldCalculator, createFieldValue, toCalculatedPath } from './calculator/fieldCalculator';
export type {
  FieldCalculatorOptions,
  FieldMapping,
  FieldMappingConfig,
  FieldOutcome,
  FieldValue,
  Report,
} from './calculator/fieldCalculator';
export { createFunctionRegistry } from './calculator/functions';
export type { CalculationFunction, FunctionRegistry } from './calculator/functions';
export {
  CalculationError,
  CalculatorError,
  FieldNotFoundError,
  FunctionNotFoundError,
  isCalculatorError,
} from './calculator/errors';
export type { CalculatorErrorCode } from './calculator/errors';

/////////////////////////////
// Tables                  //
/////////////////////////////

export { transformTable } from './table/pipeline';
export type { TransformTableOptions } from './table/pipeline';
export {
  TransformerNotFoundError,
  TransformerRegistry,
  createTransformerRegistry,
} from './table/transformers';
export type { TableTransformer, TransformerParams } from './table/transformers';
export { formatNumber, formatWithRules, parseFormatRules } from './table/formatRules';
export type { FormatRule, FormatRuleConfig } from './table/formatRules';
export type {
  Cell,
  Grid,
  TableMetadata,
  TableTargets,
  TransformContext,
  TransformStep,
} from './table/types';

/////////////////////////////
// Plugins & registries    //
/////////////////////////////

export { Registry } from './registry';
export {
  applyPlugins,
  builtinCalculationsPlugin,
  createDefaultRegistries,
  createPluginSet,
  createRegistries,
  extraCalculationsPlugin,
  tableTransformersPlugin,
} from './plugins';
export type { Plugin, PluginSet, Registries } from './plugins';

/////////////////////////////
// Config & utilities      //
/////////////////////////////

export {
  ConfigError,
  parseCalculatorConfig,
  parseFieldMappingConfig,
  parseFormatRuleConfig,
  parseTransformSteps,
} from './config/schemas';
export type { CalculatorConfig } from './config/schemas';

export { NOT_FOUND, getPath, hasPath, setPath } from './utils/path';
export { createLogger, getLogger } from './utils/logger';
export type { Logger } from './utils/logger';

/////////////////////////////
// Convenience helpers     //
/////////////////////////////

export interface CalculatedReport {
  report: Report;
  values: Record<string, FieldValue>;
}

/**
 * One-shot helper: run every mapping of `config` against `report`.
 *
 *   const { report: updated, values } = calculateReport(report, config, { strictMode: true });
 */
export function calculateReport(
  report: Report,
  config: FieldMappingConfig,
  options?: FieldCalculatorOptions,
): CalculatedReport {
  const calculator = new FieldCalculator(report, options);
  const values = calculator.processConfig(config);
  return { report: calculator.getCalculatedReport(), values };
}
