/**
 * ReportCalc – Field calculator
 *
 * Computes `calculated_data` entries of a report from field mappings:
 *
 *   {
 *     "template_field": "energy_class",
 *     "source_field": "calculated_data.energy_class",
 *     "type": "text",
 *     "function": "energy_class_rating",
 *     "args": ["extracted_data.rated_wattage", "extracted_data.luminous_flux"]
 *   }
 *
 * Each mapping resolves its argument paths, calls the registered function
 * and writes the result back into the report, which is mutated in place.
 * `calculateField` reports failures as data; `processConfig` decides
 * whether a failure is logged and skipped or aborts the batch.
 *
 * License: Apache-2.0
 */

import type { Logger } from 'pino';

import {
  CalculationError,
  FieldNotFoundError,
  FunctionNotFoundError,
} from './errors';
import type { AvailableFields, CalculatorError } from './errors';
import type { FunctionRegistry } from './functions';
import { createDefaultRegistries } from '../plugins';
import type { Result } from '../core/types';
import { fail, ok } from '../core/types';
import { componentLogger } from '../utils/logger';
import { coerceFieldValue } from '../utils/numbers';
import { NOT_FOUND, getPath, isPlainObject, setPath } from '../utils/path';
import type { PlainObject } from '../utils/path';

/////////////////////////////
// Public types            //
/////////////////////////////

export const REPORT_SECTIONS = ['metadata', 'extracted_data', 'calculated_data'] as const;
export type ReportSection = (typeof REPORT_SECTIONS)[number];

/**
 * Hierarchical report. Only `calculated_data` is written to.
 */
export interface Report extends PlainObject {
  metadata?: PlainObject;
  extracted_data?: PlainObject;
  calculated_data?: PlainObject;
}

export interface FieldMapping {
  template_field: string;
  /** Target path; placed under `calculated_data` unless it already is. */
  source_field: string;
  type?: string;
  function?: string;
  /** Paths of the argument values, in call order. */
  args?: string[];
}

export interface FieldMappingConfig {
  field_mappings: FieldMapping[];
}

/**
 * A value as it enters or leaves a computation. Numeric strings are
 * converted once, on construction.
 */
export interface FieldValue {
  readonly value: unknown;
  readonly source: string;
  readonly fieldName: string;
}

export function createFieldValue(value: unknown, source: string, fieldName: string): FieldValue {
  return { value: coerceFieldValue(value), source, fieldName };
}

export interface FieldCalculatorOptions {
  /** Missing argument paths fail the mapping instead of passing null. */
  strictMode?: boolean;

  /** The first failing mapping aborts `processConfig`. */
  raiseOnError?: boolean;

  /** Defaults to a registry holding the built-in functions. */
  registry?: FunctionRegistry;

  logger?: Logger;
}

export type FieldOutcome = Result<FieldValue, CalculatorError>;

const CALCULATED_PREFIX = 'calculated_data.';

/////////////////////////////
// Calculator              //
/////////////////////////////

export class FieldCalculator {
  private readonly report: Report;
  private readonly strictMode: boolean;
  private readonly raiseOnError: boolean;
  private readonly registry: FunctionRegistry;
  private readonly logger: Logger;
  private readonly calculated = new Map<string, FieldValue>();

  constructor(report: Report, options: FieldCalculatorOptions = {}) {
    this.report = report;
    this.strictMode = options.strictMode ?? false;
    this.raiseOnError = options.raiseOnError ?? false;
    this.registry = options.registry ?? createDefaultRegistries().functions;
    this.logger = componentLogger('field-calculator', options.logger);
  }

  /**
   * Read a report value as a FieldValue.
   *
   * @throws FieldNotFoundError when any segment of `path` is missing.
   */
  getValue(path: string): FieldValue {
    const value = getPath(this.report, path);
    if (value === NOT_FOUND) {
      throw new FieldNotFoundError(path, this.availableFields());
    }
    return createFieldValue(value, 'report', path);
  }

  /**
   * Compute one mapping and write its result. A mapping without a
   * `function` passes its first argument through.
   */
  calculateField(mapping: FieldMapping): FieldOutcome {
    const args: unknown[] = [];

    for (const argPath of mapping.args ?? []) {
      const value = getPath(this.report, argPath);
      if (value !== NOT_FOUND) {
        args.push(createFieldValue(value, 'report', argPath).value);
        continue;
      }
      if (this.strictMode) {
        return fail(new FieldNotFoundError(argPath, this.availableFields()));
      }
      this.logger.debug(
        { field: mapping.template_field, path: argPath },
        'argument path not found, passing null',
      );
      args.push(null);
    }

    let result: unknown;

    if (mapping.function) {
      const fn = this.registry.get(mapping.function);
      if (!fn) {
        return fail(new FunctionNotFoundError(mapping.function));
      }
      try {
        result = fn(...args);
      } catch (err) {
        return fail(new CalculationError(mapping.function, args, err));
      }
    } else {
      result = args.length > 0 ? args[0] : null;
    }

    const target = toCalculatedPath(mapping.source_field);
    setPath(this.report, target, result);

    const field = createFieldValue(result, 'calculated_data', target);
    this.calculated.set(target, field);
    return ok(field);
  }

  /**
   * Compute every mapping that names a function, keyed by template field.
   *
   * A missing function always throws. Other failures are logged and
   * skipped, or thrown when `raiseOnError` is set.
   */
  processConfig(config: FieldMappingConfig): Record<string, FieldValue> {
    const results: Record<string, FieldValue> = {};

    for (const mapping of config.field_mappings) {
      if (!mapping.function) continue;

      const outcome = this.calculateField(mapping);
      if (outcome.ok) {
        results[mapping.template_field] = outcome.value;
        continue;
      }

      const { error } = outcome;
      if (error instanceof FunctionNotFoundError || this.raiseOnError) {
        throw error;
      }

      this.logger.warn(
        { field: mapping.template_field, code: error.code, err: error },
        `Failed to calculate field '${mapping.template_field}': ${error.message}`,
      );
    }

    return results;
  }

  /** The report, including everything written so far. */
  getCalculatedReport(): Report {
    return this.report;
  }

  /** Computed fields keyed by their target path. */
  getCalculatedValues(): Record<string, FieldValue> {
    return Object.fromEntries(this.calculated);
  }

  private availableFields(): AvailableFields {
    const available: AvailableFields = {};
    for (const section of REPORT_SECTIONS) {
      const data = this.report[section];
      if (isPlainObject(data)) {
        available[section] = Object.keys(data);
      }
    }
    return available;
  }
}

export function toCalculatedPath(sourceField: string): string {
  return sourceField.startsWith(CALCULATED_PREFIX)
    ? sourceField
    : `${CALCULATED_PREFIX}${sourceField}`;
}
