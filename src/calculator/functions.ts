/**
 * ReportCalc – Calculation function registry
 *
 * Functions receive already-resolved, already-coerced argument values (a
 * missing argument arrives as `null` outside strict mode) and return a
 * scalar that is written into `calculated_data`.
 *
 *   const functions = createFunctionRegistry()
 *     .register('lumens_per_watt', (flux, watts) => ...);
 *
 * License: Apache-2.0
 */

import { Registry } from '../registry';

/**
 * Scalar a calculation may receive or produce.
 */
export type FieldScalar = string | number | boolean | null;

/**
 * Argument as handed to a calculation function. Paths may point at nested
 * objects or grids, so anything stored in a report can arrive here.
 */
export type CalculationArg = unknown;

export type CalculationFunction = (...args: CalculationArg[]) => unknown;

export type FunctionRegistry = Registry<CalculationFunction>;

export function createFunctionRegistry(
  entries?: Iterable<readonly [string, CalculationFunction]>,
): FunctionRegistry {
  return new Registry<CalculationFunction>('function', entries);
}
