/**
 * ReportCalc – Built-in calculations plugin
 *
 * Functions every calculator starts with. They never throw: bad input
 * yields a documented fallback ("N/A", "0.00%", 0, …) so one malformed
 * report value does not abort a batch.
 *
 *   energy_class_rating(wattage, flux)     → "A++" … "E" | "N/A"
 *   energy_efficacy(wattage, flux)         → "160.00" | "N/A"
 *   percentage(value, total)               → "25.00%"
 *   format_number(value, decimals = 2)     → "3.14"
 *   concat(...values)                      → "a b c"
 *   multiply(a, b)                         → number
 *   divide(a, b, default = 0)              → number
 *
 * The `calculate_energy_class_rating`, `calculate_energy_efficacy` and
 * `calculate_percentage` aliases point at the same functions.
 *
 * License: Apache-2.0
 */

import type { CalculationFunction } from '../calculator/functions';
import { toDisplayString, toFixed } from '../core/format';
import { parseIntegerLiteral, toNumeric } from '../utils/numbers';
import type { Plugin } from './index';

/////////////////////////////
// Energy classes          //
/////////////////////////////

/**
 * Lower efficacy bound (lm/W, inclusive) of each class, best first.
 */
export const ENERGY_CLASS_THRESHOLDS: ReadonlyArray<readonly [string, number]> = [
  ['A++', 210],
  ['A+', 185],
  ['A', 160],
  ['B', 135],
  ['C', 110],
  ['D', 85],
];

export const LOWEST_ENERGY_CLASS = 'E';

function efficacyOf(wattage: unknown, flux: unknown): number | null {
  if (!wattage || !flux) return null;

  const watts = toNumeric(wattage);
  const lumens = toNumeric(flux);
  if (watts === null || lumens === null || watts === 0) return null;

  return lumens / watts;
}

export function energyClassRating(wattage: unknown, flux: unknown): string {
  const efficacy = efficacyOf(wattage, flux);
  if (efficacy === null) return 'N/A';

  for (const [label, min] of ENERGY_CLASS_THRESHOLDS) {
    if (efficacy >= min) return label;
  }
  return LOWEST_ENERGY_CLASS;
}

export function energyEfficacy(wattage: unknown, flux: unknown): string {
  const efficacy = efficacyOf(wattage, flux);
  return efficacy === null ? 'N/A' : toFixed(efficacy, 2);
}

/////////////////////////////
// Generic helpers         //
/////////////////////////////

export function percentage(value: unknown, total: unknown): string {
  if (!total) return '0.00%';

  const part = toNumeric(value);
  const whole = toNumeric(total);
  if (part === null || whole === null || whole === 0) return '0.00%';

  return `${toFixed((part / whole) * 100, 2)}%`;
}

export function formatNumberValue(value: unknown, decimals: unknown = 2): string {
  const num = toNumeric(value);
  const places = toDecimalPlaces(decimals);
  if (num === null || places === null) return displayString(value);

  return toFixed(num, places);
}

/**
 * Join the string form of every non-null value.
 */
export function concat(values: readonly unknown[], separator = ' '): string {
  return values
    .filter((value) => value !== null && value !== undefined)
    .map(displayString)
    .join(separator);
}

export function multiply(a: unknown, b: unknown): number {
  const x = toNumeric(a);
  const y = toNumeric(b);
  return x === null || y === null ? 0 : x * y;
}

export function divide(a: unknown, b: unknown, fallback: unknown = 0): unknown {
  const dividend = toNumeric(a);
  const divisor = toNumeric(b);
  if (dividend === null || divisor === null || divisor === 0) return fallback;

  return dividend / divisor;
}

/////////////////////////////
// Shared conversions      //
/////////////////////////////

/**
 * String form used when a value is written back as text; null and
 * undefined become "".
 */
export function displayString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return toDisplayString(value);
  return JSON.stringify(value) ?? '';
}

/**
 * Decimal places from a number or integer string; null when unusable.
 */
export function toDecimalPlaces(value: unknown): number | null {
  let places: number | null = null;

  if (typeof value === 'number' && Number.isFinite(value)) {
    places = Math.trunc(value);
  } else if (typeof value === 'string') {
    places = parseIntegerLiteral(value);
  }

  return places !== null && places >= 0 && places <= 100 ? places : null;
}

/////////////////////////////
// Plugin                  //
/////////////////////////////

export const BUILTIN_CALCULATIONS: ReadonlyArray<readonly [string, CalculationFunction]> = [
  ['energy_class_rating', energyClassRating],
  ['energy_efficacy', energyEfficacy],
  ['percentage', percentage],
  ['format_number', formatNumberValue],
  ['concat', (...values) => concat(values)],
  ['multiply', multiply],
  ['divide', divide],
  ['calculate_energy_class_rating', energyClassRating],
  ['calculate_energy_efficacy', energyEfficacy],
  ['calculate_percentage', percentage],
];

export const builtinCalculationsPlugin: Plugin = (registries) => {
  for (const [name, fn] of BUILTIN_CALCULATIONS) {
    registries.functions.register(name, fn);
  }
  return registries;
};
