/**
 * ReportCalc – Format specifiers
 *
 * The subset of format specifiers accepted in template slots:
 *
 *   [.precision](d | f | e | g | %)
 *
 *  - f  fixed point, default precision 6
 *  - d  integer; the value must be integral and no precision is allowed
 *  - e  exponential, exponent padded to two digits ("1.50e+03")
 *  - g  general: significant digits, trailing zeros removed
 *  - %  percent: value × 100 in fixed point, followed by "%"
 *
 * Exact ties round half to even, so `.2f` of 0.125 is "0.12".
 *
 * License: Apache-2.0
 */

import { createExecutionError } from './errors';
import type { Value } from './types';

const FORMAT_SPEC_PATTERN = /^(?:\.(\d{1,2}))?([dfge%])$/;

export function isValidFormatSpec(spec: string): boolean {
  return FORMAT_SPEC_PATTERN.test(spec);
}

/**
 * Format `value` with `spec`; with no spec, the plain display string.
 */
export function formatValue(value: Value, spec: string | null): string {
  if (spec === null) return toDisplayString(value);

  const match = FORMAT_SPEC_PATTERN.exec(spec);
  if (!match) {
    throw createExecutionError({ message: `invalid format specifier "${spec}"` });
  }

  const precision = match[1] === undefined ? null : Number(match[1]);
  const type = match[2];

  if (typeof value === 'string') {
    throw createExecutionError({
      message: `format code "${type}" cannot be applied to a string`,
    });
  }
  const num = typeof value === 'boolean' ? Number(value) : value;

  switch (type) {
    case 'd':
      if (precision !== null) {
        throw createExecutionError({
          message: 'precision is not allowed with format code "d"',
        });
      }
      if (!Number.isInteger(num)) {
        throw createExecutionError({
          message: 'format code "d" requires an integral value',
        });
      }
      return toFixed(num, 0);
    case 'f':
      return toFixed(num, precision ?? 6);
    case 'e':
      return toExponential(num, precision ?? 6);
    case 'g':
      return toGeneral(num, precision ?? 6);
    case '%':
      return Number.isFinite(num) ? `${toFixed(num * 100, precision ?? 6)}%` : `${nonFinite(num)}%`;
    default:
      throw createExecutionError({ message: `invalid format specifier "${spec}"` });
  }
}

/**
 * Display form of a value outside any specifier.
 */
export function toDisplayString(value: Value): string {
  if (typeof value === 'number' && !Number.isFinite(value)) return nonFinite(value);
  return String(value);
}

/**
 * Fixed-point with half-to-even rounding on exact ties.
 */
export function toFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);

  // Number#toFixed switches to exponent notation from 1e21 up; such values
  // are integral, so their digits come from BigInt.
  if (Math.abs(value) >= 1e21) {
    return digits > 0 ? `${BigInt(value)}.${'0'.repeat(digits)}` : `${BigInt(value)}`;
  }

  const scale = 10 ** digits;
  const scaled = value * scale;
  const floor = Math.floor(scaled);

  if (scaled - floor === 0.5) {
    const even = floor % 2 === 0 ? floor : floor + 1;
    return (even / scale).toFixed(digits);
  }

  return value.toFixed(digits);
}

function toExponential(value: number, digits: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);
  return padExponent(value.toExponential(digits));
}

function toGeneral(value: number, precision: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);

  const p = precision === 0 ? 1 : precision;
  if (value === 0) return '0';

  const exponential = value.toExponential(p - 1);
  const exp = Number(exponential.slice(exponential.indexOf('e') + 1));

  // toPrecision stays in positional notation over this exponent range and
  // takes up to 100 digits, where toFixed(p - 1 - exp) would exceed its limit.
  if (exp >= -4 && exp < p) {
    return stripTrailingZeros(value.toPrecision(p));
  }

  const [mantissa = '', exponent = ''] = exponential.split('e');
  return padExponent(`${stripTrailingZeros(mantissa)}e${exponent}`);
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/\.?0+$/, '');
}

function padExponent(text: string): string {
  return text.replace(/e([+-])(\d+)$/, (_m, sign: string, digits: string) =>
    `e${sign}${digits.padStart(2, '0')}`,
  );
}

function nonFinite(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  return value > 0 ? 'inf' : '-inf';
}
