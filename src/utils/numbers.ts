/**
 * ReportCalc – Utils / numbers
 *
 * Lenient numeric parsing shared by the calculator and the table pipeline.
 * Report values and grid cells arrive as strings more often than not
 * ("12", " 3.5 ", "1e3"), so every numeric check goes through here.
 *
 * License: Apache-2.0
 */

const INTEGER_PATTERN = /^[+-]?\d+(?:_\d+)*$/;
const FLOAT_PATTERN =
  /^[+-]?(?:(?:\d+(?:_\d+)*)?\.\d+(?:_\d+)*|\d+(?:_\d+)*\.?)(?:[eE][+-]?\d+(?:_\d+)*)?$/;
const SPECIAL_PATTERN = /^[+-]?(?:inf|infinity|nan)$/i;

/**
 * Numeric value of `value`, or null when it has none.
 *
 * Numbers pass through, booleans count as 0/1, and strings are parsed with
 * surrounding whitespace ignored. "inf" and "nan" spellings are accepted.
 */
export function toNumeric(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (text.length === 0) return null;

  if (FLOAT_PATTERN.test(text)) {
    return Number(text.replace(/_/g, ''));
  }

  if (SPECIAL_PATTERN.test(text)) {
    const negative = text.startsWith('-');
    if (/nan/i.test(text)) return Number.NaN;
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  return null;
}

/**
 * Integer value of a string holding an integer literal, else null.
 */
export function parseIntegerLiteral(value: string): number | null {
  const text = value.trim();
  return INTEGER_PATTERN.test(text) ? Number(text.replace(/_/g, '')) : null;
}

/**
 * Finite numeric value, or null (NaN and infinities count as non-numeric
 * for arithmetic on cells).
 */
export function toFiniteNumber(value: unknown): number | null {
  const num = toNumeric(value);
  return num !== null && Number.isFinite(num) ? num : null;
}

/**
 * Value-entry coercion: a string is parsed once as an integer, then as a
 * float; anything non-numeric (including "") is returned unchanged.
 */
export function coerceFieldValue<T>(value: T): T | number {
  if (typeof value !== 'string') return value;

  const integer = parseIntegerLiteral(value);
  if (integer !== null) return integer;

  const float = toNumeric(value);
  return float !== null ? float : value;
}
