/**
 * ReportCalc – Utils / path navigation
 *
 * Dot-path access into nested plain objects:
 *
 *   getPath(report, 'extracted_data.rated_wattage')
 *
 * Reads never throw. A missing segment, a non-object along the way or an
 * empty path all yield `NOT_FOUND`, which is distinct from a stored `null`.
 *
 * License: Apache-2.0
 */

export const NOT_FOUND: unique symbol = Symbol('reportcalc.notFound');
export type NotFound = typeof NOT_FOUND;

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function splitPath(path: string): string[] {
  return path.split('.');
}

export function getPath(data: unknown, path: string | null | undefined): unknown {
  if (!path) return NOT_FOUND;

  let current: unknown = data;
  for (const segment of splitPath(path)) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return NOT_FOUND;
    }
    current = current[segment];
  }
  return current;
}

export function hasPath(data: unknown, path: string | null | undefined): boolean {
  return getPath(data, path) !== NOT_FOUND;
}

/**
 * Assign `value` at `path`, creating an empty object for every missing or
 * non-object intermediate segment.
 */
export function setPath(data: PlainObject, path: string, value: unknown): void {
  if (!path) {
    throw new TypeError('path must be a non-empty string');
  }

  const segments = splitPath(path);
  const last = segments.pop() ?? path;

  let current = data;
  for (const segment of segments) {
    assertSafeSegment(segment);
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[segment] = created;
      current = created;
    }
  }

  assertSafeSegment(last);
  current[last] = value;
}

const UNSAFE_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

function assertSafeSegment(segment: string): void {
  if (UNSAFE_SEGMENTS.has(segment)) {
    throw new TypeError(`path segment "${segment}" is not allowed`);
  }
}
